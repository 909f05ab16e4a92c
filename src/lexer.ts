import { LexicalFault } from "./fault.ts";
import {
  keywords,
  type Position,
  type SymbolToken,
  type Token,
  TokenType,
} from "./token.ts";
import { isalnum, isalpha, isdigit, isspace } from "./utils.ts";

const twoCharOps = new Map<string, SymbolToken["type"]>([
  ["<=", TokenType.COMP_LE],
  [">=", TokenType.COMP_GE],
  ["==", TokenType.COMP_EQ],
  ["!=", TokenType.COMP_NE],
]);

const oneCharOps = new Map<string, SymbolToken["type"]>([
  ["+", TokenType.OP_ADD],
  ["-", TokenType.OP_SUB],
  ["*", TokenType.OP_MUL],
  ["/", TokenType.OP_DIV],
  ["(", TokenType.LPAREN],
  [")", TokenType.RPAREN],
  ["=", TokenType.OP_EQ],
  [";", TokenType.SEMICOLON],
  [",", TokenType.COMMA],
  ["<", TokenType.COMP_LT],
  [">", TokenType.COMP_GT],
]);

/**Lexer */
export class Lexer {
  private pos = 0;
  private row = 1;
  private col = 1;
  private tok: Token;

  constructor(private src: string, public readonly filename = "<input>") {
    this.tok = { type: TokenType.EOF, pos: this.position() };
    this.nextToken();
  }

  private current = (): string => {
    const cp = this.src.codePointAt(this.pos);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  };

  private bump = (): void => {
    const ch = this.current();
    if (ch === "\n") {
      this.row++;
      this.col = 1;
    } else if (ch !== "") {
      this.col++;
    }
    this.pos += ch.length;
  };

  private position = (): Position => ({ row: this.row, col: this.col });

  private skipSpaces = (): void => {
    while (isspace(this.current())) this.bump();
  };

  private parseNumber = (pos: Position): Token => {
    let text = "";
    while (isdigit(this.current())) {
      text += this.current();
      this.bump();
    }

    if (this.current() !== ".") {
      return {
        type: TokenType.NUMBER,
        value: BigInt(text),
        isFloat: false,
        text,
        pos,
      };
    }

    text += ".";
    this.bump();
    while (isdigit(this.current())) {
      text += this.current();
      this.bump();
    }
    return {
      type: TokenType.NUMBER,
      value: parseFloat(text),
      isFloat: true,
      text,
      pos,
    };
  };

  private parseAlpha = (pos: Position): Token => {
    let word = "";
    while (isalnum(this.current())) {
      word += this.current();
      this.bump();
    }
    const keyword = keywords.get(word);
    if (keyword !== undefined) return { type: keyword, pos };
    return { type: TokenType.IDENT, name: word, pos };
  };

  public nextToken = (): void => {
    this.skipSpaces();
    const pos = this.position();
    const ch = this.current();

    if (ch === "") {
      this.tok = { type: TokenType.EOF, pos };
      return;
    }
    if (isalpha(ch)) {
      this.tok = this.parseAlpha(pos);
      return;
    }
    if (isdigit(ch)) {
      this.tok = this.parseNumber(pos);
      return;
    }

    const pair = twoCharOps.get(this.src.slice(this.pos, this.pos + 2));
    if (pair !== undefined) {
      this.bump();
      this.bump();
      this.tok = { type: pair, pos };
      return;
    }

    const single = oneCharOps.get(ch);
    if (single !== undefined) {
      this.bump();
      this.tok = { type: single, pos };
      return;
    }

    const snippet = [...this.src.slice(this.pos, this.pos + 6)].slice(0, 3);
    throw new LexicalFault(
      `Bad string '${snippet.join("")}...'`,
      { filename: this.filename, ...pos },
    );
  };

  public currentToken = (): Token => {
    return this.tok;
  };
}

/** Lexes the whole source; the last token is always EOF. */
export const tokenize = (src: string, filename?: string): Token[] => {
  const lexer = new Lexer(src, filename);
  const tokens: Token[] = [lexer.currentToken()];
  while (lexer.currentToken().type !== TokenType.EOF) {
    lexer.nextToken();
    tokens.push(lexer.currentToken());
  }
  return tokens;
};
