import { SyntaxFault } from "../fault.ts";
import type { Lexer } from "../lexer.ts";
import { describeToken, type Position, type Token, TokenType } from "../token.ts";
import { FALSE, float, int, NONE, TRUE } from "../value.ts";
import { type BinaryOp, type Chunk, type Instruction, Op } from "./bytecode.ts";

const relOps = new Map<TokenType, BinaryOp>([
  [TokenType.COMP_LT, "lt"],
  [TokenType.COMP_LE, "le"],
  [TokenType.COMP_GT, "gt"],
  [TokenType.COMP_GE, "ge"],
  [TokenType.COMP_EQ, "eq"],
  [TokenType.COMP_NE, "ne"],
]);

/**
 * Single-pass recursive-descent compiler. Every grammar rule emits its
 * instructions while it is recognised; there is no intermediate tree.
 *
 * ```
 * program    := exprlist EOF
 * exprlist   := expr { ';' expr }
 * expr       := arexpr [ relop arexpr ]
 * arexpr     := [ '+' | '-' ] term { ('+'|'-') term }
 * term       := factor { ('*'|'/') factor }
 * factor     := primary { args } | NUMBER | '(' exprlist ')'
 * primary    := IDENT [ '=' expr ] | TRUE | FALSE | NONE | if | while
 * if         := 'if' expr 'then' exprlist [ 'else' exprlist ] 'end'
 * while      := 'while' expr 'do' exprlist 'end'
 * args       := '(' [ expr { ',' expr } ] ')'
 * ```
 */
export class Compiler {
  private codes: Instruction[] = [];
  private positions: Position[] = [];

  constructor(private lexer: Lexer) {}

  public compile = (): Chunk => {
    this.exprList();
    this.expect(TokenType.EOF, "end of input");
    return {
      filename: this.lexer.filename,
      code: this.codes,
      positions: this.positions,
    };
  };

  /** Appends an instruction and returns its tape index. */
  private emit = (instr: Instruction, pos: Position): number => {
    this.codes.push(instr);
    this.positions.push(pos);
    return this.codes.length - 1;
  };

  private patchJumpAddr = (at: number): void => {
    const instr = this.codes[at];
    if (instr.op !== Op.JUMP && instr.op !== Op.JUMP_IF_FALSE) {
      throw new Error(`Cannot patch non-jump instruction at ${at}`);
    }
    this.codes[at] = { ...instr, target: this.codes.length };
  };

  private current = (): Token => this.lexer.currentToken();

  private error = (expected: string): never => {
    const tok = this.current();
    throw new SyntaxFault(
      `Expected ${expected}, but got ${describeToken(tok)}`,
      { filename: this.lexer.filename, ...tok.pos },
    );
  };

  private expect = (type: TokenType, expected: string): void => {
    if (this.current().type !== type) this.error(expected);
    this.lexer.nextToken();
  };

  private exprList = (): void => {
    this.expr();
    while (this.current().type === TokenType.SEMICOLON) {
      this.emit({ op: Op.POP }, this.current().pos);
      this.lexer.nextToken();
      this.expr();
    }
  };

  private expr = (): void => {
    this.arExpr();
    const tok = this.current();
    const kind = relOps.get(tok.type);
    if (kind === undefined) return;
    this.lexer.nextToken();
    this.arExpr();
    this.emit({ op: Op.BINARY, kind }, tok.pos);
  };

  private arExpr = (): void => {
    const first = this.current();
    const negate = first.type === TokenType.OP_SUB;
    if (negate || first.type === TokenType.OP_ADD) this.lexer.nextToken();

    this.term();
    if (negate) this.emit({ op: Op.NEG }, first.pos);

    while (true) {
      const tok = this.current();
      if (tok.type !== TokenType.OP_ADD && tok.type !== TokenType.OP_SUB) {
        return;
      }
      this.lexer.nextToken();
      this.term();
      this.emit({
        op: Op.BINARY,
        kind: tok.type === TokenType.OP_ADD ? "add" : "sub",
      }, tok.pos);
    }
  };

  private term = (): void => {
    this.factor();
    while (true) {
      const tok = this.current();
      if (tok.type !== TokenType.OP_MUL && tok.type !== TokenType.OP_DIV) {
        return;
      }
      this.lexer.nextToken();
      this.factor();
      this.emit({
        op: Op.BINARY,
        kind: tok.type === TokenType.OP_MUL ? "mul" : "div",
      }, tok.pos);
    }
  };

  private factor = (): void => {
    const tok = this.current();
    switch (tok.type) {
      case TokenType.NUMBER: {
        const value = tok.isFloat ? float(tok.value) : int(tok.value);
        this.emit({ op: Op.PUSH_CONST, value }, tok.pos);
        this.lexer.nextToken();
        return;
      }
      case TokenType.LPAREN: {
        this.lexer.nextToken();
        this.exprList();
        this.expect(TokenType.RPAREN, "')'");
        return;
      }
      case TokenType.IDENT:
      case TokenType.TRUE:
      case TokenType.FALSE:
      case TokenType.NONE:
      case TokenType.IF:
      case TokenType.WHILE: {
        this.primary();
        while (this.current().type === TokenType.LPAREN) this.args();
        return;
      }
      default:
        return this.error("number, name or '('");
    }
  };

  private primary = (): void => {
    const tok = this.current();
    switch (tok.type) {
      case TokenType.IDENT: {
        this.lexer.nextToken();
        if (this.current().type !== TokenType.OP_EQ) {
          this.emit({ op: Op.LOAD_VAR, name: tok.name }, tok.pos);
          return;
        }
        const eq = this.current();
        this.emit({ op: Op.PUSH_VAR_NAME, name: tok.name }, tok.pos);
        this.lexer.nextToken();
        this.expr();
        this.emit({ op: Op.ASSIGN }, eq.pos);
        return;
      }
      case TokenType.TRUE:
      case TokenType.FALSE:
      case TokenType.NONE: {
        const value = tok.type === TokenType.TRUE
          ? TRUE
          : tok.type === TokenType.FALSE
          ? FALSE
          : NONE;
        this.emit({ op: Op.PUSH_CONST, value }, tok.pos);
        this.lexer.nextToken();
        return;
      }
      case TokenType.IF:
        return this.ifStmt();
      case TokenType.WHILE:
        return this.whileStmt();
      default:
        return this.error("name, TRUE, FALSE, NONE, 'if' or 'while'");
    }
  };

  private ifStmt = (): void => {
    const start = this.current().pos;
    this.lexer.nextToken();
    this.expr();
    const thenPos = this.emit({ op: Op.JUMP_IF_FALSE, target: -1 }, start);
    this.expect(TokenType.THEN, "'then'");
    this.exprList();

    const endPos = this.emit({ op: Op.JUMP, target: -1 }, start);
    this.patchJumpAddr(thenPos);

    if (this.current().type === TokenType.ELSE) {
      this.lexer.nextToken();
      this.exprList();
    } else {
      // an if without else still yields a value
      this.emit({ op: Op.PUSH_CONST, value: NONE }, start);
    }
    this.expect(TokenType.END, "'end'");
    this.patchJumpAddr(endPos);
  };

  private whileStmt = (): void => {
    const start = this.current().pos;
    this.lexer.nextToken();

    // value of a loop whose body never runs
    this.emit({ op: Op.PUSH_CONST, value: NONE }, start);
    const loopPos = this.codes.length;
    this.expr();
    const exitPos = this.emit({ op: Op.JUMP_IF_FALSE, target: -1 }, start);
    this.expect(TokenType.DO, "'do'");

    // drop the previous iteration's value (or the initial NONE)
    this.emit({ op: Op.POP }, start);
    this.exprList();
    this.emit({ op: Op.JUMP, target: loopPos }, start);
    this.expect(TokenType.END, "'end'");
    this.patchJumpAddr(exitPos);
  };

  private args = (): void => {
    const open = this.current().pos;
    this.lexer.nextToken();
    this.emit({ op: Op.MAKE_LIST }, open);

    if (this.current().type !== TokenType.RPAREN) {
      this.expr();
      this.emit({ op: Op.BINARY, kind: "listAppend" }, open);
      while (this.current().type === TokenType.COMMA) {
        this.lexer.nextToken();
        this.expr();
        this.emit({ op: Op.BINARY, kind: "listAppend" }, open);
      }
    }
    this.expect(TokenType.RPAREN, "')'");
    this.emit({ op: Op.BINARY, kind: "call" }, open);
  };
}
