export const enum TokenType {
  OP_ADD,
  OP_SUB,
  OP_MUL,
  OP_DIV,
  OP_EQ,
  COMP_EQ,
  COMP_NE,
  COMP_GT,
  COMP_GE,
  COMP_LT,
  COMP_LE,
  LPAREN,
  RPAREN,
  SEMICOLON,
  COMMA,
  IF,
  THEN,
  ELSE,
  END,
  WHILE,
  DO,
  TRUE,
  FALSE,
  NONE,
  NUMBER,
  IDENT,
  EOF,
}

export type Position = {
  row: number;
  col: number;
};

export type IdentToken = {
  type: TokenType.IDENT;
  name: string;
  pos: Position;
};

// integer literals keep every digit
export type NumberToken =
  | {
    type: TokenType.NUMBER;
    isFloat: false;
    value: bigint;
    text: string;
    pos: Position;
  }
  | {
    type: TokenType.NUMBER;
    isFloat: true;
    value: number;
    text: string;
    pos: Position;
  };

export type SymbolToken = {
  type: Exclude<TokenType, TokenType.IDENT | TokenType.NUMBER>;
  pos: Position;
};

export type Token = IdentToken | NumberToken | SymbolToken;

export const keywords = new Map<string, SymbolToken["type"]>([
  ["if", TokenType.IF],
  ["then", TokenType.THEN],
  ["else", TokenType.ELSE],
  ["end", TokenType.END],
  ["while", TokenType.WHILE],
  ["do", TokenType.DO],
  ["TRUE", TokenType.TRUE],
  ["FALSE", TokenType.FALSE],
  ["NONE", TokenType.NONE],
]);

export const tokenNames: Record<TokenType, string> = {
  [TokenType.OP_ADD]: "'+'",
  [TokenType.OP_SUB]: "'-'",
  [TokenType.OP_MUL]: "'*'",
  [TokenType.OP_DIV]: "'/'",
  [TokenType.OP_EQ]: "'='",
  [TokenType.COMP_EQ]: "'=='",
  [TokenType.COMP_NE]: "'!='",
  [TokenType.COMP_GT]: "'>'",
  [TokenType.COMP_GE]: "'>='",
  [TokenType.COMP_LT]: "'<'",
  [TokenType.COMP_LE]: "'<='",
  [TokenType.LPAREN]: "'('",
  [TokenType.RPAREN]: "')'",
  [TokenType.SEMICOLON]: "';'",
  [TokenType.COMMA]: "','",
  [TokenType.IF]: "'if'",
  [TokenType.THEN]: "'then'",
  [TokenType.ELSE]: "'else'",
  [TokenType.END]: "'end'",
  [TokenType.WHILE]: "'while'",
  [TokenType.DO]: "'do'",
  [TokenType.TRUE]: "'TRUE'",
  [TokenType.FALSE]: "'FALSE'",
  [TokenType.NONE]: "'NONE'",
  [TokenType.NUMBER]: "number",
  [TokenType.IDENT]: "name",
  [TokenType.EOF]: "end of input",
};

export const describeToken = (tok: Token): string => {
  switch (tok.type) {
    case TokenType.IDENT:
      return `name '${tok.name}'`;
    case TokenType.NUMBER:
      return `number ${tok.text}`;
    default:
      return tokenNames[tok.type];
  }
};
