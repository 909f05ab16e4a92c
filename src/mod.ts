export { Lexer, tokenize } from "./lexer.ts";
export { describeToken, type Position, type Token, TokenType } from "./token.ts";
export { Compiler } from "./bytecode/compiler.ts";
export {
  type BinaryOp,
  type Chunk,
  dis,
  formatInstruction,
  type Instruction,
  Op,
} from "./bytecode/bytecode.ts";
export { run, type StackItem, VM, type VMOptions } from "./bytecode/vm.ts";
export { Context } from "./context.ts";
export { createContext, nativeFuncs, type Writer } from "./core.ts";
export * from "./fault.ts";
export * from "./value.ts";
export { compile, execute, type ExecuteOptions, type Outcome } from "./run.ts";
