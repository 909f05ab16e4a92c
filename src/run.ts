import type { Chunk } from "./bytecode/bytecode.ts";
import { Compiler } from "./bytecode/compiler.ts";
import { run, type VMOptions } from "./bytecode/vm.ts";
import type { Context } from "./context.ts";
import { createContext, type Writer } from "./core.ts";
import { Fault } from "./fault.ts";
import { Lexer } from "./lexer.ts";
import type { Value } from "./value.ts";

export type Outcome =
  | { ok: true; value: Value }
  | { ok: false; fault: Fault };

export interface ExecuteOptions extends VMOptions {
  /** Sink for `print`; ignored when `context` is given. */
  write?: Writer;
  /** Reuse an existing context instead of a fresh one. */
  context?: Context;
}

export const compile = (src: string, filename = "<input>"): Chunk =>
  new Compiler(new Lexer(src, filename)).compile();

/**
 * Compiles and runs a whole program. Faults come back as a failed
 * outcome; nothing runs if compilation fails.
 */
export const execute = (
  src: string,
  filename = "<input>",
  options: ExecuteOptions = {},
): Outcome => {
  try {
    const chunk = compile(src, filename);
    const context = options.context ?? createContext(options.write);
    return { ok: true, value: run(chunk, context, { trace: options.trace }) };
  } catch (e) {
    if (e instanceof Fault) return { ok: false, fault: e };
    throw e;
  }
};
