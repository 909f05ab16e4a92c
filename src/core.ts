import { Context } from "./context.ts";
import { TypeFault } from "./fault.ts";
import {
  expectNumber,
  float,
  type NativeFunc,
  NONE,
  show,
  toNumber,
  type Value,
} from "./value.ts";

export type Writer = (text: string) => void;

export const stdoutWriter: Writer = (text) => {
  process.stdout.write(text);
};

const native = (name: string, fn: NativeFunc["fn"]): NativeFunc => ({
  type: "NativeFunc",
  name,
  fn,
});

export const nativeFuncs = (write: Writer): Record<string, Value> => ({
  pi: float(Math.PI),
  e: float(Math.E),
  sin: native("sin", (args) => {
    if (args.length !== 1) {
      throw new TypeFault(`sin expects 1 argument, got ${args.length}`);
    }
    return float(Math.sin(toNumber(expectNumber(args[0], "sin"))));
  }),
  print: native("print", (args) => {
    write(`${args.map(show).join(" ")}\n`);
    return NONE;
  }),
});

/** A fresh context seeded with the built-ins; `print` goes to `write`. */
export const createContext = (write: Writer = stdoutWriter): Context =>
  new Context(nativeFuncs(write));
