import { expect, test } from "vitest";
import { Context } from "../src/context.ts";
import { createContext } from "../src/core.ts";
import { NameFault, TypeFault } from "../src/fault.ts";
import { float, int, NONE, type Value } from "../src/value.ts";

const call = (fn: Value, args: Value[]): Value => {
  if (fn.type !== "NativeFunc") throw new Error(`${fn.type} is not callable`);
  return fn.fn(args);
};

test("Context", () => {
  const context = new Context();
  context.setVar("test", int(1n));
  expect(context.getVar("test")).toEqual(int(1n));
  context.setVar("test", int(2n));
  expect(context.getVar("test")).toEqual(int(2n));
  expect(context.hasVar("other")).toBe(false);
});

test("missing variable", () => {
  expect(() => new Context().getVar("test")).toThrowError(NameFault);
  expect(() => new Context().getVar("test")).toThrowError(
    "No variable 'test' found",
  );
});

test("built-ins", () => {
  const out: string[] = [];
  const context = createContext((text) => out.push(text));
  expect(context.names()).toEqual(["pi", "e", "sin", "print"]);
  expect(context.getVar("pi")).toEqual(float(Math.PI));
  expect(context.getVar("e")).toEqual(float(Math.E));

  expect(call(context.getVar("sin"), [int(0n)])).toEqual(float(0));
  expect(call(context.getVar("print"), [int(1n), float(2), NONE])).toEqual(NONE);
  expect(call(context.getVar("print"), [])).toEqual(NONE);
  expect(out).toEqual(["1 2.0 NONE\n", "\n"]);
});

test("sin checks its argument", () => {
  const sin = createContext().getVar("sin");
  expect(() => call(sin, [])).toThrowError(TypeFault);
  expect(() => call(sin, [int(1n), int(2n)])).toThrowError(
    "sin expects 1 argument, got 2",
  );
  expect(() => call(sin, [NONE])).toThrowError(
    "sin expects a number, got Null",
  );
});
