import { expect, test } from "vitest";
import { dis, type Instruction, Op } from "../src/bytecode/bytecode.ts";
import { SyntaxFault } from "../src/fault.ts";
import { compile } from "../src/run.ts";
import { FALSE, float, int, NONE } from "../src/value.ts";

const push = (n: bigint): Instruction => ({ op: Op.PUSH_CONST, value: int(n) });

test("Compiler", () => {
  const chunk = compile("1 + 2 * 3");
  expect(chunk.code).toEqual([
    push(1n),
    push(2n),
    push(3n),
    { op: Op.BINARY, kind: "mul" },
    { op: Op.BINARY, kind: "add" },
  ]);
});

test("leading minus negates only the first term", () => {
  expect(compile("-2 * 3 + 4").code).toEqual([
    push(2n),
    push(3n),
    { op: Op.BINARY, kind: "mul" },
    { op: Op.NEG },
    push(4n),
    { op: Op.BINARY, kind: "add" },
  ]);
  expect(compile("+2.5").code).toEqual([
    { op: Op.PUSH_CONST, value: float(2.5) },
  ]);
});

test("assignment and sequencing", () => {
  expect(compile("x = 5; x + 1").code).toEqual([
    { op: Op.PUSH_VAR_NAME, name: "x" },
    push(5n),
    { op: Op.ASSIGN },
    { op: Op.POP },
    { op: Op.LOAD_VAR, name: "x" },
    push(1n),
    { op: Op.BINARY, kind: "add" },
  ]);
});

test("if without else pushes NONE", () => {
  expect(compile("if FALSE then 1 end").code).toEqual([
    { op: Op.PUSH_CONST, value: FALSE },
    { op: Op.JUMP_IF_FALSE, target: 4 },
    push(1n),
    { op: Op.JUMP, target: 5 },
    { op: Op.PUSH_CONST, value: NONE },
  ]);
});

test("if with else", () => {
  expect(compile("if a then 1 else 2 end").code).toEqual([
    { op: Op.LOAD_VAR, name: "a" },
    { op: Op.JUMP_IF_FALSE, target: 4 },
    push(1n),
    { op: Op.JUMP, target: 5 },
    push(2n),
  ]);
});

test("while loop jumps back to the condition", () => {
  expect(compile("while i < 3 do i = i + 1 end").code).toEqual([
    { op: Op.PUSH_CONST, value: NONE },
    { op: Op.LOAD_VAR, name: "i" },
    push(3n),
    { op: Op.BINARY, kind: "lt" },
    { op: Op.JUMP_IF_FALSE, target: 12 },
    { op: Op.POP },
    { op: Op.PUSH_VAR_NAME, name: "i" },
    { op: Op.LOAD_VAR, name: "i" },
    push(1n),
    { op: Op.BINARY, kind: "add" },
    { op: Op.ASSIGN },
    { op: Op.JUMP, target: 1 },
  ]);
});

test("call arguments are collected into a list", () => {
  expect(compile("print(1, 2)").code).toEqual([
    { op: Op.LOAD_VAR, name: "print" },
    { op: Op.MAKE_LIST },
    push(1n),
    { op: Op.BINARY, kind: "listAppend" },
    push(2n),
    { op: Op.BINARY, kind: "listAppend" },
    { op: Op.BINARY, kind: "call" },
  ]);
  expect(compile("f()()").code).toEqual([
    { op: Op.LOAD_VAR, name: "f" },
    { op: Op.MAKE_LIST },
    { op: Op.BINARY, kind: "call" },
    { op: Op.MAKE_LIST },
    { op: Op.BINARY, kind: "call" },
  ]);
});

test("compiling the same text twice gives the same tape", () => {
  const src = "n = 3; while n > 0 do print(n); n = n - 1 end";
  expect(compile(src)).toEqual(compile(src));
});

test("instructions remember their source position", () => {
  const chunk = compile("a +\n  b", "pos.ev");
  expect(chunk.filename).toBe("pos.ev");
  expect(chunk.positions).toEqual([
    { row: 1, col: 1 },
    { row: 2, col: 3 },
    { row: 1, col: 3 },
  ]);
});

test("dis", () => {
  expect(dis(compile("x = 2 / 4"))).toBe(
    [
      "0000: PUSH_VAR_NAME   x",
      "0001: PUSH_CONST      2",
      "0002: PUSH_CONST      4",
      "0003: BINARY          div",
      "0004: ASSIGN",
    ].join("\n"),
  );
  expect(dis(compile("if x then 1 end")).split("\n")[1]).toBe(
    "0001: JUMP_IF_FALSE   -> 0004",
  );
});

test("unterminated expression faults at end of input", () => {
  expect(() => compile("(1 + ", "test.ev")).toThrowError(SyntaxFault);
  expect(() => compile("(1 + ", "test.ev")).toThrowError(
    "test.ev:1:6:Expected number, name or '(', but got end of input",
  );
});

test("syntax faults name what was expected", () => {
  expect(() => compile("if TRUE 1 end")).toThrowError(
    "<input>:1:9:Expected 'then', but got number 1",
  );
  expect(() => compile("1 2")).toThrowError(
    "<input>:1:3:Expected end of input, but got number 2",
  );
  expect(() => compile("(1; 2")).toThrowError(
    "<input>:1:6:Expected ')', but got end of input",
  );
  expect(() => compile("while x do y")).toThrowError(
    "<input>:1:13:Expected 'end', but got end of input",
  );
  expect(() => compile("f(1,)")).toThrowError(
    "<input>:1:5:Expected number, name or '(', but got ')'",
  );
});

test("relational operators do not chain", () => {
  expect(() => compile("1 < 2 < 3")).toThrowError(
    "<input>:1:7:Expected end of input, but got '<'",
  );
});
