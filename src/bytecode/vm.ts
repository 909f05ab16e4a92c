import type { Context } from "../context.ts";
import {
  ArithmeticFault,
  Fault,
  MalformedTapeFault,
  type SourceLocation,
  TypeFault,
} from "../fault.ts";
import { unreachable } from "../utils.ts";
import {
  bool,
  compareNumbers,
  equals,
  expectNumber,
  float,
  int,
  isTruthy,
  list,
  type NumberValue,
  toNumber,
  type Value,
} from "../value.ts";
import { type BinaryOp, type Chunk, type Instruction, Op } from "./bytecode.ts";

/** The left side of an assignment waiting for its value. */
export type VarName = { type: "Name"; name: string };

export type StackItem = Value | VarName;

export interface VMOptions {
  /** Called before each instruction executes. */
  trace?: (
    ip: number,
    instr: Instruction,
    stack: readonly StackItem[],
  ) => void;
}

const symbols: Record<BinaryOp, string> = {
  add: "+",
  sub: "-",
  mul: "*",
  div: "/",
  lt: "<",
  le: "<=",
  gt: ">",
  ge: ">=",
  eq: "==",
  ne: "!=",
  listAppend: "listAppend",
  call: "call",
};

type ArithOp = "add" | "sub" | "mul";

const intOps: Record<ArithOp, (x: bigint, y: bigint) => bigint> = {
  add: (x, y) => x + y,
  sub: (x, y) => x - y,
  mul: (x, y) => x * y,
};

const floatOps: Record<ArithOp, (x: number, y: number) => number> = {
  add: (x, y) => x + y,
  sub: (x, y) => x - y,
  mul: (x, y) => x * y,
};

// Int op Int stays exact; a Float on either side makes the result a Float.
const arith = (op: ArithOp, a: NumberValue, b: NumberValue): NumberValue => {
  if (a.type === "Int" && b.type === "Int") {
    return int(intOps[op](a.value, b.value));
  }
  return float(floatOps[op](toNumber(a), toNumber(b)));
};

const divideInts = (x: bigint, y: bigint): number => {
  const safe = BigInt(Number.MAX_SAFE_INTEGER);
  const small = (n: bigint) => -safe <= n && n <= safe;
  if (small(x) && small(y)) return Number(x) / Number(y);
  // too wide for a double: split into quotient and remainder first
  return Number(x / y) + Number(x % y) / Number(y);
};

/** Stack machine executing a compiled tape. */
export class VM {
  private ip = 0;
  private stack: StackItem[] = [];

  constructor(
    private chunk: Chunk,
    private context: Context,
    private options: VMOptions = {},
  ) {}

  public run = (): Value => {
    const code = this.chunk.code;
    while (this.ip < code.length) {
      const instr = code[this.ip];
      this.options.trace?.(this.ip, instr, this.stack);
      try {
        this.step(instr);
      } catch (e) {
        const where = this.location();
        if (e instanceof Fault && where) e.locate(where);
        throw e;
      }
    }

    if (this.stack.length !== 1) {
      throw new MalformedTapeFault(
        `Expected one value on the stack at halt, found ${this.stack.length}`,
      );
    }
    return this.popValue();
  };

  private location = (): SourceLocation | undefined => {
    const pos = this.chunk.positions[this.ip];
    if (pos === undefined) return undefined;
    return { filename: this.chunk.filename, ...pos };
  };

  private pop = (): StackItem => {
    const item = this.stack.pop();
    if (item === undefined) throw new MalformedTapeFault("Stack underflow");
    return item;
  };

  private popValue = (): Value => {
    const item = this.pop();
    if (item.type === "Name") {
      throw new MalformedTapeFault(`Unexpected variable name '${item.name}'`);
    }
    return item;
  };

  private popName = (): string => {
    const item = this.pop();
    if (item.type !== "Name") {
      throw new MalformedTapeFault(
        `Expected a variable name, got ${item.type}`,
      );
    }
    return item.name;
  };

  private jump = (target: number): void => {
    const inRange = target >= 0 && target <= this.chunk.code.length;
    if (!Number.isInteger(target) || !inRange) {
      throw new MalformedTapeFault(`Jump target ${target} is out of range`);
    }
    this.ip = target;
  };

  private step = (instr: Instruction): void => {
    switch (instr.op) {
      case Op.PUSH_CONST:
        this.stack.push(instr.value);
        break;
      case Op.LOAD_VAR:
        this.stack.push(this.context.getVar(instr.name));
        break;
      case Op.PUSH_VAR_NAME:
        this.stack.push({ type: "Name", name: instr.name });
        break;
      case Op.NEG: {
        const v = expectNumber(this.popValue(), "unary '-'");
        this.stack.push(v.type === "Int" ? int(-v.value) : float(-v.value));
        break;
      }
      case Op.BINARY: {
        const right = this.popValue();
        const left = this.popValue();
        this.stack.push(this.binary(instr.kind, left, right));
        break;
      }
      case Op.ASSIGN: {
        const value = this.popValue();
        const name = this.popName();
        this.context.setVar(name, value);
        this.stack.push(value);
        break;
      }
      case Op.POP:
        this.popValue();
        break;
      case Op.MAKE_LIST:
        this.stack.push(list([]));
        break;
      case Op.JUMP_IF_FALSE: {
        const cond = this.popValue();
        if (!isTruthy(cond)) return this.jump(instr.target);
        break;
      }
      case Op.JUMP:
        return this.jump(instr.target);
      default:
        return unreachable(instr, "instruction");
    }
    this.ip++;
  };

  private binary = (kind: BinaryOp, left: Value, right: Value): Value => {
    const what = `'${symbols[kind]}'`;
    const operands = (): [NumberValue, NumberValue] => [
      expectNumber(left, what),
      expectNumber(right, what),
    ];

    switch (kind) {
      case "add":
      case "sub":
      case "mul":
        return arith(kind, ...operands());
      case "div": {
        const [x, y] = operands();
        if (toNumber(y) === 0) throw new ArithmeticFault("Division by zero");
        if (x.type === "Int" && y.type === "Int") {
          return float(divideInts(x.value, y.value));
        }
        return float(toNumber(x) / toNumber(y));
      }
      case "lt":
        return bool(compareNumbers(...operands()) < 0);
      case "le":
        return bool(compareNumbers(...operands()) <= 0);
      case "gt":
        return bool(compareNumbers(...operands()) > 0);
      case "ge":
        return bool(compareNumbers(...operands()) >= 0);
      case "eq":
        return bool(equals(left, right));
      case "ne":
        return bool(!equals(left, right));
      case "listAppend": {
        if (left.type !== "List") {
          throw new MalformedTapeFault(`Cannot append to ${left.type}`);
        }
        return list([...left.items, right]);
      }
      case "call": {
        if (left.type !== "NativeFunc") {
          throw new TypeFault(`${left.type} value is not callable`);
        }
        if (right.type !== "List") {
          throw new MalformedTapeFault(
            `Expected an argument list, got ${right.type}`,
          );
        }
        return left.fn(right.items);
      }
      default:
        return unreachable(kind, "binary operation");
    }
  };
}

export const run = (
  chunk: Chunk,
  context: Context,
  options?: VMOptions,
): Value => new VM(chunk, context, options).run();
