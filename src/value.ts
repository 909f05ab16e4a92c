import { TypeFault } from "./fault.ts";
import { unreachable } from "./utils.ts";

export type IntValue = { type: "Int"; value: bigint };
export type FloatValue = { type: "Float"; value: number };
export type BoolValue = { type: "Bool"; value: boolean };
export type NullValue = { type: "Null" };
export type ListValue = { type: "List"; items: Value[] };
export type NativeFunc = {
  type: "NativeFunc";
  name: string;
  fn: (args: Value[]) => Value;
};

export type NumberValue = IntValue | FloatValue;

export type Value =
  | IntValue
  | FloatValue
  | BoolValue
  | NullValue
  | ListValue
  | NativeFunc;

export const NONE: NullValue = { type: "Null" };
export const TRUE: BoolValue = { type: "Bool", value: true };
export const FALSE: BoolValue = { type: "Bool", value: false };

export const int = (value: bigint): IntValue => ({ type: "Int", value });
export const float = (value: number): FloatValue => ({ type: "Float", value });
export const bool = (value: boolean): BoolValue => value ? TRUE : FALSE;
export const list = (items: Value[]): ListValue => ({ type: "List", items });

export const isNumber = (v: Value): v is NumberValue =>
  v.type === "Int" || v.type === "Float";

export const toNumber = (v: NumberValue): number =>
  v.type === "Int" ? Number(v.value) : v.value;

/**
 * Three-way numeric comparison; NaN when the operands are unordered.
 * Two Ints compare exactly.
 */
export const compareNumbers = (a: NumberValue, b: NumberValue): number => {
  if (a.type === "Int" && b.type === "Int") {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  const x = toNumber(a);
  const y = toNumber(b);
  return x < y ? -1 : x > y ? 1 : x === y ? 0 : NaN;
};

const numbersEqual = (a: NumberValue, b: NumberValue): boolean => {
  if (a.type === "Int" && b.type === "Int") return a.value === b.value;
  if (a.type === "Float" && b.type === "Float") return a.value === b.value;
  const i = a.type === "Int" ? a.value : b.type === "Int" ? b.value : 0n;
  const f = a.type === "Float" ? a.value : b.type === "Float" ? b.value : 0;
  return Number.isInteger(f) && BigInt(f) === i;
};

/** Narrows to a number or raises a TypeFault naming the operation. */
export const expectNumber = (v: Value, what: string): NumberValue => {
  if (isNumber(v)) return v;
  throw new TypeFault(`${what} expects a number, got ${v.type}`);
};

export const isTruthy = (v: Value): boolean => {
  switch (v.type) {
    case "Null":
      return false;
    case "Bool":
      return v.value;
    case "Int":
    case "Float":
    case "List":
    case "NativeFunc":
      return true;
    default:
      return unreachable(v, "value");
  }
};

export const equals = (a: Value, b: Value): boolean => {
  if (isNumber(a) && isNumber(b)) return numbersEqual(a, b);
  switch (a.type) {
    case "Bool":
      return b.type === "Bool" && a.value === b.value;
    case "Null":
      return b.type === "Null";
    case "List":
      return b.type === "List" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => equals(item, b.items[i]));
    case "NativeFunc":
      return a === b;
    case "Int":
    case "Float":
      return false;
    default:
      return unreachable(a, "value");
  }
};

const showFloat = (x: number): string => {
  if (Number.isNaN(x)) return "nan";
  if (!Number.isFinite(x)) return x > 0 ? "inf" : "-inf";
  if (Object.is(x, -0)) return "-0.0";
  if (Number.isInteger(x) && Math.abs(x) < 1e16) return x.toFixed(1);
  return String(x);
};

export const show = (v: Value): string => {
  switch (v.type) {
    case "Int":
      return String(v.value);
    case "Float":
      return showFloat(v.value);
    case "Bool":
      return v.value ? "TRUE" : "FALSE";
    case "Null":
      return "NONE";
    case "List":
      return `[${v.items.map(show).join(", ")}]`;
    case "NativeFunc":
      return `<built-in function ${v.name}>`;
    default:
      return unreachable(v, "value");
  }
};
