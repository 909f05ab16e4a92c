import type { Position } from "../token.ts";
import { show, type Value } from "../value.ts";
import { unreachable } from "../utils.ts";

export const enum Op {
  PUSH_CONST,
  LOAD_VAR,
  PUSH_VAR_NAME,
  NEG,
  BINARY,
  ASSIGN,
  POP,
  MAKE_LIST,
  JUMP_IF_FALSE,
  JUMP,
}

export type BinaryOp =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "lt"
  | "le"
  | "gt"
  | "ge"
  | "eq"
  | "ne"
  | "listAppend"
  | "call";

export type Instruction =
  | { op: Op.PUSH_CONST; value: Value }
  | { op: Op.LOAD_VAR; name: string }
  | { op: Op.PUSH_VAR_NAME; name: string }
  | { op: Op.NEG }
  | { op: Op.BINARY; kind: BinaryOp }
  | { op: Op.ASSIGN }
  | { op: Op.POP }
  | { op: Op.MAKE_LIST }
  | { op: Op.JUMP_IF_FALSE; target: number }
  | { op: Op.JUMP; target: number };

export interface Chunk {
  filename: string;
  code: Instruction[];
  // positions[i] is where code[i] came from in the source
  positions: Position[];
}

const opNames: Record<Op, string> = {
  [Op.PUSH_CONST]: "PUSH_CONST",
  [Op.LOAD_VAR]: "LOAD_VAR",
  [Op.PUSH_VAR_NAME]: "PUSH_VAR_NAME",
  [Op.NEG]: "NEG",
  [Op.BINARY]: "BINARY",
  [Op.ASSIGN]: "ASSIGN",
  [Op.POP]: "POP",
  [Op.MAKE_LIST]: "MAKE_LIST",
  [Op.JUMP_IF_FALSE]: "JUMP_IF_FALSE",
  [Op.JUMP]: "JUMP",
};

const address = (n: number): string => n.toString().padStart(4, "0");

const operand = (instr: Instruction): string | null => {
  switch (instr.op) {
    case Op.PUSH_CONST:
      return show(instr.value);
    case Op.LOAD_VAR:
    case Op.PUSH_VAR_NAME:
      return instr.name;
    case Op.BINARY:
      return instr.kind;
    case Op.JUMP:
    case Op.JUMP_IF_FALSE:
      return `-> ${address(instr.target)}`;
    case Op.NEG:
    case Op.ASSIGN:
    case Op.POP:
    case Op.MAKE_LIST:
      return null;
    default:
      return unreachable(instr, "instruction");
  }
};

export const formatInstruction = (instr: Instruction): string => {
  const name = opNames[instr.op];
  const arg = operand(instr);
  return arg === null ? name : `${name.padEnd(15)} ${arg}`;
};

/** Renders the tape, one `addr: OPCODE operand` line per instruction. */
export const dis = (chunk: Chunk): string =>
  chunk.code
    .map((instr, ip) => `${address(ip)}: ${formatInstruction(instr)}`)
    .join("\n");
