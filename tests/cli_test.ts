import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { afterAll, beforeAll, expect, test } from "vitest";
import {
  type CliIO,
  createCli,
  disFile,
  repl,
  runFile,
  tokensFile,
} from "../src/cli.ts";

let dir = "";

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "exprvm-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

const capture = () => {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    write: (text) => {
      out.push(text);
    },
    error: (text) => {
      err.push(text);
    },
  };
  return { io, out, err };
};

const source = async (name: string, text: string): Promise<string> => {
  const file = join(dir, name);
  await writeFile(file, text);
  return file;
};

test("run prints output and the final value", async () => {
  const file = await source("ok.ev", "print(1 + 1); 7 / 2");
  const { io, out, err } = capture();
  expect(await runFile(file, {}, io)).toBe(0);
  expect(out).toEqual(["2\n", "3.5\n"]);
  expect(err).toEqual([]);
});

test("run does not print a NONE result", async () => {
  const file = await source("none.ev", "print(5)");
  const { io, out } = capture();
  expect(await runFile(file, {}, io)).toBe(0);
  expect(out).toEqual(["5\n"]);
});

test("run reports faults and exits with 1", async () => {
  const file = await source("bad.ev", "x +");
  const { io, out, err } = capture();
  expect(await runFile(file, {}, io)).toBe(1);
  expect(out).toEqual([]);
  expect(err).toEqual([
    `${file}:1:4:Expected number, name or '(', but got end of input`,
  ]);
});

test("run traces to stderr", async () => {
  const file = await source("trace.ev", "1");
  const { io, out, err } = capture();
  expect(await runFile(file, { trace: true }, io)).toBe(0);
  expect(out).toEqual(["1\n"]);
  expect(err).toEqual([`0000: ${"PUSH_CONST      1".padEnd(30)} []`]);
});

test("missing file", async () => {
  const file = join(dir, "missing.ev");
  const { io, err } = capture();
  expect(await runFile(file, {}, io)).toBe(1);
  expect(err).toHaveLength(1);
  expect(err[0].startsWith(`Cannot read '${file}': `)).toBe(true);
});

test("dis", async () => {
  const file = await source("dis.ev", "1 + 2");
  const { io, out } = capture();
  expect(await disFile(file, io)).toBe(0);
  expect(out).toEqual([
    [
      "0000: PUSH_CONST      1",
      "0001: PUSH_CONST      2",
      "0002: BINARY          add",
    ].join("\n") + "\n",
  ]);
});

test("tokens", async () => {
  const file = await source("tokens.ev", "a+1");
  const { io, out } = capture();
  expect(await tokensFile(file, io)).toBe(0);
  expect(out).toEqual([
    "1:1 name 'a'\n",
    "1:2 '+'\n",
    "1:3 number 1\n",
    "1:4 end of input\n",
  ]);
});

test("tokens reports lexical faults", async () => {
  const file = await source("lexbad.ev", "a ? b");
  const { io, err } = capture();
  expect(await tokensFile(file, io)).toBe(1);
  expect(err).toEqual([`${file}:1:3:Bad string '? b...'`]);
});

test("run is the default command", async () => {
  const file = await source("default.ev", "x = 3; x * 2");
  const { io, out } = capture();
  await createCli(io).parseAsync(["node", "exprvm", file]);
  expect(out).toEqual(["6\n"]);
  expect(process.exitCode).toBe(0);
  process.exitCode = undefined;
});

test("repl keeps one context and survives faults", async () => {
  const { io, out, err } = capture();
  await repl(io, Readable.from(["x = 2\n", "x * 21\n", "\n", "y\n"]));
  expect(out).toEqual([
    "exprvm REPL (Ctrl-D to exit)\n",
    "> ",
    "2\n",
    "> ",
    "42\n",
    "> ",
    "> ",
    "> ",
  ]);
  expect(err).toEqual(["<repl>:1:1:No variable 'y' found"]);
});

test("repl passes on errors from its output sink", async () => {
  const io: CliIO = {
    write: (text) => {
      if (text === "2\n") throw new Error("sink closed");
    },
    error: () => {},
  };
  await expect(repl(io, Readable.from(["x = 2\n", "x\n"]))).rejects.toThrow(
    "sink closed",
  );
});
