import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import { Command } from "commander";
import { dis, formatInstruction } from "./bytecode/bytecode.ts";
import type { StackItem, VMOptions } from "./bytecode/vm.ts";
import { createContext } from "./core.ts";
import { tokenize } from "./lexer.ts";
import { compile, execute, type Outcome } from "./run.ts";
import { describeToken } from "./token.ts";
import { Fault } from "./fault.ts";
import { show } from "./value.ts";

export interface CliIO {
  write: (text: string) => void;
  error: (text: string) => void;
}

const defaultIO: CliIO = {
  write: (text) => {
    process.stdout.write(text);
  },
  error: (text) => console.error(text),
};

const showItem = (item: StackItem): string =>
  item.type === "Name" ? `&${item.name}` : show(item);

const tracer = (io: CliIO): VMOptions["trace"] => (ip, instr, stack) => {
  const address = ip.toString().padStart(4, "0");
  io.error(
    `${address}: ${formatInstruction(instr).padEnd(30)} [${
      stack.map(showItem).join(", ")
    }]`,
  );
};

const readSource = async (
  file: string,
  io: CliIO,
): Promise<string | null> => {
  try {
    return await readFile(file, "utf-8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    io.error(`Cannot read '${file}': ${reason}`);
    return null;
  }
};

/** Prints a finished outcome; returns the exit status. */
const report = (outcome: Outcome, io: CliIO): number => {
  if (!outcome.ok) {
    io.error(outcome.fault.message);
    return 1;
  }
  if (outcome.value.type !== "Null") io.write(`${show(outcome.value)}\n`);
  return 0;
};

export const runFile = async (
  file: string,
  options: { trace?: boolean },
  io: CliIO = defaultIO,
): Promise<number> => {
  const src = await readSource(file, io);
  if (src === null) return 1;
  const outcome = execute(src, file, {
    write: io.write,
    trace: options.trace ? tracer(io) : undefined,
  });
  return report(outcome, io);
};

// Compile-only commands print faults the same way `run` does.
const withFaults = (io: CliIO, body: () => void): number => {
  try {
    body();
    return 0;
  } catch (e) {
    if (!(e instanceof Fault)) throw e;
    io.error(e.message);
    return 1;
  }
};

export const disFile = async (
  file: string,
  io: CliIO = defaultIO,
): Promise<number> => {
  const src = await readSource(file, io);
  if (src === null) return 1;
  return withFaults(io, () => io.write(`${dis(compile(src, file))}\n`));
};

export const tokensFile = async (
  file: string,
  io: CliIO = defaultIO,
): Promise<number> => {
  const src = await readSource(file, io);
  if (src === null) return 1;
  return withFaults(io, () => {
    for (const tok of tokenize(src, file)) {
      io.write(`${tok.pos.row}:${tok.pos.col} ${describeToken(tok)}\n`);
    }
  });
};

/** Evaluates `input` line by line in one shared context. */
export const repl = async (
  io: CliIO,
  input: NodeJS.ReadableStream = process.stdin,
): Promise<void> => {
  io.write("exprvm REPL (Ctrl-D to exit)\n");
  const context = createContext(io.write);
  const rl = createInterface({ input, terminal: false });

  try {
    io.write("> ");
    for await (const line of rl) {
      if (line.trim() !== "") {
        report(execute(line, "<repl>", { context }), io);
      }
      io.write("> ");
    }
  } finally {
    rl.close();
  }
};

export const createCli = (io: CliIO = defaultIO): Command => {
  const program = new Command();
  program
    .name("exprvm")
    .version("0.1.0")
    .description("Compile and run exprvm programs");

  program
    .command("run <file>", { isDefault: true })
    .description("Compile a source file and run it on the VM")
    .option("-t, --trace", "log every executed instruction to stderr")
    .action(async (file: string, options: { trace?: boolean }) => {
      process.exitCode = await runFile(file, options, io);
    });

  program
    .command("dis <file>")
    .description("Show the compiled instruction tape of a source file")
    .action(async (file: string) => {
      process.exitCode = await disFile(file, io);
    });

  program
    .command("tokens <file>")
    .description("Show the tokens of a source file")
    .action(async (file: string) => {
      process.exitCode = await tokensFile(file, io);
    });

  program
    .command("repl")
    .description("Start an interactive session")
    .action(async () => await repl(io));

  return program;
};
