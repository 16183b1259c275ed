import { z } from "zod";
import type { PomodoroService } from "./pomodoro.js";

export const USAGE = `marinara - pomodoro timer

Usage:
  marinara init [--force]   write a default config file (only with --force)
  marinara start            start a new pomodoro
  marinara stop             stop the current pomodoro
  marinara status           print the current pomodoro status`;

const commandSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("init"),
    force: z.boolean().default(false)
  }),
  z.object({ action: z.literal("start") }),
  z.object({ action: z.literal("stop") }),
  z.object({ action: z.literal("status") }),
  z.object({ action: z.literal("help") })
]);

export type Command = z.infer<typeof commandSchema>;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export interface CliContext {
  service: PomodoroService;
  output?: CliOutput;
}

export function parseCommand(argv: string[]): Command {
  const [name, ...rest] = argv;
  if (name === undefined) {
    throw new UsageError("Missing command.");
  }
  if (name === "help" || name === "--help" || name === "-h") {
    return { action: "help" };
  }

  let force = false;
  for (const arg of rest) {
    switch (arg) {
      case "--help":
      case "-h":
        return { action: "help" };
      case "--force":
      case "-f":
        if (name === "init") {
          force = true;
          break;
        }
        throw new UsageError(`Unexpected argument "${arg}" for ${name}.`);
      default:
        throw new UsageError(`Unexpected argument "${arg}" for ${name}.`);
    }
  }

  const parsed = commandSchema.safeParse({ action: name, force });
  if (!parsed.success) {
    throw new UsageError(`Unknown command "${name}".`);
  }
  return parsed.data;
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const output = context.output ?? consoleOutput;

  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      output.err(error.message);
      output.err(USAGE);
      return 2;
    }
    throw error;
  }

  try {
    switch (command.action) {
      case "help":
        output.out(USAGE);
        break;
      case "init": {
        const written = await context.service.init({ force: command.force });
        if (written) {
          output.out(`wrote new config to ${written}`);
        }
        break;
      }
      case "start":
        await context.service.start();
        break;
      case "stop":
        await context.service.stop();
        break;
      case "status": {
        const status = await context.service.status();
        output.out(status.text);
        break;
      }
    }
    return 0;
  } catch (error) {
    output.err(`marinara: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
