/**
 * Option parsing shared by the commands.
 *
 * Commander reads the flags, a zod schema validates the result. Each call
 * gets a fresh `Command` because commander keeps parsed state on it.
 *
 * @module
 */

import { Command, CommanderError } from "commander";
import type { z } from "zod";

export type ParseResult<T> =
  | { ok: true; config: T }
  | { ok: false; summary: string };

/**
 * Collect a repeatable option into an array.
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * A command that throws instead of exiting and prints nothing itself.
 */
export function createCommand(name: string): Command {
  return new Command(name)
    .exitOverride()
    .helpOption(false)
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: () => {},
      writeErr: () => {},
    });
}

/**
 * Parse args with commander, then validate with a zod schema.
 */
export function parseOptions<S extends z.ZodTypeAny>(
  command: Command,
  schema: S,
  args: string[],
): ParseResult<z.output<S>> {
  try {
    command.parse(args, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { ok: false, summary: error.message };
    }
    throw error;
  }

  const result = schema.safeParse(command.opts());
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `  --${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    return { ok: false, summary };
  }

  return { ok: true, config: result.data };
}
