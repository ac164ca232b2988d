/**
 * Command dispatcher for the benchmark CLI.
 *
 * Manual dispatch layer on top of commander.
 * Each command builds its own commander instance for options.
 *
 * @module
 */

import type { Operation } from "effection";
import { helpCommand } from "./help.ts";
import { reportCommand } from "./report.ts";
import { runCommand } from "./run.ts";
import { statusCommand } from "./status.ts";

/**
 * Command handler signature.
 * Takes remaining args after the command name, returns exit code.
 */
export type CommandHandler = (args: string[]) => Operation<number>;

/**
 * Registry of available commands.
 */
const commands: Record<string, CommandHandler> = {
  run: runCommand,
  report: reportCommand,
  status: statusCommand,
  help: helpCommand,
};

/**
 * Dispatch to the appropriate command handler.
 *
 * @param args - CLI arguments (e.g., ["report", "--format", "html"])
 * @returns Exit code
 */
export function* dispatch(args: string[]): Operation<number> {
  const [command, ...rest] = args;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    return yield* helpCommand(rest);
  }

  if (rest.includes("--help") || rest.includes("-h")) {
    return yield* helpCommand([command]);
  }

  const handler = commands[command];
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    console.log();
    yield* helpCommand([]);
    return 1;
  }

  return yield* handler(rest);
}
