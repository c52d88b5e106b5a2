/**
 * assist/index.ts - The `opsctl assist` command group
 *
 * One subcommand per alert; see alerts/. Without a subcommand the group
 * prints its help.
 */

import { Command } from "commander";
import { ALERTS } from "./alerts";
import { createAlertCommand, createDefaultDeps } from "./command";
import type { AssistDeps } from "./types";

export function createAssistCommand(
  getDeps: () => AssistDeps = createDefaultDeps
): Command {
  const assist = new Command("assist").description(
    "Collect diagnostic information for alerts, with optional LLM analysis"
  );

  for (const definition of ALERTS) {
    assist.addCommand(createAlertCommand(definition, getDeps));
  }

  // The action catches operands that match no subcommand, so name them
  // here rather than fall through to the help text.
  assist.action(() => {
    if (assist.args.length > 0) {
      assist.error(`error: unknown command '${assist.args[0]}'`, {
        code: "commander.unknownCommand",
      });
    }
    assist.outputHelp();
  });

  return assist;
}

export { completeOptions, createAlertCommand, createDefaultDeps } from "./command";
export type { RawAssistOptions } from "./command";
export type { AlertDefinition, AssistDeps, AssistOptions } from "./types";
