#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";

import { executeRunCommand } from "./commands/run";
import { executeListCommand, executePruneCommand, executeStatsCommand } from "./commands/seen";
import { bootstrapEnvFromDotenv } from "./env";
import { CliError } from "./errors";
import { printCommandResult } from "./output";

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`invalid positive integer: ${value}`);
  }
  return parsed;
}

function addCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "config file (default config.yaml, or RADAR_CONFIG)")
    .option("--json", "JSON output");
}

async function run() {
  bootstrapEnvFromDotenv();

  const program = new Command();
  program
    .name("research-radar")
    .description("Collect research items, filter them by relevance and build a digest")
    .version("0.1.0");

  addCommonOptions(
    program
      .command("run")
      .description("collect, filter and write a digest")
      .option("--days <days>", "look-back window in days", parsePositiveInt)
      .option("--output <path>", "digest file path")
      .option("--debug", "write debug snapshots")
      .option("--no-slack", "skip the Slack notification")
      .action(async (options) => {
        const result = await executeRunCommand(options);
        printCommandResult(result, Boolean(options.json));
      }),
  );

  addCommonOptions(
    program
      .command("stats")
      .description("count seen items per source")
      .action(async (options) => {
        const result = await executeStatsCommand(options);
        printCommandResult(result, Boolean(options.json));
      }),
  );

  addCommonOptions(
    program
      .command("list")
      .description("list recently seen items")
      .option("--source <name>", "only this source")
      .option("--limit <n>", "maximum number of items", parsePositiveInt)
      .action(async (options) => {
        const result = await executeListCommand(options);
        printCommandResult(result, Boolean(options.json));
      }),
  );

  addCommonOptions(
    program
      .command("prune")
      .description("remove seen items older than the given age")
      .option("--days <days>", "maximum age in days (default 90)", parsePositiveInt)
      .action(async (options) => {
        const result = await executePruneCommand(options);
        printCommandResult(result, Boolean(options.json));
      }),
  );

  await program.parseAsync(process.argv);
}

function printError(error: unknown): void {
  const jsonMode = process.argv.includes("--json");
  if (error instanceof CliError) {
    if (jsonMode) {
      process.stderr.write(`${JSON.stringify(error.toJSON(), null, 2)}\n`);
    } else {
      process.stderr.write(`Error: ${error.message}\n`);
      if (error.hint) {
        process.stderr.write(`Hint: ${error.hint}\n`);
      }
    }
    process.exit(error.code);
  }

  const message = error instanceof Error ? error.message : String(error);
  if (jsonMode) {
    process.stderr.write(`${JSON.stringify({ ok: false, error: { code: 1, message } }, null, 2)}\n`);
  } else {
    process.stderr.write(`Error: ${message}\n`);
  }
  process.exit(1);
}

run().catch(printError);
