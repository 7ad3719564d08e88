import { EXIT_CONFIG, runDigestWithResult, RunDigestOptions } from "@/lib/digest-runner";
import { parseBoundedInt, RuntimeOptionInput, resolveSettings } from "../config";
import { CliError } from "../errors";
import { CommandResult, fieldLine, successLine, warnLine } from "../output";

export interface RunCommandOptions extends RuntimeOptionInput {
  days?: number;
  output?: string;
  debug?: boolean;
  slack?: boolean;
}

export async function executeRunCommand(
  options: RunCommandOptions,
  overrides: Pick<RunDigestOptions, "llm" | "sources" | "notifier" | "now" | "logger"> = {},
): Promise<CommandResult> {
  const settings = resolveSettings(options);
  const days = options.days === undefined ? 1 : parseBoundedInt("days", options.days, 1, 365);

  const result = await runDigestWithResult({
    ...overrides,
    settings,
    days,
    outputPath: options.output || undefined,
    debug: Boolean(options.debug),
    noSlack: options.slack === false,
  });

  if (result.exitCode === EXIT_CONFIG) {
    throw new CliError(2, "language model client is not configured", {
      hint: "Set ANTHROPIC_API_KEY in the environment or a .env file",
    });
  }

  const lines = [
    result.relevantCount ? successLine("digest generated") : warnLine("no relevant items found"),
    fieldLine("date", result.reportDate),
    fieldLine("collected", result.collectedCount),
    fieldLine("already seen", result.seenCount),
    fieldLine("checked", result.checkedCount),
    fieldLine("relevant", result.relevantCount),
  ];
  if (result.digestPath) lines.push(fieldLine("digest", result.digestPath));
  if (result.summaryPath) lines.push(fieldLine("summary", result.summaryPath));
  if (result.relevantCount && !result.summaryPath) lines.push(warnLine("digest summary was not generated"));
  if (result.notified) lines.push(successLine("summary sent to Slack"));

  return {
    payload: {
      ok: true,
      report_date: result.reportDate,
      digest_path: result.digestPath,
      summary_path: result.summaryPath,
      collected_count: result.collectedCount,
      seen_count: result.seenCount,
      checked_count: result.checkedCount,
      relevant_count: result.relevantCount,
      notified: result.notified,
    },
    lines,
  };
}
