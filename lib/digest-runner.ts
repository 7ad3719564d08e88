import path from "node:path";
import { DigestRunResult, ItemSource, Notifier, ResearchLlm } from "@/lib/domain/models";
import { ConfigError, DEFAULT_CONFIG_PATH, loadSettings, Settings } from "@/lib/config-loader";
import { SeenItemStore } from "@/lib/cache/seen-item-store";
import { buildSources } from "@/lib/fetch";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";
import { SlackNotifier } from "@/lib/integrations/slack-notifier";
import { AnthropicClient, AnthropicError } from "@/lib/llm/anthropic-client";
import { ResearchAnalyst } from "@/lib/llm/research-analyst";
import { MarkdownDigestRenderer } from "@/lib/output/markdown-writer";
import { DigestService } from "@/lib/pipeline/digest-service";
import { MonitoringService } from "@/lib/pipeline/monitoring-service";

const DAY_MS = 24 * 60 * 60 * 1000;

export const EXIT_OK = 0;
export const EXIT_CONFIG = 2;

export interface RunDigestOptions {
  days?: number;
  outputPath?: string;
  debug?: boolean;
  noSlack?: boolean;
  configPath?: string;
  settings?: Settings;
  llm?: ResearchLlm;
  sources?: ItemSource[];
  notifier?: Notifier | null;
  now?: () => Date;
  logger?: Logger;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function localIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** `YYYY-MM-DD_HH-MM-SS`, shared by the digest and summary file names of one run. */
export function fileTimestamp(date: Date): string {
  return `${localIsoDate(date)}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}

function buildLlm(settings: Settings, logger: Logger): ResearchLlm {
  const client = new AnthropicClient({
    apiKey: settings.anthropicApiKey,
    model: settings.claude.model,
    maxTokens: settings.claude.maxTokens,
    temperature: settings.claude.temperature,
    maxRetries: settings.claude.maxRetries,
    initialRetryDelaySeconds: settings.claude.initialRetryDelay,
    requestDelaySeconds: settings.claude.requestDelay,
    timeoutSeconds: settings.claude.timeout,
    logger,
  });
  return new ResearchAnalyst(client, settings.prompts, logger);
}

function buildNotifier(settings: Settings, options: RunDigestOptions, logger: Logger): Notifier | null {
  if (options.noSlack) return null;
  if (options.notifier !== undefined) return options.notifier;
  return settings.slackWebhookUrl ? new SlackNotifier(settings.slackWebhookUrl, { logger }) : null;
}

export async function runDigestWithResult(options: RunDigestOptions = {}): Promise<DigestRunResult> {
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const days = Math.max(0, Math.trunc(options.days ?? 1));
  const reportDate = localIsoDate(startedAt);

  const result: DigestRunResult = {
    exitCode: 1,
    reportDate,
    digestPath: "",
    summaryPath: "",
    digestMarkdown: "",
    digestSummary: "",
    collectedCount: 0,
    seenCount: 0,
    checkedCount: 0,
    relevantCount: 0,
    notified: false,
  };

  let settings: Settings;
  try {
    settings = options.settings ?? loadSettings(options.configPath || DEFAULT_CONFIG_PATH);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    logger.error({ error: error.message }, "invalid configuration");
    result.exitCode = EXIT_CONFIG;
    return result;
  }

  let llm: ResearchLlm;
  try {
    llm = options.llm ?? buildLlm(settings, logger);
  } catch (error) {
    if (!(error instanceof AnthropicError)) throw error;
    logger.error({ error: error.message }, "language model client unavailable");
    result.exitCode = EXIT_CONFIG;
    return result;
  }

  const seenStore = new SeenItemStore(settings.paths.artifactsDir, { logger });
  const monitoring = new MonitoringService({
    sources: options.sources ?? buildSources(settings, logger),
    llm,
    interests: settings.monitoring.interests,
    relevanceThreshold: settings.monitoring.relevanceThreshold,
    debugDir: options.debug || settings.monitoring.saveDebugData ? settings.paths.debugDir : null,
    seenStore,
    now,
    logger,
  });
  const digestService = new DigestService({
    llm,
    renderer: new MarkdownDigestRenderer(),
    notifier: buildNotifier(settings, options, logger),
    logger,
  });

  const since = new Date(startedAt.getTime() - days * DAY_MS);
  const outcome = await monitoring.collectAndFilter(since);
  result.collectedCount = outcome.collectedCount;
  result.seenCount = outcome.seenCount;
  result.checkedCount = outcome.allFilterResults.length;
  result.relevantCount = outcome.relevantResults.length;

  if (!outcome.relevantResults.length) {
    logger.info("no relevant items found");
    await monitoring.saveArtifacts(outcome.allFilterResults);
    result.exitCode = EXIT_OK;
    return result;
  }

  const stamp = fileTimestamp(startedAt);
  const { digest, entries } = await digestService.generateDigest(outcome.relevantResults, reportDate);
  result.digestMarkdown = digest;
  result.digestPath = await digestService.saveDigest(
    digest,
    options.outputPath || path.join(settings.paths.outputDir, "full", `${stamp}_digest.md`),
  );

  try {
    const summary = await digestService.generateDigestSummary(entries);
    result.digestSummary = summary;
    result.summaryPath = await digestService.saveDigest(
      summary,
      path.join(settings.paths.outputDir, "summary", `${stamp}_summary.md`),
    );
    result.notified = await digestService.sendNotification(summary, reportDate);
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, "digest summary failed");
  }

  // Items are marked seen only after the digest file exists.
  await monitoring.saveArtifacts(outcome.allFilterResults);

  result.exitCode = EXIT_OK;
  return result;
}
