import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { mergePrompts, PromptSet, PromptTemplate } from "@/lib/llm/prompts";

export class ConfigError extends Error {}

export interface ClaudeSettings {
  model: string;
  maxTokens: number;
  temperature: number;
  maxRetries: number;
  initialRetryDelay: number;
  requestDelay: number;
  timeout: number;
}

export interface PathSettings {
  outputDir: string;
  debugDir: string;
  artifactsDir: string;
}

export interface MonitoringSettings {
  interests: string;
  keywords: string[];
  maxItemsPerSource: number;
  relevanceThreshold: number;
  saveDebugData: boolean;
}

export interface SourceSettings {
  arxiv: { enabled: boolean; categories: string[]; maxItems: number; filterByKeywords: boolean };
  github: {
    enabled: boolean;
    maxItems: number;
    topics: string[];
    keywords: string[];
    searchDays: number;
    minStars: number;
    requestDelay: number;
  };
  huggingfacePapers: { enabled: boolean; maxItems: number; filterByKeywords: boolean; searchDays: number };
  huggingfaceTrending: { enabled: boolean; maxItems: number; maxDaysOld: number; pipelineTag: string };
}

export interface Settings {
  anthropicApiKey: string;
  githubToken: string;
  slackWebhookUrl: string;
  claude: ClaudeSettings;
  paths: PathSettings;
  monitoring: MonitoringSettings;
  sources: SourceSettings;
  prompts: PromptSet;
}

export const DEFAULT_CONFIG_PATH = "config.yaml";

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function section(raw: Row, key: string): Row {
  const value = raw[key];
  return isRow(value) ? value : {};
}

function str(value: unknown, fallback: string): string {
  return String(value ?? "").trim() || fallback;
}

function num(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function int(value: unknown, fallback: number): number {
  return Math.max(0, Math.trunc(num(value, fallback)));
}

function bool(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (value === undefined || value === null || value === "") return fallback;
  return !["0", "false", "no", "off"].includes(String(value).trim().toLowerCase());
}

function list(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return fallback;
  return value.map((entry) => String(entry ?? "").trim()).filter(Boolean);
}

export function loadYaml(filePath: string): Row {
  let data: unknown;
  try {
    data = yaml.load(fs.readFileSync(filePath, "utf-8")) ?? {};
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRow(data)) {
    throw new ConfigError(`YAML root must be a mapping: ${filePath}`);
  }
  return data;
}

function promptOverrides(raw: Row): Partial<Record<keyof PromptSet, Partial<PromptTemplate>>> {
  const keys: Array<[keyof PromptSet, string]> = [
    ["relevanceCheck", "relevance_check"],
    ["summary", "summary"],
    ["highlights", "highlights"],
    ["digestSummary", "digest_summary"],
  ];
  const overrides: Partial<Record<keyof PromptSet, Partial<PromptTemplate>>> = {};
  for (const [key, yamlKey] of keys) {
    const row = section(raw, yamlKey);
    overrides[key] = { system: str(row.system, ""), user: str(row.user, "") };
  }
  return overrides;
}

/** Builds settings from an optional config file (missing file means defaults) and the environment. */
export function buildSettings(raw: Row, env: NodeJS.ProcessEnv = process.env): Settings {
  const claude = section(raw, "claude");
  const paths = section(raw, "paths");
  const monitoring = section(raw, "monitoring");
  const sources = section(raw, "sources");
  const arxiv = section(sources, "arxiv");
  const github = section(sources, "github");
  const hfPapers = section(sources, "huggingface_papers");
  const hfTrending = section(sources, "huggingface_trending");

  const maxItemsPerSource = int(monitoring.max_items_per_source, 30);

  return {
    anthropicApiKey: str(env.ANTHROPIC_API_KEY, ""),
    githubToken: str(env.GITHUB_TOKEN, ""),
    slackWebhookUrl: str(env.SLACK_WEBHOOK_URL, ""),
    claude: {
      model: str(claude.model, "claude-sonnet-4-20250514"),
      maxTokens: int(claude.max_tokens, 4096),
      temperature: num(claude.temperature, 0.7),
      maxRetries: Math.max(1, int(claude.max_retries, 5)),
      initialRetryDelay: Math.max(0, num(claude.initial_retry_delay, 2)),
      requestDelay: Math.max(0, num(claude.request_delay, 1.5)),
      timeout: Math.max(1, num(claude.timeout, 60)),
    },
    paths: {
      outputDir: str(paths.output_dir, "digests"),
      debugDir: str(paths.debug_dir, "debug"),
      artifactsDir: str(paths.artifacts_dir, "artifacts"),
    },
    monitoring: {
      interests: str(monitoring.interests, ""),
      keywords: list(monitoring.keywords, []),
      maxItemsPerSource,
      relevanceThreshold: num(monitoring.relevance_threshold, 0.6),
      saveDebugData: bool(monitoring.save_debug_data, false),
    },
    sources: {
      arxiv: {
        enabled: bool(arxiv.enabled, true),
        categories: list(arxiv.categories, ["cs.SD", "eess.AS", "cs.CL"]),
        maxItems: int(arxiv.max_items, maxItemsPerSource),
        filterByKeywords: bool(arxiv.filter_by_keywords, true),
      },
      github: {
        enabled: bool(github.enabled, true),
        maxItems: int(github.max_items, maxItemsPerSource),
        topics: list(github.topics, ["text-to-speech"]),
        keywords: list(github.keywords, []),
        searchDays: int(github.search_days, 7),
        minStars: int(github.min_stars, 10),
        requestDelay: Math.max(0, num(github.request_delay, 1)),
      },
      huggingfacePapers: {
        enabled: bool(hfPapers.enabled, true),
        maxItems: int(hfPapers.max_items, maxItemsPerSource),
        filterByKeywords: bool(hfPapers.filter_by_keywords, true),
        searchDays: Math.max(1, int(hfPapers.search_days, 7)),
      },
      huggingfaceTrending: {
        enabled: bool(hfTrending.enabled, true),
        maxItems: int(hfTrending.max_items, maxItemsPerSource),
        maxDaysOld: int(hfTrending.max_days_old, 14),
        pipelineTag: str(hfTrending.pipeline_tag, "text-to-speech"),
      },
    },
    prompts: mergePrompts(promptOverrides(section(raw, "prompts"))),
  };
}

export function loadSettings(configPath = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Settings {
  const resolved = path.resolve(configPath);
  const raw = fs.existsSync(resolved) ? loadYaml(resolved) : {};
  return buildSettings(raw, env);
}
