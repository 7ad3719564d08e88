import {
  createFilterResult,
  DigestEntry,
  FilterResult,
  Item,
  ResearchLlm,
} from "@/lib/domain/models";
import { isRecord } from "@/lib/infra/http";
import { logger as defaultLogger, type Logger } from "@/lib/infra/logger";
import { extractJson, parseWholeJson } from "@/lib/llm/json-extract";
import { DEFAULT_PROMPTS, LLM_CONTENT_LIMIT, PromptSet, renderTemplate } from "@/lib/llm/prompts";

export interface CompletionClient {
  complete(prompt: string, system: string): Promise<string>;
}

const MAX_HIGHLIGHTS = 5;
const BULLET_RE = /^(?:[-*•]+|\d+[.)])\s*/;

function itemValues(item: Item): Record<string, string> {
  return {
    title: item.title,
    url: item.url,
    type: item.type,
    source: item.source,
    content: item.content.slice(0, LLM_CONTENT_LIMIT),
  };
}

function coerceScore(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function stringify(value: unknown): string {
  return typeof value === "string" ? value.trim() : JSON.stringify(value);
}

/** Splits non-JSON model output into highlight lines. */
export function splitHighlightLines(response: string): string[] {
  return response
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("```"))
    .map((line) => line.replace(BULLET_RE, "").trim())
    .filter(Boolean)
    .slice(0, MAX_HIGHLIGHTS);
}

export class ResearchAnalyst implements ResearchLlm {
  constructor(
    private readonly client: CompletionClient,
    private readonly prompts: PromptSet = DEFAULT_PROMPTS,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async checkRelevance(item: Item, interests: string): Promise<FilterResult> {
    const template = this.prompts.relevanceCheck;
    const prompt = renderTemplate(template.user, { ...itemValues(item), interests });
    const response = await this.client.complete(prompt, template.system);

    const extracted = extractJson(response);
    let payload: unknown;
    try {
      payload = JSON.parse(extracted);
    } catch (error) {
      return this.unparsed(item, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
    }

    if (!isRecord(payload)) {
      return this.unparsed(item, "response is not a JSON object");
    }
    if (typeof payload.is_relevant !== "boolean") {
      return this.unparsed(item, "missing field 'is_relevant'");
    }
    const score = coerceScore(payload.score);
    if (score === null) {
      return this.unparsed(item, "missing field 'score'");
    }
    if (!("reason" in payload) || payload.reason === null || payload.reason === undefined) {
      return this.unparsed(item, "missing field 'reason'");
    }
    if (score < 0 || score > 1) {
      this.logger.warn({ title: item.title, score }, "relevance score outside 0-1");
    }

    return createFilterResult(item, payload.is_relevant, score, String(payload.reason));
  }

  async generateSummary(item: Item): Promise<string> {
    const template = this.prompts.summary;
    return this.client.complete(renderTemplate(template.user, itemValues(item)), template.system);
  }

  async extractHighlights(item: Item): Promise<string[]> {
    const template = this.prompts.highlights;
    const response = await this.client.complete(renderTemplate(template.user, itemValues(item)), template.system);

    const parsed = parseWholeJson(response);
    if (parsed === undefined) {
      return splitHighlightLines(response);
    }
    if (Array.isArray(parsed)) {
      return parsed.map(stringify).filter(Boolean).slice(0, MAX_HIGHLIGHTS);
    }
    if (isRecord(parsed)) {
      return Object.values(parsed)
        .flatMap((value) => (Array.isArray(value) ? value : [value]))
        .map(stringify)
        .filter(Boolean)
        .slice(0, MAX_HIGHLIGHTS);
    }
    return [response.trim()];
  }

  async generateDigestSummary(entries: readonly DigestEntry[]): Promise<string> {
    const template = this.prompts.digestSummary;
    const data = entries.map((entry) => ({
      title: entry.item.title,
      url: entry.item.url,
      type: entry.item.type,
      summary: entry.summary,
      score: entry.relevanceScore,
    }));
    const prompt = renderTemplate(template.user, { entries: JSON.stringify(data, null, 2) });
    return this.client.complete(prompt, template.system);
  }

  private unparsed(item: Item, detail: string): FilterResult {
    this.logger.warn({ title: item.title, detail }, "could not parse relevance response");
    return createFilterResult(item, false, 0, `Failed to parse relevance response: ${detail}`);
  }
}
