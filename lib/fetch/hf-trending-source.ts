import { createItem, Item, ITEM_MODEL_CARD, ItemSource } from "@/lib/domain/models";
import { fetchJson, fetchText, isRecord } from "@/lib/infra/http";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";

const CARD_LIMIT = 10_000;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface HfTrendingSourceOptions {
  maxItems?: number;
  maxDaysOld?: number;
  pipelineTag?: string;
  baseUrl?: string;
  timeoutSeconds?: number;
  now?: () => Date;
  logger?: Logger;
}

interface ModelRow {
  id: string;
  trendingScore: number;
}

function toModelRow(raw: unknown): ModelRow | null {
  if (!isRecord(raw)) return null;
  const id = String(raw.id || raw.modelId || "").trim();
  if (!id) return null;
  return { id, trendingScore: Number(raw.trendingScore || 0) };
}

/** Trending HuggingFace models of one pipeline tag, limited to recently modified ones. */
export class HfTrendingSource implements ItemSource {
  readonly name = "huggingface_trending";

  private readonly maxItems: number;

  private readonly maxDaysOld: number;

  private readonly pipelineTag: string;

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly now: () => Date;

  private readonly logger: Logger;

  constructor(options: HfTrendingSourceOptions = {}) {
    this.maxItems = Math.max(0, Math.trunc(options.maxItems ?? 50));
    this.maxDaysOld = Math.max(0, options.maxDaysOld ?? 14);
    this.pipelineTag = String(options.pipelineTag || "").trim() || "text-to-speech";
    this.baseUrl = (options.baseUrl || "https://huggingface.co").replace(/\/$/, "");
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 30) * 1_000));
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async fetchItems(_since: Date): Promise<Item[]> {
    const cutoff = this.now().getTime() - this.maxDaysOld * DAY_MS;
    const params = new URLSearchParams({
      pipeline_tag: this.pipelineTag,
      sort: "trendingScore",
      limit: "100",
    });

    let rows: unknown;
    try {
      rows = await fetchJson(`${this.baseUrl}/api/models?${params.toString()}`, { timeoutMs: this.timeoutMs });
    } catch (error) {
      this.logger.warn({ source: this.name, error: errorMessage(error) }, "trending models fetch failed");
      return [];
    }
    if (!Array.isArray(rows)) return [];

    const models = rows
      .map(toModelRow)
      .filter((row): row is ModelRow => row !== null)
      .sort((a, b) => b.trendingScore - a.trendingScore);

    const items: Item[] = [];
    let staleCount = 0;

    for (const model of models) {
      if (items.length >= this.maxItems) break;

      let details: unknown;
      try {
        details = await fetchJson(`${this.baseUrl}/api/models/${model.id}`, { timeoutMs: this.timeoutMs });
      } catch (error) {
        this.logger.debug({ model: model.id, error: errorMessage(error) }, "model details unavailable");
        continue;
      }
      if (!isRecord(details)) continue;

      const lastModified = String(details.lastModified || "").trim();
      const modifiedAt = Date.parse(lastModified);
      if (!Number.isNaN(modifiedAt) && modifiedAt < cutoff) {
        staleCount += 1;
        continue;
      }

      const card = await this.fetchModelCard(model.id);
      if (!card) continue;

      items.push(
        createItem({
          type: ITEM_MODEL_CARD,
          title: model.id,
          url: `${this.baseUrl}/${model.id}`,
          content: card,
          source: this.name,
          metadata: {
            likes: String(Number(details.likes || 0)),
            downloads: String(Number(details.downloads || 0)),
            trending_score: String(model.trendingScore),
            last_modified: lastModified || "unknown",
          },
        }),
      );
    }

    if (staleCount) {
      this.logger.info({ source: this.name, staleCount, maxDaysOld: this.maxDaysOld }, "stale models skipped");
    }
    return items;
  }

  private async fetchModelCard(modelId: string): Promise<string> {
    try {
      const text = await fetchText(`${this.baseUrl}/${modelId}/raw/main/README.md`, { timeoutMs: this.timeoutMs });
      return text.slice(0, CARD_LIMIT);
    } catch (error) {
      this.logger.debug({ model: modelId, error: errorMessage(error) }, "model card unavailable");
      return "";
    }
  }
}
