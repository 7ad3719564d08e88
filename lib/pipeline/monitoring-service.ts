import fs from "node:fs/promises";
import path from "node:path";
import { FilterResult, Item, ItemSource, ResearchLlm } from "@/lib/domain/models";
import { SeenItemStore } from "@/lib/cache/seen-item-store";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";

export interface MonitoringServiceOptions {
  sources: readonly ItemSource[];
  llm: ResearchLlm;
  interests: string;
  relevanceThreshold?: number;
  debugDir?: string | null;
  seenStore?: SeenItemStore | null;
  now?: () => Date;
  logger?: Logger;
}

export interface CollectionOutcome {
  relevantResults: FilterResult[];
  allFilterResults: FilterResult[];
  collectedCount: number;
  seenCount: number;
  errorCount: number;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local-time `YYYYMMDD_HHMMSS`, used to name debug snapshots. */
export function debugTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function contentPreview(content: string): string {
  return content.length > 500 ? `${content.slice(0, 500)}...` : content;
}

export class MonitoringService {
  readonly relevanceThreshold: number;

  private readonly sources: readonly ItemSource[];

  private readonly llm: ResearchLlm;

  private readonly interests: string;

  private readonly debugDir: string | null;

  private readonly seenStore: SeenItemStore | null;

  private readonly now: () => Date;

  private readonly logger: Logger;

  constructor(options: MonitoringServiceOptions) {
    this.sources = options.sources;
    this.llm = options.llm;
    this.interests = options.interests;
    this.relevanceThreshold = options.relevanceThreshold ?? 0.6;
    this.debugDir = options.debugDir || null;
    this.seenStore = options.seenStore ?? null;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  isRelevant(result: FilterResult): boolean {
    return result.isRelevant && result.relevanceScore >= this.relevanceThreshold;
  }

  async collectAndFilter(since: Date): Promise<CollectionOutcome> {
    const collected: Item[] = [];
    for (const source of this.sources) {
      try {
        const items = await source.fetchItems(since);
        collected.push(...items);
        this.logger.info({ source: source.name, count: items.length }, "source collected");
      } catch (error) {
        this.logger.warn({ source: source.name, error: errorMessage(error) }, "source failed");
      }
    }
    this.logger.info({ count: collected.length }, "collection finished");

    if (this.debugDir) {
      await this.writeDebug("collected_items", collected.map((item) => ({
        type: item.type,
        title: item.title,
        url: item.url,
        source: item.source,
        discovered_at: item.discoveredAt.toISOString(),
        metadata: item.metadata,
        content_length: item.content.length,
        content_preview: contentPreview(item.content),
      })));
    }

    let candidates = collected;
    let seenCount = 0;
    if (this.seenStore) {
      const filtered = await this.seenStore.filterUnseen(collected);
      candidates = filtered.unseen;
      seenCount = filtered.seenCount;
      this.logger.info({ seenCount, newCount: candidates.length }, "seen items skipped");
    }

    const allFilterResults: FilterResult[] = [];
    let errorCount = 0;
    for (const item of candidates) {
      try {
        allFilterResults.push(await this.llm.checkRelevance(item, this.interests));
      } catch (error) {
        errorCount += 1;
        this.logger.warn({ title: item.title, error: errorMessage(error) }, "relevance check failed");
      }
    }

    const relevantResults = allFilterResults.filter((result) => this.isRelevant(result));
    this.logger.info(
      { checked: allFilterResults.length, relevant: relevantResults.length, errors: errorCount },
      "relevance filtering finished",
    );

    if (this.debugDir) {
      const rows = allFilterResults
        .map((result) => ({
          title: result.item.title,
          url: result.item.url,
          type: result.item.type,
          source: result.item.source,
          is_relevant: result.isRelevant,
          relevance_score: result.relevanceScore,
          reason: result.reason,
        }))
        .sort((a, b) => b.relevance_score - a.relevance_score);
      await this.writeDebug("filter_results", {
        total_checked: allFilterResults.length,
        relevant_count: relevantResults.length,
        threshold: this.relevanceThreshold,
        results: rows,
      });
    }

    return {
      relevantResults,
      allFilterResults,
      collectedCount: collected.length,
      seenCount,
      errorCount,
    };
  }

  async saveArtifacts(results: readonly FilterResult[]): Promise<void> {
    if (!this.seenStore) return;
    for (const result of results) {
      await this.seenStore.markSeenWithRelevance(result.item, result.isRelevant, result.relevanceScore, result.reason);
    }
    this.logger.info({ count: results.length }, "artifacts saved");
  }

  private async writeDebug(prefix: string, data: unknown): Promise<void> {
    if (!this.debugDir) return;
    const filePath = path.join(this.debugDir, `${prefix}_${debugTimestamp(this.now())}.json`);
    try {
      await fs.mkdir(this.debugDir, { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
      this.logger.debug({ filePath }, "debug snapshot written");
    } catch (error) {
      this.logger.warn({ filePath, error: errorMessage(error) }, "could not write debug snapshot");
    }
  }
}
