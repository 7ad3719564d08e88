import { createItem, Item, ITEM_PAPER, ItemSource } from "@/lib/domain/models";
import { fetchJson, isRecord } from "@/lib/infra/http";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";
import { matchesKeywords } from "@/lib/fetch/keyword-filter";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface HfPapersSourceOptions {
  maxItems?: number;
  filterByKeywords?: boolean;
  searchDays?: number;
  keywords?: string[];
  baseUrl?: string;
  timeoutSeconds?: number;
  now?: () => Date;
  logger?: Logger;
}

interface DailyPaper {
  id: string;
  title: string;
  summary: string;
  upvotes: number;
}

function toDailyPaper(raw: unknown): DailyPaper | null {
  if (!isRecord(raw)) return null;
  const paper = isRecord(raw.paper) ? raw.paper : {};
  const id = String(paper.id || "").trim();
  if (!id) return null;
  return {
    id,
    title: String(raw.title || paper.title || "").trim(),
    summary: String(raw.summary || paper.summary || "").trim(),
    upvotes: Number(paper.upvotes || 0),
  };
}

/** HuggingFace daily papers for each of the last `searchDays` days, newest first. */
export class HfPapersSource implements ItemSource {
  readonly name = "huggingface_papers";

  private readonly maxItems: number;

  private readonly filterByKeywords: boolean;

  private readonly searchDays: number;

  private readonly keywords: string[];

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly now: () => Date;

  private readonly logger: Logger;

  constructor(options: HfPapersSourceOptions = {}) {
    this.maxItems = Math.max(0, Math.trunc(options.maxItems ?? 50));
    this.filterByKeywords = options.filterByKeywords ?? true;
    this.searchDays = Math.max(1, Math.trunc(options.searchDays ?? 7));
    this.keywords = options.keywords || [];
    this.baseUrl = (options.baseUrl || "https://huggingface.co").replace(/\/$/, "");
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 30) * 1_000));
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async fetchItems(_since: Date): Promise<Item[]> {
    const items: Item[] = [];
    const seenIds = new Set<string>();
    const today = this.now().getTime();
    let filteredCount = 0;

    for (let offset = 0; offset < this.searchDays; offset += 1) {
      if (items.length >= this.maxItems) break;
      const day = new Date(today - offset * DAY_MS).toISOString().slice(0, 10);

      let rows: unknown;
      try {
        rows = await fetchJson(`${this.baseUrl}/api/daily_papers?date=${day}`, { timeoutMs: this.timeoutMs });
      } catch (error) {
        this.logger.warn({ source: this.name, day, error: errorMessage(error) }, "daily papers fetch failed");
        continue;
      }
      if (!Array.isArray(rows)) continue;

      for (const row of rows) {
        if (items.length >= this.maxItems) break;
        const paper = toDailyPaper(row);
        if (!paper || seenIds.has(paper.id)) continue;
        seenIds.add(paper.id);

        if (this.filterByKeywords && !matchesKeywords(paper.title, paper.summary, this.keywords)) {
          filteredCount += 1;
          continue;
        }
        if (!paper.title) continue;

        items.push(
          createItem({
            type: ITEM_PAPER,
            title: paper.title,
            url: `${this.baseUrl}/papers/${paper.id}`,
            content: [`Title: ${paper.title}`, "", "Summary:", paper.summary, "", `Paper ID: ${paper.id}`, ""].join("\n"),
            source: this.name,
            metadata: {
              upvotes: String(paper.upvotes),
              paper_id: paper.id,
              published_date: day,
            },
          }),
        );
      }
    }

    if (filteredCount) {
      this.logger.info({ source: this.name, filteredCount }, "items dropped by keyword filter");
    }
    return items;
  }
}
