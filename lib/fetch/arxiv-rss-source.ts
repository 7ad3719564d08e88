import Parser from "rss-parser";
import { createItem, Item, ITEM_PAPER, ItemSource } from "@/lib/domain/models";
import { fetchText } from "@/lib/infra/http";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";
import { matchesKeywords } from "@/lib/fetch/keyword-filter";

const ABSTRACT_RE = /Abstract:\s*([\s\S]*)/;
const ARXIV_ID_RE = /(\d+\.\d+)/;
const TAG_RE = /<[^>]+>/g;

export const ARXIV_CATEGORIES: Record<string, string> = {
  "cs.SD": "Sound (cs.SD)",
  "cs.CL": "Computation and Language (cs.CL)",
  "eess.AS": "Audio and Speech Processing (eess.AS)",
  "cs.LG": "Machine Learning (cs.LG)",
  "cs.AI": "Artificial Intelligence (cs.AI)",
};

interface ArxivFeedItem {
  description?: string;
}

export interface ArxivPaper {
  id: string;
  title: string;
  abstract: string;
  link: string;
  published: string;
  authors: string;
  categories: string;
}

export interface ArxivRssSourceOptions {
  categories?: string[];
  maxItems?: number;
  filterByKeywords?: boolean;
  keywords?: string[];
  baseUrl?: string;
  timeoutSeconds?: number;
  logger?: Logger;
}

const parser = new Parser<Record<string, unknown>, ArxivFeedItem>({
  customFields: {
    item: ["description"],
  },
});

function cleanText(value: string): string {
  return value.replace(TAG_RE, " ").replace(/[ \t]+/g, " ").trim();
}

export function extractAbstract(description: string): string {
  const match = ABSTRACT_RE.exec(description);
  return cleanText(match ? match[1] : description);
}

export async function parseArxivFeed(xml: string): Promise<ArxivPaper[]> {
  const feed = await parser.parseString(xml);
  return (feed.items || []).map((entry) => {
    const link = String(entry.link || "").trim();
    const idMatch = ARXIV_ID_RE.exec(link);
    return {
      id: idMatch ? idMatch[1] : "",
      title: cleanText(String(entry.title || "")),
      abstract: extractAbstract(String(entry.description || entry.content || "")),
      link,
      published: String(entry.pubDate || entry.isoDate || ""),
      authors: String(entry.creator || "").trim(),
      categories: (entry.categories || [])
        .map((category) => String(category).trim())
        .filter(Boolean)
        .join(", "),
    };
  });
}

function paperContent(paper: ArxivPaper): string {
  return [
    `Title: ${paper.title}`,
    "",
    `Authors: ${paper.authors || "Unknown"}`,
    "",
    "Abstract:",
    paper.abstract,
    "",
    `ArXiv ID: ${paper.id}`,
    `Published: ${paper.published || "Unknown"}`,
    `Categories: ${paper.categories || "Unknown"}`,
    "",
  ].join("\n");
}

/** Papers from the daily arXiv RSS feeds of the configured categories. */
export class ArxivRssSource implements ItemSource {
  readonly name = "arxiv_rss";

  private readonly categories: string[];

  private readonly maxItems: number;

  private readonly filterByKeywords: boolean;

  private readonly keywords: string[];

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly logger: Logger;

  constructor(options: ArxivRssSourceOptions = {}) {
    this.categories = options.categories?.length ? options.categories : ["cs.SD", "eess.AS", "cs.CL"];
    this.maxItems = Math.max(0, Math.trunc(options.maxItems ?? 50));
    this.filterByKeywords = options.filterByKeywords ?? true;
    this.keywords = options.keywords || [];
    this.baseUrl = (options.baseUrl || "http://export.arxiv.org/rss").replace(/\/$/, "");
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 30) * 1_000));
    this.logger = options.logger ?? defaultLogger;
  }

  async fetchItems(_since: Date): Promise<Item[]> {
    const items: Item[] = [];
    const seenIds = new Set<string>();
    let filteredCount = 0;

    for (const category of this.categories) {
      if (items.length >= this.maxItems) break;

      let papers: ArxivPaper[];
      try {
        const xml = await fetchText(`${this.baseUrl}/${category}`, {
          timeoutMs: this.timeoutMs,
          headers: { Accept: "application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.8" },
        });
        papers = await parseArxivFeed(xml);
      } catch (error) {
        this.logger.warn({ source: this.name, category, error: errorMessage(error) }, "arxiv category skipped");
        continue;
      }

      let categoryCount = 0;
      for (const paper of papers) {
        if (items.length >= this.maxItems) break;
        if (!paper.id || seenIds.has(paper.id)) continue;
        seenIds.add(paper.id);

        if (this.filterByKeywords && !matchesKeywords(paper.title, paper.abstract, this.keywords)) {
          filteredCount += 1;
          continue;
        }
        if (!paper.title) continue;

        items.push(
          createItem({
            type: ITEM_PAPER,
            title: paper.title,
            url: paper.link || `https://arxiv.org/abs/${paper.id}`,
            content: paperContent(paper),
            source: this.name,
            metadata: {
              arxiv_id: paper.id,
              published: paper.published,
              authors: paper.authors || "Unknown",
              categories: paper.categories,
            },
          }),
        );
        categoryCount += 1;
      }

      this.logger.debug({ category: ARXIV_CATEGORIES[category] || category, count: categoryCount }, "arxiv category fetched");
    }

    if (filteredCount) {
      this.logger.info({ source: this.name, filteredCount }, "items dropped by keyword filter");
    }
    return items;
  }
}
