import { createItem, Item, ITEM_REPOSITORY, ItemSource } from "@/lib/domain/models";
import { fetchJson, fetchText, isRecord, sleep } from "@/lib/infra/http";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";

const README_LIMIT = 10_000;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface GitHubSourceOptions {
  token?: string;
  maxItems?: number;
  topics?: string[];
  keywords?: string[];
  searchDays?: number;
  minStars?: number;
  requestDelaySeconds?: number;
  apiBase?: string;
  timeoutSeconds?: number;
  now?: () => Date;
  logger?: Logger;
}

interface RepoSummary {
  fullName: string;
  htmlUrl: string;
  description: string;
  topics: string[];
  stars: number;
  language: string;
  updatedAt: string;
}

function toRepoSummary(raw: unknown): RepoSummary | null {
  if (!isRecord(raw)) return null;
  const fullName = String(raw.full_name || "").trim();
  const htmlUrl = String(raw.html_url || "").trim();
  if (!fullName || !htmlUrl) return null;
  return {
    fullName,
    htmlUrl,
    description: String(raw.description || ""),
    topics: Array.isArray(raw.topics) ? raw.topics.map((topic) => String(topic)) : [],
    stars: Number(raw.stargazers_count || 0),
    language: String(raw.language || ""),
    updatedAt: String(raw.updated_at || ""),
  };
}

export function buildSearchQueries(topics: readonly string[], keywords: readonly string[]): string[] {
  const queries = [
    ...topics.map((topic) => topic.trim()).filter(Boolean).map((topic) => `topic:${topic}`),
    ...keywords.map((keyword) => keyword.trim()).filter(Boolean).map((keyword) => `"${keyword}" in:name,description`),
  ];
  return Array.from(new Set(queries));
}

/** Recently pushed repositories found through the GitHub search API. */
export class GitHubSource implements ItemSource {
  readonly name = "github";

  private readonly token: string;

  private readonly maxItems: number;

  private readonly queries: string[];

  private readonly searchDays: number;

  private readonly minStars: number;

  private readonly requestDelayMs: number;

  private readonly apiBase: string;

  private readonly timeoutMs: number;

  private readonly now: () => Date;

  private readonly logger: Logger;

  constructor(options: GitHubSourceOptions = {}) {
    this.token = String(options.token || "").trim();
    this.maxItems = Math.max(0, Math.trunc(options.maxItems ?? 30));
    this.queries = buildSearchQueries(options.topics || ["text-to-speech"], options.keywords || []);
    this.searchDays = Math.max(0, Math.trunc(options.searchDays ?? 0));
    this.minStars = Math.max(0, Math.trunc(options.minStars ?? 10));
    this.requestDelayMs = Math.max(0, (options.requestDelaySeconds ?? 1) * 1_000);
    this.apiBase = (options.apiBase || "https://api.github.com").replace(/\/$/, "");
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 30) * 1_000));
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async fetchItems(since: Date): Promise<Item[]> {
    const cutoff = this.searchDays > 0 ? new Date(this.now().getTime() - this.searchDays * DAY_MS) : since;
    const pushedSince = cutoff.toISOString().slice(0, 10);

    const items: Item[] = [];
    const seen = new Set<string>();

    for (const [index, query] of this.queries.entries()) {
      if (items.length >= this.maxItems) break;
      if (index > 0) await sleep(this.requestDelayMs);

      let repos: RepoSummary[];
      try {
        repos = await this.search(`${query} pushed:>=${pushedSince} stars:>=${this.minStars}`);
      } catch (error) {
        this.logger.warn({ source: this.name, query, error: errorMessage(error) }, "github search failed");
        continue;
      }

      for (const repo of repos) {
        if (items.length >= this.maxItems) break;
        if (seen.has(repo.fullName)) continue;
        seen.add(repo.fullName);

        const readme = await this.fetchReadme(repo.fullName);
        items.push(
          createItem({
            type: ITEM_REPOSITORY,
            title: repo.fullName,
            url: repo.htmlUrl,
            content: [`Description: ${repo.description}`, "", `Topics: ${repo.topics.join(", ")}`, "", "README:", readme, ""].join(
              "\n",
            ),
            source: this.name,
            metadata: {
              stars: String(repo.stars),
              language: repo.language,
              updated_at: repo.updatedAt,
            },
          }),
        );
      }
    }

    return items;
  }

  private headers(accept = "application/vnd.github+json"): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: accept,
      "X-GitHub-Api-Version": "2022-11-28",
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async search(q: string): Promise<RepoSummary[]> {
    const params = new URLSearchParams({
      q,
      sort: "updated",
      order: "desc",
      per_page: String(Math.min(100, Math.max(1, this.maxItems))),
    });
    const data = await fetchJson(`${this.apiBase}/search/repositories?${params.toString()}`, {
      headers: this.headers(),
      timeoutMs: this.timeoutMs,
    });
    if (!isRecord(data) || !Array.isArray(data.items)) return [];
    return data.items.map(toRepoSummary).filter((repo): repo is RepoSummary => repo !== null);
  }

  private async fetchReadme(fullName: string): Promise<string> {
    try {
      const text = await fetchText(`${this.apiBase}/repos/${fullName}/readme`, {
        headers: this.headers("application/vnd.github.raw"),
        timeoutMs: this.timeoutMs,
      });
      return text.slice(0, README_LIMIT);
    } catch (error) {
      this.logger.debug({ repo: fullName, error: errorMessage(error) }, "readme unavailable");
      return "";
    }
  }
}
