import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { LRUCache } from "lru-cache";
import { Item, SeenArtifact, SeenStats } from "@/lib/domain/models";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";
import { LLM_CONTENT_LIMIT } from "@/lib/llm/prompts";

const ARTIFACT_EXT = ".yaml";
const TITLE_PREFIX_LENGTH = 50;
const CONTENT_PREVIEW_LENGTH = 500;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ListedArtifact extends SeenArtifact {
  artifactFile: string;
}

interface RelevanceMark {
  isRelevant: boolean;
  relevanceScore: number;
  reason: string;
}

function isoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

function sanitizeTitle(title: string): string {
  const cleaned = title.replace(/[^\p{L}\p{N}_\s-]/gu, "").replace(/[-\s]+/g, "-");
  return Array.from(cleaned).slice(0, TITLE_PREFIX_LENGTH).join("");
}

function sanitizeSource(source: string): string {
  return source.trim().replace(/[^\w.-]+/g, "_").replace(/^\.+/, "_") || "unknown";
}

export function artifactFileName(item: Pick<Item, "title" | "url">): string {
  const urlHash = crypto.createHash("md5").update(item.url).digest("hex").slice(0, 8);
  return `${sanitizeTitle(item.title)}_${urlHash}${ARTIFACT_EXT}`;
}

function serializeArtifact(artifact: SeenArtifact): Record<string, unknown> {
  const row: Record<string, unknown> = {
    title: artifact.title,
    url: artifact.url,
    source: artifact.source,
    type: artifact.type,
    date_discovered: artifact.dateDiscovered,
    date_seen: artifact.dateSeen,
    metadata: artifact.metadata,
    content_preview: artifact.contentPreview,
    content_length: artifact.contentLength,
    llm_content_sent: artifact.llmContentSent,
    relevance_checked: artifact.relevanceChecked,
  };
  if (artifact.relevanceChecked) {
    row.is_relevant = artifact.isRelevant;
    row.relevance_score = artifact.relevanceScore;
    row.reason = artifact.reason;
  }
  return row;
}

function parseArtifact(raw: unknown): SeenArtifact | null {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return null;
  const row: Record<string, unknown> = { ...raw };
  const metadata: Record<string, string> = {};
  if (row.metadata && typeof row.metadata === "object" && !Array.isArray(row.metadata)) {
    Object.entries(row.metadata).forEach(([key, value]) => {
      metadata[key] = String(value ?? "");
    });
  }

  const artifact: SeenArtifact = {
    title: String(row.title ?? ""),
    url: String(row.url ?? ""),
    source: String(row.source ?? ""),
    type: String(row.type ?? ""),
    dateDiscovered: String(row.date_discovered ?? ""),
    dateSeen: row.date_seen instanceof Date ? isoDate(row.date_seen) : String(row.date_seen ?? ""),
    metadata,
    contentPreview: String(row.content_preview ?? ""),
    contentLength: Number(row.content_length || 0),
    llmContentSent: Number(row.llm_content_sent || 0),
    relevanceChecked: row.relevance_checked === true,
  };
  if (artifact.relevanceChecked) {
    artifact.isRelevant = row.is_relevant === true;
    artifact.relevanceScore = Number(row.relevance_score || 0);
    artifact.reason = String(row.reason ?? "");
  }
  return artifact;
}

/**
 * File-per-item record of processed items, laid out as
 * `<root>/<source>/<title-prefix>_<url-hash>.yaml`.
 */
export class SeenItemStore {
  private readonly memory = new LRUCache<string, true>({ max: 5000 });

  private readonly now: () => Date;

  private readonly logger: Logger;

  constructor(
    readonly storageDir: string,
    options: { now?: () => Date; logger?: Logger } = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  artifactPath(item: Pick<Item, "title" | "url" | "source">): string {
    return path.join(this.storageDir, sanitizeSource(item.source), artifactFileName(item));
  }

  async isSeen(item: Item): Promise<boolean> {
    const artifactPath = this.artifactPath(item);
    if (this.memory.has(artifactPath)) return true;
    try {
      await fs.access(artifactPath);
      this.memory.set(artifactPath, true);
      return true;
    } catch {
      return false;
    }
  }

  async markSeen(item: Item): Promise<void> {
    await this.saveArtifact(item);
  }

  async markSeenWithRelevance(item: Item, isRelevant: boolean, relevanceScore: number, reason: string): Promise<void> {
    await this.saveArtifact(item, { isRelevant, relevanceScore, reason });
  }

  async markBatchSeen(items: readonly Item[]): Promise<void> {
    for (const item of items) {
      await this.saveArtifact(item);
    }
  }

  async filterUnseen(items: readonly Item[]): Promise<{ unseen: Item[]; seenCount: number }> {
    const unseen: Item[] = [];
    let seenCount = 0;
    for (const item of items) {
      if (await this.isSeen(item)) {
        seenCount += 1;
      } else {
        unseen.push(item);
      }
    }
    return { unseen, seenCount };
  }

  async getStats(): Promise<SeenStats> {
    const bySource: Record<string, number> = {};
    let total = 0;
    for (const sourceDir of await this.sourceDirs()) {
      const count = (await this.artifactFiles(sourceDir)).length;
      bySource[sourceDir] = count;
      total += count;
    }
    return { total, bySource };
  }

  async listArtifacts(options: { source?: string; limit?: number } = {}): Promise<ListedArtifact[]> {
    const limit = Math.max(0, Math.trunc(options.limit ?? 20));
    const dirs = options.source ? [sanitizeSource(options.source)] : await this.sourceDirs();

    const files: Array<{ relative: string; mtimeMs: number }> = [];
    for (const dir of dirs) {
      for (const name of await this.artifactFiles(dir)) {
        const relative = path.join(dir, name);
        try {
          const stat = await fs.stat(path.join(this.storageDir, relative));
          files.push({ relative, mtimeMs: stat.mtimeMs });
        } catch {
          continue;
        }
      }
    }
    files.sort((a, b) => b.mtimeMs - a.mtimeMs);

    const artifacts: ListedArtifact[] = [];
    for (const file of files) {
      if (artifacts.length >= limit) break;
      const artifact = await this.readArtifact(path.join(this.storageDir, file.relative));
      if (!artifact) continue;
      artifacts.push({ ...artifact, artifactFile: file.relative });
    }
    return artifacts;
  }

  /** Deletes artifacts first seen more than `days` days ago; undated ones are kept. */
  async pruneOld(days = 90): Promise<number> {
    const today = Date.parse(isoDate(this.now()));
    let removed = 0;

    for (const dir of await this.sourceDirs()) {
      for (const name of await this.artifactFiles(dir)) {
        const artifactPath = path.join(this.storageDir, dir, name);
        const artifact = await this.readArtifact(artifactPath);
        if (!artifact || !artifact.dateSeen) continue;

        const seenAt = Date.parse(artifact.dateSeen.slice(0, 10));
        if (Number.isNaN(seenAt)) continue;

        const daysOld = Math.round((today - seenAt) / DAY_MS);
        if (daysOld <= days) continue;

        try {
          await fs.unlink(artifactPath);
          this.memory.delete(artifactPath);
          removed += 1;
        } catch (error) {
          this.logger.warn({ artifactPath, error: errorMessage(error) }, "could not remove artifact");
        }
      }
    }

    return removed;
  }

  private async saveArtifact(item: Item, relevance?: RelevanceMark): Promise<void> {
    const artifactPath = this.artifactPath(item);
    const artifact: SeenArtifact = {
      title: item.title,
      url: item.url,
      source: item.source,
      type: item.type,
      dateDiscovered: item.discoveredAt.toISOString(),
      dateSeen: isoDate(this.now()),
      metadata: { ...item.metadata },
      contentPreview: item.content.slice(0, CONTENT_PREVIEW_LENGTH),
      contentLength: item.content.length,
      llmContentSent: Math.min(LLM_CONTENT_LIMIT, item.content.length),
      relevanceChecked: Boolean(relevance),
      ...relevance,
    };

    try {
      await fs.mkdir(path.dirname(artifactPath), { recursive: true });
      await fs.writeFile(artifactPath, yaml.dump(serializeArtifact(artifact), { sortKeys: false, lineWidth: -1 }), "utf-8");
      this.memory.set(artifactPath, true);
    } catch (error) {
      this.logger.warn({ title: item.title, artifactPath, error: errorMessage(error) }, "could not save artifact");
    }
  }

  private async readArtifact(artifactPath: string): Promise<SeenArtifact | null> {
    try {
      const raw = await fs.readFile(artifactPath, "utf-8");
      return parseArtifact(yaml.load(raw));
    } catch {
      return null;
    }
  }

  private async sourceDirs(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.storageDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch {
      return [];
    }
  }

  private async artifactFiles(sourceDir: string): Promise<string[]> {
    try {
      const names = await fs.readdir(path.join(this.storageDir, sourceDir));
      return names.filter((name) => name.endsWith(ARTIFACT_EXT));
    } catch {
      return [];
    }
  }
}
