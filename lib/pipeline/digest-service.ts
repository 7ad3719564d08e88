import fs from "node:fs/promises";
import path from "node:path";
import { DigestEntry, DigestRenderer, FilterResult, Notifier, ResearchLlm } from "@/lib/domain/models";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";

export interface DigestServiceOptions {
  llm: ResearchLlm;
  renderer: DigestRenderer;
  notifier?: Notifier | null;
  logger?: Logger;
}

export class DigestService {
  private readonly llm: ResearchLlm;

  private readonly renderer: DigestRenderer;

  private readonly notifier: Notifier | null;

  private readonly logger: Logger;

  constructor(options: DigestServiceOptions) {
    this.llm = options.llm;
    this.renderer = options.renderer;
    this.notifier = options.notifier ?? null;
    this.logger = options.logger ?? defaultLogger;
  }

  async generateDigest(
    results: readonly FilterResult[],
    date: string,
  ): Promise<{ digest: string; entries: DigestEntry[] }> {
    const entries: DigestEntry[] = [];

    for (const result of results) {
      const [summary, highlights] = await Promise.allSettled([
        this.llm.generateSummary(result.item),
        this.llm.extractHighlights(result.item),
      ]);

      if (summary.status === "rejected") {
        this.logger.warn({ title: result.item.title, error: errorMessage(summary.reason) }, "summary generation failed");
      }
      if (highlights.status === "rejected") {
        this.logger.warn({ title: result.item.title, error: errorMessage(highlights.reason) }, "highlight extraction failed");
      }

      entries.push({
        item: result.item,
        summary:
          summary.status === "fulfilled" ? summary.value : `Summary generation failed: ${errorMessage(summary.reason)}`,
        relevanceScore: result.relevanceScore,
        highlights: highlights.status === "fulfilled" ? highlights.value : [],
      });
    }

    const digest = await this.renderer.render(entries, date);
    return { digest, entries };
  }

  generateDigestSummary(entries: readonly DigestEntry[]): Promise<string> {
    return this.llm.generateDigestSummary(entries);
  }

  async sendNotification(text: string, date: string): Promise<boolean> {
    if (!this.notifier) return false;
    await this.notifier.send(text, date);
    return true;
  }

  async saveDigest(content: string, outputPath: string): Promise<string> {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, content, "utf-8");
    this.logger.info({ outputPath }, "digest saved");
    return outputPath;
  }
}
