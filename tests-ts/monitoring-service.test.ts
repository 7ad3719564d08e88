import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { SeenItemStore } from "@/lib/cache/seen-item-store";
import { createFilterResult, DigestEntry, FilterResult, Item, ItemSource, ResearchLlm } from "@/lib/domain/models";
import { silentLogger } from "@/lib/infra/logger";
import { debugTimestamp, MonitoringService } from "@/lib/pipeline/monitoring-service";
import { makeItem, makeTempDir, removeTempDirs } from "./helpers/fixtures";

class StaticSource implements ItemSource {
  constructor(
    readonly name: string,
    private readonly items: Item[] | Error,
  ) {}

  async fetchItems(): Promise<Item[]> {
    if (this.items instanceof Error) throw this.items;
    return this.items;
  }
}

class VerdictLlm implements ResearchLlm {
  readonly checked: string[] = [];

  constructor(private readonly verdicts: Record<string, { relevant: boolean; score: number } | Error>) {}

  async checkRelevance(item: Item): Promise<FilterResult> {
    this.checked.push(item.title);
    const verdict = this.verdicts[item.title];
    if (!verdict) throw new Error(`no verdict for ${item.title}`);
    if (verdict instanceof Error) throw verdict;
    return createFilterResult(item, verdict.relevant, verdict.score, `scored ${verdict.score}`);
  }

  async generateSummary(): Promise<string> {
    return "";
  }

  async extractHighlights(): Promise<string[]> {
    return [];
  }

  async generateDigestSummary(_entries: readonly DigestEntry[]): Promise<string> {
    return "";
  }
}

function titled(title: string): Item {
  return makeItem({ title, url: `https://example.com/${encodeURIComponent(title)}` });
}

afterEach(removeTempDirs);

describe("monitoring service", () => {
  it("keeps items at or above the threshold", async () => {
    const llm = new VerdictLlm({
      equal: { relevant: true, score: 0.6 },
      below: { relevant: true, score: 0.6 - 1e-9 },
      rejected: { relevant: false, score: 0.9 },
    });
    const service = new MonitoringService({
      sources: [new StaticSource("s", [titled("equal"), titled("below"), titled("rejected")])],
      llm,
      interests: "tts",
      relevanceThreshold: 0.6,
      logger: silentLogger(),
    });

    const outcome = await service.collectAndFilter(new Date());

    expect(outcome.relevantResults.map((result) => result.item.title)).toEqual(["equal"]);
    expect(outcome.allFilterResults).toHaveLength(3);
  });

  it("tolerates failing sources and failing checks", async () => {
    const llm = new VerdictLlm({ good: { relevant: true, score: 0.9 }, broken: new Error("rate limited") });
    const service = new MonitoringService({
      sources: [new StaticSource("down", new Error("offline")), new StaticSource("up", [titled("broken"), titled("good")])],
      llm,
      interests: "tts",
      logger: silentLogger(),
    });

    const outcome = await service.collectAndFilter(new Date());

    expect(outcome.collectedCount).toBe(2);
    expect(outcome.errorCount).toBe(1);
    expect(outcome.allFilterResults.map((result) => result.item.title)).toEqual(["good"]);
    expect(llm.checked).toEqual(["broken", "good"]);
  });

  it("skips items already in the seen store", async () => {
    const store = new SeenItemStore(await makeTempDir("radar-monitor"), { logger: silentLogger() });
    await store.markSeen(titled("old"));
    const llm = new VerdictLlm({ new: { relevant: true, score: 0.9 } });
    const service = new MonitoringService({
      sources: [new StaticSource("s", [titled("old"), titled("new")])],
      llm,
      interests: "tts",
      seenStore: store,
      logger: silentLogger(),
    });

    const outcome = await service.collectAndFilter(new Date());

    expect(outcome.seenCount).toBe(1);
    expect(llm.checked).toEqual(["new"]);
    expect(outcome.relevantResults).toHaveLength(1);
  });

  it("saves relevance artifacts for every checked item", async () => {
    const store = new SeenItemStore(await makeTempDir("radar-monitor"), { logger: silentLogger() });
    const item = titled("paper");
    const service = new MonitoringService({
      sources: [],
      llm: new VerdictLlm({}),
      interests: "tts",
      seenStore: store,
      logger: silentLogger(),
    });

    await service.saveArtifacts([createFilterResult(item, true, 0.9, "on topic")]);
    await service.saveArtifacts([createFilterResult(item, true, 0.9, "on topic")]);

    const artifacts = await store.listArtifacts();
    expect(artifacts).toHaveLength(1);
    expect(artifacts[0]).toMatchObject({ relevanceChecked: true, isRelevant: true, relevanceScore: 0.9, reason: "on topic" });
  });

  it("writes debug snapshots", async () => {
    const debugDir = await makeTempDir("radar-debug");
    const now = new Date(2026, 0, 2, 3, 4, 5);
    const service = new MonitoringService({
      sources: [new StaticSource("s", [titled("low"), titled("high")])],
      llm: new VerdictLlm({ low: { relevant: false, score: 0.2 }, high: { relevant: true, score: 0.8 } }),
      interests: "tts",
      debugDir,
      now: () => now,
      logger: silentLogger(),
    });

    await service.collectAndFilter(new Date());

    expect(debugTimestamp(now)).toBe("20260102_030405");
    const collected = JSON.parse(await fs.readFile(path.join(debugDir, "collected_items_20260102_030405.json"), "utf-8"));
    expect(collected).toHaveLength(2);
    const filtered = JSON.parse(await fs.readFile(path.join(debugDir, "filter_results_20260102_030405.json"), "utf-8"));
    expect(filtered).toMatchObject({ total_checked: 2, relevant_count: 1, threshold: 0.6 });
    expect(filtered.results.map((row: { title: string }) => row.title)).toEqual(["high", "low"]);
  });
});
