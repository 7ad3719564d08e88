import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createFilterResult, createItem, FilterResult, Item, ItemInput, ITEM_PAPER } from "@/lib/domain/models";

export function makeItem(overrides: Partial<ItemInput> = {}): Item {
  return createItem({
    type: ITEM_PAPER,
    title: "Streaming Speech Synthesis",
    url: "https://example.com/papers/1",
    content: "A paper about low latency speech synthesis.",
    source: "arxiv_rss",
    discoveredAt: new Date("2026-01-02T08:00:00Z"),
    ...overrides,
  });
}

export function makeResult(item: Item, score: number, isRelevant = true, reason = "matches interests"): FilterResult {
  return createFilterResult(item, isRelevant, score, reason);
}

const tempDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
  tempDirs.push(dir);
  return dir;
}

/** Deletes every directory handed out by `makeTempDir`; run it from `afterEach`. */
export async function removeTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
}
