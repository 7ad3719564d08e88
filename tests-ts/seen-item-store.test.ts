import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { afterEach, describe, expect, it } from "vitest";
import { artifactFileName, SeenItemStore } from "@/lib/cache/seen-item-store";
import { silentLogger } from "@/lib/infra/logger";
import { makeItem, makeTempDir, removeTempDirs } from "./helpers/fixtures";

const DAY_MS = 24 * 60 * 60 * 1000;
const JAN_1 = Date.UTC(2026, 0, 1, 12);

function store(root: string, nowMs = JAN_1): SeenItemStore {
  return new SeenItemStore(root, { now: () => new Date(nowMs), logger: silentLogger() });
}

async function readYaml(filePath: string): Promise<unknown> {
  return yaml.load(await fs.readFile(filePath, "utf-8"));
}

function md5Prefix(value: string): string {
  return crypto.createHash("md5").update(value).digest("hex").slice(0, 8);
}

afterEach(removeTempDirs);

describe("seen item store", () => {
  it("names artifacts after the sanitized title and a url hash", () => {
    expect(artifactFileName({ title: "Hello, World! TTS", url: "https://example.com/a" })).toBe(
      `Hello-World-TTS_${md5Prefix("https://example.com/a")}.yaml`,
    );
    expect(artifactFileName({ title: "a".repeat(80), url: "u" })).toBe(`${"a".repeat(50)}_${md5Prefix("u")}.yaml`);
  });

  it("remembers items across instances", async () => {
    const root = await makeTempDir("radar-seen");
    const item = makeItem();

    expect(await store(root).isSeen(item)).toBe(false);
    await store(root).markSeen(item);

    expect(await store(root).isSeen(item)).toBe(true);
  });

  it("writes snake_case artifacts with relevance data", async () => {
    const root = await makeTempDir("radar-seen");
    const subject = store(root);
    const item = makeItem({ content: "c".repeat(9000), metadata: { arxiv_id: "2401.00001" } });

    await subject.markSeen(item);
    const plain = await readYaml(subject.artifactPath(item));
    expect(plain).toMatchObject({
      title: item.title,
      url: item.url,
      source: "arxiv_rss",
      type: "paper",
      date_discovered: "2026-01-02T08:00:00.000Z",
      date_seen: "2026-01-01",
      metadata: { arxiv_id: "2401.00001" },
      content_length: 9000,
      llm_content_sent: 8000,
      relevance_checked: false,
    });
    expect(plain).not.toHaveProperty("is_relevant");

    await subject.markSeenWithRelevance(item, true, 0.8, "on topic");
    expect(await readYaml(subject.artifactPath(item))).toMatchObject({
      relevance_checked: true,
      is_relevant: true,
      relevance_score: 0.8,
      reason: "on topic",
      content_preview: "c".repeat(500),
    });
  });

  it("filters unseen items in input order", async () => {
    const root = await makeTempDir("radar-seen");
    const subject = store(root);
    const items = [0, 1, 2, 3, 4].map((index) => makeItem({ title: `Item ${index}`, url: `https://example.com/${index}` }));

    await subject.markBatchSeen([items[1], items[3]]);
    const { unseen, seenCount } = await subject.filterUnseen(items);

    expect(seenCount).toBe(2);
    expect(unseen.map((item) => item.title)).toEqual(["Item 0", "Item 2", "Item 4"]);
  });

  it("counts artifacts per source", async () => {
    const root = await makeTempDir("radar-seen");
    const subject = store(root);
    await subject.markSeen(makeItem({ url: "https://example.com/1", source: "github" }));
    await subject.markSeen(makeItem({ url: "https://example.com/2", source: "github" }));
    await subject.markSeen(makeItem({ url: "https://example.com/3", source: "arxiv_rss" }));

    await expect(subject.getStats()).resolves.toEqual({ total: 3, bySource: { arxiv_rss: 1, github: 2 } });
    await expect(store(await makeTempDir("radar-empty")).getStats()).resolves.toEqual({ total: 0, bySource: {} });
  });

  it("lists the most recently written artifacts first", async () => {
    const root = await makeTempDir("radar-seen");
    const subject = store(root);
    const items = [1, 2, 3].map((index) =>
      makeItem({ title: `Item ${index}`, url: `https://example.com/${index}`, source: index === 2 ? "github" : "arxiv_rss" }),
    );
    for (const [index, item] of items.entries()) {
      await subject.markSeen(item);
      const at = new Date(JAN_1 + index * 60_000);
      await fs.utimes(subject.artifactPath(item), at, at);
    }

    const recent = await subject.listArtifacts({ limit: 2 });
    expect(recent.map((artifact) => artifact.title)).toEqual(["Item 3", "Item 2"]);
    expect(recent[0].artifactFile).toBe(path.join("arxiv_rss", artifactFileName(items[2])));

    const github = await subject.listArtifacts({ source: "github" });
    expect(github.map((artifact) => artifact.title)).toEqual(["Item 2"]);
  });

  it("prunes artifacts older than the cutoff", async () => {
    const root = await makeTempDir("radar-seen");
    const old = makeItem({ title: "Old", url: "https://example.com/old" });
    const recent = makeItem({ title: "Recent", url: "https://example.com/recent" });
    await store(root, JAN_1).markSeen(old);
    await store(root, JAN_1 + 2 * DAY_MS).markSeen(recent);
    const undated = path.join(root, "arxiv_rss", "undated_00000000.yaml");
    await fs.writeFile(undated, yaml.dump({ title: "Undated", url: "https://example.com/undated" }), "utf-8");

    const later = store(root, JAN_1 + 91 * DAY_MS);
    await expect(later.pruneOld(90)).resolves.toBe(1);

    expect(await later.isSeen(old)).toBe(false);
    expect(await later.isSeen(recent)).toBe(true);
    await expect(fs.access(undated)).resolves.toBeUndefined();
  });

  it("logs write failures instead of throwing", async () => {
    const root = await makeTempDir("radar-seen");
    const blocked = path.join(root, "not-a-dir");
    await fs.writeFile(blocked, "file", "utf-8");
    const subject = store(blocked);

    await expect(subject.markSeen(makeItem())).resolves.toBeUndefined();
    expect(await subject.isSeen(makeItem())).toBe(false);
  });
});
