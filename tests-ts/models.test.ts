import fs from "node:fs/promises";
import { describe, expect, it } from "vitest";
import { createItem, isItemType, ItemValidationError, ITEM_REPOSITORY } from "@/lib/domain/models";
import { makeTempDir, removeTempDirs } from "./helpers/fixtures";

describe("domain models", () => {
  it("rejects blank titles and urls", () => {
    expect(() => createItem({ type: ITEM_REPOSITORY, title: "  ", url: "https://example.com", source: "github" })).toThrowError(
      ItemValidationError,
    );
    expect(() => createItem({ type: ITEM_REPOSITORY, title: "repo", url: "", source: "github" })).toThrowError(
      "URL cannot be empty",
    );
  });

  it("freezes items and copies metadata", () => {
    const metadata = { stars: "3" };
    const item = createItem({ type: ITEM_REPOSITORY, title: "repo", url: "https://example.com", source: "github", metadata });
    metadata.stars = "4";

    expect(item.metadata).toEqual({ stars: "3" });
    expect(item.content).toBe("");
    expect(Object.isFrozen(item)).toBe(true);
    expect(Object.isFrozen(item.metadata)).toBe(true);
  });

  it("recognizes item types", () => {
    expect(isItemType("model_card")).toBe(true);
    expect(isItemType("blog")).toBe(false);
  });
});

describe("test fixtures", () => {
  it("removes temporary directories with their contents", async () => {
    const dir = await makeTempDir("radar-fixture");
    await fs.writeFile(`${dir}/note.txt`, "x", "utf-8");

    await removeTempDirs();

    await expect(fs.access(dir)).rejects.toThrowError();
  });
});
