import { describe, expect, it } from "vitest";
import { DigestEntry, ITEM_MODEL_CARD, ITEM_REPOSITORY } from "@/lib/domain/models";
import { formatDisplayDate, MarkdownDigestRenderer, renderDigestMarkdown } from "@/lib/output/markdown-writer";
import { makeItem } from "./helpers/fixtures";

function entry(overrides: Partial<DigestEntry> = {}): DigestEntry {
  return {
    item: makeItem({ title: "Paper", url: "https://example.com/p", metadata: { arxiv_id: "2401.00001", authors: "" } }),
    summary: "Short summary.",
    relevanceScore: 0.85,
    highlights: ["First point"],
    ...overrides,
  };
}

describe("markdown writer", () => {
  it("renders a single entry", () => {
    expect(renderDigestMarkdown([entry()], "2026-01-02")).toBe(
      [
        "# 📡 Research Digest for 02.01.2026",
        "",
        "Items found: 1",
        "",
        "## 📄 Papers",
        "",
        "### [Paper](https://example.com/p)",
        "",
        "**Relevance:** 85.0%",
        "",
        "Short summary.",
        "",
        "**Key points:**",
        "",
        "- First point",
        "",
        "*arxiv_id: 2401.00001*",
        "",
        "---",
        "",
      ].join("\n"),
    );
  });

  it("groups by type and sorts by score", () => {
    const markdown = new MarkdownDigestRenderer().render(
      [
        entry({ item: makeItem({ type: ITEM_REPOSITORY, title: "repo", url: "https://example.com/r" }), relevanceScore: 0.7 }),
        entry({ item: makeItem({ type: ITEM_MODEL_CARD, title: "model", url: "https://example.com/m" }), relevanceScore: 0.9 }),
        entry({ item: makeItem({ title: "paper low", url: "https://example.com/1" }), relevanceScore: 0.65 }),
        entry({ item: makeItem({ title: "paper high", url: "https://example.com/2" }), relevanceScore: 0.95 }),
      ],
      "2026-01-02",
    );

    const headings = markdown.split("\n").filter((line) => line.startsWith("## ") || line.startsWith("### "));
    expect(headings).toEqual([
      "## 📄 Papers",
      "### [paper high](https://example.com/2)",
      "### [paper low](https://example.com/1)",
      "## 🤖 Models",
      "### [model](https://example.com/m)",
      "## 💻 Repositories",
      "### [repo](https://example.com/r)",
    ]);
  });

  it("omits empty highlight and metadata blocks", () => {
    const markdown = renderDigestMarkdown([entry({ highlights: [], item: makeItem() })], "2026-01-02");
    expect(markdown).not.toContain("**Key points:**");
    expect(markdown.split("\n").filter((line) => line.startsWith("*") && line.endsWith("*") && !line.startsWith("**"))).toEqual(
      [],
    );
  });

  it("renders an empty digest", () => {
    expect(renderDigestMarkdown([], "2026-01-02")).toBe("# Research Digest for 02.01.2026\n\nNo relevant items found.\n");
  });

  it("formats iso dates for display", () => {
    expect(formatDisplayDate("2025-11-27")).toBe("27.11.2025");
    expect(formatDisplayDate("today")).toBe("today");
  });
});
