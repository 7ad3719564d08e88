import { DigestEntry, DigestRenderer, ITEM_MODEL_CARD, ITEM_PAPER, ITEM_REPOSITORY, ItemType } from "@/lib/domain/models";

const SECTIONS: ReadonlyArray<{ type: ItemType; heading: string }> = [
  { type: ITEM_PAPER, heading: "## 📄 Papers" },
  { type: ITEM_MODEL_CARD, heading: "## 🤖 Models" },
  { type: ITEM_REPOSITORY, heading: "## 💻 Repositories" },
];

/** `YYYY-MM-DD` → `DD.MM.YYYY`; anything else is returned unchanged. */
export function formatDisplayDate(isoDate: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(isoDate.trim());
  return match ? `${match[3]}.${match[2]}.${match[1]}` : isoDate;
}

export function formatPercent(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

function renderEntry(entry: DigestEntry): string[] {
  const lines = [
    `### [${entry.item.title}](${entry.item.url})`,
    "",
    `**Relevance:** ${formatPercent(entry.relevanceScore)}`,
    "",
    entry.summary.trim(),
    "",
  ];

  if (entry.highlights.length) {
    lines.push("**Key points:**", "");
    entry.highlights.forEach((highlight) => lines.push(`- ${highlight}`));
    lines.push("");
  }

  const meta = Object.entries(entry.item.metadata)
    .filter(([, value]) => value)
    .map(([key, value]) => `${key}: ${value}`);
  if (meta.length) {
    lines.push(`*${meta.join(" | ")}*`, "");
  }

  lines.push("---", "");
  return lines;
}

export function renderDigestMarkdown(entries: readonly DigestEntry[], date: string): string {
  const displayDate = formatDisplayDate(date);
  if (!entries.length) {
    return `# Research Digest for ${displayDate}\n\nNo relevant items found.\n`;
  }

  const lines = [`# 📡 Research Digest for ${displayDate}`, "", `Items found: ${entries.length}`, ""];

  for (const section of SECTIONS) {
    const group = entries
      .filter((entry) => entry.item.type === section.type)
      .sort((a, b) => b.relevanceScore - a.relevanceScore);
    if (!group.length) continue;
    lines.push(section.heading, "");
    group.forEach((entry) => lines.push(...renderEntry(entry)));
  }

  return `${lines.join("\n").replace(/\s+$/g, "")}\n`;
}

export class MarkdownDigestRenderer implements DigestRenderer {
  render(entries: readonly DigestEntry[], date: string): string {
    return renderDigestMarkdown(entries, date);
  }
}
