/** Case-insensitive substring match over title and content; no keywords means no filtering. */
export function matchesKeywords(title: string, content: string, keywords: readonly string[]): boolean {
  const active = keywords.map((keyword) => keyword.trim().toLowerCase()).filter(Boolean);
  if (!active.length) return true;
  const text = `${title} ${content}`.toLowerCase();
  return active.some((keyword) => text.includes(keyword));
}
