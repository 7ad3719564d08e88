export const ITEM_PAPER = "paper";
export const ITEM_REPOSITORY = "repository";
export const ITEM_MODEL_CARD = "model_card";

export const ITEM_TYPES = [ITEM_PAPER, ITEM_REPOSITORY, ITEM_MODEL_CARD] as const;

export type ItemType = (typeof ITEM_TYPES)[number];

export class ItemValidationError extends Error {}

export interface Item {
  readonly type: ItemType;
  readonly title: string;
  readonly url: string;
  readonly content: string;
  readonly source: string;
  readonly discoveredAt: Date;
  readonly metadata: Readonly<Record<string, string>>;
}

export interface ItemInput {
  type: ItemType;
  title: string;
  url: string;
  content?: string;
  source: string;
  discoveredAt?: Date;
  metadata?: Record<string, string>;
}

export function isItemType(value: unknown): value is ItemType {
  return typeof value === "string" && (ITEM_TYPES as readonly string[]).includes(value);
}

export function createItem(input: ItemInput): Item {
  if (!String(input.title || "").trim()) {
    throw new ItemValidationError("Title cannot be empty");
  }
  if (!String(input.url || "").trim()) {
    throw new ItemValidationError("URL cannot be empty");
  }

  return Object.freeze({
    type: input.type,
    title: input.title,
    url: input.url,
    content: input.content ?? "",
    source: input.source,
    discoveredAt: input.discoveredAt ?? new Date(),
    metadata: Object.freeze({ ...(input.metadata || {}) }),
  });
}

export interface FilterResult {
  readonly item: Item;
  readonly isRelevant: boolean;
  /** Nominally 0-1 but taken from model output as-is. */
  readonly relevanceScore: number;
  readonly reason: string;
}

export function createFilterResult(
  item: Item,
  isRelevant: boolean,
  relevanceScore: number,
  reason: string,
): FilterResult {
  return Object.freeze({ item, isRelevant, relevanceScore, reason });
}

export interface DigestEntry {
  readonly item: Item;
  readonly summary: string;
  readonly relevanceScore: number;
  readonly highlights: readonly string[];
}

export interface SeenArtifact {
  title: string;
  url: string;
  source: string;
  type: string;
  dateDiscovered: string;
  dateSeen: string;
  metadata: Record<string, string>;
  contentPreview: string;
  contentLength: number;
  llmContentSent: number;
  relevanceChecked: boolean;
  isRelevant?: boolean;
  relevanceScore?: number;
  reason?: string;
}

export interface SeenStats {
  total: number;
  bySource: Record<string, number>;
}

export interface ItemSource {
  readonly name: string;
  fetchItems(since: Date): Promise<Item[]>;
}

export interface ResearchLlm {
  checkRelevance(item: Item, interests: string): Promise<FilterResult>;
  generateSummary(item: Item): Promise<string>;
  extractHighlights(item: Item): Promise<string[]>;
  generateDigestSummary(entries: readonly DigestEntry[]): Promise<string>;
}

export interface DigestRenderer {
  render(entries: readonly DigestEntry[], date: string): string | Promise<string>;
}

export interface Notifier {
  send(text: string, date: string): Promise<void>;
}

export interface DigestRunResult {
  exitCode: number;
  reportDate: string;
  digestPath: string;
  summaryPath: string;
  digestMarkdown: string;
  digestSummary: string;
  collectedCount: number;
  seenCount: number;
  checkedCount: number;
  relevantCount: number;
  notified: boolean;
}
