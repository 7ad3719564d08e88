export type ExtractionStrategy = (text: string) => string[];

const FENCE_RE = /```[\w-]*[ \t]*\r?\n?([\s\S]*?)```/;
const RELEVANCE_MARKER_RE = /"is_relevant"\s*:\s*(?:true|false)\b/;
const OBJECT_RE = /\{(?:[^{}]|\{[^{}]*\})*\}/g;
const ARRAY_RE = /\[(?:[^[\]]|\[[^[\]]*\])*\]/g;
const TRAILING_COMMA_RE = /,(\s*[}\]])/g;

export function repairJson(text: string): string {
  return text.replace(TRAILING_COMMA_RE, "$1");
}

export const fencedBlock: ExtractionStrategy = (text) => {
  const match = FENCE_RE.exec(text);
  return match ? [match[1].trim()] : [];
};

export const relevanceObject: ExtractionStrategy = (text) =>
  Array.from(text.matchAll(OBJECT_RE), (match) => match[0]).filter((candidate) => RELEVANCE_MARKER_RE.test(candidate));

export const balancedObject: ExtractionStrategy = (text) => Array.from(text.matchAll(OBJECT_RE), (match) => match[0]);

export const balancedArray: ExtractionStrategy = (text) => Array.from(text.matchAll(ARRAY_RE), (match) => match[0]);

export const trimmedText: ExtractionStrategy = (text) => [text.trim()];

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  fencedBlock,
  relevanceObject,
  balancedObject,
  balancedArray,
  trimmedText,
];

function parses(candidate: string): boolean {
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recovers a JSON payload from free-form model output. Returns the first repaired
 * candidate that parses, or the repaired trimmed text when none does. Never throws.
 */
export function extractJson(raw: string | null | undefined): string {
  const text = String(raw ?? "");

  for (const strategy of EXTRACTION_STRATEGIES) {
    for (const candidate of strategy(text)) {
      const repaired = repairJson(candidate);
      if (parses(repaired)) {
        return repaired;
      }
    }
  }

  return repairJson(text.trim());
}

/**
 * Parses a reply that must be JSON as a whole: the fenced block body or the full
 * trimmed text. Embedded fragments such as a bracketed citation are not considered.
 */
export function parseWholeJson(raw: string): unknown {
  for (const candidate of [...fencedBlock(raw), ...trimmedText(raw)]) {
    try {
      return JSON.parse(repairJson(candidate));
    } catch {
      continue;
    }
  }
  return undefined;
}
