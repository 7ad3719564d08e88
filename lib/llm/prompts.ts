export interface PromptTemplate {
  system: string;
  user: string;
}

export interface PromptSet {
  relevanceCheck: PromptTemplate;
  summary: PromptTemplate;
  highlights: PromptTemplate;
  digestSummary: PromptTemplate;
}

export const LLM_CONTENT_LIMIT = 8000;

export const DEFAULT_PROMPTS: PromptSet = {
  relevanceCheck: {
    system:
      "You are a research analyst. Decide whether the item is relevant to the reader's interests. " +
      "Respond only with a JSON object containing: is_relevant (boolean), score (number 0-1), reason (string).",
    user: `Analyze the following item for relevance.

INTERESTS:
{interests}

ITEM:
Title: {title}
Type: {type}
URL: {url}
Source: {source}

Content (first ${LLM_CONTENT_LIMIT} chars):
{content}

Respond with JSON:
{"is_relevant": true/false, "score": 0.0-1.0, "reason": "brief explanation"}`,
  },
  summary: {
    system: "You are a technical writer. Write concise, informative summaries.",
    user: `Content to summarize:

Title: {title}
URL: {url}
Type: {type}

Content:
{content}

Write a brief summary (2-4 sentences) focused on the key technical contributions and practical applications.`,
  },
  highlights: {
    system: "You are a research analyst. Extract key points concisely.",
    user: `Content to analyze:

Title: {title}
Type: {type}

Content:
{content}

Extract 3-5 key highlights: main technical innovations, practical applications, performance improvements, novel approaches.
Respond with a JSON array of strings.`,
  },
  digestSummary: {
    system: "You are an editor of a research newsletter. Write short, scannable digests.",
    user: `Below are today's relevant research items as JSON:

{entries}

Write a short digest: one line per item with an emoji for its type (📄 paper, 🤖 model, 💻 repository),
the title in bold, one sentence on why it matters, and a markdown link to the url.`,
  },
};

export const PROMPT_KEYS: ReadonlyArray<keyof PromptSet> = ["relevanceCheck", "summary", "highlights", "digestSummary"];

const PLACEHOLDER_RE = /\{(\w+)\}/g;

/** Substitutes `{name}` placeholders; unknown names are left untouched. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(PLACEHOLDER_RE, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match,
  );
}

export function mergePrompts(overrides: Partial<Record<keyof PromptSet, Partial<PromptTemplate>>> = {}): PromptSet {
  const merged: PromptSet = { ...DEFAULT_PROMPTS };
  for (const key of PROMPT_KEYS) {
    const override = overrides[key];
    if (!override) continue;
    merged[key] = {
      system: String(override.system || "").trim() || DEFAULT_PROMPTS[key].system,
      user: String(override.user || "").trim() || DEFAULT_PROMPTS[key].user,
    };
  }
  return merged;
}
