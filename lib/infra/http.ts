export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    body: string,
  ) {
    super(`HTTP ${status} from ${url}: ${body.slice(0, 200)}`);
  }
}

export type HttpInit = RequestInit & { timeoutMs?: number };

export async function fetchText(url: string, init: HttpInit = {}): Promise<string> {
  const { timeoutMs = 30_000, ...requestInit } = init;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {
      redirect: "follow",
      ...requestInit,
      signal: controller.signal,
    });
    const text = await response.text();
    if (!response.ok) {
      throw new HttpStatusError(response.status, url, text);
    }
    return text;
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchJson(url: string, init: HttpInit = {}): Promise<unknown> {
  const text = await fetchText(url, init);
  if (!text.trim()) {
    return {};
  }
  return JSON.parse(text);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
