import { sleep } from "@/lib/infra/http";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";

export class AnthropicError extends Error {}

export class AnthropicHttpError extends AnthropicError {
  constructor(
    readonly status: number,
    body: string,
  ) {
    super(`Anthropic request failed: ${status} ${body.slice(0, 500)}`);
  }
}

export class AnthropicTransportError extends AnthropicError {}

export interface AnthropicClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  maxRetries?: number;
  initialRetryDelaySeconds?: number;
  requestDelaySeconds?: number;
  timeoutSeconds?: number;
  logger?: Logger;
}

const API_VERSION = "2023-06-01";

interface RawResponse {
  status: number;
  retryAfter: string | null;
  text: string;
}

function extractText(data: unknown): string | null {
  if (!data || typeof data !== "object" || !("content" in data)) return null;
  const content = data.content;
  if (!Array.isArray(content) || !content.length) return null;
  const first: unknown = content[0];
  if (!first || typeof first !== "object" || !("text" in first)) return null;
  return typeof first.text === "string" ? first.text : null;
}

/** Parses a `retry-after` value given either in seconds or as an HTTP date. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | null {
  const raw = String(value ?? "").trim();
  if (!raw) return null;
  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1_000;
  }
  const at = Date.parse(raw);
  if (!Number.isNaN(at)) {
    return Math.max(0, at - now);
  }
  return null;
}

/**
 * Messages API client with a minimum spacing between requests and
 * exponential backoff on 429, 5xx and transport failures.
 *
 * Calls on one instance are serialized, so the spacing also holds for callers
 * that issue requests concurrently.
 */
export class AnthropicClient {
  readonly apiKey: string;

  readonly baseUrl: string;

  readonly model: string;

  readonly maxTokens: number;

  readonly temperature: number;

  readonly maxRetries: number;

  readonly initialRetryDelayMs: number;

  readonly requestDelayMs: number;

  readonly timeoutMs: number;

  private readonly logger: Logger;

  private lastRequestAt = 0;

  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: AnthropicClientOptions = {}) {
    this.apiKey = options.apiKey || process.env.ANTHROPIC_API_KEY || "";
    this.baseUrl = (options.baseUrl || process.env.ANTHROPIC_BASE_URL || "https://api.anthropic.com/v1").replace(/\/$/, "");
    this.model = options.model || "claude-sonnet-4-20250514";
    this.maxTokens = Math.max(1, Math.trunc(options.maxTokens ?? 4096));
    this.temperature = options.temperature ?? 0.7;
    this.maxRetries = Math.max(1, Math.trunc(options.maxRetries ?? 5));
    this.initialRetryDelayMs = Math.max(0, (options.initialRetryDelaySeconds ?? 2) * 1_000);
    this.requestDelayMs = Math.max(0, (options.requestDelaySeconds ?? 1.5) * 1_000);
    this.timeoutMs = Math.max(1, Math.trunc((options.timeoutSeconds ?? 60) * 1_000));
    this.logger = options.logger ?? defaultLogger;

    if (!this.apiKey) {
      throw new AnthropicError("Missing ANTHROPIC_API_KEY");
    }
  }

  complete(prompt: string, system: string): Promise<string> {
    const run = this.queue.then(() => this.callWithRetry(prompt, system));
    this.queue = run.catch(() => undefined);
    return run;
  }

  backoffDelayMs(attempt: number): number {
    return this.initialRetryDelayMs * 2 ** attempt;
  }

  private async throttle(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestAt;
    if (elapsed < this.requestDelayMs) {
      await sleep(this.requestDelayMs - elapsed);
    }
  }

  private async callWithRetry(prompt: string, system: string): Promise<string> {
    await this.throttle();

    let lastError: Error | undefined;

    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      const isLast = attempt === this.maxRetries - 1;

      let response: RawResponse;
      try {
        response = await this.post(prompt, system);
      } catch (error) {
        lastError = new AnthropicTransportError(`Anthropic request failed: ${errorMessage(error)}`);
        if (isLast) break;
        const delayMs = this.backoffDelayMs(attempt);
        this.logger.warn(
          { attempt: attempt + 1, maxRetries: this.maxRetries, delayMs, error: errorMessage(error) },
          "network error, retrying",
        );
        await sleep(delayMs);
        continue;
      }

      const { text } = response;
      this.lastRequestAt = Date.now();

      if (response.status === 200) {
        let data: unknown;
        try {
          data = JSON.parse(text);
        } catch {
          throw new AnthropicError(`Unexpected Anthropic response: ${text.slice(0, 500)}`);
        }
        const content = extractText(data);
        if (content === null) {
          throw new AnthropicError(`Unexpected Anthropic response: ${text.slice(0, 500)}`);
        }
        return content;
      }

      if (response.status === 429) {
        lastError = new AnthropicHttpError(response.status, text);
        if (isLast) break;
        const delayMs = parseRetryAfter(response.retryAfter) ?? this.backoffDelayMs(attempt);
        this.logger.warn({ attempt: attempt + 1, maxRetries: this.maxRetries, delayMs }, "rate limit hit, retrying");
        await sleep(delayMs);
        continue;
      }

      if (response.status >= 500) {
        lastError = new AnthropicHttpError(response.status, text);
        if (isLast) break;
        const delayMs = this.backoffDelayMs(attempt);
        this.logger.warn(
          { attempt: attempt + 1, maxRetries: this.maxRetries, delayMs, status: response.status },
          "server error, retrying",
        );
        await sleep(delayMs);
        continue;
      }

      throw new AnthropicHttpError(response.status, text);
    }

    throw lastError ?? new AnthropicError("Failed to call Anthropic API after all retries");
  }

  private async post(prompt: string, system: string): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}/messages`, {
        method: "POST",
        headers: {
          "x-api-key": this.apiKey,
          "anthropic-version": API_VERSION,
          "content-type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          system,
          messages: [{ role: "user", content: prompt }],
        }),
        signal: controller.signal,
      });
      return {
        status: response.status,
        retryAfter: response.headers.get("retry-after"),
        text: await response.text(),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
