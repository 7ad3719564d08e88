import { vi } from "vitest";

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string;
  signal: AbortSignal | null;
  at: number;
}

export type FetchRoute = (request: RecordedRequest) => Response | Promise<Response>;

/** Replaces global fetch for the current test; restore with `vi.restoreAllMocks()`. */
export function stubFetch(route: FetchRoute): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  vi.spyOn(globalThis, "fetch").mockImplementation(async (input, init) => {
    const request: RecordedRequest = {
      url: input instanceof Request ? input.url : String(input),
      method: init?.method || "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : "",
      signal: init?.signal ?? null,
      at: Date.now(),
    };
    requests.push(request);
    return route(request);
  });
  return requests;
}

export function jsonResponse(payload: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/** A response that never arrives; the promise rejects once the request is aborted. */
export function hangUntilAborted(request: RecordedRequest): Promise<Response> {
  return new Promise((_resolve, reject) => {
    request.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted.")));
  });
}
