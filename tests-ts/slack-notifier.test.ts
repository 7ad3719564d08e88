import { afterEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "@/lib/infra/logger";
import { SlackNotifier } from "@/lib/integrations/slack-notifier";
import { formatSlackMessage, markdownToMrkdwn } from "@/lib/output/slack-formatter";
import { stubFetch, textResponse } from "./helpers/fetch-stub";

const WEBHOOK = "https://hooks.example.com/services/test";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("slack formatter", () => {
  it("converts bold text and links", () => {
    expect(markdownToMrkdwn("📄 **Paper** — [Read](https://example.com/p)")).toBe(
      "📄 *Paper* — <https://example.com/p|Read>",
    );
  });

  it("adds the dated header", () => {
    expect(formatSlackMessage("📄 Test summary\n", "2025-11-27")).toEqual({
      text: "📡 *Research Digest — 27.11.2025*\n\n📄 Test summary",
      mrkdwn: true,
    });
  });
});

describe("slack notifier", () => {
  it("posts the formatted digest", async () => {
    const requests = stubFetch(() => textResponse("ok"));

    await new SlackNotifier(WEBHOOK, { logger: silentLogger() }).send("**Paper** — Test", "2025-11-27");

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(WEBHOOK);
    expect(requests[0].method).toBe("POST");
    expect(JSON.parse(requests[0].body)).toEqual({
      text: "📡 *Research Digest — 27.11.2025*\n\n*Paper* — Test",
      mrkdwn: true,
    });
  });

  it("does nothing without a webhook", async () => {
    const requests = stubFetch(() => textResponse("ok"));
    const notifier = new SlackNotifier("", { logger: silentLogger() });

    await notifier.send("summary", "2025-11-27");

    expect(notifier.configured).toBe(false);
    expect(requests).toHaveLength(0);
  });

  it("swallows webhook errors", async () => {
    stubFetch(() => textResponse("invalid_payload", 400));
    await expect(new SlackNotifier(WEBHOOK, { logger: silentLogger() }).send("s", "2025-11-27")).resolves.toBeUndefined();

    vi.restoreAllMocks();
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    await expect(new SlackNotifier(WEBHOOK, { logger: silentLogger() }).send("s", "2025-11-27")).resolves.toBeUndefined();
  });
});
