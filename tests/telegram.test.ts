import { describe, it, expect, afterEach } from "vitest";
import { createTelegramMessenger, splitMessage, TELEGRAM_MAX_MESSAGE_CHARS } from "../src/deliver/telegram.js";
import { RateLimitError, TransportError, ValidationError } from "../src/errors.js";
import { mockFetchRouter } from "./helpers.js";

const realFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = realFetch;
});

const messenger = () => createTelegramMessenger({ botToken: "test-bot-token", chatId: "-100123", timeoutMs: 1000 });

describe("telegram messenger", () => {
  it("sends HTML messages and returns the message id", async () => {
    const requests = mockFetchRouter([
      { match: /\/sendMessage$/, body: { ok: true, result: { message_id: 42, chat: { id: -100123 } } } }
    ]);

    const id = await messenger().sendMessage("<b>Hello</b>");

    expect(id).toBe(42);
    expect(requests[0]?.url).toBe("https://api.telegram.org/bottest-bot-token/sendMessage");
    expect(requests[0]?.body).toEqual({
      chat_id: "-100123",
      text: "<b>Hello</b>",
      parse_mode: "HTML",
      disable_web_page_preview: false
    });
  });

  it("reads retry_after from a 429 body", async () => {
    mockFetchRouter([
      {
        match: /\/sendMessage$/,
        status: 429,
        body: { ok: false, error_code: 429, description: "Too Many Requests: retry after 7", parameters: { retry_after: 7 } }
      }
    ]);

    const err = await messenger().sendMessage("hi").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitError);
    if (err instanceof RateLimitError) expect(err.retryAfterMs).toBe(7000);
  });

  it("treats a 400 as a non-retryable transport error", async () => {
    mockFetchRouter([
      {
        match: /\/sendMessage$/,
        status: 400,
        body: { ok: false, error_code: 400, description: "Bad Request: can't parse entities" }
      }
    ]);

    const err = await messenger().sendMessage("<b>broken").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    if (!(err instanceof TransportError)) return;
    expect(err.status).toBe(400);
    expect(err.retryable).toBe(false);
    expect(err.message).toContain("can't parse entities");
  });

  it("rejects ok:false envelopes on a 200", async () => {
    mockFetchRouter([{ match: /\/sendMessage$/, body: { ok: false, description: "chat not found" } }]);
    await expect(messenger().sendMessage("hi")).rejects.toThrow(new ValidationError("telegram: chat not found"));
  });

  it("reports the bot username from getMe", async () => {
    const requests = mockFetchRouter([{ match: /\/getMe$/, body: { ok: true, result: { id: 1, username: "digest_bot" } } }]);

    await expect(messenger().whoami()).resolves.toBe("digest_bot");
    expect(requests[0]?.method).toBe("GET");
  });
});

describe("splitMessage", () => {
  it("returns short text unchanged", () => {
    expect(splitMessage("<b>short</b>")).toEqual(["<b>short</b>"]);
  });

  it("splits at line boundaries", () => {
    expect(splitMessage("aaaa\nbbbb\ncccc", 10)).toEqual(["aaaa\nbbbb", "cccc"]);
  });

  it("cuts a line longer than the limit", () => {
    expect(splitMessage("x".repeat(25), 10)).toEqual(["x".repeat(10), "x".repeat(10), "x".repeat(5)]);
  });

  it("keeps every part within Telegram's limit", () => {
    const line = "• " + "y".repeat(98);
    const text = Array.from({ length: 100 }, () => line).join("\n");

    const parts = splitMessage(text);

    expect(parts.length).toBe(3);
    expect(parts.every((p) => p.length <= TELEGRAM_MAX_MESSAGE_CHARS)).toBe(true);
    expect(parts.join("\n")).toBe(text);
  });
});
