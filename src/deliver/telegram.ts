import { z } from "zod";
import { ValidationError } from "../errors.js";
import { httpRequest, throwForStatus, type HttpResult } from "../http.js";

const TELEGRAM_API = "https://api.telegram.org";

/** Telegram rejects longer texts with 400 "message is too long". */
export const TELEGRAM_MAX_MESSAGE_CHARS = 4096;

export interface Messenger {
  /** Sends one HTML message and returns its message id. */
  sendMessage(html: string): Promise<number>;
  /** Bot username, for the connectivity check. */
  whoami(): Promise<string>;
}

const TelegramEnvelopeSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
  result: z.unknown().optional()
});

const SentMessageSchema = z.object({ message_id: z.number() });
const BotUserSchema = z.object({ username: z.string() });

function retryAfterMs(res: HttpResult): number | null {
  const parsed = TelegramEnvelopeSchema.safeParse(res.json);
  const secs = parsed.success ? parsed.data.parameters?.retry_after : undefined;
  return typeof secs === "number" && secs > 0 ? Math.floor(secs * 1000) : null;
}

function unwrapResult(res: HttpResult): unknown {
  throwForStatus("telegram", res, res.status === 429 ? retryAfterMs(res) : null);

  const parsed = TelegramEnvelopeSchema.safeParse(res.json);
  if (!parsed.success || !parsed.data.ok) {
    const detail = parsed.success ? parsed.data.description ?? "ok=false" : "unparseable response";
    throw new ValidationError(`telegram: ${detail}`);
  }
  return parsed.data.result;
}

export function createTelegramMessenger(args: { botToken: string; chatId: string; timeoutMs: number }): Messenger {
  const base = `${TELEGRAM_API}/bot${args.botToken}`;

  return {
    async sendMessage(html: string): Promise<number> {
      const res = await httpRequest({
        service: "telegram",
        url: `${base}/sendMessage`,
        body: {
          chat_id: args.chatId,
          text: html,
          parse_mode: "HTML",
          disable_web_page_preview: false
        },
        timeoutMs: args.timeoutMs
      });

      const sent = SentMessageSchema.safeParse(unwrapResult(res));
      if (!sent.success) throw new ValidationError("telegram response missing message_id");
      return sent.data.message_id;
    },

    async whoami(): Promise<string> {
      const res = await httpRequest({
        service: "telegram",
        url: `${base}/getMe`,
        timeoutMs: args.timeoutMs
      });

      const bot = BotUserSchema.safeParse(unwrapResult(res));
      if (!bot.success) throw new ValidationError("telegram getMe response missing username");
      return bot.data.username;
    }
  };
}

/**
 * Split at line boundaries so no part exceeds `limit`.
 * A single line longer than the limit is cut hard.
 */
export function splitMessage(text: string, limit = TELEGRAM_MAX_MESSAGE_CHARS): string[] {
  if (text.length <= limit) return [text];

  const parts: string[] = [];
  let current = "";

  const flush = () => {
    if (current.trim()) parts.push(current.trimEnd());
    current = "";
  };

  for (const line of text.split("\n")) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    flush();
    let rest = line;
    while (rest.length > limit) {
      parts.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }
  flush();

  return parts;
}
