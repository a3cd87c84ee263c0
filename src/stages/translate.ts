import { callWithRetry, type RunContext } from "../context.js";
import { ValidationError, errorMessage } from "../errors.js";
import { LOCALE_INFO, TARGET_LOCALES, type TargetLocale } from "../locales.js";
import {
  CONTENT_BEGIN,
  CONTENT_END,
  buildTranslationCorrection,
  buildTranslationPrompt,
  translationSystemPrompt
} from "../prompts.js";
import type { FormattedContent } from "../types.js";
import { REPORT_TITLE, escapeHtml } from "./format.js";

export type TranslatedContent = Partial<Record<TargetLocale, FormattedContent>>;

export type TranslationOutcome =
  | { locale: TargetLocale; status: "translated" }
  | { locale: TargetLocale; status: "fallback"; error: string }
  | { locale: TargetLocale; status: "failed"; error: string };

export type TranslationResult = {
  content: TranslatedContent;
  outcomes: TranslationOutcome[];
};

/**
 * Digit runs with their decimal/thousands separators, ignoring markup
 * (link targets are not translated text).
 */
export function extractNumerals(html: string): string[] {
  const text = html.replace(/<[^>]*>/g, " ");
  const found = text.match(/\d+(?:[.,]\d+)*/g) ?? [];
  return Array.from(new Set(found));
}

export function missingNumerals(source: string, translated: string): string[] {
  const have = new Set(extractNumerals(translated));
  return extractNumerals(source).filter((n) => !have.has(n));
}

/** Models like to wrap answers in code fences or repeat the content markers. */
export function cleanTranslation(raw: string): string {
  let s = raw.trim();
  const fence = s.match(/^```(?:html)?\s*([\s\S]*?)\s*```$/i);
  if (fence?.[1] !== undefined) s = fence[1].trim();
  if (s.startsWith(CONTENT_BEGIN)) s = s.slice(CONTENT_BEGIN.length);
  if (s.endsWith(CONTENT_END)) s = s.slice(0, -CONTENT_END.length);
  return s.trim();
}

export function validateTranslation(source: string, translated: string): void {
  if (!translated.trim()) {
    throw new ValidationError("translation was empty", ["empty response"]);
  }
  const missing = missingNumerals(source, translated);
  if (missing.length) {
    throw new ValidationError(
      `translation altered numbers: ${missing.join(", ")}`,
      missing.map((n) => `number ${n} is missing or changed`)
    );
  }
}

export function fallbackNotice(locale: TargetLocale): string {
  const info = LOCALE_INFO[locale];
  return [
    `<b>${escapeHtml(info.fallbackTitle)}</b>`,
    escapeHtml(info.fallbackNote),
    `<i>${REPORT_TITLE} (English) was sent above.</i>`
  ].join("\n\n");
}

async function translateOnce(ctx: RunContext, locale: TargetLocale, user: string, label: string): Promise<string> {
  const raw = await callWithRetry(ctx, label, () =>
    ctx.llm.complete({
      model: ctx.cfg.TRANSLATION_MODEL,
      system: translationSystemPrompt(locale),
      user,
      maxTokens: 1500,
      temperature: 0.2
    })
  );
  return cleanTranslation(raw);
}

/**
 * One locale: translate, validate, retry once with a correction, then give up.
 * Throws the last error; the caller isolates it to this locale.
 */
export async function translateToLocale(ctx: RunContext, source: FormattedContent, locale: TargetLocale): Promise<FormattedContent> {
  const html = source.htmlBody;
  const first = await translateOnce(ctx, locale, buildTranslationPrompt(locale, html), `translate.${locale}`);

  try {
    validateTranslation(html, first);
    return { ...source, htmlBody: first };
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    ctx.logger.warn("translate.invalid", { locale, attempt: 1, issues: err.issues });

    const second = await translateOnce(
      ctx,
      locale,
      buildTranslationCorrection(locale, html, err.issues),
      `translate.${locale}.correct`
    );
    validateTranslation(html, second);
    return { ...source, htmlBody: second };
  }
}

export async function runTranslationStage(ctx: RunContext, source: FormattedContent): Promise<TranslationResult> {
  const content: TranslatedContent = {};
  const outcomes: TranslationOutcome[] = [];

  for (const [i, locale] of TARGET_LOCALES.entries()) {
    if (i > 0 && ctx.cfg.TRANSLATION_PAUSE_MS > 0) await ctx.sleep(ctx.cfg.TRANSLATION_PAUSE_MS);

    try {
      content[locale] = await translateToLocale(ctx, source, locale);
      outcomes.push({ locale, status: "translated" });
      ctx.logger.info("translate.ok", { locale });
    } catch (err) {
      const error = errorMessage(err);
      if (ctx.cfg.TRANSLATION_FALLBACK === "notice") {
        content[locale] = { ...source, htmlBody: fallbackNotice(locale) };
        outcomes.push({ locale, status: "fallback", error });
        ctx.logger.warn("translate.fallback_notice", { locale, error });
      } else {
        outcomes.push({ locale, status: "failed", error });
        ctx.logger.error("translate.failed", { locale, error });
      }
    }
  }

  return { content, outcomes };
}
