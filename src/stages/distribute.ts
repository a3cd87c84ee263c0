import { callWithRetry, type RunContext } from "../context.js";
import { DeliveryError, TransportError, errorMessage } from "../errors.js";
import { splitMessage } from "../deliver/telegram.js";
import { TARGET_LOCALES, type Locale } from "../locales.js";
import type { DeliveryResult, FormattedContent } from "../types.js";
import type { TranslationResult } from "./translate.js";

async function deliverOne(ctx: RunContext, locale: Locale, content: FormattedContent): Promise<number[]> {
  const parts = splitMessage(content.htmlBody);

  if (ctx.cfg.DRY_RUN) {
    ctx.logger.info("deliver.dry_run", { locale, parts: parts.length, text: content.htmlBody });
    return [];
  }

  const ids: number[] = [];
  for (const [i, part] of parts.entries()) {
    try {
      ids.push(await callWithRetry(ctx, `deliver.${locale}`, () => ctx.messenger.sendMessage(part)));
    } catch (err) {
      const status = err instanceof TransportError ? err.status : null;
      throw new DeliveryError(locale, `part ${i + 1}/${parts.length}: ${errorMessage(err)}`, status, ids);
    }
  }
  return ids;
}

/**
 * English first, then each target locale. A locale whose translation failed is
 * reported as failed without a send; one failed send never stops the others.
 */
export async function runDistributionStage(
  ctx: RunContext,
  english: FormattedContent,
  translation: TranslationResult
): Promise<DeliveryResult[]> {
  const results: DeliveryResult[] = [];
  let sentBefore = false;

  const variants: Array<{ locale: Locale; content?: FormattedContent; degraded?: boolean; error?: string }> = [
    { locale: "en", content: english }
  ];
  for (const locale of TARGET_LOCALES) {
    const outcome = translation.outcomes.find((o) => o.locale === locale);
    variants.push({
      locale,
      content: translation.content[locale],
      degraded: outcome?.status === "fallback",
      error: outcome && outcome.status !== "translated" ? outcome.error : undefined
    });
  }

  for (const v of variants) {
    if (!v.content) {
      const error = `translation failed: ${v.error ?? "no content"}`;
      ctx.logger.warn("deliver.skipped", { locale: v.locale, error });
      results.push({ locale: v.locale, success: false, error });
      continue;
    }

    if (sentBefore && ctx.cfg.DELIVERY_PAUSE_MS > 0 && !ctx.cfg.DRY_RUN) await ctx.sleep(ctx.cfg.DELIVERY_PAUSE_MS);
    sentBefore = true;

    try {
      const messageIds = await deliverOne(ctx, v.locale, v.content);
      ctx.logger.info("deliver.sent", { locale: v.locale, messageIds, degraded: v.degraded ?? false });
      results.push({ locale: v.locale, success: true, messageIds, ...(v.degraded ? { degraded: true } : {}) });
    } catch (err) {
      const delivery = err instanceof DeliveryError ? err : new DeliveryError(v.locale, errorMessage(err));
      const sent = delivery.sentMessageIds;
      ctx.logger.error("deliver.failed", {
        locale: v.locale,
        status: delivery.status,
        error: delivery.message,
        ...(sent.length ? { sentMessageIds: sent } : {})
      });
      results.push({ locale: v.locale, success: false, ...(sent.length ? { messageIds: sent } : {}), error: delivery.message });
    }
  }

  return results;
}
