import { type MoneyCents, ZERO_CENTS, inclusiveTaxPortion, parseDollars, toCents } from "../../../libs/money";
import type { GstSource } from "../types";
import { type MatchContext, type Matcher, runChain } from "./chain";
import type { TextLine } from "./lines";

export interface CurrencyToken {
  cents: MoneyCents;
  line: number;
  column: number;
  text: string;
}

/*
 * Optional currency prefix, digits with optional thousands groups, optional
 * cents. Never part of a longer number and never a percentage.
 */
const AMOUNT_PATTERN = /(\bAUD\s?\$?|A\$|\$)?\s?(?<![\d.,])(\d{1,3}(?:,\d{3})+|\d+)(\.\d{2})?(?![.,]?\d)(?!\s*%)/gi;

/** Whole-dollar digits that still fit in safe integer cents; longer runs are OCR noise. */
export const MAX_DOLLAR_DIGITS = 13;

export function findCurrencyTokens(line: TextLine): CurrencyToken[] {
  const tokens: CurrencyToken[] = [];
  for (const match of line.text.matchAll(AMOUNT_PATTERN)) {
    const [text, prefix, digits, cents] = match;
    if (!prefix && !cents) continue;
    if (digits.replace(/,/g, "").length > MAX_DOLLAR_DIGITS) continue;
    tokens.push({
      cents: parseDollars(`${digits}${cents ?? ""}`),
      line: line.index,
      column: match.index ?? 0,
      text: text.trim(),
    });
  }
  return tokens;
}

const TOTAL_KEYWORD =
  /(?<!\bsub[\s-]?)\b(?:grand\s+total|total(?!\s*(?:gst|tax|vat)\b)|amount\s+(?:due|payable)|balance(?:\s+due)?|charged\s+to)\b/i;

const GST_KEYWORD =
  /(?<!\b(?:inc|incl|include|includes|included|including|ex|excl|exclude|excludes|excluding|plus)\.?\s*)\b(?:gst|tax|vat)\b(?![\s-]*(?:invoice|free|exempt|registered|inclusive|exclusive)\b)/i;

/**
 * Currency tokens attached to a keyword: those after it on the same line,
 * else those before it on the same line, else the whole next line (labels
 * and values are often split across lines by OCR).
 */
export function amountsNearKeyword(lines: TextLine[], keyword: RegExp): CurrencyToken[] {
  const found: CurrencyToken[] = [];
  lines.forEach((line, position) => {
    const hit = keyword.exec(line.text);
    if (!hit) return;
    const keywordEnd = hit.index + hit[0].length;
    const onLine = findCurrencyTokens(line);
    const after = onLine.filter((token) => token.column >= keywordEnd);
    if (after.length > 0) {
      found.push(...after);
      return;
    }
    const before = onLine.filter((token) => token.column < hit.index);
    if (before.length > 0) {
      found.push(before[before.length - 1]);
      return;
    }
    const next = lines[position + 1];
    if (next) {
      found.push(...findCurrencyTokens(next));
    }
  });
  return found;
}

/** Largest token; on a tie the earliest in reading order. */
export function largestToken(tokens: CurrencyToken[]): CurrencyToken | null {
  let best: CurrencyToken | null = null;
  for (const token of tokens) {
    if (!best || toCents(token.cents) > toCents(best.cents)) {
      best = token;
    }
  }
  return best;
}

export const totalKeywordMatcher: Matcher<CurrencyToken> = {
  name: "total-keyword",
  match: ({ lines }) => largestToken(amountsNearKeyword(lines, TOTAL_KEYWORD)),
};

export const largestAmountMatcher: Matcher<CurrencyToken> = {
  name: "largest-amount",
  match: ({ lines }) => largestToken(lines.flatMap(findCurrencyTokens)),
};

export const TOTAL_MATCHERS: ReadonlyArray<Matcher<CurrencyToken>> = [totalKeywordMatcher, largestAmountMatcher];

export interface GstContext extends MatchContext {
  totalCents: MoneyCents;
  gstRateBp: number;
}

export interface GstFigure {
  cents: MoneyCents;
  source: GstSource;
}

export const gstKeywordMatcher: Matcher<GstFigure, GstContext> = {
  name: "gst-keyword",
  match: ({ lines, totalCents }) => {
    const token = amountsNearKeyword(lines, GST_KEYWORD).find(
      (candidate) => toCents(candidate.cents) < toCents(totalCents)
    );
    return token ? { cents: token.cents, source: "extracted" } : null;
  },
};

/** GST-inclusive back-calculation: total × rate / (1 + rate). */
export const derivedGstMatcher: Matcher<GstFigure, GstContext> = {
  name: "gst-derived",
  match: ({ totalCents, gstRateBp }) => ({
    cents: inclusiveTaxPortion(totalCents, gstRateBp),
    source: "derived",
  }),
};

export const GST_MATCHERS: ReadonlyArray<Matcher<GstFigure, GstContext>> = [gstKeywordMatcher, derivedGstMatcher];

export interface AmountResult {
  totalCents: MoneyCents;
  gstCents: MoneyCents;
  gstSource: GstSource;
  totalMatcher: string | null;
}

export function extractAmounts(context: MatchContext, gstRateBp: number): AmountResult {
  const total = runChain(TOTAL_MATCHERS, context);
  const totalCents = total ? total.value.cents : ZERO_CENTS;
  if (toCents(totalCents) <= 0) {
    return { totalCents: ZERO_CENTS, gstCents: ZERO_CENTS, gstSource: "none", totalMatcher: total?.matcher ?? null };
  }

  const gst = runChain(GST_MATCHERS, { ...context, totalCents, gstRateBp });
  return {
    totalCents,
    gstCents: gst ? gst.value.cents : ZERO_CENTS,
    gstSource: gst ? gst.value.source : "none",
    totalMatcher: total?.matcher ?? null,
  };
}
