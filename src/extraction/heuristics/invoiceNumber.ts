import type { MatchContext, Matcher } from "./chain";
import { isPlausibleInvoiceNumber } from "./rejection";

const TOKEN = String.raw`([A-Za-z0-9][A-Za-z0-9\-/]*)`;

const LABELLED_NUMBER = new RegExp(
  String.raw`\b(?:invoice|inv)\.?\s*(?:no\b\.?|number\b|num\b\.?|#)\s*[:#.\-]?\s*` + TOKEN,
  "gi"
);
const INVOICE_COLON = new RegExp(String.raw`\binvoice\s*:\s*` + TOKEN, "gi");
const REFERENCE = new RegExp(
  String.raw`\bref(?:erence)?\b\.?\s*(?:no\b\.?|number\b|#)?\s*[:#.\-]?\s*` + TOKEN,
  "gi"
);

function cleanToken(token: string): string {
  return token.replace(/[-/]+$/, "");
}

function firstPlausible(pattern: RegExp, text: string): string | null {
  for (const match of text.matchAll(pattern)) {
    const candidate = cleanToken(match[1]);
    if (isPlausibleInvoiceNumber(candidate)) {
      return candidate;
    }
  }
  return null;
}

function labelMatcher(name: string, pattern: RegExp): Matcher<string> {
  // Lines are re-joined so a label and its value may sit on consecutive lines.
  return {
    name,
    match: ({ lines }: MatchContext) => firstPlausible(pattern, lines.map((line) => line.text).join("\n")),
  };
}

export const INVOICE_NUMBER_MATCHERS: ReadonlyArray<Matcher<string>> = [
  labelMatcher("invoice-number-label", LABELLED_NUMBER),
  labelMatcher("invoice-colon", INVOICE_COLON),
  labelMatcher("reference-label", REFERENCE),
];
