import type { MatchContext, Matcher } from "./chain";
import { type TextLine, collapseWhitespace } from "./lines";
import { isRejectedSupplier } from "./rejection";

/** Lines considered the letterhead of the document. */
export const TOP_BLOCK_LINES = 8;

const LABELLED_SUPPLIER =
  /^(?:from|supplier|vendor|bill(?:ed)?\s+(?:from|by)|invoice\s+from|sold\s+by)\s*[:-]\s*(.+)$/i;

const COMPANY_NAME =
  /^(.*?\b(?:pty\.?\s+ltd|pty\.?\s+limited|ltd|limited|inc|llc|corporation|corp)\b\.?)(?=\s*(?:$|[,;(|]|\b(?:abn|acn)\b))/i;

function accept(candidate: string | undefined): string | null {
  if (!candidate) return null;
  const text = collapseWhitespace(candidate);
  return isRejectedSupplier(text) ? null : text;
}

function topBlock(lines: TextLine[]): TextLine[] {
  return lines.slice(0, TOP_BLOCK_LINES);
}

function mostlyLetters(text: string): boolean {
  const compact = text.replace(/\s+/g, "");
  const letters = (compact.match(/[A-Za-z]/g) ?? []).length;
  return /^[A-Za-z&]/.test(text) && letters * 2 >= compact.length;
}

export const labelledSupplierMatcher: Matcher<string> = {
  name: "supplier-label",
  match: ({ lines }: MatchContext) => {
    for (const line of lines) {
      const value = accept(LABELLED_SUPPLIER.exec(line.text)?.[1]);
      if (value) return value;
    }
    return null;
  },
};

export const companySuffixMatcher: Matcher<string> = {
  name: "supplier-company-suffix",
  match: ({ lines }: MatchContext) => {
    for (const line of topBlock(lines)) {
      const value = accept(COMPANY_NAME.exec(line.text)?.[1]);
      if (value) return value;
    }
    return null;
  },
};

export const topLineMatcher: Matcher<string> = {
  name: "supplier-top-line",
  match: ({ lines }: MatchContext) => {
    for (const line of topBlock(lines)) {
      if (!mostlyLetters(line.text)) continue;
      const value = accept(line.text);
      if (value) return value;
    }
    return null;
  },
};

export const SUPPLIER_MATCHERS: ReadonlyArray<Matcher<string>> = [
  labelledSupplierMatcher,
  companySuffixMatcher,
  topLineMatcher,
];
