import type { MatchContext, Matcher } from "./chain";
import type { TextLine } from "./lines";

export interface DateCandidate {
  /** YYYY-MM-DD */
  iso: string;
  line: number;
  column: number;
}

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

const ISO_DATE = /(?<!\d)(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?!\d)/g;
const NUMERIC_DATE = /(?<![\d/.-])(\d{1,2})[/.-](\d{1,2})[/.-](\d{4}|\d{2})(?![\d/.-]?\d)/g;
const DAY_MONTH_NAME = /(?<!\d)(\d{1,2})(?:st|nd|rd|th)?(?:\s+of)?[\s-]+([A-Za-z]{3,9})\.?,?[\s-]+(\d{4})(?!\d)/g;
const MONTH_NAME_DAY = /\b([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})(?!\d)/g;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function toIsoDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || year < 1900 || year > 2099) return null;
  if (!Number.isInteger(month) || month < 1 || month > 12) return null;
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function expandYear(raw: string): number {
  const year = Number(raw);
  return raw.length === 2 ? 2000 + year : year;
}

function monthNumber(name: string): number | null {
  return MONTHS[name.toLowerCase()] ?? null;
}

/** Day first, as printed on Australian invoices; month first only when the second number cannot be a month. */
function resolveNumeric(first: number, second: number, year: number): string | null {
  if (second > 12 && first <= 12) {
    return toIsoDate(year, first, second);
  }
  return toIsoDate(year, second, first);
}

export function findDates(line: TextLine): DateCandidate[] {
  const found: DateCandidate[] = [];
  const push = (iso: string | null, column: number | undefined) => {
    if (iso) found.push({ iso, line: line.index, column: column ?? 0 });
  };

  for (const m of line.text.matchAll(ISO_DATE)) {
    push(toIsoDate(Number(m[1]), Number(m[2]), Number(m[3])), m.index);
  }
  for (const m of line.text.matchAll(NUMERIC_DATE)) {
    push(resolveNumeric(Number(m[1]), Number(m[2]), expandYear(m[3])), m.index);
  }
  for (const m of line.text.matchAll(DAY_MONTH_NAME)) {
    const month = monthNumber(m[2]);
    if (month) push(toIsoDate(Number(m[3]), month, Number(m[1])), m.index);
  }
  for (const m of line.text.matchAll(MONTH_NAME_DAY)) {
    const month = monthNumber(m[1]);
    if (month) push(toIsoDate(Number(m[3]), month, Number(m[2])), m.index);
  }

  return found.sort((a, b) => a.column - b.column);
}

export function containsDate(text: string): boolean {
  return findDates({ index: 0, text }).length > 0;
}

function dateNearKeyword(lines: TextLine[], keyword: RegExp): string | null {
  for (const [position, line] of lines.entries()) {
    const hit = keyword.exec(line.text);
    if (!hit) continue;
    const keywordEnd = hit.index + hit[0].length;
    const after = findDates(line).find((candidate) => candidate.column >= keywordEnd);
    if (after) return after.iso;
    const next = lines[position + 1];
    const below = next ? findDates(next)[0] : undefined;
    if (below) return below.iso;
  }
  return null;
}

const ISSUE_DATE_KEYWORD =
  /\b(?:invoice\s+date|issue\s+date|date\s+issued|date\s+of\s+issue|tax\s+(?:invoice\s+)?date|tax\s+point)\b/i;
const DATE_KEYWORD = /(?<!\bdue[\s-]?)\bdate\b(?!\s+due\b)/i;

export const issueDateMatcher: Matcher<string> = {
  name: "date-issue-keyword",
  match: ({ lines }) => dateNearKeyword(lines, ISSUE_DATE_KEYWORD),
};

export const dateKeywordMatcher: Matcher<string> = {
  name: "date-keyword",
  match: ({ lines }) => dateNearKeyword(lines, DATE_KEYWORD),
};

export const firstDateMatcher: Matcher<string> = {
  name: "date-first",
  match: ({ lines }: MatchContext) => {
    for (const line of lines) {
      const [first] = findDates(line);
      if (first) return first.iso;
    }
    return null;
  },
};

export const DATE_MATCHERS: ReadonlyArray<Matcher<string>> = [issueDateMatcher, dateKeywordMatcher, firstDateMatcher];

/** Local calendar date of the clock, in the same canonical form as extracted dates. */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, "0")}-${String(date.getDate()).padStart(2, "0")}`;
}
