import type { TextLine } from "./lines";

export interface MatchContext {
  rawText: string;
  lines: TextLine[];
}

export interface Matcher<T, C extends MatchContext = MatchContext> {
  name: string;
  match(context: C): T | null;
}

export interface ChainResult<T> {
  value: T;
  matcher: string;
}

/** Evaluates matchers in order; the first non-null value wins. */
export function runChain<T, C extends MatchContext>(
  matchers: ReadonlyArray<Matcher<T, C>>,
  context: C
): ChainResult<T> | null {
  for (const matcher of matchers) {
    const value = matcher.match(context);
    if (value !== null) {
      return { value, matcher: matcher.name };
    }
  }
  return null;
}
