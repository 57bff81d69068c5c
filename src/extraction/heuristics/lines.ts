export interface TextLine {
  /** Position in reading order after blank lines are dropped. */
  index: number;
  text: string;
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function toLines(rawText: string): TextLine[] {
  return rawText
    .split(/\r?\n|\r/)
    .map(collapseWhitespace)
    .filter((text) => text.length > 0)
    .map((text, index) => ({ index, text }));
}
