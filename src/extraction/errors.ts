export type ExtractionErrorKind =
  | "UnsupportedFormat"
  | "DocumentUnreadable"
  | "ExtractionEngineUnavailable"
  | "ExtractionTimeout";

export type ExtractionErrorCategory = "input" | "engine" | "timeout";

const CATEGORY: Record<ExtractionErrorKind, ExtractionErrorCategory> = {
  UnsupportedFormat: "input",
  DocumentUnreadable: "input",
  ExtractionEngineUnavailable: "engine",
  ExtractionTimeout: "timeout",
};

export class ExtractionError extends Error {
  public readonly kind: ExtractionErrorKind;
  public readonly category: ExtractionErrorCategory;
  public readonly retryable: boolean;

  constructor(kind: ExtractionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
    this.kind = kind;
    this.category = CATEGORY[kind];
    this.retryable = kind === "ExtractionTimeout";
  }
}

export function isExtractionError(err: unknown): err is ExtractionError {
  return err instanceof ExtractionError;
}
