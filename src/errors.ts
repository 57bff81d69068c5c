import type { ExtractionError, ExtractionErrorKind } from "./extraction/errors";

export class HttpError extends Error {
  constructor(
    public status: number,
    public code: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "HttpError";
  }

  get retryable(): boolean {
    return this.status === 504;
  }
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}

const EXTRACTION_STATUS: Record<ExtractionErrorKind, number> = {
  UnsupportedFormat: 415,
  DocumentUnreadable: 422,
  ExtractionEngineUnavailable: 503,
  ExtractionTimeout: 504,
};

export function fromExtractionError(err: ExtractionError): HttpError {
  return new HttpError(EXTRACTION_STATUS[err.kind], err.kind, err.message);
}

interface BodyParserError {
  status: number;
  type: string;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

/** Maps express.json failures (oversized or malformed bodies) onto HttpError. */
export function fromBodyParserError(err: unknown): HttpError | null {
  if (!isBodyParserError(err)) return null;
  if (err.type === "entity.too.large") {
    return new HttpError(413, "payload_too_large", err.message);
  }
  if (err.status === 400) {
    return new HttpError(400, "invalid_request", err.message);
  }
  return null;
}
