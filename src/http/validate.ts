import { z } from "zod";
import { HttpError } from "../errors";

export const classificationSchema = z.enum(["income", "expense"]).default("expense");

const BASE64 = /^[A-Za-z0-9+/\r\n]+={0,2}\s*$/u;

export const processInvoiceJsonSchema = z.object({
  filename: z.string().min(1).optional(),
  mime: z.string().min(1, "mime is required"),
  content: z.string().min(1, "content is required").regex(BASE64, "content must be base64"),
  classification: classificationSchema,
});

export type ProcessInvoiceJsonBody = z.infer<typeof processInvoiceJsonSchema>;

export function formatZodError(error: z.ZodError) {
  return {
    issues: error.errors.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  };
}

export function invalidRequest(message: string, details?: Record<string, unknown>): HttpError {
  return new HttpError(400, "invalid_request", message, details);
}

/** Parses with the schema or throws a 400 carrying the zod issues. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw invalidRequest("Validation failed", formatZodError(parsed.error));
  }
  return parsed.data;
}
