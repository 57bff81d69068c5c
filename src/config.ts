import "dotenv/config";
import { z } from "zod";

const intFrom = (fallback: number) => z.coerce.number().int().default(fallback);

const envSchema = z.object({
  PORT: intFrom(8000).pipe(z.number().int().min(1).max(65535)),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  OCR_ENGINE_PATH: z.string().min(1).default("tesseract"),
  OCR_LANG: z.string().min(1).default("eng"),
  OCR_PSM: intFrom(6).pipe(z.number().int().min(0).max(13)),
  PDF_RENDER_DPI: intFrom(300).pipe(z.number().int().positive()),
  OCR_PAGE_CONCURRENCY: intFrom(1).pipe(z.number().int().min(1).max(16)),
  EXTRACTION_TIMEOUT_MS: intFrom(30_000).pipe(z.number().int().positive()),
  GST_RATE: z.coerce.number().min(0).max(1).default(0.1),
  MAX_UPLOAD_BYTES: intFrom(10 * 1024 * 1024).pipe(z.number().int().positive()),
});

export interface AppConfig {
  port: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  ocr: { binaryPath: string; lang: string; psm: number; pageConcurrency: number };
  pdfDpi: number;
  timeoutMs: number;
  gstRate: number;
  maxUploadBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const blankAsUnset = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(blankAsUnset);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    ocr: {
      binaryPath: e.OCR_ENGINE_PATH,
      lang: e.OCR_LANG,
      psm: e.OCR_PSM,
      pageConcurrency: e.OCR_PAGE_CONCURRENCY,
    },
    pdfDpi: e.PDF_RENDER_DPI,
    timeoutMs: e.EXTRACTION_TIMEOUT_MS,
    gstRate: e.GST_RATE,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
  };
}
