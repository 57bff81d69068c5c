#!/usr/bin/env tsx
import { readFile } from "fs/promises";
import { basename } from "path";
import pino from "pino";
import { loadConfig } from "../src/config";
import { PdfPageRasterizer } from "../src/extraction/document";
import { isExtractionError } from "../src/extraction/errors";
import { TesseractRecognizer } from "../src/extraction/ocr";
import { createInvoicePipeline } from "../src/extraction/pipeline";
import { classificationSchema } from "../src/http/validate";
import { toResponseBody } from "../src/routes/invoices";
import { createLogger } from "../src/ops/logs";

function parseArgs() {
  const [, , fileArg, ...rest] = process.argv;
  if (!fileArg) {
    throw new Error("Usage: tsx scripts/extract-invoice.ts <file> [--classification=income|expense] [--mime=<type>]");
  }
  const flag = (name: string) => rest.find((arg) => arg.startsWith(`--${name}=`))?.split("=")[1];
  const classification = classificationSchema.safeParse(flag("classification"));
  if (!classification.success) {
    throw new Error("classification must be income or expense");
  }
  return { file: fileArg, classification: classification.data, mime: flag("mime") ?? "" };
}

async function main() {
  const { file, classification, mime } = parseArgs();
  const config = loadConfig();
  // stdout carries the JSON result
  const logger = createLogger(process.env.LOG_LEVEL ? config.logLevel : "warn", pino.destination(2));
  const pipeline = createInvoicePipeline({
    recognizer: new TesseractRecognizer({ binaryPath: config.ocr.binaryPath, lang: config.ocr.lang, psm: config.ocr.psm }),
    rasterizer: new PdfPageRasterizer(),
    logger,
    gstRate: config.gstRate,
    pdfDpi: config.pdfDpi,
    timeoutMs: config.timeoutMs,
    pageConcurrency: config.ocr.pageConcurrency,
  });

  const data = await readFile(file);
  const result = await pipeline.processInvoice({
    document: { data, mimeType: mime, filename: basename(file) },
    classification,
  });
  console.log(JSON.stringify(toResponseBody(result), null, 2));
}

main().catch((err: unknown) => {
  if (isExtractionError(err)) {
    console.error(`${err.kind}: ${err.message}`);
  } else {
    console.error(err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
