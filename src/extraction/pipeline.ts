import type { Logger } from "pino";
import { rateToBasisPoints } from "../../libs/money";
import { MIN_RENDER_DPI, resolveMediaType, toPageImages } from "./document";
import { ExtractionError, isExtractionError } from "./errors";
import { extractInvoiceFields } from "./extract";
import { recognizePages } from "./text";
import type {
  InvoiceClassification,
  PageRasterizer,
  ProcessedInvoice,
  RawDocument,
  TextRecognizer,
} from "./types";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_GST_RATE = 0.1;

export interface InvoicePipelineOptions {
  recognizer: TextRecognizer;
  rasterizer: PageRasterizer;
  logger: Logger;
  gstRate?: number;
  pdfDpi?: number;
  timeoutMs?: number;
  pageConcurrency?: number;
  now?: () => Date;
}

export interface ProcessInvoiceRequest {
  document: RawDocument;
  classification: InvoiceClassification;
}

export interface InvoicePipeline {
  processInvoice(request: ProcessInvoiceRequest): Promise<ProcessedInvoice>;
}

async function withTimeout<T>(timeoutMs: number, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new ExtractionError("ExtractionTimeout", `Invoice extraction exceeded ${timeoutMs} ms`);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), expired]);
  } catch (err) {
    // stops recognition still in flight for other pages
    controller.abort(err);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

export function createInvoicePipeline(options: InvoicePipelineOptions): InvoicePipeline {
  const log = options.logger.child({ module: "extraction" });
  const gstRateBp = rateToBasisPoints(options.gstRate ?? DEFAULT_GST_RATE);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const now = options.now ?? (() => new Date());

  let dpi = options.pdfDpi ?? 300;
  if (dpi < MIN_RENDER_DPI) {
    log.warn({ configuredDpi: dpi, minimumDpi: MIN_RENDER_DPI }, "PDF render DPI below quality floor, raising");
    dpi = MIN_RENDER_DPI;
  }

  async function processInvoice(request: ProcessInvoiceRequest): Promise<ProcessedInvoice> {
    const { document, classification } = request;
    const mediaType = resolveMediaType(document);
    const started = Date.now();

    try {
      const invoice = await withTimeout(timeoutMs, async (signal) => {
        const pages = await toPageImages(document, mediaType, { rasterizer: options.rasterizer, dpi, signal });
        const rawText = await recognizePages(pages, options.recognizer, {
          concurrency: options.pageConcurrency ?? 1,
          signal,
        });
        signal.throwIfAborted();
        log.debug({ mediaType, pages: pages.length, textLength: rawText.length }, "document recognised");
        return extractInvoiceFields(rawText, { gstRateBp, now, logger: log });
      });

      log.info(
        {
          mediaType,
          classification,
          durationMs: Date.now() - started,
          isSystemDate: invoice.isSystemDate,
          gstSource: invoice.gstSource,
        },
        "invoice extracted"
      );
      return { invoice, classification };
    } catch (err) {
      if (isExtractionError(err)) {
        log.warn({ mediaType, kind: err.kind, durationMs: Date.now() - started }, err.message);
        throw err;
      }
      log.error({ err, mediaType }, "text recognition failed unexpectedly");
      throw new ExtractionError("ExtractionEngineUnavailable", "Text recognition failed unexpectedly", { cause: err });
    }
  }

  return { processInvoice };
}
