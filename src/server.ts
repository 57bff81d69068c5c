import { createApp } from "./app";
import { loadConfig } from "./config";
import { PdfPageRasterizer } from "./extraction/document";
import { TesseractRecognizer } from "./extraction/ocr";
import { createInvoicePipeline } from "./extraction/pipeline";
import { createLogger } from "./ops/logs";

const config = loadConfig();
const logger = createLogger(config.logLevel);

const recognizer = new TesseractRecognizer({
  binaryPath: config.ocr.binaryPath,
  lang: config.ocr.lang,
  psm: config.ocr.psm,
});

const pipeline = createInvoicePipeline({
  recognizer,
  rasterizer: new PdfPageRasterizer(),
  logger,
  gstRate: config.gstRate,
  pdfDpi: config.pdfDpi,
  timeoutMs: config.timeoutMs,
  pageConcurrency: config.ocr.pageConcurrency,
});

const app = createApp({ pipeline, recognizer, logger, maxUploadBytes: config.maxUploadBytes });

app.listen(config.port, () => {
  logger.info({ port: config.port }, "invoice intake listening");
});
