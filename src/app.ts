import express from "express";
import type { Logger } from "pino";
import type { InvoicePipeline } from "./extraction/pipeline";
import type { TextRecognizer } from "./extraction/types";
import { createHttpLogger, errorResponder } from "./ops/logs";
import { createInvoiceRouter } from "./routes/invoices";

export interface AppDependencies {
  pipeline: InvoicePipeline;
  recognizer: TextRecognizer;
  logger: Logger;
  maxUploadBytes: number;
}

// base64 inflates uploads by 4/3; leave headroom for the JSON envelope
function jsonLimit(maxUploadBytes: number): number {
  return Math.ceil((maxUploadBytes * 4) / 3) + 64 * 1024;
}

export function createApp(deps: AppDependencies) {
  const app = express();
  app.use(createHttpLogger(deps.logger));
  app.use(express.json({ limit: jsonLimit(deps.maxUploadBytes) }));

  app.get("/health", async (_req, res, next) => {
    try {
      const available = deps.recognizer.isAvailable ? await deps.recognizer.isAvailable() : true;
      res.json({ status: "ok", ocr: available ? "available" : "unavailable" });
    } catch (err) {
      next(err);
    }
  });

  app.use(createInvoiceRouter(deps.pipeline, { maxUploadBytes: deps.maxUploadBytes }));

  app.use((_req, res) => res.status(404).json({ error: "Not Found" }));
  app.use(errorResponder(deps.logger));

  return app;
}
