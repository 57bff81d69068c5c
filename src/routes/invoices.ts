import { Router } from "express";
import type { Request } from "express";
import type { InvoicePipeline, ProcessInvoiceRequest } from "../extraction/pipeline";
import type { ProcessedInvoice } from "../extraction/types";
import { readMultipartInvoice } from "../http/multipart";
import { classificationSchema, invalidRequest, parseOrThrow, processInvoiceJsonSchema } from "../http/validate";

export interface InvoiceRouterOptions {
  maxUploadBytes: number;
}

export function toResponseBody(result: ProcessedInvoice) {
  const { invoice } = result;
  return {
    success: true as const,
    invoice: {
      supplier: invoice.supplier,
      invoice_number: invoice.invoiceNumber,
      invoice_date: invoice.invoiceDate,
      is_system_date: invoice.isSystemDate,
      total_amount: invoice.totalAmount,
      gst_amount: invoice.gstAmount,
      net_amount: invoice.netAmount,
      gst_source: invoice.gstSource,
      raw_text: invoice.rawText,
    },
    classification: result.classification,
  };
}

async function readRequest(req: Request, maxUploadBytes: number): Promise<ProcessInvoiceRequest> {
  if (req.is("multipart/form-data")) {
    const upload = await readMultipartInvoice(req, maxUploadBytes);
    if (!upload.document) {
      throw invalidRequest("A 'file' part is required");
    }
    return {
      document: upload.document,
      classification: parseOrThrow(classificationSchema, upload.classification),
    };
  }

  const body = parseOrThrow(processInvoiceJsonSchema, req.body);
  return {
    document: {
      data: Buffer.from(body.content, "base64"),
      mimeType: body.mime,
      filename: body.filename,
    },
    classification: body.classification,
  };
}

export function createInvoiceRouter(pipeline: InvoicePipeline, options: InvoiceRouterOptions): Router {
  const router = Router();

  router.post("/process-invoice", async (req, res, next) => {
    try {
      const request = await readRequest(req, options.maxUploadBytes);
      const result = await pipeline.processInvoice(request);
      res.json(toResponseBody(result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
