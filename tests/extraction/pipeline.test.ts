import { describe, it } from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import { ExtractionError, isExtractionError } from "../../src/extraction/errors";
import { type InvoicePipelineOptions, createInvoicePipeline } from "../../src/extraction/pipeline";
import type { PageImage, TextRecognizer } from "../../src/extraction/types";
import {
  FakeRasterizer,
  FakeRecognizer,
  PDF_BYTES,
  delay,
  PNG_BYTES,
  extractionErrorOf,
  hangingRecognizer,
  pngPages,
  silentLogger,
  textRecognizer,
} from "../helpers/fakes";

function pipelineWith(recognizer: TextRecognizer, overrides: Partial<InvoicePipelineOptions> = {}) {
  return createInvoicePipeline({
    recognizer,
    rasterizer: new FakeRasterizer(pngPages(1)),
    logger: silentLogger,
    now: () => new Date(2024, 6, 15),
    ...overrides,
  });
}

const pngDocument = { data: PNG_BYTES, mimeType: "image/png" };

describe("invoice pipeline", () => {
  it("extracts fields and passes the classification through", async () => {
    const pipeline = pipelineWith(textRecognizer("Acme Pty Ltd\nTotal $110.00"));
    const result = await pipeline.processInvoice({ document: pngDocument, classification: "income" });

    assert.equal(result.classification, "income");
    assert.equal(result.invoice.supplier, "Acme Pty Ltd");
    assert.equal(result.invoice.totalAmount, 110);
    assert.equal(result.invoice.gstAmount, 10);
    assert.equal(result.invoice.invoiceDate, "2024-07-15");
    assert.equal(result.invoice.isSystemDate, true);
  });

  it("rejects unsupported formats before recognition", async () => {
    const recognizer = textRecognizer("unused");
    const pipeline = pipelineWith(recognizer);

    await assert.rejects(
      pipeline.processInvoice({
        document: {
          data: Buffer.from("PK"),
          mimeType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
          filename: "invoice.docx",
        },
        classification: "expense",
      }),
      extractionErrorOf("UnsupportedFormat")
    );
    assert.equal(recognizer.calls.length, 0);
  });

  it("recognises PDF pages concurrently and keeps page order", async () => {
    const texts = ["Acme Pty Ltd", "Invoice No: 7781", "Total $330.00"];
    const recognizer = new FakeRecognizer(async (page: PageImage) => {
      await delay((3 - page.index) * 5);
      return texts[page.index];
    });
    const pipeline = pipelineWith(recognizer, {
      rasterizer: new FakeRasterizer(pngPages(3)),
      pageConcurrency: 3,
    });

    const { invoice } = await pipeline.processInvoice({
      document: { data: PDF_BYTES, mimeType: "application/pdf" },
      classification: "expense",
    });

    assert.equal(invoice.rawText, "Acme Pty Ltd\nInvoice No: 7781\nTotal $330.00");
    assert.equal(invoice.supplier, "Acme Pty Ltd");
    assert.equal(invoice.invoiceNumber, "7781");
    assert.equal(invoice.totalAmount, 330);
    assert.equal(invoice.gstAmount, 30);
    assert.equal(invoice.netAmount, 300);
  });

  it("aborts recognition and fails with a retryable timeout", async () => {
    const recognizer = hangingRecognizer();
    const pipeline = pipelineWith(recognizer, { timeoutMs: 20 });

    await assert.rejects(pipeline.processInvoice({ document: pngDocument, classification: "expense" }), (err: unknown) => {
      assert.ok(isExtractionError(err));
      assert.equal(err.kind, "ExtractionTimeout");
      assert.equal(err.retryable, true);
      assert.equal(err.message, "Invoice extraction exceeded 20 ms");
      return true;
    });
    assert.equal(recognizer.signals[0]?.aborted, true);
  });

  it("reports recognizer failures as an unavailable engine", async () => {
    const boom = new Error("segfault");
    const pipeline = pipelineWith(
      new FakeRecognizer(() => {
        throw boom;
      })
    );

    await assert.rejects(pipeline.processInvoice({ document: pngDocument, classification: "expense" }), (err: unknown) => {
      assert.ok(err instanceof ExtractionError);
      assert.equal(err.kind, "ExtractionEngineUnavailable");
      assert.equal(err.retryable, false);
      assert.equal(err.cause, boom);
      return true;
    });
  });

  it("cancels the remaining pages when one page fails", async () => {
    const recognizer = new FakeRecognizer(async (page: PageImage) => {
      if (page.index === 0) throw new Error("corrupt page");
      await delay(10);
      return `page ${page.index}`;
    });
    const pipeline = pipelineWith(recognizer, {
      rasterizer: new FakeRasterizer(pngPages(5)),
      pageConcurrency: 2,
    });

    await assert.rejects(
      pipeline.processInvoice({ document: { data: PDF_BYTES, mimeType: "application/pdf" }, classification: "expense" }),
      extractionErrorOf("ExtractionEngineUnavailable")
    );
    assert.equal(recognizer.calls.length, 2);
    assert.equal(recognizer.signals[1]?.aborted, true);

    await delay(50);
    assert.equal(recognizer.calls.length, 2);
  });

  it("passes engine errors through unchanged", async () => {
    const unavailable = new ExtractionError("ExtractionEngineUnavailable", "OCR engine 'tesseract' is not installed or not executable");
    const pipeline = pipelineWith(
      new FakeRecognizer(() => {
        throw unavailable;
      })
    );

    await assert.rejects(pipeline.processInvoice({ document: pngDocument, classification: "expense" }), (err: unknown) => err === unavailable);
  });

  it("raises a render DPI below the quality floor and warns", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "warn" }, { write: (line: string) => lines.push(line) });
    const rasterizer = new FakeRasterizer(pngPages(1));
    const pipeline = pipelineWith(textRecognizer("Total $11.00"), { rasterizer, logger, pdfDpi: 96 });

    await pipeline.processInvoice({ document: { data: PDF_BYTES, mimeType: "application/pdf" }, classification: "expense" });

    assert.deepEqual(rasterizer.requestedDpi, [200]);
    const warning = lines.map((line) => JSON.parse(line) as { msg: string; configuredDpi?: number }).find((entry) =>
      entry.msg.startsWith("PDF render DPI")
    );
    assert.equal(warning?.configuredDpi, 96);
  });
});
