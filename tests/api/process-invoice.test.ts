import { describe, it } from "node:test";
import assert from "node:assert/strict";
import request from "supertest";
import { createApp } from "../../src/app";
import { ExtractionError } from "../../src/extraction/errors";
import { createInvoicePipeline } from "../../src/extraction/pipeline";
import type { TextRecognizer } from "../../src/extraction/types";
import {
  FakeRasterizer,
  FakeRecognizer,
  PNG_BYTES,
  hangingRecognizer,
  pngPages,
  silentLogger,
  textRecognizer,
} from "../helpers/fakes";

const RECEIPT_TEXT = "Acme Pty Ltd\nInvoice No: 7781\nInvoice Date: 03/06/2024\nTotal $110.00";

function appWith(recognizer: TextRecognizer, options: { timeoutMs?: number; maxUploadBytes?: number } = {}) {
  const pipeline = createInvoicePipeline({
    recognizer,
    rasterizer: new FakeRasterizer(pngPages(1)),
    logger: silentLogger,
    timeoutMs: options.timeoutMs,
    now: () => new Date(2024, 6, 15),
  });
  return createApp({
    pipeline,
    recognizer,
    logger: silentLogger,
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
  });
}

const expectedInvoice = {
  supplier: "Acme Pty Ltd",
  invoice_number: "7781",
  invoice_date: "2024-06-03",
  is_system_date: false,
  total_amount: 110,
  gst_amount: 10,
  net_amount: 100,
  gst_source: "derived",
  raw_text: RECEIPT_TEXT,
};

describe("POST /process-invoice", () => {
  it("accepts a base64 JSON upload", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .send({ filename: "receipt.png", mime: "image/png", content: PNG_BYTES.toString("base64"), classification: "income" })
      .expect(200);

    assert.deepEqual(response.body, { success: true, invoice: expectedInvoice, classification: "income" });
  });

  it("accepts a multipart upload and defaults the classification", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .attach("file", PNG_BYTES, { filename: "receipt.png", contentType: "image/png" })
      .expect(200);

    assert.deepEqual(response.body, { success: true, invoice: expectedInvoice, classification: "expense" });
  });

  it("reads the classification field of a multipart upload", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .field("classification", "income")
      .attach("file", PNG_BYTES, { filename: "receipt.png", contentType: "image/png" })
      .expect(200);

    assert.equal(response.body.classification, "income");
  });

  it("rejects an unknown classification", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .send({ mime: "image/png", content: PNG_BYTES.toString("base64"), classification: "refund" })
      .expect(400);

    assert.equal(response.body.error, "invalid_request");
    assert.equal(response.body.success, false);
  });

  it("rejects a request without content", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .send({ mime: "image/png" })
      .expect(400);

    assert.equal(response.body.error, "invalid_request");
  });

  it("rejects a multipart request without a file part", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .field("classification", "income")
      .expect(400);

    assert.equal(response.body.detail, "A 'file' part is required");
  });

  it("rejects uploads over the size limit", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT), { maxUploadBytes: 16 }))
      .post("/process-invoice")
      .attach("file", Buffer.concat([PNG_BYTES, Buffer.alloc(64)]), { filename: "big.png", contentType: "image/png" })
      .expect(413);

    assert.equal(response.body.error, "payload_too_large");
  });

  it("maps an unsupported format to 415", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .send({ mime: "application/msword", content: Buffer.from("not a pdf").toString("base64") })
      .expect(415);

    assert.deepEqual(response.body, {
      success: false,
      error: "UnsupportedFormat",
      detail: "Unsupported file type: application/msword. Supported types are: application/pdf, image/jpeg, image/png, image/tiff",
      retryable: false,
    });
  });

  it("maps an unreadable document to 422", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .send({ mime: "image/png", content: Buffer.from("hello").toString("base64") })
      .expect(422);

    assert.equal(response.body.error, "DocumentUnreadable");
    assert.equal(response.body.detail, "File content is not a valid image/png document");
  });

  it("maps an unavailable engine to 503", async () => {
    const recognizer = new FakeRecognizer(() => {
      throw new ExtractionError("ExtractionEngineUnavailable", "OCR engine 'tesseract' is not installed or not executable");
    });
    const response = await request(appWith(recognizer))
      .post("/process-invoice")
      .send({ mime: "image/png", content: PNG_BYTES.toString("base64") })
      .expect(503);

    assert.deepEqual(response.body, {
      success: false,
      error: "ExtractionEngineUnavailable",
      detail: "OCR engine 'tesseract' is not installed or not executable",
      retryable: false,
    });
  });

  it("maps a timeout to a retryable 504", async () => {
    const response = await request(appWith(hangingRecognizer(), { timeoutMs: 20 }))
      .post("/process-invoice")
      .send({ mime: "image/png", content: PNG_BYTES.toString("base64") })
      .expect(504);

    assert.deepEqual(response.body, {
      success: false,
      error: "ExtractionTimeout",
      detail: "Invoice extraction exceeded 20 ms",
      retryable: true,
    });
  });

  it("echoes the caller's request id", async () => {
    const response = await request(appWith(textRecognizer(RECEIPT_TEXT)))
      .post("/process-invoice")
      .set("x-request-id", "test-req-1")
      .send({ mime: "image/png", content: PNG_BYTES.toString("base64") })
      .expect(200);

    assert.equal(response.headers["x-request-id"], "test-req-1");
  });
});

describe("service routes", () => {
  it("reports OCR availability on /health", async () => {
    const up = await request(appWith(textRecognizer(""))).get("/health").expect(200);
    assert.deepEqual(up.body, { status: "ok", ocr: "available" });

    const down = await request(appWith(new FakeRecognizer(() => "", false))).get("/health").expect(200);
    assert.deepEqual(down.body, { status: "ok", ocr: "unavailable" });
  });

  it("returns 404 for unknown routes", async () => {
    const response = await request(appWith(textRecognizer(""))).get("/nope").expect(404);
    assert.deepEqual(response.body, { error: "Not Found" });
  });
});
