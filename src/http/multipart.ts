import busboy from "busboy";
import type { Request } from "express";
import { HttpError } from "../errors";
import type { RawDocument } from "../extraction/types";
import { invalidRequest } from "./validate";

export interface MultipartInvoice {
  document: RawDocument | null;
  classification: string | undefined;
}

function payloadTooLarge(maxBytes: number): HttpError {
  return new HttpError(413, "payload_too_large", `Upload exceeds ${maxBytes} bytes`);
}

/** Buffers the `file` part and reads the `classification` field; other parts are drained. */
export function readMultipartInvoice(req: Request, maxBytes: number): Promise<MultipartInvoice> {
  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { fileSize: maxBytes, files: 1, fields: 8 } });
    } catch (err) {
      reject(invalidRequest(err instanceof Error ? err.message : "Malformed multipart request"));
      return;
    }

    let document: RawDocument | null = null;
    let classification: string | undefined;
    let tooLarge = false;
    const files: Promise<void>[] = [];

    parser.on("field", (name, value) => {
      if (name === "classification") classification = value;
    });

    parser.on("file", (name, stream, info) => {
      if (name !== "file") {
        stream.resume();
        return;
      }
      const chunks: Buffer[] = [];
      files.push(
        new Promise<void>((done, fail) => {
          stream.on("data", (chunk: Buffer) => chunks.push(chunk));
          stream.on("limit", () => {
            tooLarge = true;
          });
          stream.on("error", fail);
          stream.on("end", () => {
            document = { data: Buffer.concat(chunks), mimeType: info.mimeType, filename: info.filename };
            done();
          });
        })
      );
    });

    parser.on("error", (err: unknown) => {
      reject(invalidRequest(err instanceof Error ? err.message : "Malformed multipart request"));
    });

    parser.on("close", () => {
      Promise.all(files)
        .then(() => {
          if (tooLarge) {
            reject(payloadTooLarge(maxBytes));
            return;
          }
          resolve({ document, classification });
        })
        .catch(reject);
    });

    req.pipe(parser);
  });
}
