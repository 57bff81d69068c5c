import { pdfToPng } from "pdf-to-png-converter";
import { ExtractionError } from "./errors";
import {
  type PageImage,
  type PageRasterizer,
  type RawDocument,
  SUPPORTED_MEDIA_TYPES,
  type SupportedMediaType,
} from "./types";

export const MIN_RENDER_DPI = 200;
const PDF_POINTS_PER_INCH = 72;

const MEDIA_TYPE_ALIASES: Record<string, SupportedMediaType> = {
  "image/jpg": "image/jpeg",
  "image/pjpeg": "image/jpeg",
  "image/tif": "image/tiff",
  "application/x-pdf": "application/pdf",
};

const EXTENSION_TYPES: Record<string, SupportedMediaType> = {
  pdf: "application/pdf",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  tif: "image/tiff",
  tiff: "image/tiff",
};

function isSupported(value: string): value is SupportedMediaType {
  return (SUPPORTED_MEDIA_TYPES as readonly string[]).includes(value);
}

function inferFromFilename(filename: string | undefined): SupportedMediaType | null {
  if (!filename) return null;
  const dot = filename.lastIndexOf(".");
  if (dot < 0) return null;
  return EXTENSION_TYPES[filename.slice(dot + 1).toLowerCase()] ?? null;
}

/**
 * Resolves the declared content type of an upload. Parameters are ignored,
 * and a generic or missing type falls back to the filename extension.
 */
export function resolveMediaType(document: Pick<RawDocument, "mimeType" | "filename">): SupportedMediaType {
  const declared = document.mimeType.split(";")[0].trim().toLowerCase();
  const canonical = MEDIA_TYPE_ALIASES[declared] ?? declared;
  if (isSupported(canonical)) {
    return canonical;
  }
  if (!canonical || canonical === "application/octet-stream") {
    const inferred = inferFromFilename(document.filename);
    if (inferred) return inferred;
  }
  throw new ExtractionError(
    "UnsupportedFormat",
    `Unsupported file type: ${declared || "(none)"}. Supported types are: ${SUPPORTED_MEDIA_TYPES.join(", ")}`
  );
}

const SIGNATURES: Record<SupportedMediaType, number[][]> = {
  "application/pdf": [[0x25, 0x50, 0x44, 0x46, 0x2d]],
  "image/jpeg": [[0xff, 0xd8, 0xff]],
  "image/png": [[0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
  "image/tiff": [
    [0x49, 0x49, 0x2a, 0x00],
    [0x4d, 0x4d, 0x00, 0x2a],
  ],
};

export function hasSignature(data: Buffer, mediaType: SupportedMediaType): boolean {
  return SIGNATURES[mediaType].some(
    (signature) => data.length >= signature.length && signature.every((byte, i) => data[i] === byte)
  );
}

export function assertReadable(data: Buffer, mediaType: SupportedMediaType): void {
  if (data.length === 0) {
    throw new ExtractionError("DocumentUnreadable", "Empty file received");
  }
  if (!hasSignature(data, mediaType)) {
    throw new ExtractionError("DocumentUnreadable", `File content is not a valid ${mediaType} document`);
  }
}

export class PdfPageRasterizer implements PageRasterizer {
  async rasterize(pdf: Buffer, options: { dpi: number; signal?: AbortSignal }): Promise<PageImage[]> {
    const arrayBuffer = pdf.buffer.slice(pdf.byteOffset, pdf.byteOffset + pdf.byteLength);

    const pages = await pdfToPng(arrayBuffer, {
      disableFontFace: true,
      useSystemFonts: true,
      viewportScale: options.dpi / PDF_POINTS_PER_INCH,
    }).catch((err: unknown) => {
      throw new ExtractionError("DocumentUnreadable", "PDF could not be opened for rendering", { cause: err });
    });
    options.signal?.throwIfAborted();

    const images: PageImage[] = [];
    for (const [index, page] of pages.entries()) {
      if (!page.content) continue;
      images.push({ index, mimeType: "image/png", data: page.content, dpi: options.dpi });
    }
    return images;
  }
}

export interface PageImageOptions {
  rasterizer: PageRasterizer;
  dpi: number;
  signal?: AbortSignal;
}

/**
 * Turns a validated upload into ordered page images: PDFs are rendered
 * page by page, images pass through as page 0.
 */
export async function toPageImages(
  document: RawDocument,
  mediaType: SupportedMediaType,
  options: PageImageOptions
): Promise<PageImage[]> {
  assertReadable(document.data, mediaType);

  if (mediaType !== "application/pdf") {
    return [{ index: 0, mimeType: mediaType, data: document.data }];
  }

  const dpi = Math.max(options.dpi, MIN_RENDER_DPI);
  const pages = await options.rasterizer.rasterize(document.data, { dpi, signal: options.signal });
  if (pages.length === 0) {
    throw new ExtractionError("DocumentUnreadable", "PDF contains no renderable pages");
  }
  return pages.map((page) => ({ ...page, dpi: page.dpi ?? dpi })).sort((a, b) => a.index - b.index);
}
