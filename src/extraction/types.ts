export const SUPPORTED_MEDIA_TYPES = ["application/pdf", "image/jpeg", "image/png", "image/tiff"] as const;

export type SupportedMediaType = (typeof SUPPORTED_MEDIA_TYPES)[number];
export type ImageMediaType = Exclude<SupportedMediaType, "application/pdf">;

export type InvoiceClassification = "income" | "expense";

export interface RawDocument {
  data: Buffer;
  mimeType: string;
  filename?: string;
}

export interface PageImage {
  index: number;
  mimeType: ImageMediaType;
  data: Buffer;
  /** Render resolution, set for pages rasterised from a PDF. */
  dpi?: number;
}

/** Where the GST figure came from: read off the document, back-calculated from the total, or nothing to split. */
export type GstSource = "extracted" | "derived" | "none";

export interface ExtractedInvoice {
  supplier: string;
  invoiceNumber: string;
  /** Canonical YYYY-MM-DD. */
  invoiceDate: string;
  isSystemDate: boolean;
  totalAmount: number;
  gstAmount: number;
  netAmount: number;
  gstSource: GstSource;
  rawText: string;
}

export interface ProcessedInvoice {
  invoice: ExtractedInvoice;
  classification: InvoiceClassification;
}

export interface PageRasterizer {
  rasterize(pdf: Buffer, options: { dpi: number; signal?: AbortSignal }): Promise<PageImage[]>;
}

/** Narrow seam to the OCR engine: one page image in, recognised text out. */
export interface TextRecognizer {
  recognize(page: PageImage, signal?: AbortSignal): Promise<string>;
  isAvailable?(): Promise<boolean>;
}
