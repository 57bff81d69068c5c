import { type MoneyCents, ZERO_CENTS, clampCents, fromCents, subtractCents, toCents, toDollars } from "../../libs/money";
import { collapseWhitespace } from "./heuristics/lines";
import { isPlausibleInvoiceNumber, isRejectedSupplier } from "./heuristics/rejection";
import type { ExtractedInvoice, GstSource } from "./types";

export interface InvoiceDraft {
  supplier: string;
  invoiceNumber: string;
  /** YYYY-MM-DD, or null when no date was found. */
  invoiceDate: string | null;
  totalCents: MoneyCents;
  gstCents: MoneyCents;
  gstSource: GstSource;
  rawText: string;
}

/**
 * Last word on every field: whitespace collapse, false-positive rejection,
 * then amounts rebuilt so that gst + net == total to the cent.
 */
export function finalizeInvoice(draft: InvoiceDraft, processingDate: string): ExtractedInvoice {
  const invoiceNumber = collapseWhitespace(draft.invoiceNumber);
  let supplier = collapseWhitespace(draft.supplier);
  if (isRejectedSupplier(supplier) || (invoiceNumber !== "" && supplier === invoiceNumber)) {
    supplier = "";
  }

  const total = fromCents(Math.max(0, toCents(draft.totalCents)));
  const gst = clampCents(draft.gstCents, ZERO_CENTS, total);
  const net = subtractCents(total, gst);
  const gstSource: GstSource = toCents(total) === 0 ? "none" : draft.gstSource;

  return Object.freeze({
    supplier,
    invoiceNumber: isPlausibleInvoiceNumber(invoiceNumber) ? invoiceNumber : "",
    invoiceDate: draft.invoiceDate ?? processingDate,
    isSystemDate: draft.invoiceDate === null,
    totalAmount: toDollars(total),
    gstAmount: toDollars(gst),
    netAmount: toDollars(net),
    gstSource,
    rawText: draft.rawText,
  });
}
