import type { Logger } from "pino";
import { extractAmounts } from "./heuristics/amounts";
import { type MatchContext, runChain } from "./heuristics/chain";
import { DATE_MATCHERS, formatLocalDate } from "./heuristics/dates";
import { INVOICE_NUMBER_MATCHERS } from "./heuristics/invoiceNumber";
import { toLines } from "./heuristics/lines";
import { SUPPLIER_MATCHERS } from "./heuristics/supplier";
import { finalizeInvoice } from "./normalize";
import type { ExtractedInvoice } from "./types";

export interface FieldExtractionOptions {
  gstRateBp: number;
  now: () => Date;
  logger?: Logger;
}

/**
 * Runs every field chain over recognised text. Never throws for a missing
 * field: absence becomes the field's default value.
 */
export function extractInvoiceFields(rawText: string, options: FieldExtractionOptions): ExtractedInvoice {
  const context: MatchContext = { rawText, lines: toLines(rawText) };

  const amounts = extractAmounts(context, options.gstRateBp);
  const date = runChain(DATE_MATCHERS, context);
  const invoiceNumber = runChain(INVOICE_NUMBER_MATCHERS, context);
  const supplier = runChain(SUPPLIER_MATCHERS, context);

  options.logger?.debug(
    {
      lines: context.lines.length,
      matchers: {
        total: amounts.totalMatcher,
        gst: amounts.gstSource,
        date: date?.matcher ?? null,
        invoiceNumber: invoiceNumber?.matcher ?? null,
        supplier: supplier?.matcher ?? null,
      },
    },
    "invoice fields matched"
  );

  return finalizeInvoice(
    {
      supplier: supplier?.value ?? "",
      invoiceNumber: invoiceNumber?.value ?? "",
      invoiceDate: date?.value ?? null,
      totalCents: amounts.totalCents,
      gstCents: amounts.gstCents,
      gstSource: amounts.gstSource,
      rawText,
    },
    formatLocalDate(options.now())
  );
}
