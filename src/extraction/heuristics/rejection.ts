import { findCurrencyTokens } from "./amounts";
import { containsDate } from "./dates";
import { collapseWhitespace } from "./lines";

export const MIN_INVOICE_NUMBER_LENGTH = 2;
export const MAX_INVOICE_NUMBER_LENGTH = 20;
const MAX_SUPPLIER_LENGTH = 80;

const INVOICE_NUMBER_SHAPE = /^[A-Za-z0-9][A-Za-z0-9\-/]*$/;

const INVOICE_NUMBER_LIKE = /^(?:INV|REC|ORD|BILL|DOC|REF)?[-#\s]*\d+(?:[-/#\s]*\d+)*$/i;

const HEADER_WORD =
  String.raw`(?:tax\s+invoice|invoice|receipt|number|order|bill|document|reference|id|statement|quote|quotation|date|page|abn|acn|total|subtotal|gst|tax|amount|balance|due|description|qty|quantity|ship\s+to|sold\s+to|customer|attn|attention|phone|tel|fax|email|e-mail|web|website)`;

// A header word only counts as a label when a separator, a number, a label noun or the line end follows it.
const HEADER_LIKE = new RegExp(
  String.raw`^(?:${HEADER_WORD}\s*(?:[:#.\-]|\d|$|(?:no|number|name|date|details?)\b)|no[.:]|to:)`,
  "i"
);

const CONTACT_LIKE = /(@|https?:\/\/|\bwww\.)/i;

/**
 * Accepts alphanumeric references of plausible length with at least one
 * digit; single characters, words and overlong runs are noise.
 */
export function isPlausibleInvoiceNumber(value: string): boolean {
  return (
    value.length >= MIN_INVOICE_NUMBER_LENGTH &&
    value.length <= MAX_INVOICE_NUMBER_LENGTH &&
    INVOICE_NUMBER_SHAPE.test(value) &&
    /\d/.test(value) &&
    !containsDate(value)
  );
}

export function isRejectedSupplier(value: string): boolean {
  const text = collapseWhitespace(value);
  if (!text || text.length > MAX_SUPPLIER_LENGTH) return true;
  if ((text.match(/[A-Za-z]/g) ?? []).length < 2) return true;
  if (INVOICE_NUMBER_LIKE.test(text) || HEADER_LIKE.test(text)) return true;
  if (CONTACT_LIKE.test(text)) return true;
  if (findCurrencyTokens({ index: 0, text }).length > 0) return true;
  return containsDate(text);
}
