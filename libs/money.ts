import assert from "node:assert";

export type MoneyCents = number & { readonly __brand: unique symbol };

function ensureSafeInteger(value: number): asserts value is number {
  assert(Number.isSafeInteger(value), `Expected safe integer cents but received ${value}`);
}

function normalizeCents(value: number | bigint): number {
  const cents = typeof value === "bigint" ? Number(value) : value;
  ensureSafeInteger(cents);
  return cents;
}

export function fromCents(value: number | bigint): MoneyCents {
  return normalizeCents(value) as MoneyCents;
}

export function toCents(money: MoneyCents): number {
  return money as number;
}

export const ZERO_CENTS = fromCents(0);

const BP_SCALE = 10_000n;

function parseDecimalInput(input: string): { sign: bigint; dollars: string; fraction: string } {
  const trimmed = input.trim().replace(/,/g, "");
  const match = trimmed.match(/^([+-]?)(\d+)(?:\.(\d{0,}))?$/);
  if (!match) {
    throw new Error(`Invalid decimal monetary value: ${input}`);
  }
  const [, signPart, dollars, fractionRaw = ""] = match;
  const sign = signPart === "-" ? -1n : 1n;
  return { sign, dollars, fraction: fractionRaw };
}

/**
 * Parses a dollar amount as printed on a document ("1,234.5", "110.00")
 * into cents, rounding half-up on the third decimal.
 */
export function parseDollars(value: string): MoneyCents {
  const { sign, dollars, fraction } = parseDecimalInput(value);
  const centDigits = (fraction + "00").slice(0, 3);
  const centsPortion = BigInt(centDigits.slice(0, 2));
  const roundingDigit = Number(centDigits[2] ?? "0");
  let cents = BigInt(dollars) * 100n + centsPortion;
  if (roundingDigit >= 5) {
    cents += 1n;
  }
  return fromCents(sign * cents);
}

export function rateToBasisPoints(rate: number): number {
  if (!Number.isFinite(rate) || rate < 0) {
    throw new Error(`Invalid tax rate: ${rate}`);
  }
  return Math.round(rate * Number(BP_SCALE));
}

/**
 * Tax contained in a tax-inclusive amount: amount × rate / (1 + rate),
 * rounded half-up to the cent. At 1000 bp this is amount / 11.
 */
export function inclusiveTaxPortion(amount: MoneyCents, basisPoints: number): MoneyCents {
  if (!Number.isInteger(basisPoints) || basisPoints < 0) {
    throw new Error(`Basis points must be a non-negative integer, received ${basisPoints}`);
  }
  const bp = BigInt(basisPoints);
  const denominator = BP_SCALE + bp;
  const numerator = BigInt(toCents(amount)) * bp;
  return fromCents((numerator * 2n + denominator) / (denominator * 2n));
}

export function subtractCents(a: MoneyCents, b: MoneyCents): MoneyCents {
  return fromCents(toCents(a) - toCents(b));
}

export function clampCents(value: MoneyCents, min: MoneyCents, max: MoneyCents): MoneyCents {
  return fromCents(Math.min(Math.max(toCents(value), toCents(min)), toCents(max)));
}

export function toDollars(amount: MoneyCents): number {
  return toCents(amount) / 100;
}
