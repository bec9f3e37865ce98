import { Decimal } from "decimal.js";
import { InvalidFormatError } from "./errors.js";

// OCC strike field: 8 digits of thousandths, 0 .. 99999.999
export const STRIKE_FIELD_WIDTH = 8;
export const MAX_STRIKE_THOUSANDTHS = 99_999_999;

/**
 * Build a Decimal from a price without going through binary multiplication.
 * Numbers are read through their shortest round-trip string, so 5.5 is
 * exactly 5.5 and 0.1 is exactly 0.1.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  return new Decimal(value);
}

/**
 * Scale a strike to an integer count of thousandths, rounding half-up at the
 * third decimal place (5.5 → 5500, 1.0005 → 1001).
 */
export function toThousandths(strike: Decimal.Value): number {
  let dec: Decimal;
  try {
    dec = toDecimal(strike);
  } catch {
    throw new InvalidFormatError(`strike must be a decimal number, got ${String(strike)}`, strike);
  }
  if (!dec.isFinite()) {
    throw new InvalidFormatError(`strike must be finite, got ${String(strike)}`, strike);
  }

  // round at the source scale; the product then has at most 8 digits and is exact
  const scaled = dec.toDecimalPlaces(3, Decimal.ROUND_HALF_UP).times(1000);
  if (scaled.lt(0) || scaled.gt(MAX_STRIKE_THOUSANDTHS)) {
    throw new InvalidFormatError(
      `strike must be between 0 and 99999.999, got ${String(strike)}`,
      strike
    );
  }
  // -0 would print as "0" anyway, but keep the field clean
  return Math.abs(scaled.toNumber());
}

export function formatStrikeField(thousandths: number): string {
  return String(thousandths).padStart(STRIKE_FIELD_WIDTH, "0");
}

export function fromThousandths(thousandths: number): number {
  return thousandths / 1000;
}
