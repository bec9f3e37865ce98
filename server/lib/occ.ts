/**
 * OCC option ticker codec
 *
 * Massive identifies option contracts by OCC tickers with an `O:` prefix:
 *
 *   O:RZLV251107C00005500
 *     │ │   │     │└──────── strike in thousandths, 8 digits (5.5)
 *     │ │   │     └───────── C = call, P = put
 *     │ │   └─────────────── expiration yymmdd (2025-11-07)
 *     │ └─────────────────── root symbol, 1-6 letters
 *     └───────────────────── Massive options prefix
 *
 * Encoding and decoding are purely syntactic: nothing here checks that the
 * contract actually lists on an exchange.
 *
 * @module server/lib/occ
 */

import type { Decimal } from "decimal.js";
import { InvalidFormatError, InvalidTickerError } from "./errors.js";
import { formatStrikeField, fromThousandths, toThousandths } from "./thousandths.js";

export type ContractType = "call" | "put";

export interface OccTicker {
  ticker: string;
  underlying: string;
  /** YYYY-MM-DD, century assumed to be 20xx */
  expiration: string;
  contractType: ContractType;
  strike: number;
}

export interface EncodeOptions {
  /** Reject dates that do not exist on the calendar (2025-13-01, 2025-02-30). */
  strictCalendar?: boolean;
}

export const OCC_PATTERN =
  /^O:(?<root>[A-Z]{1,6})(?<yy>\d{2})(?<mm>\d{2})(?<dd>\d{2})(?<cp>[CP])(?<strike>\d{8})$/;

const ROOT_PATTERN = /^[A-Z]{1,6}$/;
const DATE_DIGITS_PATTERN = /^\d{8}$/;

/**
 * Map a free-form contract type to its OCC flag.
 * Anything starting with "c" (any case) is a call, everything else a put.
 */
export function contractFlag(contractType: string): "C" | "P" {
  return contractType.toLowerCase().startsWith("c") ? "C" : "P";
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  // Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function cleanExpiration(expirationDate: string, strictCalendar: boolean): string {
  const digits = expirationDate.replace(/-/g, "");
  if (!DATE_DIGITS_PATTERN.test(digits)) {
    throw new InvalidFormatError("expiration_date must be in YYYY-MM-DD format", expirationDate);
  }

  if (strictCalendar) {
    const year = Number(digits.slice(0, 4));
    const month = Number(digits.slice(4, 6));
    const day = Number(digits.slice(6, 8));
    if (!isCalendarDate(year, month, day)) {
      throw new InvalidFormatError(
        `expiration_date is not a calendar date: ${expirationDate}`,
        expirationDate
      );
    }
  }

  return digits;
}

/**
 * Build an OCC ticker from its parts.
 *
 * @example
 * buildOccOptionTicker("RZLV", "2025-11-07", "call", 6) // "O:RZLV251107C00006000"
 */
export function buildOccOptionTicker(
  underlying: string,
  expirationDate: string,
  contractType: string,
  strike: Decimal.Value,
  options: EncodeOptions = {}
): string {
  const root = underlying.toUpperCase();
  if (!ROOT_PATTERN.test(root)) {
    throw new InvalidFormatError(`underlying must be 1-6 letters, got "${underlying}"`, underlying);
  }

  const exp = cleanExpiration(expirationDate, options.strictCalendar ?? false);
  const yy = exp.slice(2, 4);
  const mm = exp.slice(4, 6);
  const dd = exp.slice(6, 8);
  const cp = contractFlag(contractType);
  const strikeField = formatStrikeField(toThousandths(strike));

  return `O:${root}${yy}${mm}${dd}${cp}${strikeField}`;
}

/**
 * One ticker per strike, in input order. Duplicates are kept.
 */
export function buildOccOptionList(
  underlying: string,
  expirationDate: string,
  contractType: string,
  strikes: Iterable<Decimal.Value>,
  options: EncodeOptions = {}
): string[] {
  const tickers: string[] = [];
  for (const strike of strikes) {
    tickers.push(buildOccOptionTicker(underlying, expirationDate, contractType, strike, options));
  }
  return tickers;
}

function matchTicker(ticker: string) {
  const groups = OCC_PATTERN.exec(ticker)?.groups;
  if (!groups) {
    throw new InvalidTickerError(ticker);
  }
  return groups;
}

/**
 * Extract the strike from an OCC ticker.
 *
 * @example
 * parseOccStrike("O:RZLV251107C00005500") // 5.5
 */
export function parseOccStrike(ticker: string): number {
  const { strike } = matchTicker(ticker);
  return fromThousandths(Number.parseInt(strike, 10));
}

export function parseOccTicker(ticker: string): OccTicker {
  const { root, yy, mm, dd, cp, strike } = matchTicker(ticker);
  return {
    ticker,
    underlying: root,
    expiration: `20${yy}-${mm}-${dd}`,
    contractType: cp === "C" ? "call" : "put",
    strike: fromThousandths(Number.parseInt(strike, 10)),
  };
}

export function isOccTicker(ticker: string): boolean {
  return OCC_PATTERN.test(ticker);
}
