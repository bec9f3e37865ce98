import { Decimal } from "decimal.js";
import { InvalidRangeError } from "./errors.js";
import { toDecimal } from "./thousandths.js";

export const DEFAULT_STRIKE_GTE = 0.5;
export const DEFAULT_STRIKE_LTE = 10;
export const DEFAULT_STRIKE_STEP = 0.5;

// Lets the upper bound in even when (end - start) / step lands just short of an integer
export const LADDER_TOLERANCE = new Decimal("0.0001");

export const MAX_LADDER_SIZE = 10_000;

export interface StrikeLadderOptions {
  /** Exact strike; when set, bounds and step are ignored. */
  strike?: number | null;
  strikeGte?: number | null;
  strikeLte?: number | null;
  step?: number;
}

function toBound(value: number, name: string): Decimal {
  if (!Number.isFinite(value)) {
    throw new InvalidRangeError(`${name} must be a finite number, got ${value}`, value);
  }
  return toDecimal(value);
}

/**
 * Candidate strikes for an option batch.
 *
 * Returns `[strike]` when an exact strike is requested. Otherwise walks from
 * `strikeGte` (default 0.5) to `strikeLte` (default 10) inclusive in `step`
 * increments; inverted bounds are swapped. Every element is computed as
 * `start + i * step` in decimal arithmetic, so long ladders do not drift.
 *
 * @example
 * generateStrikeLadder({ strikeGte: 2, strikeLte: 3 }) // [2, 2.5, 3]
 */
export function generateStrikeLadder(options: StrikeLadderOptions = {}): number[] {
  const { strike, strikeGte, strikeLte, step = DEFAULT_STRIKE_STEP } = options;

  if (strike !== undefined && strike !== null) {
    return [strike];
  }

  if (!Number.isFinite(step) || step <= 0) {
    throw new InvalidRangeError(`step must be a positive number, got ${step}`, step);
  }

  let start = toBound(strikeGte ?? DEFAULT_STRIKE_GTE, "strike_gte");
  let end = toBound(strikeLte ?? DEFAULT_STRIKE_LTE, "strike_lte");
  if (end.lt(start)) {
    [start, end] = [end, start];
  }

  const stepDec = toDecimal(step);
  const count = end.plus(LADDER_TOLERANCE).minus(start).div(stepDec).floor().toNumber() + 1;
  if (count > MAX_LADDER_SIZE) {
    throw new InvalidRangeError(
      `ladder would contain ${count} strikes (max ${MAX_LADDER_SIZE}); narrow the range or widen the step`,
      { start: start.toNumber(), end: end.toNumber(), step }
    );
  }

  const strikes: number[] = [];
  for (let i = 0; i < count; i++) {
    strikes.push(start.plus(stepDec.times(i)).toNumber());
  }
  return strikes;
}
