/**
 * OCC Ticker Codec Tests
 *
 * Encode/decode of Massive option tickers (O:ROOTyymmddC00000000).
 * Critical: strikes must survive the trip through the 8-digit thousandths
 * field without binary rounding drift.
 */

import { describe, it, expect } from "vitest";
import {
  buildOccOptionList,
  buildOccOptionTicker,
  contractFlag,
  isOccTicker,
  parseOccStrike,
  parseOccTicker,
} from "../occ.js";
import { InvalidFormatError, InvalidTickerError, OccError } from "../errors.js";

// ============================================================================
// buildOccOptionTicker
// ============================================================================

describe("buildOccOptionTicker", () => {
  it("builds the RZLV call ticker", () => {
    expect(buildOccOptionTicker("RZLV", "2025-11-07", "call", 6.0)).toBe("O:RZLV251107C00006000");
  });

  it("is deterministic", () => {
    const a = buildOccOptionTicker("SPY", "2026-01-16", "put", 587.5);
    const b = buildOccOptionTicker("SPY", "2026-01-16", "put", 587.5);
    expect(a).toBe(b);
    expect(a).toBe("O:SPY260116P00587500");
  });

  it("upper-cases the underlying", () => {
    expect(buildOccOptionTicker("rzlv", "2025-11-07", "put", 1)).toBe("O:RZLV251107P00001000");
  });

  it("maps contract types by first character", () => {
    expect(contractFlag("call")).toBe("C");
    expect(contractFlag("CALL")).toBe("C");
    expect(contractFlag("c")).toBe("C");
    expect(contractFlag("put")).toBe("P");
    expect(contractFlag("Put")).toBe("P");
    expect(contractFlag("")).toBe("P");
    expect(contractFlag("xyz")).toBe("P");
  });

  describe("strike rounding", () => {
    it("5.5 → 00005500 exactly", () => {
      expect(buildOccOptionTicker("RZLV", "2025-11-07", "call", 5.5)).toBe("O:RZLV251107C00005500");
    });

    it("rounds half-up at the third decimal", () => {
      expect(buildOccOptionTicker("A", "2025-11-07", "c", 1.0005)).toBe("O:A251107C00001001");
      expect(buildOccOptionTicker("A", "2025-11-07", "c", 2.0004)).toBe("O:A251107C00002000");
      expect(buildOccOptionTicker("A", "2025-11-07", "c", 0.0005)).toBe("O:A251107C00000001");
    });

    it("2.675 stays 2675 (binary multiplication would give 2674.999…)", () => {
      expect(buildOccOptionTicker("A", "2025-11-07", "c", 2.675)).toBe("O:A251107C00002675");
    });

    it("accepts decimal strings", () => {
      expect(buildOccOptionTicker("A", "2025-11-07", "c", "12.345")).toBe("O:A251107C00012345");
    });

    it("accepts the full 8-digit range", () => {
      expect(buildOccOptionTicker("A", "2025-11-07", "c", 0)).toBe("O:A251107C00000000");
      expect(buildOccOptionTicker("A", "2025-11-07", "c", 99999.999)).toBe("O:A251107C99999999");
    });

    it("rejects strikes that do not fit the field", () => {
      expect(() => buildOccOptionTicker("A", "2025-11-07", "c", 100000)).toThrow(InvalidFormatError);
      expect(() => buildOccOptionTicker("A", "2025-11-07", "c", -1)).toThrow(InvalidFormatError);
      expect(() => buildOccOptionTicker("A", "2025-11-07", "c", Number.NaN)).toThrow(
        InvalidFormatError
      );
      expect(() => buildOccOptionTicker("A", "2025-11-07", "c", "abc")).toThrow(InvalidFormatError);
    });
  });

  describe("expiration date", () => {
    it("accepts a date without hyphens", () => {
      expect(buildOccOptionTicker("RZLV", "20251107", "call", 6)).toBe("O:RZLV251107C00006000");
    });

    it("rejects dates that are not 8 digits once hyphens are removed", () => {
      for (const bad of ["2025-1-07", "2025/11/07", "2025-11-07T00", "", "2025-1a-07"]) {
        expect(() => buildOccOptionTicker("RZLV", bad, "call", 6)).toThrow(InvalidFormatError);
      }
    });

    it("carries the raw date on the error", () => {
      try {
        buildOccOptionTicker("RZLV", "11/07/2025", "call", 6);
        expect.fail("expected InvalidFormatError");
      } catch (error) {
        expect(error).toBeInstanceOf(OccError);
        if (error instanceof OccError) {
          expect(error.code).toBe("INVALID_FORMAT");
          expect(error.input).toBe("11/07/2025");
          expect(error.message).toBe("expiration_date must be in YYYY-MM-DD format");
        }
      }
    });

    it("is lenient about calendar validity by default", () => {
      expect(buildOccOptionTicker("RZLV", "2025-13-45", "call", 6)).toBe("O:RZLV251345C00006000");
    });

    it("rejects impossible dates with strictCalendar", () => {
      expect(() =>
        buildOccOptionTicker("RZLV", "2025-13-01", "call", 6, { strictCalendar: true })
      ).toThrow("expiration_date is not a calendar date: 2025-13-01");
      expect(() =>
        buildOccOptionTicker("RZLV", "2025-02-29", "call", 6, { strictCalendar: true })
      ).toThrow(InvalidFormatError);
      expect(buildOccOptionTicker("RZLV", "2024-02-29", "call", 6, { strictCalendar: true })).toBe(
        "O:RZLV240229C00006000"
      );
    });

    it("checks two-digit calendar years literally", () => {
      expect(buildOccOptionTicker("RZLV", "0025-01-01", "call", 6, { strictCalendar: true })).toBe(
        "O:RZLV250101C00006000"
      );
      // 0100 is not a leap year, 0096 is
      expect(() =>
        buildOccOptionTicker("RZLV", "0100-02-29", "call", 6, { strictCalendar: true })
      ).toThrow(InvalidFormatError);
      expect(buildOccOptionTicker("RZLV", "0096-02-29", "call", 6, { strictCalendar: true })).toBe(
        "O:RZLV960229C00006000"
      );
    });
  });

  it("rejects roots that the ticker grammar cannot hold", () => {
    for (const bad of ["", "BRK.B", "ABCDEFG", "SPY1"]) {
      expect(() => buildOccOptionTicker(bad, "2025-11-07", "call", 6)).toThrow(InvalidFormatError);
    }
  });
});

// ============================================================================
// buildOccOptionList
// ============================================================================

describe("buildOccOptionList", () => {
  it("builds one ticker per strike", () => {
    expect(buildOccOptionList("RZLV", "2025-11-07", "call", [0.5, 1.0])).toEqual([
      "O:RZLV251107C00000500",
      "O:RZLV251107C00001000",
    ]);
  });

  it("preserves order and duplicates", () => {
    expect(buildOccOptionList("RZLV", "2025-11-07", "put", [3, 1, 3])).toEqual([
      "O:RZLV251107P00003000",
      "O:RZLV251107P00001000",
      "O:RZLV251107P00003000",
    ]);
  });

  it("returns an empty list for no strikes", () => {
    expect(buildOccOptionList("RZLV", "2025-11-07", "put", [])).toEqual([]);
  });
});

// ============================================================================
// parseOccStrike / parseOccTicker
// ============================================================================

describe("parseOccStrike", () => {
  it("decodes strikes", () => {
    expect(parseOccStrike("O:RZLV251107C00009500")).toBe(9.5);
    expect(parseOccStrike("O:RZLV251107P00000500")).toBe(0.5);
    expect(parseOccStrike("O:SPY260116C00587500")).toBe(587.5);
  });

  it("round-trips strikes at thousandths precision", () => {
    const strikes = [0, 0.001, 0.5, 5.5, 12.345, 99.99, 1234.567, 99999.999];
    for (const strike of strikes) {
      const ticker = buildOccOptionTicker("RZLV", "2025-11-07", "call", strike);
      expect(parseOccStrike(ticker)).toBe(strike);
    }
  });

  it("rejects anything off the grammar", () => {
    const bad = [
      "O:rzlv251107C00009500", // lowercase root
      "O:RZLV251107X00009500", // bad call/put flag
      "O:RZLV251107C0000950", // 7 strike digits
      "O:RZLV251107C000095000", // 9 strike digits
      "O:RZLV25110AC00009500", // letter in date
      "O:RZLV251107C0000950A", // letter in strike
      "O:ABCDEFG251107C00009500", // 7-letter root
      "RZLV251107C00009500", // missing prefix
      " O:RZLV251107C00009500", // leading space
      "O:RZLV251107C00009500\n", // trailing newline
      "",
    ];
    for (const ticker of bad) {
      expect(() => parseOccStrike(ticker)).toThrow(InvalidTickerError);
    }
  });

  it("carries the raw ticker on the error", () => {
    expect(() => parseOccStrike("bad")).toThrow("Invalid OCC option ticker: bad");
    try {
      parseOccStrike("bad");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTickerError);
      if (error instanceof InvalidTickerError) {
        expect(error.code).toBe("INVALID_TICKER");
        expect(error.input).toBe("bad");
      }
    }
  });
});

describe("parseOccTicker", () => {
  it("returns every field", () => {
    expect(parseOccTicker("O:SPY261218P00450500")).toEqual({
      ticker: "O:SPY261218P00450500",
      underlying: "SPY",
      expiration: "2026-12-18",
      contractType: "put",
      strike: 450.5,
    });
  });

  it("inverts buildOccOptionTicker", () => {
    const ticker = buildOccOptionTicker("rzlv", "2025-11-07", "Call", 6.25);
    expect(parseOccTicker(ticker)).toEqual({
      ticker: "O:RZLV251107C00006250",
      underlying: "RZLV",
      expiration: "2025-11-07",
      contractType: "call",
      strike: 6.25,
    });
  });

  it("isOccTicker mirrors the grammar", () => {
    expect(isOccTicker("O:RZLV251107C00009500")).toBe(true);
    expect(isOccTicker("O:RZLV251107C9500")).toBe(false);
  });
});
