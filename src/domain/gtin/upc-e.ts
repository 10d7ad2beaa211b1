// ---------------------------------------------------------------------------
// UPC-E to UPC-A expansion
// ---------------------------------------------------------------------------

import type { Digit, GtinResult, UpcA } from "../../core/types.js";
import { ConversionFailedError } from "../../core/errors.js";
import { computeCheckDigit } from "./check-digit.js";
import { createGtin } from "./model.js";

/**
 * Take the six compressed digits out of a UPC-E encoding.
 *
 * - 8 digits: number-system digit, 6 core digits, check digit.
 * - 7 digits: 6 core digits, check digit.
 * - 6 digits: the core alone.
 */
function coreDigits(upce: readonly Digit[]): readonly Digit[] | null {
  switch (upce.length) {
    case 8:
      return upce.slice(1, 7);
    case 7:
      return upce.slice(0, 6);
    case 6:
      return upce;
    default:
      return null;
  }
}

/**
 * Rebuild the manufacturer and item numbers (five digits each) from the
 * core. The last core digit selects how the zeros were squeezed out.
 */
function decompress(
  core: readonly Digit[],
): { manufacturer: Digit[]; item: Digit[] } {
  const [d0, d1, d2, d3, d4, d5] = core;

  switch (d5) {
    case 0:
    case 1:
    case 2:
      return { manufacturer: [d0, d1, d5, 0, 0], item: [0, 0, d2, d3, d4] };
    case 3:
      return { manufacturer: [d0, d1, d2, 0, 0], item: [0, 0, 0, d3, d4] };
    case 4:
      return { manufacturer: [d0, d1, d2, d3, 0], item: [0, 0, 0, 0, d4] };
    default:
      return { manufacturer: [d0, d1, d2, d3, d4], item: [0, 0, 0, 0, d5] };
  }
}

/**
 * Expand a UPC-E encoding (6, 7 or 8 digits) to the UPC-A it abbreviates.
 *
 * A trailing check digit on the input is ignored; the UPC-A check digit is
 * recomputed over the expanded number.
 */
export function expandUpcE(upce: readonly Digit[]): GtinResult<UpcA> {
  const core = coreDigits(upce);
  if (core === null) {
    return {
      ok: false,
      error: new ConversionFailedError(
        `UPC-E needs 6, 7 or 8 digits, got ${upce.length}`,
      ),
    };
  }

  const { manufacturer, item } = decompress(core);
  const body: Digit[] = [0, ...manufacturer, ...item];
  const digits = [...body, computeCheckDigit(body)];

  if (digits.length !== 12) {
    return {
      ok: false,
      error: new ConversionFailedError(
        `expanded UPC-A has ${digits.length} digits`,
      ),
    };
  }

  const upcA = createGtin("UpcA", digits);
  if (!upcA.ok) {
    return {
      ok: false,
      error: new ConversionFailedError(upcA.error.message, {
        cause: upcA.error,
      }),
    };
  }
  return upcA;
}
