// ---------------------------------------------------------------------------
// Flat, JSON-friendly summaries of GTINs and GTIN errors.
// ---------------------------------------------------------------------------

import type {
  GTIN,
  GtinDescription,
  GtinErrorDescription,
} from "../../core/types.js";
import type { GtinError } from "../../core/errors.js";
import { InvalidLengthError } from "../../core/errors.js";
import type { PrefixRegistry } from "../../config/prefix-registry.js";
import { defaultPrefixRegistry } from "../../config/prefix-registry.js";
import { digitsToString } from "./digits.js";
import { asEan13 } from "./gtin.js";
import { formatGtin, formatName, gtinLength, toText } from "./model.js";
import { countryCode, gs1Prefix, numberSystem } from "./number-system.js";

export function describeGtin(
  gtin: GTIN,
  registry: PrefixRegistry = defaultPrefixRegistry(),
): GtinDescription {
  const prefix = gs1Prefix(gtin);
  const ean13 = asEan13(gtin);

  return {
    code: toText(gtin),
    format: gtin.format,
    formatName: formatName(gtin),
    length: gtinLength(gtin),
    display: formatGtin(gtin),
    gs1Prefix: prefix ? digitsToString(prefix) : null,
    numberSystem: numberSystem(gtin),
    countryCode: countryCode(gtin, registry),
    ean13: ean13 ? toText(ean13) : null,
  };
}

export function describeGtinError(error: GtinError): GtinErrorDescription {
  return {
    kind: error.kind,
    message: error.message,
    ...(error instanceof InvalidLengthError ? { length: error.length } : {}),
  };
}
