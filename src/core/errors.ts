// ---------------------------------------------------------------------------
// Error hierarchy for the GTIN Inspector service.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all GTIN Inspector errors.
 */
export class GtinInspectorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GtinInspectorError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Domain errors ───────────────────────────────────────────────────────────

export type GtinErrorKind =
  | "invalid_length"
  | "invalid_checksum"
  | "conversion_failed"
  | "decode_failed";

/**
 * Base class for parse, validation and conversion failures.
 * Domain functions return these inside a `GtinResult` instead of throwing.
 */
export abstract class GtinError extends GtinInspectorError {
  abstract readonly kind: GtinErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GtinError";
  }
}

/** The extracted digit count is not a supported GTIN length. */
export class InvalidLengthError extends GtinError {
  readonly kind = "invalid_length";
  public readonly length: number;

  constructor(length: number, options?: ErrorOptions) {
    super(`unsupported GTIN length: ${length}`, options);
    this.name = "InvalidLengthError";
    this.length = length;
  }
}

/** The trailing digit does not match the mod-10 check digit. */
export class InvalidChecksumError extends GtinError {
  readonly kind = "invalid_checksum";

  constructor(options?: ErrorOptions) {
    super("invalid GTIN checksum", options);
    this.name = "InvalidChecksumError";
  }
}

/** A conversion between GTIN formats could not be carried out. */
export class ConversionFailedError extends GtinError {
  readonly kind = "conversion_failed";
  public readonly reason: string;

  constructor(reason: string, options?: ErrorOptions) {
    super(`GTIN conversion failed: ${reason}`, options);
    this.name = "ConversionFailedError";
    this.reason = reason;
  }
}

/** An interchange payload held something other than a GTIN string. */
export class GtinDecodeError extends GtinError {
  readonly kind = "decode_failed";

  constructor(received: string, options?: ErrorOptions) {
    super(`expected a GTIN string, received ${received}`, options);
    this.name = "GtinDecodeError";
  }
}

// ── API errors ──────────────────────────────────────────────────────────────

/** User-supplied input failed GTIN validation. */
export class GtinValidationError extends GtinInspectorError {
  public readonly rawInput: string;
  public readonly gtinError: GtinError;

  constructor(rawInput: string, gtinError: GtinError) {
    super(`Invalid GTIN "${rawInput}": ${gtinError.message}`, {
      cause: gtinError,
    });
    this.name = "GtinValidationError";
    this.rawInput = rawInput;
    this.gtinError = gtinError;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends GtinInspectorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
