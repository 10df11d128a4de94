export type InlayErrorCode = "validation" | "invalid-argument" | "unavailable";

export class InlayError extends Error {
  readonly code: InlayErrorCode;

  constructor(code: InlayErrorCode, message: string) {
    super(message);
    this.name = "InlayError";
    this.code = code;
  }
}

/** A value handed to the editor (by the IME, a formatter or the host) is malformed. */
export class ValidationError extends InlayError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

export class InvalidArgumentError extends InlayError {
  constructor(message: string) {
    super("invalid-argument", message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Raised (or returned) when a measurement cannot be answered without a full
 * layout, e.g. a dry layout of baseline-aligned inline content.
 */
export class UnavailableError extends InlayError {
  constructor(message: string) {
    super("unavailable", message);
    this.name = "UnavailableError";
  }
}
