/**
 * A backend reached a cap or join variant it has no encoding for.
 * Only values that slip past the type system can get here.
 */
export class UnsupportedStyleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedStyleError";
  }
}

/** Writing to an output sink failed. Output already written is not rolled back. */
export class ExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportError";
  }
}

/** Exhaustive-switch guard for the closed style variant sets. */
export function unsupportedStyle(value: never, what: string): never {
  throw new UnsupportedStyleError(`${what} not supported: ${JSON.stringify(value)}`);
}
