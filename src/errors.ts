/**
 * Error taxonomy of the codec layer.
 *
 * Every codec or adaptation operation either returns a complete result or
 * throws one of these. None of them is transient: the same bytes always
 * produce the same failure, so callers skip or report the item instead of
 * retrying.
 */

export type SysexErrorKind =
  | "InvalidMessageType"
  | "MalformedFraming"
  | "UnsupportedCharacter"
  | "IncompatibleConversion"
  | "UnknownAddress";

export class SysexError extends Error {
  readonly kind: SysexErrorKind;

  constructor(kind: SysexErrorKind, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

/** Header, type selector or end marker do not match what was expected. */
export class InvalidMessageTypeError extends SysexError {
  constructor(message: string) {
    super("InvalidMessageType", message);
  }
}

/** Unexpected length, wrong number of packets, bad checksum or empty data block. */
export class MalformedFramingError extends SysexError {
  constructor(message: string) {
    super("MalformedFraming", message);
  }
}

/** A name contains a character the device's character table cannot store. */
export class UnsupportedCharacterError extends SysexError {
  readonly character: string;

  constructor(character: string, text: string) {
    super("UnsupportedCharacter", `Unsupported character "${character}" in name "${text}"`);
    this.character = character;
  }
}

/** Edit-buffer/program-dump conversion requested for a message that is neither. */
export class IncompatibleConversionError extends SysexError {
  constructor(message: string) {
    super("IncompatibleConversion", message);
  }
}

/** A program number was requested from a message that carries no location. */
export class UnknownAddressError extends SysexError {
  constructor(message: string) {
    super("UnknownAddress", message);
  }
}

export function isSysexError(err: unknown): err is SysexError {
  return err instanceof SysexError;
}

/**
 * Render any thrown value as a one-line message, prefixed with the error
 * kind for codec errors.
 */
export function describeError(err: unknown): string {
  if (isSysexError(err)) {
    return `${err.kind}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}
