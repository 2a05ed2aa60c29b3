export enum DecodeFailureKind {
  /** No data at all where at least one value was expected. */
  EmptyData = "empty data",
  OutOfBounds = "out of bounds",
  DataOutOfBounds = "data out of bounds",
  InvalidPadding = "invalid padding",
  InvalidBoolean = "invalid boolean",
  InvalidEnumValue = "invalid enum value"
}

export type DecodeFailure = {
  kind: DecodeFailureKind;
  message: string;
  /** Byte position of the word that could not be decoded. */
  offset: number;
  /** Location of the failing value in the decoded tree, e.g. `$[1][0]`. */
  path: string;
};

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; failure: DecodeFailure };

export const success = <T>(value: T): DecodeResult<T> => ({ ok: true, value });

export const failure = <T>(
  kind: DecodeFailureKind,
  offset: number,
  message: string = kind
): DecodeResult<T> => ({ ok: false, failure: { kind, message, offset, path: "" } });

/**
 * Prefixes the path of a failed result with `segment`.
 * Successful results are returned as they are.
 */
export function withPathSegment<T>(result: DecodeResult<T>, segment: string): DecodeResult<T> {
  if (result.ok) return result;
  return { ok: false, failure: { ...result.failure, path: segment + result.failure.path } };
}

export function formatDecodeFailure({ kind, message, offset, path }: DecodeFailure): string {
  const location = `$${path} at offset ${offset}`;
  return message === kind ? `${kind}: ${location}` : `${kind}: ${message} (${location})`;
}

export class AbiDecodingError extends Error {
  readonly kind: DecodeFailureKind;
  readonly offset: number;
  readonly path: string;

  constructor(readonly failure: DecodeFailure) {
    super(formatDecodeFailure(failure));
    this.name = "AbiDecodingError";
    this.kind = failure.kind;
    this.offset = failure.offset;
    this.path = failure.path;
  }
}

/** Thrown for values that do not belong to the domain of the type they are encoded as. */
export class AbiEncodingError extends Error {
  constructor(message: string, readonly path = "") {
    super(path ? `${message} (at $${path})` : message);
    this.name = "AbiEncodingError";
  }
}
