import { TypeNode } from "../ast";
import { DecodeMode } from "../constants";
import { BytesLike, NoopLogger, toBytes } from "../utils";
import { AbiDecoder, DecodeOptions } from "./decoder";
import { AbiEncoder } from "./encoder";
import {
  AbiDecodingError,
  DecodeFailureKind,
  DecodeResult,
  failure,
  formatDecodeFailure
} from "./errors";
import { AbiInputValue, AbiValue } from "./values";

/**
 * Decodes a list of parameters from `data`, which is treated as a single region
 * with offsets relative to its first byte.
 */
export function decodeAll(
  data: BytesLike,
  types: readonly TypeNode[],
  options: DecodeOptions = {}
): DecodeResult<AbiValue[]> {
  const logger = options.logger ?? new NoopLogger();
  const result = new AbiDecoder(toBytes(data), { ...options, logger }).decodeParameters(types);
  if (!result.ok) {
    logger.log(`decode failed: ${formatDecodeFailure(result.failure)}`);
  }
  return result;
}

/**
 * Like `decodeAll`, but throws an `AbiDecodingError` if the data can not be decoded.
 */
export function decodeAllOrThrow(
  data: BytesLike,
  types: readonly TypeNode[],
  options: DecodeOptions = {}
): AbiValue[] {
  const result = decodeAll(data, types, options);
  if (!result.ok) {
    throw new AbiDecodingError(result.failure);
  }
  return result.value;
}

/**
 * Decodes a single value of `type` whose head slot is at `baseOffset`. Offsets are
 * relative to `baseOffset`.
 */
export function decode(
  data: BytesLike,
  baseOffset: number,
  type: TypeNode,
  mode: DecodeMode = DecodeMode.Strict
): DecodeResult<AbiValue> {
  if (!Number.isSafeInteger(baseOffset) || baseOffset < 0) {
    return failure(DecodeFailureKind.OutOfBounds, baseOffset, `invalid base offset ${baseOffset}`);
  }
  return new AbiDecoder(toBytes(data), { mode }).decodeAt(type, baseOffset, baseOffset);
}

export function encodeAll(
  values: readonly AbiInputValue[],
  types: readonly TypeNode[]
): Uint8Array {
  return new AbiEncoder().encodeParameters(types, values);
}

export function encode(value: AbiInputValue, type: TypeNode): Uint8Array {
  return encodeAll([value], [type]);
}
