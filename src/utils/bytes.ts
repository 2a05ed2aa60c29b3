import { arrayify, hexlify, isHexString } from "@ethersproject/bytes";
import { WORD_SIZE } from "../constants";

export type BytesLike = Uint8Array | string;

export const toHex = (n: number | bigint): string => {
  const bytes = n.toString(16);
  return `0x${"0".repeat(bytes.length % 2)}${bytes}`;
};

export const BI_ONE = BigInt(1);
export const BI_TWO = BigInt(2);
export const maxUint = (bits: number): bigint => BI_TWO ** BigInt(bits) - BI_ONE;

export const WORD_MASK = maxUint(WORD_SIZE * 8);

/** Rounds `size` up to the next multiple of the word size. */
export const roundUpToWord = (size: bigint): bigint => {
  const word = BigInt(WORD_SIZE);
  return ((size + word - BI_ONE) / word) * word;
};

/**
 * Converts a bigint into a big-endian 32 byte word. Negative values are written
 * in two's complement.
 */
export function bigIntToWord(value: bigint): Uint8Array {
  const unsigned = value < 0n ? (value + WORD_MASK + BI_ONE) & WORD_MASK : value;
  if (unsigned > WORD_MASK) {
    throw new Error(`Value ${value} does not fit in a word`);
  }
  return arrayify(`0x${unsigned.toString(16).padStart(WORD_SIZE * 2, "0")}`);
}

export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  return BigInt(hexlify(bytes));
}

/** Interprets the low `bits` bits of `value` as a two's complement integer. */
export function signExtend(value: bigint, bits: number): bigint {
  const low = value & maxUint(bits);
  return low >> BigInt(bits - 1) === BI_ONE ? low - BI_TWO ** BigInt(bits) : low;
}

export function toBytes(data: BytesLike): Uint8Array {
  if (typeof data === "string") {
    if (!isHexString(data) || data.length % 2 !== 0) {
      throw new Error(`Invalid hex string: ${data}`);
    }
    return arrayify(data);
  }
  return data;
}

export const bytesToHex = (bytes: Uint8Array): string => hexlify(bytes);

export const isNumeric = (value: unknown): value is number | string =>
  typeof value === "number" ||
  (typeof value === "string" && !!value.match(/^(-?[0-9]+|0x[0-9a-fA-F]+)$/));
