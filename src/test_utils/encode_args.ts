import { concat } from "@ethersproject/bytes";
import { toUtf8Bytes } from "@ethersproject/strings";
import { bigIntToWord, roundUpToWord } from "../utils";

export type RawArg = number | bigint | string | Uint8Array;

/**
 * Builds raw call data word by word. Numbers become big-endian words (negative numbers
 * in two's complement), strings are written left-aligned and zero-padded to a multiple
 * of 32 bytes, and byte arrays are appended exactly as given.
 */
export function encodeArgs(...args: RawArg[]): Uint8Array {
  return concat(
    args.map((arg) => {
      if (typeof arg === "number" || typeof arg === "bigint") {
        return bigIntToWord(BigInt(arg));
      }
      if (typeof arg === "string") {
        const text = toUtf8Bytes(arg);
        const padded = new Uint8Array(Number(roundUpToWord(BigInt(Math.max(text.length, 1)))));
        padded.set(text);
        return padded;
      }
      return arg;
    })
  );
}

/** `n` zero bytes. */
export const zeros = (n: number): Uint8Array => new Uint8Array(n);

