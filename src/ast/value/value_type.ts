import { WORD_SIZE } from "../../constants";
import { TypeNode } from "../type_node";

export abstract class ValueType extends TypeNode {
  readonly calldataEncodedSize = WORD_SIZE;

  readonly isDynamicallyEncoded = false;

  readonly isDynamicallySized = false;

  abstract exactBits: number;

  signatureInExternalFunction(_structsByName: boolean): string {
    return this.canonicalName;
  }

  get calldataEncodedTailSize(): number {
    throw Error(`Value types do not have calldata tail`);
  }

  /// Maximum value (inclusive) of the word holding this type, once cleaned.
  abstract max(): bigint;

  /// Minimum value (inclusive) of the word holding this type, once cleaned.
  abstract min(): bigint;

  fits(literal: bigint): boolean {
    return literal <= this.max() && literal >= this.min();
  }
}
