import assert from "assert";
import { ABITypeKind } from "../../constants";
import { ValueType } from "./value_type";

export class FixedBytesType extends ValueType {
  readonly kind = ABITypeKind.FixedBytes;
  size: number;

  constructor(size: number) {
    super();
    assert(Number.isInteger(size) && size >= 1 && size <= 32, `Invalid bytes size: ${size}`);
    this.size = size;
  }

  copy(): FixedBytesType {
    return new FixedBytesType(this.size);
  }

  get exactBits(): number {
    return this.size * 8;
  }

  get canonicalName(): string {
    return `bytes${this.size}`;
  }

  min(): bigint {
    return 0n;
  }

  max(): bigint {
    return 2n ** BigInt(this.exactBits) - 1n;
  }
}
