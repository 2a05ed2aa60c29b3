import assert from "assert";
import { ABITypeKind } from "../../constants";
import { ValueType } from "./value_type";

export class IntegerType extends ValueType {
  readonly kind = ABITypeKind.Integer;
  exactBits: number;
  signed: boolean;

  constructor(exactBits: number, signed: boolean) {
    super();
    assert(
      exactBits >= 8 && exactBits <= 256 && exactBits % 8 === 0,
      `Invalid integer size: ${exactBits}`
    );
    this.exactBits = exactBits;
    this.signed = signed;
  }

  copy(): IntegerType {
    return new IntegerType(this.exactBits, this.signed);
  }

  /// Maximum value (inclusive) representable by this int type.
  max(): bigint {
    return 2n ** BigInt(this.signed ? this.exactBits - 1 : this.exactBits) - 1n;
  }

  /// Minimum value (inclusive) representable by this int type.
  min(): bigint {
    return this.signed ? -(2n ** BigInt(this.exactBits - 1)) : 0n;
  }

  get canonicalName(): string {
    return `${this.signed ? "" : "u"}int${this.exactBits}`;
  }
}
