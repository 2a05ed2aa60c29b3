import assert from "assert";
import { ABITypeKind } from "../../constants";
import { ValueType } from "./value_type";

export class EnumType extends ValueType {
  readonly kind = ABITypeKind.Enum;
  name: string;
  members: string[];

  constructor(name: string, members: string[]) {
    super();
    assert(
      members.length > 0 && members.length <= 256,
      `Enum ${name} must have between 1 and 256 members`
    );
    this.name = name;
    this.members = members;
  }

  copy(): EnumType {
    return new EnumType(this.name, [...this.members]);
  }

  get memberCount(): number {
    return this.members.length;
  }

  get exactBits(): number {
    return 8;
  }

  signatureInExternalFunction(structsByName: boolean): string {
    if (structsByName) return this.name;
    return "uint8";
  }

  get canonicalName(): string {
    return this.name;
  }

  min(): bigint {
    return 0n;
  }

  max(): bigint {
    return BigInt(this.members.length - 1);
  }
}
