import { ABITypeKind, WORD_SIZE } from "../../constants";
import { ReferenceType } from "./reference_type";

export abstract class PackedArrayType extends ReferenceType {
  readonly isDynamicallySized = true;
  readonly isDynamicallyEncoded = true;

  readonly exactBits = undefined;

  get calldataEncodedSize(): number {
    throw Error(`Can not read calldata size of dynamically encoded ${this.canonicalName}`);
  }

  get calldataEncodedTailSize(): number {
    return WORD_SIZE;
  }
}

export class BytesType extends PackedArrayType {
  readonly kind = ABITypeKind.Bytes;
  readonly canonicalName = "bytes";

  copy(): BytesType {
    return new BytesType();
  }
}

export class StringType extends PackedArrayType {
  readonly kind = ABITypeKind.String;
  readonly canonicalName = "string";

  copy(): StringType {
    return new StringType();
  }
}
