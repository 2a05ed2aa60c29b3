import assert from "assert";
import { ABITypeKind } from "../constants";
import {
  ArrayType,
  BytesType,
  StringType,
  StructType,
  TupleType,
  UReferenceType
} from "./reference";
import { TypeNode } from "./type_node";
import {
  AddressType,
  BoolType,
  EnumType,
  FixedBytesType,
  IntegerType,
  UValueType
} from "./value";

export const PossibleABITypes = [
  AddressType,
  BoolType,
  EnumType,
  FixedBytesType,
  IntegerType,
  ArrayType,
  BytesType,
  StringType,
  StructType,
  TupleType
];

export const isUABIType = (type: TypeNode): type is UReferenceType | UValueType =>
  PossibleABITypes.some((ctor) => type instanceof ctor);

/**
 * Dispatches on the kind of an ABI type. `Args` are forwarded unchanged to the
 * visit function of the matching kind.
 */
export abstract class DefaultVisitor<R, Args extends unknown[] = []> {
  visit(type: TypeNode, ...args: Args): R {
    assert(isUABIType(type), `Expected UABIType, got ${type.constructor.name}`);

    switch (type.kind) {
      case ABITypeKind.Integer:
        return this.visitInteger(type, ...args);
      case ABITypeKind.Address:
        return this.visitAddress(type, ...args);
      case ABITypeKind.Bool:
        return this.visitBool(type, ...args);
      case ABITypeKind.Enum:
        return this.visitEnum(type, ...args);
      case ABITypeKind.FixedBytes:
        return this.visitFixedBytes(type, ...args);
      case ABITypeKind.Bytes:
        return this.visitBytes(type, ...args);
      case ABITypeKind.String:
        return this.visitString(type, ...args);
      case ABITypeKind.Array:
        return this.visitArray(type, ...args);
      case ABITypeKind.Tuple:
        return this.visitTuple(type, ...args);
      case ABITypeKind.Struct:
        return this.visitStruct(type, ...args);
    }
  }

  abstract visitInteger(type: IntegerType, ...args: Args): R;

  abstract visitAddress(type: AddressType, ...args: Args): R;

  abstract visitBool(type: BoolType, ...args: Args): R;

  abstract visitEnum(type: EnumType, ...args: Args): R;

  abstract visitFixedBytes(type: FixedBytesType, ...args: Args): R;

  abstract visitBytes(type: BytesType, ...args: Args): R;

  abstract visitString(type: StringType, ...args: Args): R;

  abstract visitArray(type: ArrayType, ...args: Args): R;

  abstract visitTuple(type: TupleType | StructType, ...args: Args): R;

  visitStruct(type: StructType, ...args: Args): R {
    return this.visitTuple(type, ...args);
  }
}
