import {
  AddressType,
  ArrayType,
  BoolType,
  BytesType,
  DefaultVisitor,
  EnumType,
  FixedBytesType,
  IntegerType,
  StringType,
  StructType,
  TupleType,
  TypeNode
} from "../ast";
import { AbiEncodingError, AbiInputValue } from "../codec";
import { isNumeric } from "../utils";

/**
 * Converts parsed JSON into encoder input for a given type. Integers may be given as
 * JSON numbers or as decimal or hex strings, byte values as hex strings.
 */
export class JsonValueReader extends DefaultVisitor<AbiInputValue, [json: unknown, path: string]> {
  readValues(types: readonly TypeNode[], json: unknown): AbiInputValue[] {
    const values = this.requireArray(json, "", types.length);
    return types.map((type, i) => this.visit(type, values[i], `[${i}]`));
  }

  protected requireArray(json: unknown, path: string, length?: number): unknown[] {
    if (!Array.isArray(json)) {
      throw new AbiEncodingError(`Expected a JSON array`, path);
    }
    if (length !== undefined && json.length !== length) {
      throw new AbiEncodingError(`Expected ${length} values, got ${json.length}`, path);
    }
    return json;
  }

  protected readInteger(json: unknown, path: string): bigint {
    if (typeof json === "number" && Number.isSafeInteger(json)) {
      return BigInt(json);
    }
    if (typeof json === "string" && isNumeric(json)) {
      return BigInt(json);
    }
    throw new AbiEncodingError(`Expected an integer, got ${JSON.stringify(json)}`, path);
  }

  protected readString(json: unknown, path: string): string {
    if (typeof json !== "string") {
      throw new AbiEncodingError(`Expected a string, got ${JSON.stringify(json)}`, path);
    }
    return json;
  }

  visitInteger(_type: IntegerType, json: unknown, path: string): AbiInputValue {
    return this.readInteger(json, path);
  }

  visitAddress(_type: AddressType, json: unknown, path: string): AbiInputValue {
    return this.readString(json, path);
  }

  visitBool(_type: BoolType, json: unknown, path: string): AbiInputValue {
    if (typeof json !== "boolean") {
      throw new AbiEncodingError(`Expected a boolean, got ${JSON.stringify(json)}`, path);
    }
    return json;
  }

  visitEnum(_type: EnumType, json: unknown, path: string): AbiInputValue {
    return this.readInteger(json, path);
  }

  visitFixedBytes(_type: FixedBytesType, json: unknown, path: string): AbiInputValue {
    return this.readString(json, path);
  }

  visitBytes(_type: BytesType, json: unknown, path: string): AbiInputValue {
    return this.readString(json, path);
  }

  visitString(_type: StringType, json: unknown, path: string): AbiInputValue {
    return this.readString(json, path);
  }

  visitArray(type: ArrayType, json: unknown, path: string): AbiInputValue {
    return this.requireArray(json, path, type.length).map((element, i) =>
      this.visit(type.baseType, element, `${path}[${i}]`)
    );
  }

  visitTuple(type: TupleType | StructType, json: unknown, path: string): AbiInputValue {
    const members = type.vMembers;
    return this.requireArray(json, path, members.length).map((member, i) =>
      this.visit(members[i], member, `${path}[${i}]`)
    );
  }
}
