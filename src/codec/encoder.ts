import { concat, isHexString } from "@ethersproject/bytes";
import { toUtf8Bytes } from "@ethersproject/strings";
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
  TypeNode,
  ValueType
} from "../ast";
import { WORD_SIZE } from "../constants";
import { bigIntToWord, roundUpToWord, toBytes } from "../utils";
import { AbiEncodingError } from "./errors";
import { AbiInputValue } from "./values";

const isValueList = (value: AbiInputValue): value is readonly AbiInputValue[] =>
  Array.isArray(value);

/**
 * Encodes values into the ABI format. Static values are written in place; dynamic
 * values are appended after the heads of their enclosing tuple or array, with their
 * head slot holding the offset of their encoding from the start of the enclosing heads.
 *
 * The second visit argument is the path of the value, used in error messages only.
 */
export class AbiEncoder extends DefaultVisitor<Uint8Array, [value: AbiInputValue, path: string]> {
  encodeParameters(types: readonly TypeNode[], values: readonly AbiInputValue[]): Uint8Array {
    if (types.length !== values.length) {
      throw new AbiEncodingError(`Expected ${types.length} values, got ${values.length}`);
    }
    return this.encodeSequence(
      types.length,
      (i) => types[i],
      values,
      (i) => `[${i}]`,
      ""
    );
  }

  protected encodeSequence(
    count: number,
    memberAt: (index: number) => TypeNode,
    values: readonly AbiInputValue[],
    segmentAt: (index: number) => string,
    path: string
  ): Uint8Array {
    let headSize = 0;
    for (let i = 0; i < count; i++) {
      headSize += memberAt(i).calldataHeadSize;
    }

    const heads: Uint8Array[] = [];
    const tails: Uint8Array[] = [];
    let tailOffset = headSize;
    for (let i = 0; i < count; i++) {
      const member = memberAt(i);
      const encoded = this.visit(member, values[i], path + segmentAt(i));
      if (member.isDynamicallyEncoded) {
        heads.push(bigIntToWord(BigInt(tailOffset)));
        tails.push(encoded);
        tailOffset += encoded.length;
      } else {
        heads.push(encoded);
      }
    }
    return concat([...heads, ...tails]);
  }

  protected requireInteger(type: ValueType, value: AbiInputValue, path: string): bigint {
    let n: bigint;
    if (typeof value === "bigint") {
      n = value;
    } else if (typeof value === "number" && Number.isSafeInteger(value)) {
      n = BigInt(value);
    } else {
      throw new AbiEncodingError(`Expected an integer for ${type.canonicalName}`, path);
    }
    if (!type.fits(n)) {
      throw new AbiEncodingError(`${n} is out of range for ${type.canonicalName}`, path);
    }
    return n;
  }

  protected requireBytes(type: TypeNode, value: AbiInputValue, path: string): Uint8Array {
    if (value instanceof Uint8Array) return value;
    if (typeof value === "string" && isHexString(value) && value.length % 2 === 0) {
      return toBytes(value);
    }
    throw new AbiEncodingError(`Expected bytes or a hex string for ${type.canonicalName}`, path);
  }

  protected requireList(
    type: TypeNode,
    value: AbiInputValue,
    path: string,
    length?: number
  ): readonly AbiInputValue[] {
    if (!isValueList(value)) {
      throw new AbiEncodingError(`Expected an array for ${type.canonicalName}`, path);
    }
    if (length !== undefined && value.length !== length) {
      throw new AbiEncodingError(
        `Expected ${length} values for ${type.canonicalName}, got ${value.length}`,
        path
      );
    }
    return value;
  }

  /** Length word followed by the data, right-padded to a multiple of 32 bytes. */
  protected encodeByteArray(data: Uint8Array): Uint8Array {
    const padded = new Uint8Array(Number(roundUpToWord(BigInt(data.length))));
    padded.set(data);
    return concat([bigIntToWord(BigInt(data.length)), padded]);
  }

  visitInteger(type: IntegerType, value: AbiInputValue, path: string): Uint8Array {
    return bigIntToWord(this.requireInteger(type, value, path));
  }

  visitAddress(type: AddressType, value: AbiInputValue, path: string): Uint8Array {
    if (typeof value === "string") {
      if (!isHexString(value, 20)) {
        throw new AbiEncodingError(`Invalid address ${value}`, path);
      }
      return bigIntToWord(BigInt(value));
    }
    return bigIntToWord(this.requireInteger(type, value, path));
  }

  visitBool(type: BoolType, value: AbiInputValue, path: string): Uint8Array {
    if (typeof value !== "boolean") {
      throw new AbiEncodingError(`Expected a boolean for ${type.canonicalName}`, path);
    }
    return bigIntToWord(value ? 1n : 0n);
  }

  visitEnum(type: EnumType, value: AbiInputValue, path: string): Uint8Array {
    return bigIntToWord(this.requireInteger(type, value, path));
  }

  visitFixedBytes(type: FixedBytesType, value: AbiInputValue, path: string): Uint8Array {
    const data = this.requireBytes(type, value, path);
    if (data.length > type.size) {
      throw new AbiEncodingError(
        `${data.length} bytes do not fit in ${type.canonicalName}`,
        path
      );
    }
    const word = new Uint8Array(WORD_SIZE);
    word.set(data);
    return word;
  }

  visitBytes(type: BytesType, value: AbiInputValue, path: string): Uint8Array {
    return this.encodeByteArray(this.requireBytes(type, value, path));
  }

  visitString(type: StringType, value: AbiInputValue, path: string): Uint8Array {
    if (typeof value !== "string") {
      throw new AbiEncodingError(`Expected a string for ${type.canonicalName}`, path);
    }
    return this.encodeByteArray(toUtf8Bytes(value));
  }

  visitArray(type: ArrayType, value: AbiInputValue, path: string): Uint8Array {
    const values = this.requireList(type, value, path, type.length);
    const elements = this.encodeSequence(
      values.length,
      () => type.baseType,
      values,
      (i) => `[${i}]`,
      path
    );
    if (type.length !== undefined) return elements;
    return concat([bigIntToWord(BigInt(values.length)), elements]);
  }

  visitTuple(type: TupleType | StructType, value: AbiInputValue, path: string): Uint8Array {
    const members = type.vMembers;
    const values = this.requireList(type, value, path, members.length);
    return this.encodeSequence(
      members.length,
      (i) => members[i],
      values,
      (i) => {
        const label = members[i].labelFromParent;
        return label ? `.${label}` : `[${i}]`;
      },
      path
    );
  }
}
