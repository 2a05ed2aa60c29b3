import { Utf8ErrorFuncs, toUtf8String } from "@ethersproject/strings";
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
import { DecodeMode, WORD_SIZE } from "../constants";
import {
  Logger,
  NoopLogger,
  bigIntToWord,
  bytesToBigInt,
  maxUint,
  roundUpToWord,
  signExtend,
  toHex
} from "../utils";
import { DecodeFailureKind, DecodeResult, failure, success, withPathSegment } from "./errors";
import { AbiValue } from "./values";

export type DecodeOptions = {
  mode?: DecodeMode;
  logger?: Logger;
};

const ADDRESS_MASK = maxUint(160);
const LOW_BYTE_MASK = maxUint(8);

/**
 * Decodes ABI encoded data. Every visit function receives the byte position where the
 * encoding of the visited type starts: its head slot for static types, the start of its
 * tail for dynamic types.
 *
 * The decoder is created for a single buffer and holds no other state. The decode mode
 * only matters for scalar validation and for the two places where lenient decoding
 * accepts short data:
 * - a trailing word that is cut off by the end of the data is read zero-padded
 * - the payload of `bytes` and `string` does not need its padding to be present
 */
export class AbiDecoder extends DefaultVisitor<DecodeResult<AbiValue>, [start: number]> {
  readonly mode: DecodeMode;
  protected readonly logger: Logger;

  constructor(protected readonly data: Uint8Array, options: DecodeOptions = {}) {
    super();
    this.mode = options.mode ?? DecodeMode.Strict;
    this.logger = options.logger ?? new NoopLogger();
  }

  get strict(): boolean {
    return this.mode === DecodeMode.Strict;
  }

  /**
   * Decodes a parameter list, treating the whole buffer as the region its
   * offsets are relative to.
   */
  decodeParameters(types: readonly TypeNode[]): DecodeResult<AbiValue[]> {
    const headSize = types.reduce((sum, type) => sum + type.calldataHeadSize, 0);
    if (this.data.length === 0 && headSize > 0) {
      return failure(
        DecodeFailureKind.EmptyData,
        0,
        `expected ${types.length} value(s) but the data is empty`
      );
    }
    return this.decodeSequence(
      types.length,
      (i) => types[i],
      0,
      (i) => `[${i}]`
    );
  }

  /**
   * Decodes the value of `type` whose head slot is at `headOffset`. Offsets read from
   * dynamic heads are relative to `base`.
   */
  decodeAt(type: TypeNode, headOffset: number, base: number): DecodeResult<AbiValue> {
    if (!type.isDynamicallyEncoded) {
      return this.visit(type, headOffset);
    }
    const pointer = this.readWord(headOffset);
    if (!pointer.ok) return pointer;

    const tail = this.resolvePointer(type, base, pointer.value, headOffset);
    if (!tail.ok) return tail;

    return this.visit(type, tail.value);
  }

  /**
   * Reads the word at `offset`.
   */
  protected readWord(offset: number): DecodeResult<bigint> {
    const end = offset + WORD_SIZE;
    if (offset >= 0 && end <= this.data.length) {
      return success(bytesToBigInt(this.data.subarray(offset, end)));
    }
    if (!this.strict && offset >= 0 && offset < this.data.length) {
      const word = new Uint8Array(WORD_SIZE);
      word.set(this.data.subarray(offset));
      return success(bytesToBigInt(word));
    }
    return failure(
      DecodeFailureKind.OutOfBounds,
      offset,
      `word at ${offset} exceeds data length ${this.data.length}`
    );
  }

  /**
   * Returns the start of the tail `pointer` refers to, after checking that the minimum
   * tail size of `type` fits in the data.
   */
  protected resolvePointer(
    type: TypeNode,
    base: number,
    pointer: bigint,
    headOffset: number
  ): DecodeResult<number> {
    const tail = BigInt(base) + pointer;
    const minimumSize = BigInt(type.calldataEncodedTailSize);
    if (tail + minimumSize > BigInt(this.data.length)) {
      return failure(
        DecodeFailureKind.OutOfBounds,
        headOffset,
        `offset ${toHex(pointer)} of ${type.canonicalName} points outside of the data`
      );
    }
    this.logger.log(`${type.canonicalName}: head ${headOffset} -> tail ${tail}`);
    return success(Number(tail));
  }

  /**
   * Decodes `count` members laid out head to head from `start`. Dynamic members are
   * resolved relative to `start`.
   */
  protected decodeSequence(
    count: number,
    memberAt: (index: number) => TypeNode,
    start: number,
    segmentAt: (index: number) => string
  ): DecodeResult<AbiValue[]> {
    const values: AbiValue[] = [];
    let head = start;
    for (let i = 0; i < count; i++) {
      const member = memberAt(i);
      const result = withPathSegment(this.decodeAt(member, head, start), segmentAt(i));
      if (!result.ok) return result;
      values.push(result.value);
      head += member.calldataHeadSize;
    }
    return success(values);
  }

  visitInteger(type: IntegerType, start: number): DecodeResult<AbiValue> {
    const word = this.readWord(start);
    if (!word.ok) return word;

    if (this.strict) {
      const value = type.signed ? signExtend(word.value, 256) : word.value;
      if (!type.fits(value)) {
        return failure(
          DecodeFailureKind.InvalidPadding,
          start,
          `${toHex(word.value)} is not a valid ${type.canonicalName}`
        );
      }
      return success(value);
    }
    if (type.signed) {
      return success(signExtend(word.value, type.exactBits));
    }
    return success(word.value & maxUint(type.exactBits));
  }

  visitAddress(_type: AddressType, start: number): DecodeResult<AbiValue> {
    const word = this.readWord(start);
    if (!word.ok) return word;
    return success(`0x${(word.value & ADDRESS_MASK).toString(16).padStart(40, "0")}`);
  }

  visitBool(_type: BoolType, start: number): DecodeResult<AbiValue> {
    const word = this.readWord(start);
    if (!word.ok) return word;
    if (this.strict && word.value > 1n) {
      return failure(
        DecodeFailureKind.InvalidBoolean,
        start,
        `${toHex(word.value)} is not a valid bool`
      );
    }
    return success(word.value !== 0n);
  }

  visitEnum(type: EnumType, start: number): DecodeResult<AbiValue> {
    const word = this.readWord(start);
    if (!word.ok) return word;
    if (!this.strict) {
      return success(Number(word.value & LOW_BYTE_MASK));
    }
    if (word.value >= BigInt(type.memberCount)) {
      return failure(
        DecodeFailureKind.InvalidEnumValue,
        start,
        `${toHex(word.value)} is not a member of ${type.name}`
      );
    }
    return success(Number(word.value));
  }

  visitFixedBytes(type: FixedBytesType, start: number): DecodeResult<AbiValue> {
    const word = this.readWord(start);
    if (!word.ok) return word;
    return success(bigIntToWord(word.value).slice(0, type.size));
  }

  visitBytes(_type: BytesType, start: number): DecodeResult<AbiValue> {
    return this.decodeByteArray(start);
  }

  visitString(_type: StringType, start: number): DecodeResult<AbiValue> {
    const bytes = this.decodeByteArray(start);
    if (!bytes.ok) return bytes;
    return success(toUtf8String(bytes.value, Utf8ErrorFuncs.replace));
  }

  protected decodeByteArray(start: number): DecodeResult<Uint8Array> {
    const length = this.readWord(start);
    if (!length.ok) return length;

    const dataStart = start + WORD_SIZE;
    const requiredSize = this.strict ? roundUpToWord(length.value) : length.value;
    if (BigInt(dataStart) + requiredSize > BigInt(this.data.length)) {
      return failure(
        DecodeFailureKind.DataOutOfBounds,
        start,
        `length ${toHex(length.value)} exceeds the remaining ${Math.max(
          this.data.length - dataStart,
          0
        )} bytes`
      );
    }
    return success(this.data.slice(dataStart, dataStart + Number(length.value)));
  }

  visitArray(type: ArrayType, start: number): DecodeResult<AbiValue> {
    const baseType = type.baseType;
    const segmentAt = (i: number) => `[${i}]`;

    if (type.length !== undefined) {
      return this.decodeSequence(type.length, () => baseType, start, segmentAt);
    }

    const length = this.readWord(start);
    if (!length.ok) return length;

    const elementsStart = start + WORD_SIZE;
    const requiredSize = length.value * BigInt(type.calldataStride);
    // Elements of empty tuples take no space, so their count is bounded by the data length
    const exceedsData =
      type.calldataStride === 0
        ? length.value > BigInt(this.data.length)
        : BigInt(elementsStart) + requiredSize > BigInt(this.data.length);
    if (exceedsData) {
      return failure(
        DecodeFailureKind.OutOfBounds,
        start,
        `length ${toHex(length.value)} of ${type.canonicalName} exceeds the data`
      );
    }
    return this.decodeSequence(Number(length.value), () => baseType, elementsStart, segmentAt);
  }

  visitTuple(type: TupleType | StructType, start: number): DecodeResult<AbiValue> {
    const members = type.vMembers;
    return this.decodeSequence(
      members.length,
      (i) => members[i],
      start,
      (i) => {
        const label = members[i].labelFromParent;
        return label ? `.${label}` : `[${i}]`;
      }
    );
  }
}
