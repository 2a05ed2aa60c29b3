import assert from "assert";
import { ABITypeKind, WORD_SIZE } from "../../constants";
import { TypeNode, TypeNodeWithChildren } from "../type_node";

export class ArrayType extends TypeNodeWithChildren {
  readonly kind = ABITypeKind.Array;
  readonly exactBits = undefined;
  baseType: TypeNode;
  length: number | undefined;

  constructor(baseType: TypeNode, length: number | undefined) {
    super();
    assert(
      length === undefined || (Number.isSafeInteger(length) && length > 0),
      `Invalid array length: ${length}`
    );
    this.baseType = this.appendChild(baseType);
    this.length = length;
  }

  copy(): ArrayType {
    const arr = new ArrayType(this.baseType.copy(), this.length);
    arr.labelFromParent = this.labelFromParent;
    return arr;
  }

  get isDynamicallyEncoded(): boolean {
    return this.isDynamicallySized || this.baseType.isDynamicallyEncoded;
  }

  get isDynamicallySized(): boolean {
    return this.length === undefined;
  }

  get canonicalName(): string {
    return this.signatureInExternalFunction(true);
  }

  /**
   * @returns The offset to advance in calldata to move from one array element to the next.
   */
  get calldataStride(): number {
    return this.baseType.calldataHeadSize;
  }

  get calldataEncodedSize(): number {
    if (this.isDynamicallyEncoded) {
      throw Error(`Can not read calldata size of dynamically encoded ${this.canonicalName}`);
    }
    return this.requireLength() * this.calldataStride;
  }

  get calldataEncodedTailSize(): number {
    if (!this.isDynamicallyEncoded) {
      throw Error(`Can not read calldata tail of statically encoded array`);
    }
    if (this.length === undefined) return WORD_SIZE;
    return this.length * this.calldataStride;
  }

  get embeddedCalldataHeadSize(): number {
    return this.requireLength() * this.calldataStride;
  }

  signatureInExternalFunction(structsByName: boolean): string {
    return (
      this.baseType.signatureInExternalFunction(structsByName) +
      "[" +
      (this.length === undefined ? "" : this.length) +
      "]"
    );
  }

  /**
   * Elements share a single child node, so a node argument resolves to the first element.
   */
  calldataOffsetOfChild(indexOrNameOrNode: string | number | TypeNode): number {
    if (typeof indexOrNameOrNode !== "number") return 0;
    return this.calldataStride * indexOrNameOrNode;
  }

  private requireLength(): number {
    if (this.length === undefined) {
      throw Error("Can not determine embedded head size for dynamically sized array");
    }
    return this.length;
  }
}
