import assert from "assert";
import { ABITypeKind, WORD_SIZE } from "../constants";
import { Node } from "./node";

export abstract class TypeNode extends Node<TypeNode> {
  parent?: TypeNodeWithChildren;

  abstract readonly kind: ABITypeKind;

  labelFromParent?: string;

  /** @returns an unattached copy of this type. Labels of members are kept. */
  abstract copy(): TypeNode;

  pp(): string {
    return [this.canonicalName, this.labelFromParent].filter(Boolean).join(" ");
  }

  get calldataHeadOffset(): number {
    return this.parent?.calldataOffsetOfChild(this) ?? 0;
  }

  // ======================================================================//
  //                            Encoding Size                              //
  // ======================================================================//

  /**
   * @returns number of bytes used by this type when ABI encoded. Cannot be used for
   * dynamically encoded types.
   * Always returns a multiple of 32 and throws if the type is dynamically encoded.
   */
  abstract readonly calldataEncodedSize: number;

  /**
   * @returns the minimal size of the tail for this type. Can only be used for
   * dynamically encoded types. For dynamically-sized arrays, bytes and strings this is 32
   * (the size of the length), for statically-sized but dynamically encoded arrays this is
   * 32*length, for tuples this is the sum of the calldataHeadSize's of its members.
   * Throws if the type is not dynamically encoded.
   */
  abstract readonly calldataEncodedTailSize: number;

  /**
   * @returns the distance between two elements of this type in an array or tuple.
   * For statically encoded types this is the same as calldataEncodedSize.
   * For dynamically encoded types this is the size of a tail pointer, i.e. 32.
   */
  get calldataHeadSize(): number {
    return this.isDynamicallyEncoded ? WORD_SIZE : this.calldataEncodedSize;
  }

  /** @returns true if the type is a dynamic array, bytes or string */
  abstract readonly isDynamicallySized: boolean;

  /** @returns true if the type is dynamically encoded in the ABI */
  abstract readonly isDynamicallyEncoded: boolean;

  /** @returns bits required to represent the data, irrespective of ABI encoding rules */
  abstract readonly exactBits: number | undefined;

  /**
   * @returns the signature of this type in external functions, i.e. `uint256` for integers
   * or `(uint256,bytes8)[2]` for an array of tuples. If `structsByName` is set, structs
   * and enums are given by name.
   */
  abstract signatureInExternalFunction(structsByName: boolean): string;

  /** @returns the canonical ABI name of this type. */
  abstract readonly canonicalName: string;
}

export abstract class TypeNodeWithChildren extends TypeNode {
  protected ownChildren: TypeNode[] = [];

  get children(): readonly TypeNode[] {
    return this.ownChildren;
  }

  /**
   * Attaches `node`, or a copy of it if it already belongs to another type, so that
   * head offsets are always computed from a single parent.
   */
  protected appendChild(node: TypeNode): TypeNode {
    const child = node.parent === undefined ? node : node.copy();
    child.labelFromParent = node.labelFromParent;
    child.parent = this;
    this.ownChildren.push(child);
    return child;
  }

  requireIndexOfChild(node: TypeNode): number {
    const index = this.ownChildren.findIndex((child) => child === node);
    if (index === -1) {
      throw new Error("Reference node is not a child of current node");
    }
    return index;
  }

  requireFindChildIndex(indexOrNameOrNode: string | number | TypeNode): number {
    if (typeof indexOrNameOrNode === "number") {
      assert(
        indexOrNameOrNode >= 0 && indexOrNameOrNode < this.ownChildren.length,
        `Index out of bounds: ${indexOrNameOrNode}`
      );
      return indexOrNameOrNode;
    }
    if (typeof indexOrNameOrNode === "string") {
      const index = this.ownChildren.findIndex((c) => c.labelFromParent === indexOrNameOrNode);
      if (index === -1) {
        throw new Error(`Member ${indexOrNameOrNode} not found`);
      }
      return index;
    }
    return this.requireIndexOfChild(indexOrNameOrNode);
  }

  get embeddedCalldataHeadSize(): number {
    return this.ownChildren.reduce((sum, child) => sum + child.calldataHeadSize, 0);
  }

  calldataOffsetOfChild(indexOrNameOrNode: string | number | TypeNode): number {
    const index = this.requireFindChildIndex(indexOrNameOrNode);
    let offset = 0;
    for (let i = 0; i < index; i++) {
      offset += this.ownChildren[i].calldataHeadSize;
    }
    return offset;
  }
}
