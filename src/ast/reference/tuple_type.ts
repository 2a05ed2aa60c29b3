import { ABITypeKind } from "../../constants";
import { TypeNode, TypeNodeWithChildren } from "../type_node";

export abstract class TupleLikeType extends TypeNodeWithChildren {
  constructor(members: TypeNode[]) {
    super();

    for (const member of members) {
      this.appendChild(member);
    }
  }

  get vMembers(): readonly TypeNode[] {
    return this.ownChildren;
  }

  get canonicalName(): string {
    return this.signatureInExternalFunction(true);
  }

  get isDynamicallyEncoded(): boolean {
    return this.ownChildren.some((m) => m.isDynamicallyEncoded);
  }

  get calldataEncodedSize(): number {
    if (this.isDynamicallyEncoded) {
      throw Error(`Can not read calldata size of dynamically encoded ${this.canonicalName}`);
    }
    return this.ownChildren.reduce((sum, member) => sum + member.calldataEncodedSize, 0);
  }

  get calldataEncodedTailSize(): number {
    if (!this.isDynamicallyEncoded) {
      throw Error(`Can not read calldata tail of statically encoded ${this.canonicalName}`);
    }
    return this.embeddedCalldataHeadSize;
  }

  signatureInExternalFunction(structsByName: boolean): string {
    const memberTypeStrings = this.children.map((c) =>
      c.signatureInExternalFunction(structsByName)
    );
    return "(" + memberTypeStrings.join(",") + ")";
  }

  /**
   * Get a list of names for the tuple members, using `base<index>` for unnamed members
   * @param base Base text to use for members without names, suffixed with index
   */
  getParamNames(base: string): string[] {
    return this.vMembers.map(
      (member, i) => member.labelFromParent ?? (this.vMembers.length > 1 ? `${base}${i}` : base)
    );
  }

  readonly isDynamicallySized = false;
  readonly exactBits = undefined;
}

export class TupleType extends TupleLikeType {
  readonly kind = ABITypeKind.Tuple;

  copy(): TupleType {
    const tuple = new TupleType(
      this.ownChildren.map((member) => {
        const copy = member.copy();
        copy.labelFromParent = member.labelFromParent;
        return copy;
      })
    );
    tuple.labelFromParent = this.labelFromParent;
    return tuple;
  }

  pp(): string {
    const memberTypeStrings = this.children.map((c) => c.pp());
    return "(" + memberTypeStrings.join(", ") + ")";
  }
}
