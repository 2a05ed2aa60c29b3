import { TypeNode } from "../type_node";

/**
 * Base class used by dynamically sized types without children: byte arrays and strings.
 */
export abstract class ReferenceType extends TypeNode {
  signatureInExternalFunction(_structsByName: boolean): string {
    return this.canonicalName;
  }
}
