import { TypeNode } from "./type_node";
import { ArrayType, BytesType, StringType, StructType, TupleType } from "./reference";
import { AddressType, BoolType, EnumType, FixedBytesType, IntegerType } from "./value";

export class TypeProvider {
  static uint(bits = 256): IntegerType {
    return new IntegerType(bits, false);
  }

  static int(bits = 256): IntegerType {
    return new IntegerType(bits, true);
  }

  static address(): AddressType {
    return new AddressType();
  }

  static bool(): BoolType {
    return new BoolType();
  }

  static fixedBytes(size: number): FixedBytesType {
    return new FixedBytesType(size);
  }

  static bytes(): BytesType {
    return new BytesType();
  }

  static string(): StringType {
    return new StringType();
  }

  static enum(name: string, members: string[]): EnumType {
    return new EnumType(name, members);
  }

  static array(baseType: TypeNode, length?: number): ArrayType {
    return new ArrayType(baseType, length);
  }

  static tuple(...members: TypeNode[]): TupleType {
    return new TupleType(members);
  }

  static struct(name: string, members: Record<string, TypeNode>): StructType {
    return new StructType(
      Object.entries(members).map(([label, member]) => {
        const copy = member.copy();
        copy.labelFromParent = label;
        return copy;
      }),
      name
    );
  }
}
