import { expect } from "chai";
import { readParameterTypes, readTypeNode } from "../readers";
import { ArrayType, TupleType } from "./reference";
import { TypeProvider } from "./type_provider";
import { IntegerType } from "./value";

describe("Type layout", function () {
  describe("Static types", function () {
    it("Value types take a single word", function () {
      const type = TypeProvider.uint(16);
      expect(type.isDynamicallyEncoded).to.eq(false);
      expect(type.calldataEncodedSize).to.eq(32);
      expect(type.calldataHeadSize).to.eq(32);
      expect(() => type.calldataEncodedTailSize).to.throw("Value types do not have calldata tail");
    });

    it("Fixed arrays of static types are stored in place", function () {
      const type = readTypeNode("uint256[3]");
      expect(type.isDynamicallyEncoded).to.eq(false);
      expect(type.calldataEncodedSize).to.eq(96);
      expect(type.calldataHeadSize).to.eq(96);
    });

    it("Static tuples sum their members", function () {
      const type = readTypeNode("(uint256,uint256[2],bool)");
      expect(type).to.be.instanceOf(TupleType);
      expect(type.calldataEncodedSize).to.eq(128);
      if (type instanceof TupleType) {
        expect(type.calldataOffsetOfChild(2)).to.eq(96);
      }
    });
  });

  describe("Dynamic types", function () {
    it("Dynamic arrays need their length word", function () {
      const type = readTypeNode("uint16[][]");
      expect(type.isDynamicallyEncoded).to.eq(true);
      expect(type.calldataHeadSize).to.eq(32);
      expect(type.calldataEncodedTailSize).to.eq(32);
      expect(() => type.calldataEncodedSize).to.throw("Can not read calldata size");
    });

    it("Fixed arrays of dynamic types need one head per element", function () {
      const type = readTypeNode("bytes[2]");
      expect(type.isDynamicallyEncoded).to.eq(true);
      expect(type.isDynamicallySized).to.eq(false);
      expect(type.calldataEncodedTailSize).to.eq(64);
    });

    it("Tuples with a dynamic member need all member heads", function () {
      const type = readTypeNode("(uint256,bytes)");
      expect(type.isDynamicallyEncoded).to.eq(true);
      expect(type.calldataEncodedTailSize).to.eq(64);
    });

    it("Bytes and strings need their length word", function () {
      expect(TypeProvider.bytes().calldataEncodedTailSize).to.eq(32);
      expect(TypeProvider.string().calldataEncodedTailSize).to.eq(32);
    });
  });

  it("Head offsets of parameters", function () {
    const params = readParameterTypes("uint256,bytes,uint256[2],bool");
    expect(params.vMembers.map((member) => member.calldataHeadOffset)).to.deep.eq([
      0, 32, 64, 128
    ]);
    expect(params.embeddedCalldataHeadSize).to.eq(160);
  });

  it("Array elements are spaced by the element head size", function () {
    const type = readTypeNode("(uint256,uint256)[3]");
    expect(type).to.be.instanceOf(ArrayType);
    if (type instanceof ArrayType) {
      expect(type.calldataStride).to.eq(64);
      expect(type.calldataOffsetOfChild(2)).to.eq(128);
    }
  });

  describe("Names", function () {
    it("Canonical names", function () {
      expect(readTypeNode("uint16[][]").canonicalName).to.eq("uint16[][]");
      expect(readTypeNode("(uint256,bytes)[2]").canonicalName).to.eq("(uint256,bytes)[2]");
      expect(TypeProvider.fixedBytes(3).canonicalName).to.eq("bytes3");
      expect(TypeProvider.int(24).canonicalName).to.eq("int24");
    });

    it("Enums are uint8 in signatures", function () {
      const type = TypeProvider.enum("Side", ["Buy", "Sell"]);
      expect(type.canonicalName).to.eq("Side");
      expect(type.signatureInExternalFunction(false)).to.eq("uint8");
      expect(type.max()).to.eq(1n);
    });

    it("Structs", function () {
      const struct = TypeProvider.struct("Order", {
        amount: TypeProvider.uint(),
        data: TypeProvider.bytes()
      });
      expect(struct.canonicalName).to.eq("Order");
      expect(struct.signatureInExternalFunction(false)).to.eq("(uint256,bytes)");
      expect(struct.writeDefinition()).to.eq(
        ["struct Order {", "  uint256 amount;", "  bytes data;", "}"].join("\n")
      );
      expect(struct.calldataOffsetOfChild("data")).to.eq(32);
    });

    it("Parameter names fall back to an indexed base name", function () {
      const params = readParameterTypes("uint256 amount,bool");
      expect(params.getParamNames("value")).to.deep.eq(["amount", "value1"]);
      expect(params.pp()).to.eq("(uint256 amount, bool)");
    });
  });

  it("Copies keep labels and do not share children", function () {
    const tuple = readParameterTypes("uint256 a,bytes b");
    const copy = tuple.copy();
    expect(copy.vMembers.map((member) => member.labelFromParent)).to.deep.eq(["a", "b"]);
    expect(copy.vMembers[0]).to.not.eq(tuple.vMembers[0]);
    expect(copy.vMembers[0].parent).to.eq(copy);
  });

  it("Members that already belong to a type are attached as copies", function () {
    const amount = TypeProvider.uint();
    amount.labelFromParent = "amount";
    const first = TypeProvider.tuple(TypeProvider.bool(), amount);
    const second = TypeProvider.tuple(amount);
    expect(first.vMembers[1]).to.eq(amount);
    expect(second.vMembers[0]).to.not.eq(amount);
    expect(second.vMembers[0].labelFromParent).to.eq("amount");
    expect(amount.calldataHeadOffset).to.eq(32);
    expect(second.vMembers[0].calldataHeadOffset).to.eq(0);
  });

  it("Struct members are labelled without changing the given types", function () {
    const amount = TypeProvider.uint();
    const order = TypeProvider.struct("Order", { open: TypeProvider.bool(), amount });
    expect(amount.labelFromParent).to.eq(undefined);
    expect(amount.parent).to.eq(undefined);
    expect(order.vMembers[1].labelFromParent).to.eq("amount");
    expect(order.vMembers[1].calldataHeadOffset).to.eq(32);
  });

  it("Rejects invalid widths", function () {
    expect(() => new IntegerType(7, false)).to.throw("Invalid integer size: 7");
    expect(() => TypeProvider.fixedBytes(33)).to.throw("Invalid bytes size: 33");
    expect(() => TypeProvider.array(TypeProvider.bool(), 0)).to.throw("Invalid array length: 0");
    expect(() => TypeProvider.enum("Empty", [])).to.throw("must have between 1 and 256 members");
  });
});
