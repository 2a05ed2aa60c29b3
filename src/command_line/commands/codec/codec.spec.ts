import { defaultAbiCoder } from "@ethersproject/abi";
import { hexlify } from "@ethersproject/bytes";
import { expect } from "chai";
import { readTypeNode } from "../../../readers";
import { encodeArgs } from "../../../test_utils/encode_args";
import { MARKET_ABI_PATH } from "../../../test_utils/fixtures";
import { BufferedLogger } from "../../../utils";
import { formatValue, stripANSI } from "../../format";
import { JsonValueReader } from "../../json_values";
import { resolveParameterTypes } from "../../utils";
import { runDecode } from "./decode";
import { runEncode } from "./encode";

const separator = (width: number) => "=".repeat(width);

describe("Codec commands", function () {
  describe("decode", function () {
    it("Prints a table of decoded values", function () {
      const data = hexlify(encodeArgs(5, 1));
      const output = runDecode({ types: "uint256,bool", data });
      expect(output.ok).to.eq(true);
      expect(output.lines).to.deep.eq([
        separator(28),
        "| name   | type    | value |",
        separator(28),
        "| value0 | uint256 | 5     |",
        "| value1 | bool    | true  |",
        separator(28)
      ]);
    });

    it("Prints the failure", function () {
      const output = runDecode({ types: "bool", data: hexlify(encodeArgs(2)) });
      expect(output.ok).to.eq(false);
      expect(output.lines.map(stripANSI)).to.deep.eq([
        "invalid boolean: 0x02 is not a valid bool ($[0] at offset 0)"
      ]);
    });

    it("Cleans values with --lenient", function () {
      const output = runDecode({ types: "bool flag", data: hexlify(encodeArgs(2)), lenient: true });
      expect(output.ok).to.eq(true);
      expect(output.lines[3]).to.eq("| flag | bool | true  |");
    });

    it("Logs offsets to the given logger", function () {
      const logger = new BufferedLogger();
      runDecode({ types: "string", data: hexlify(encodeArgs(0x20, 2, "hi")) }, logger);
      expect(logger.lines).to.deep.eq(["string: head 0 -> tail 32"]);
    });
  });

  describe("encode", function () {
    it("Encodes JSON values", function () {
      const output = runEncode({ types: "uint256,string,bool[]", values: `[5, "ab", [true]]` });
      expect(output).to.deep.eq({
        ok: true,
        lines: [defaultAbiCoder.encode(["uint256", "string", "bool[]"], [5, "ab", [true]])]
      });
    });

    it("Reads integers from strings", function () {
      const output = runEncode({ types: "uint8,int256", values: `["0x10", "-1"]` });
      expect(output.lines).to.deep.eq([`0x${"10".padStart(64, "0")}${"f".repeat(64)}`]);
    });

    it("Prints malformed values", function () {
      const output = runEncode({ types: "uint8", values: "[256]" });
      expect(output.ok).to.eq(false);
      expect(output.lines.map(stripANSI)).to.deep.eq(["256 is out of range for uint8 (at $[0])"]);
    });
  });

  describe("JsonValueReader", function () {
    const reader = new JsonValueReader();

    it("Converts nested values", function () {
      const types = [readTypeNode("(uint256,bytes2)[]")];
      expect(reader.readValues(types, [[[1, "0x0102"]]])).to.deep.eq([[[1n, "0x0102"]]]);
    });

    it("Rejects values of the wrong shape", function () {
      expect(() => reader.readValues([readTypeNode("bool")], [1])).to.throw(
        "Expected a boolean, got 1 (at $[0])"
      );
      expect(() => reader.readValues([readTypeNode("uint8")], [1, 2])).to.throw(
        "Expected 1 values, got 2"
      );
      expect(() => reader.readValues([readTypeNode("uint8")], ["1.5"])).to.throw(
        `Expected an integer, got "1.5" (at $[0])`
      );
      expect(() => reader.readValues([readTypeNode("uint8[2]")], [[1]])).to.throw(
        "Expected 2 values, got 1 (at $[0])"
      );
    });
  });

  describe("resolveParameterTypes", function () {
    it("Finds functions by name", function () {
      const params = resolveParameterTypes({ types: "submit", abi: MARKET_ABI_PATH });
      expect(params.canonicalName).to.eq("(Market.Order,string[])");
    });

    it("Finds functions by signature", function () {
      const params = resolveParameterTypes({
        types: "batch((uint256, uint8)[])",
        abi: MARKET_ABI_PATH
      });
      expect(params.getParamNames("value")).to.deep.eq(["orders"]);
    });

    it("Reads return parameters with --outputs", function () {
      const params = resolveParameterTypes({
        types: "submit",
        abi: MARKET_ABI_PATH,
        outputs: true
      });
      expect(params.canonicalName).to.eq("(bool)");
    });

    it("Throws for unknown functions", function () {
      expect(() => resolveParameterTypes({ types: "cancel", abi: MARKET_ABI_PATH })).to.throw(
        "No function found for cancel"
      );
    });
  });

  it("formatValue", function () {
    const type = readTypeNode("(uint8,string,bytes2,address)[]");
    const value = [[1n, "hi", new Uint8Array([0xab, 0xcd]), `0x${"0".repeat(40)}`]];
    expect(formatValue(value, type)).to.eq(`[[1, "hi", 0xabcd, 0x${"0".repeat(40)}]]`);
  });
});
