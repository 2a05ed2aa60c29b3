import { expect } from "chai";
import { BufferedLogger } from "./loggers";
import {
  bigIntToWord,
  bytesToBigInt,
  isNumeric,
  roundUpToWord,
  signExtend,
  toBytes,
  toHex
} from "./bytes";
import { encodeArgs } from "../test_utils/encode_args";

describe("Byte utilities", function () {
  describe("bigIntToWord", function () {
    it("Writes values big-endian into 32 bytes", function () {
      const word = bigIntToWord(0x0102n);
      expect(word.length).to.eq(32);
      expect(word[30]).to.eq(1);
      expect(word[31]).to.eq(2);
    });

    it("Writes negative values in two's complement", function () {
      expect(bigIntToWord(-1n)).to.deep.eq(new Uint8Array(32).fill(0xff));
      expect(bytesToBigInt(bigIntToWord(-2n))).to.eq(2n ** 256n - 2n);
    });

    it("Throws for values wider than a word", function () {
      expect(() => bigIntToWord(2n ** 256n)).to.throw(`does not fit in a word`);
    });
  });

  it("signExtend", function () {
    expect(signExtend(0xffffn, 16)).to.eq(-1n);
    expect(signExtend(0x1ffffn, 16)).to.eq(-1n);
    expect(signExtend(0x10fffn, 16)).to.eq(0xfffn);
    expect(signExtend(0x7fn, 8)).to.eq(127n);
    expect(signExtend(0x80n, 8)).to.eq(-128n);
  });

  it("roundUpToWord", function () {
    expect(roundUpToWord(0n)).to.eq(0n);
    expect(roundUpToWord(1n)).to.eq(32n);
    expect(roundUpToWord(32n)).to.eq(32n);
    expect(roundUpToWord(33n)).to.eq(64n);
  });

  it("toHex pads to whole bytes", function () {
    expect(toHex(1n)).to.eq("0x01");
    expect(toHex(255)).to.eq("0xff");
    expect(toHex(256)).to.eq("0x0100");
  });

  describe("toBytes", function () {
    it("Reads hex strings", function () {
      expect(toBytes("0x0102")).to.deep.eq(new Uint8Array([1, 2]));
      expect(toBytes("0x")).to.deep.eq(new Uint8Array([]));
    });

    it("Returns byte arrays as they are", function () {
      const bytes = new Uint8Array([3]);
      expect(toBytes(bytes)).to.eq(bytes);
    });

    it("Rejects odd length and non-hex strings", function () {
      expect(() => toBytes("0x1")).to.throw("Invalid hex string: 0x1");
      expect(() => toBytes("xyz")).to.throw("Invalid hex string: xyz");
    });
  });

  it("isNumeric", function () {
    expect(isNumeric("-12")).to.eq(true);
    expect(isNumeric("0x1f")).to.eq(true);
    expect(isNumeric(3)).to.eq(true);
    expect(isNumeric("-0x1")).to.eq(false);
    expect(isNumeric("1.5")).to.eq(false);
    expect(isNumeric(undefined)).to.eq(false);
  });

  it("encodeArgs pads strings to whole words", function () {
    const data = encodeArgs(7, "abc");
    expect(data.length).to.eq(64);
    expect(data[31]).to.eq(7);
    expect([...data.slice(32, 36)]).to.deep.eq([0x61, 0x62, 0x63, 0]);
  });

  it("BufferedLogger joins messages", function () {
    const logger = new BufferedLogger();
    logger.log("a", 1, 2n);
    expect(logger.lines).to.deep.eq(["a 1 2"]);
  });
});
