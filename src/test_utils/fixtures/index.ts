import { JsonFragment } from "@ethersproject/abi";
import { readFileSync } from "fs";
import path from "path";

export const MARKET_ABI_PATH = path.join(__dirname, "market_abi.json");

export const readMarketAbi = (): JsonFragment[] =>
  JSON.parse(readFileSync(MARKET_ABI_PATH, "utf8"));
