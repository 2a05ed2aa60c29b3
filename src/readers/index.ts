export * from "./read_abi";
export * from "./types";
