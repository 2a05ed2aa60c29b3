export * from "./ast";
export * from "./codec";
export * from "./constants";
export * from "./readers";
export * from "./utils";
