export * from "./coder";
export * from "./decoder";
export * from "./encoder";
export * from "./errors";
export * from "./values";
