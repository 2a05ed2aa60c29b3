export * from "./bytes";
export * from "./loggers";
export * from "./text";
