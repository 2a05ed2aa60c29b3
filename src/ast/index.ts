import { UReferenceType } from "./reference";
import { UValueType } from "./value";

export * from "./reference";
export * from "./value";
export * from "./type_node";
export * from "./type_provider";
export * from "./type_node_visitor";

export type UABIType = UReferenceType | UValueType;
