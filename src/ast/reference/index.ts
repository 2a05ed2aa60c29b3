import { ArrayType } from "./array_type";
import { BytesType, StringType } from "./packed_array_type";
import { StructType } from "./struct_type";
import { TupleType } from "./tuple_type";

export * from "./array_type";
export * from "./packed_array_type";
export * from "./struct_type";
export * from "./tuple_type";
export * from "./reference_type";

export type UReferenceType = ArrayType | BytesType | StringType | StructType | TupleType;
