import { AddressType } from "./address_type";
import { BoolType } from "./bool_type";
import { EnumType } from "./enum_type";
import { FixedBytesType } from "./fixed_bytes_type";
import { IntegerType } from "./integer_type";

export * from "./address_type";
export * from "./bool_type";
export * from "./enum_type";
export * from "./fixed_bytes_type";
export * from "./integer_type";
export * from "./value_type";

export type UValueType = AddressType | BoolType | EnumType | FixedBytesType | IntegerType;
