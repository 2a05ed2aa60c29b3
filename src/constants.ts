export enum ABITypeKind {
  Bool = "bool",
  Integer = "int",
  Address = "address",
  Enum = "enum",
  Array = "array",
  FixedBytes = "fixedBytes",
  Bytes = "bytes",
  String = "string",
  Tuple = "tuple",
  Struct = "struct"
}

export enum DecodeMode {
  /** Masks malformed scalars instead of rejecting them. */
  Lenient = "lenient",
  Strict = "strict"
}

export const WORD_SIZE = 32;
