/**
 * Decoded value tree. Integers decode to `bigint`, enums to `number`, addresses to
 * lowercase hex strings, fixed and dynamic byte arrays to `Uint8Array`, strings to
 * `string`, and arrays and tuples to arrays of their members.
 */
export type AbiValue = bigint | number | boolean | string | Uint8Array | AbiValue[];

/** Values accepted by the encoder. */
export type AbiInputValue =
  | bigint
  | number
  | boolean
  | string
  | Uint8Array
  | readonly AbiInputValue[];
