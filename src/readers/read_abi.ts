import {
  Fragment,
  FunctionFragment,
  Interface,
  JsonFragment,
  JsonFragmentType,
  ParamType
} from "@ethersproject/abi";
import { ArrayType, StructType, TupleType, TypeNode, TypeProvider } from "../ast";
import { FunctionParameters } from "./types";

const internalTypeOf = (fragment?: JsonFragmentType): string | undefined => {
  const internalType: unknown = fragment?.internalType;
  return typeof internalType === "string" ? internalType : undefined;
};

/** Drops the outermost array suffix of a JSON fragment's type strings. */
function arrayChildFragment(fragment?: JsonFragmentType): JsonFragmentType | undefined {
  if (fragment === undefined) return undefined;
  const stripSuffix = (type?: string) => type?.replace(/\[[0-9]*\]$/, "");
  return {
    ...fragment,
    type: stripSuffix(fragment.type),
    internalType: stripSuffix(internalTypeOf(fragment))
  };
}

const isByteWidth = (n: number) => Number.isInteger(n) && n >= 1 && n <= 32;

/**
 * Maps the base type of a `ParamType` to its descriptor. `ParamType` has already
 * expanded `uint` and `int` to their 256 bit names.
 */
function fromBaseType(baseType: string): TypeNode {
  switch (baseType) {
    case "address":
      return TypeProvider.address();
    case "bool":
      return TypeProvider.bool();
    case "bytes":
      return TypeProvider.bytes();
    case "string":
      return TypeProvider.string();
    case "byte":
      return TypeProvider.fixedBytes(1);
  }
  const int = baseType.match(/^(u?)int([0-9]+)$/);
  if (int !== null && isByteWidth(Number(int[2]) / 8)) {
    const bits = Number(int[2]);
    return int[1] === "u" ? TypeProvider.uint(bits) : TypeProvider.int(bits);
  }
  const fixedBytes = baseType.match(/^bytes([0-9]+)$/);
  if (fixedBytes !== null && isByteWidth(Number(fixedBytes[1]))) {
    return TypeProvider.fixedBytes(Number(fixedBytes[1]));
  }
  throw new Error(`Unsupported type ${baseType}`);
}

function fromParamType(param: ParamType, fragment?: JsonFragmentType): TypeNode {
  let type: TypeNode;
  if (param.baseType === "tuple") {
    const members = param.components.map((component, i) =>
      fromParamType(component, fragment?.components?.[i])
    );
    const internalType = internalTypeOf(fragment);
    type = internalType?.startsWith("struct ")
      ? new StructType(members, internalType.replace("struct ", ""))
      : new TupleType(members);
  } else if (param.baseType === "array") {
    const baseType = fromParamType(param.arrayChildren, arrayChildFragment(fragment));
    type = new ArrayType(baseType, param.arrayLength >= 0 ? param.arrayLength : undefined);
  } else if (internalTypeOf(fragment)?.startsWith("enum ")) {
    // ABI JSON does not record the number of members of an enum
    type = TypeProvider.uint(8);
  } else {
    type = fromBaseType(param.baseType);
  }
  if (param.name) {
    type.labelFromParent = param.name;
  }
  return type;
}

const paramTypesToMembers = (
  params: readonly ParamType[],
  fragments?: readonly JsonFragmentType[]
): TypeNode[] => params.map((param, i) => fromParamType(param, fragments?.[i]));

/**
 * Reads a single ABI type string, e.g. `uint16[][]` or `(uint256 a, bytes b)[2]`.
 */
export function readTypeNode(typeString: string): TypeNode {
  return fromParamType(ParamType.from(typeString));
}

/**
 * Reads a comma separated parameter list (`uint256,(bool,bytes)[]`) or a function
 * signature (`f(uint256,bytes)`) into a tuple of the parameter types.
 */
export function readParameterTypes(list: string): TupleType {
  const trimmed = list.trim();
  if (/^[a-zA-Z_$][a-zA-Z0-9_$]*\s*\(/.test(trimmed)) {
    return new TupleType(paramTypesToMembers(FunctionFragment.from(trimmed).inputs));
  }
  if (trimmed === "") {
    return new TupleType([]);
  }
  return new TupleType(paramTypesToMembers(ParamType.from(`(${trimmed})`).components));
}

function getJsonFragment(
  jsonFragments: readonly JsonFragment[],
  fn: FunctionFragment
): JsonFragment {
  const fragment = jsonFragments.find(
    (frag) => frag.type === "function" && Fragment.from(frag).format() === fn.format()
  );
  if (fragment === undefined) {
    throw Error(`JSON fragment not found for ${fn.format()}`);
  }
  return fragment;
}

/**
 * Reads the parameter and return parameter types of every function in a JSON ABI,
 * keyed by function signature.
 */
export function readTypeNodesFromABI(
  jsonFragments: readonly JsonFragment[]
): Map<string, FunctionParameters> {
  const iface = new Interface(jsonFragments.filter((fn) => fn.type === "function"));
  const functions = new Map<string, FunctionParameters>();
  for (const [signature, fn] of Object.entries(iface.functions)) {
    const jsonFragment = getJsonFragment(jsonFragments, fn);
    functions.set(signature, {
      name: fn.name,
      signature,
      parameters: new TupleType(paramTypesToMembers(fn.inputs, jsonFragment.inputs)),
      returnParameters: new TupleType(paramTypesToMembers(fn.outputs ?? [], jsonFragment.outputs))
    });
  }
  return functions;
}
