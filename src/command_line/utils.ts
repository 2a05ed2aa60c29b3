import { JsonFragment } from "@ethersproject/abi";
import { readFileSync } from "fs";
import path from "path";
import { TupleType } from "../ast";
import { readParameterTypes, readTypeNodesFromABI } from "../readers";
import { writeNestedStructure } from "../utils";

export type ParameterTypeArgs = {
  types: string;
  abi?: string;
  outputs?: boolean;
};

function readJsonAbi(input: string): JsonFragment[] {
  const data: unknown = JSON.parse(readFileSync(input, "utf8"));
  if (Array.isArray(data)) {
    return data;
  }
  if (typeof data === "object" && data !== null && "abi" in data && Array.isArray(data.abi)) {
    return data.abi;
  }
  throw Error(
    writeNestedStructure([
      `ABI not found in ${input}`,
      `JSON input file must be ABI or artifact with "abi" member.`
    ])
  );
}

/**
 * Resolves the `types` argument of a command. Without `abi` it is read as a parameter
 * list; with `abi` it names a function (by name or signature) whose parameters, or
 * return parameters if `outputs` is set, are used.
 */
export function resolveParameterTypes({ types, abi, outputs }: ParameterTypeArgs): TupleType {
  if (abi === undefined) {
    return readParameterTypes(types);
  }
  const functions = [...readTypeNodesFromABI(readJsonAbi(path.resolve(abi))).values()];
  const matches = types.includes("(")
    ? functions.filter((fn) => fn.signature === types.replace(/\s/g, ""))
    : functions.filter((fn) => fn.name === types);
  if (matches.length !== 1) {
    throw Error(
      matches.length === 0
        ? `No function found for ${types}`
        : `Function name ${types} is ambiguous, use one of: ${matches
            .map((fn) => fn.signature)
            .join(", ")}`
    );
  }
  return outputs ? matches[0].returnParameters : matches[0].parameters;
}

/** Text produced by a command, and whether it succeeded. */
export type CommandOutput = {
  ok: boolean;
  lines: string[];
};

export function printOutput({ ok, lines }: CommandOutput): void {
  if (ok) {
    console.log(lines.join("\n"));
  } else {
    console.error(lines.join("\n"));
    process.exitCode = 1;
  }
}

export const parameterTypeOptions = {
  types: {
    describe: "Parameter list (`uint256,bytes`), function signature, or function name with --abi",
    type: "string",
    demandOption: true
  },
  abi: {
    alias: ["a"],
    describe: "JSON ABI or artifact file to look up the function named by <types>",
    type: "string",
    demandOption: false
  },
  outputs: {
    describe: "Use the return parameters of the function instead of its inputs",
    type: "boolean",
    default: false
  }
} as const;
