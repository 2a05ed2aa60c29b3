import { Argv } from "yargs";
import { AbiEncodingError, encodeAll } from "../../../codec";
import { bytesToHex, writeNestedStructure } from "../../../utils";
import { err } from "../../format";
import { JsonValueReader } from "../../json_values";
import {
  CommandOutput,
  ParameterTypeArgs,
  parameterTypeOptions,
  printOutput,
  resolveParameterTypes
} from "../../utils";

const options = {
  ...parameterTypeOptions,
  values: {
    describe: "JSON array with one value per parameter",
    type: "string",
    demandOption: true
  }
} as const;

export type EncodeCommandArgs = ParameterTypeArgs & { values: string };

export function runEncode(args: EncodeCommandArgs): CommandOutput {
  const parameters = resolveParameterTypes(args);
  const json: unknown = JSON.parse(args.values);
  try {
    const values = new JsonValueReader().readValues(parameters.vMembers, json);
    return { ok: true, lines: [bytesToHex(encodeAll(values, parameters.vMembers))] };
  } catch (error) {
    if (error instanceof AbiEncodingError) {
      return { ok: false, lines: [err(error.message)] };
    }
    throw error;
  }
}

export const addCommand = <T>(yargs: Argv<T>): Argv<T> =>
  yargs.command(
    "encode <types> <values>",
    writeNestedStructure([
      "ABI encode a list of values",
      "Integers may be JSON numbers or decimal / hex strings, bytes are hex strings"
    ]),
    options,
    (args) => {
      printOutput(runEncode(args));
    }
  );
