import { Argv } from "yargs";
import { decodeAll, formatDecodeFailure } from "../../../codec";
import { DecodeMode } from "../../../constants";
import { DebugLogger, Logger, writeNestedStructure } from "../../../utils";
import { err, formatValue, toCommentTable } from "../../format";
import {
  CommandOutput,
  ParameterTypeArgs,
  parameterTypeOptions,
  printOutput,
  resolveParameterTypes
} from "../../utils";

const options = {
  ...parameterTypeOptions,
  data: {
    describe: "Hex encoded data, without a function selector",
    type: "string",
    demandOption: true
  },
  lenient: {
    alias: ["l"],
    describe: "Clean malformed values instead of rejecting them",
    type: "boolean",
    default: false
  },
  debug: {
    describe: "Log every offset followed while decoding",
    type: "boolean",
    default: false
  }
} as const;

export type DecodeCommandArgs = ParameterTypeArgs & {
  data: string;
  lenient?: boolean;
  debug?: boolean;
};

export function runDecode(args: DecodeCommandArgs, logger?: Logger): CommandOutput {
  const parameters = resolveParameterTypes(args);
  const result = decodeAll(args.data, parameters.vMembers, {
    mode: args.lenient ? DecodeMode.Lenient : DecodeMode.Strict,
    logger: logger ?? (args.debug ? new DebugLogger() : undefined)
  });
  if (!result.ok) {
    return { ok: false, lines: [err(formatDecodeFailure(result.failure))] };
  }
  const names = parameters.getParamNames("value");
  const rows = parameters.vMembers.map((member, i) => [
    names[i],
    member.canonicalName,
    formatValue(result.value[i], member)
  ]);
  return { ok: true, lines: toCommentTable([["name", "type", "value"], ...rows]) };
}

export const addCommand = <T>(yargs: Argv<T>): Argv<T> =>
  yargs.command(
    "decode <types> <data>",
    writeNestedStructure([
      "Decode ABI encoded data",
      "Exits with code 1 and prints the failure if the data is malformed"
    ]),
    options,
    (args) => {
      printOutput(runDecode(args));
    }
  );
