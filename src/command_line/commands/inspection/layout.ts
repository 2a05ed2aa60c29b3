import _ from "lodash";
import { Argv } from "yargs";
import { StructType, TypeNode } from "../../../ast";
import { writeNestedStructure } from "../../../utils";
import { info, toCommentTable } from "../../format";
import {
  CommandOutput,
  ParameterTypeArgs,
  parameterTypeOptions,
  printOutput,
  resolveParameterTypes
} from "../../utils";

const isStruct = (node: TypeNode): node is StructType => node instanceof StructType;

export function runLayout(args: ParameterTypeArgs): CommandOutput {
  const parameters = resolveParameterTypes(args);
  const names = parameters.getParamNames("value");
  const rows = parameters.vMembers.map((member, i) => [
    names[i],
    member.canonicalName,
    member.isDynamicallyEncoded ? "yes" : "no",
    member.calldataHeadOffset.toString(),
    member.calldataHeadSize.toString(),
    member.isDynamicallyEncoded ? member.calldataEncodedTailSize.toString() : "-"
  ]);
  const header = ["name", "type", "dynamic", "head offset", "head size", "min tail size"];
  const lines = [info(parameters.pp()), ...toCommentTable([header, ...rows])];

  const structs = _.uniqBy(parameters.getChildrenBySelector(isStruct), (struct) => struct.name);
  for (const struct of structs) {
    lines.push("", struct.writeDefinition());
  }
  return { ok: true, lines };
}

export const addCommand = <T>(yargs: Argv<T>): Argv<T> =>
  yargs.command(
    "layout <types>",
    writeNestedStructure(["Print the head / tail layout of a parameter list"]),
    parameterTypeOptions,
    (args) => {
      printOutput(runLayout(args));
    }
  );
