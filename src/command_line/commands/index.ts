import { Argv } from "yargs";
import codec from "./codec";
import inspection from "./inspection";

const commands = [...codec, ...inspection];

export const addCommands = <T>(yargs: Argv<T>): Argv<T> =>
  commands.reduce((yargs, cmd) => cmd.addCommand(yargs), yargs);
