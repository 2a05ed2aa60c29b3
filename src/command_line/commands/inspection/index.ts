import * as layout from "./layout";

const commands = [layout];

export default commands;
