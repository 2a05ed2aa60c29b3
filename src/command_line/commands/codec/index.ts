import * as decode from "./decode";
import * as encode from "./encode";

const commands = [decode, encode];

export default commands;
