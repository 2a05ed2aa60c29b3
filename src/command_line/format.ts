import chalk from "chalk";
import _ from "lodash";
import { ArrayType, StringType, TupleLikeType, TypeNode } from "../ast";
import { AbiValue } from "../codec";
import { bytesToHex } from "../utils";

export const err = chalk.bold.red;
export const info = chalk.blue;

// eslint-disable-next-line no-control-regex
export const stripANSI = (str: string): string => str.replace(/\u001b\[.*?m/g, "");

/**
 * Renders `rows` as a table. The first row is the header; a column is left-aligned
 * if any of its cells below the header contains a letter.
 */
export function toCommentTable(rows: string[][]): string[] {
  const columns = _.unzip(rows);
  const widths = columns.map((col) => _.max(col.map((cell) => stripANSI(cell).length)) ?? 0);
  const alignLeft = columns.map((col) =>
    col.slice(1).some((cell) => /[a-zA-Z]/.test(stripANSI(cell)))
  );

  const pad = (cell: string, c: number) => {
    const padding = " ".repeat(Math.max(0, widths[c] - stripANSI(cell).length));
    return alignLeft[c] ? cell + padding : padding + cell;
  };
  const lines = rows.map((row) => `| ${row.map(pad).join(" | ")} |`);
  const separator = `==${widths.map((size) => "=".repeat(size)).join("===")}==`;
  return [separator, lines[0], separator, ...lines.slice(1), separator];
}

/** Single line rendering of a decoded value of `type`. */
export function formatValue(value: AbiValue, type: TypeNode): string {
  if (Array.isArray(value)) {
    const memberAt = (i: number): TypeNode => {
      if (type instanceof ArrayType) return type.baseType;
      if (type instanceof TupleLikeType) return type.vMembers[i];
      throw Error(`Unexpected list value for ${type.canonicalName}`);
    };
    return `[${value.map((member, i) => formatValue(member, memberAt(i))).join(", ")}]`;
  }
  if (value instanceof Uint8Array) {
    return bytesToHex(value);
  }
  if (type instanceof StringType) {
    return JSON.stringify(value);
  }
  return value.toString();
}
