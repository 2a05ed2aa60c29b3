export type StructuredText<T = string> = Array<StructuredText<T>> | T[] | T;

export function writeNestedStructure(doc: StructuredText): string {
  if (typeof doc === "string") return doc;
  const ret: string[] = [];
  const doMap = (subArr: StructuredText<string>, depth = 0) => {
    if (Array.isArray(subArr)) for (const x of subArr) doMap(x, depth + 1);
    else if (subArr.length > 0) ret.push(`${"  ".repeat(depth)}${subArr}`);
    else ret.push("");
  };
  for (const x of doc) doMap(x);
  if (ret[ret.length - 1] === "") ret.pop();
  return ret.join(`\n`);
}
