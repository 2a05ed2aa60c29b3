import { TupleType } from "../ast";

export type FunctionParameters = {
  name: string;
  signature: string;
  parameters: TupleType;
  returnParameters: TupleType;
};
