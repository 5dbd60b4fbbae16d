import { readFileSync } from "fs";
import { Parser } from "./parser";
import { Frame, Value } from "./types";
import { ErrorKind } from "./errors";
import { Evaluator } from "./evaluator";

// Evaluates every top-level form of source in env, returning the last value
export function evalSource(source: string, env: Frame, evaluator: Evaluator): Value {
  const parser = Parser.fromString(source);
  let last: Value = null;

  for (let form = parser.parse(); form !== undefined; form = parser.parse()) {
    last = evaluator.eval(form, env);
  }

  return last;
}

export function loadFile(path: string, env: Frame, evaluator: Evaluator): Value {
  let source: string;
  try {
    source = readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return evaluator.report(
      ErrorKind.FileNotFound,
      `load: Cannot open file ${path}: ${reason}`,
    );
  }
  return evalSource(source, env, evaluator);
}
