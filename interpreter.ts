import type { Frame, Value } from "./types";
import { type Host, consoleHost } from "./errors";
import { Evaluator } from "./evaluator";
import { initEnv } from "./builtins";
import { readForm } from "./parser";
import { evalSource, loadFile } from "./loader";

export { printValue } from "./printer";
export { LispError, ErrorKind, consoleHost } from "./errors";
export type { Host } from "./errors";
export { Sym, Pair, Closure, Primitive, Frame } from "./types";
export type { Value } from "./types";

//
// One global frame and the evaluator that works on it
//
export class Interpreter {
  readonly global: Frame;
  readonly evaluator: Evaluator;

  constructor(host: Host = consoleHost) {
    this.evaluator = new Evaluator(host);
    this.global = initEnv();
  }

  // Reads a single form, ignoring anything after it
  evalString(source: string): Value {
    return this.evaluator.eval(readForm(source), this.global);
  }

  evalAll(source: string): Value {
    return evalSource(source, this.global, this.evaluator);
  }

  load(path: string): Value {
    return loadFile(path, this.global, this.evaluator);
  }
}
