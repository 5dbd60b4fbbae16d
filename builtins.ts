import {
  Sym,
  Pair,
  Frame,
  Primitive,
  NativeOperation,
  Value,
  TRUE,
  fromBoolean,
  toArray,
} from "./types";
import { ErrorKind } from "./errors";
import { Evaluator } from "./evaluator";
import { printValue } from "./printer";
import { loadFile } from "./loader";

//
// Helper functions
//
function arithmetic(
  name: string,
  combine: (acc: number, n: number) => number,
): NativeOperation {
  return (args, _env, evaluator) => {
    let acc = 0;
    for (const [i, arg] of toArray(args).entries()) {
      if (typeof arg !== "number") {
        return evaluator.report(
          ErrorKind.WrongArgumentType,
          `${name}: Expected numbers.`,
        );
      }
      // The first argument seeds the fold
      acc = i === 0 ? arg : combine(acc, arg);
    }
    return acc;
  };
}

function comparison(
  name: string,
  test: (a: number, b: number) => boolean,
): NativeOperation {
  return (args, _env, evaluator) => {
    const values = toArray(args);
    if (values.length !== 2) {
      return evaluator.report(
        ErrorKind.WrongArgumentCount,
        `${name}: Expected two arguments.`,
      );
    }
    const [a, b] = values;
    if (typeof a !== "number" || typeof b !== "number") {
      return evaluator.report(
        ErrorKind.WrongArgumentType,
        `${name}: Expected numbers.`,
      );
    }
    return fromBoolean(test(a, b));
  };
}

function unary(
  name: string,
  operation: (arg: Value, env: Frame, evaluator: Evaluator) => Value,
): NativeOperation {
  return (args, env, evaluator) => {
    const values = toArray(args);
    if (values.length !== 1) {
      return evaluator.report(
        ErrorKind.WrongArgumentCount,
        `${name}: Expected one argument.`,
      );
    }
    return operation(values[0], env, evaluator);
  };
}

export function initEnv(): Frame {
  const env = new Frame(null);
  const define = (name: string, operation: NativeOperation): void =>
    env.define(name, new Primitive(name, operation));

  define("+", arithmetic("+", (acc, n) => acc + n));
  define("-", arithmetic("-", (acc, n) => acc - n));
  define("*", arithmetic("*", (acc, n) => acc * n));
  define("/", arithmetic("/", (acc, n) => acc / n));

  define("=", comparison("=", (a, b) => a === b));
  define("<", comparison("<", (a, b) => a < b));
  define(">", comparison(">", (a, b) => a > b));

  define("cons", (args, _env, evaluator) => {
    const values = toArray(args);
    if (values.length !== 2) {
      return evaluator.report(
        ErrorKind.WrongArgumentCount,
        "cons: Expected two arguments.",
      );
    }
    return new Pair(values[0], values[1]);
  });

  define(
    "car",
    unary("car", (arg, _env, evaluator) => {
      if (!(arg instanceof Pair)) {
        return evaluator.report(ErrorKind.WrongArgumentType, "car: Expected a pair.");
      }
      return arg.car;
    }),
  );

  define(
    "cdr",
    unary("cdr", (arg, _env, evaluator) => {
      if (!(arg instanceof Pair)) {
        return evaluator.report(ErrorKind.WrongArgumentType, "cdr: Expected a pair.");
      }
      return arg.cdr;
    }),
  );

  // Arguments arrive as a fresh list already
  define("list", (args) => args);

  define(
    "null?",
    unary("null?", (arg) => fromBoolean(arg === null)),
  );

  define(
    "display",
    unary("display", (arg, _env, evaluator) => {
      evaluator.host.print(printValue(arg));
      return null;
    }),
  );

  // Evaluates an already evaluated argument a second time
  define(
    "eval",
    unary("eval", (arg, env, evaluator) => evaluator.eval(arg, env)),
  );

  define(
    "load",
    unary("load", (arg, env, evaluator) => {
      if (!(arg instanceof Sym)) {
        return evaluator.report(
          ErrorKind.WrongArgumentType,
          "load: Expected a symbol naming a file, e.g. (load (quote example.scm)).",
        );
      }
      return loadFile(arg.name, env, evaluator);
    }),
  );

  env.define("#t", TRUE);

  return env;
}
