import {
  Sym,
  Pair,
  Primitive,
  Closure,
  Frame,
  Value,
  list,
  toArray,
  truthy,
} from "./types";
import { ErrorKind, Host, LispError } from "./errors";
import { printValue } from "./printer";

//
// Helper functions
//
function carIsSym(expr: Pair, name: string): boolean {
  return expr.car instanceof Sym && expr.car.is(name);
}

// The operand at index, or undefined when the form is too short
function operand(operands: Value, index: number): Value | undefined {
  let current = operands;
  for (let i = 0; i < index && current instanceof Pair; i++) {
    current = current.cdr;
  }
  return current instanceof Pair ? current.car : undefined;
}

//
// Evaluator
//
// A direct recursive walk: there is no tail-call elimination, so deeply
// recursive programs end when the JavaScript stack does.
//
export class Evaluator {
  constructor(public readonly host: Host) {}

  // Hands the failure to the host; the failing step evaluates to ()
  report(kind: ErrorKind, message: string): null {
    this.host.report(new LispError(kind, message));
    return null;
  }

  eval(expr: Value, env: Frame): Value {
    if (expr instanceof Sym) {
      return this.evalSymbol(expr, env);
    } else if (expr instanceof Pair) {
      if (carIsSym(expr, "quote")) {
        return this.evalQuote(expr.cdr);
      } else if (carIsSym(expr, "if")) {
        return this.evalIf(expr.cdr, env);
      } else if (carIsSym(expr, "define")) {
        return this.evalDefine(expr.cdr, env);
      } else if (carIsSym(expr, "lambda")) {
        return this.evalLambda(expr.cdr, env);
      } else {
        return this.evalApplication(expr, env);
      }
    }
    // (), numbers and procedures evaluate to themselves
    return expr;
  }

  apply(proc: Value, args: Value, env: Frame): Value {
    if (proc instanceof Primitive) {
      return proc.call(args, env, this);
    } else if (proc instanceof Closure) {
      return this.applyClosure(proc, args);
    } else {
      return this.report(
        ErrorKind.NotAProcedure,
        `Not a procedure: ${printValue(proc)}`,
      );
    }
  }

  private evalSymbol(sym: Sym, env: Frame): Value {
    const value = env.lookup(sym.name);
    if (value === undefined) {
      return this.report(
        ErrorKind.UnboundSymbol,
        `Unbound symbol: ${sym.name}`,
      );
    }
    return value;
  }

  private evalQuote(operands: Value): Value {
    const quoted = operand(operands, 0);
    if (quoted === undefined) {
      return this.report(
        ErrorKind.WrongArgumentType,
        "quote: Expected one operand.",
      );
    }
    return quoted;
  }

  private evalIf(operands: Value, env: Frame): Value {
    const test = operand(operands, 0);
    const consequent = operand(operands, 1);
    if (test === undefined || consequent === undefined) {
      return this.report(
        ErrorKind.WrongArgumentType,
        "if: Expected a test and a consequent.",
      );
    }

    if (truthy(this.eval(test, env))) {
      return this.eval(consequent, env);
    }
    const alternate = operand(operands, 2);
    return alternate === undefined ? null : this.eval(alternate, env);
  }

  private evalDefine(operands: Value, env: Frame): Value {
    const target = operand(operands, 0);
    const valueExpr = operand(operands, 1);
    if (target === undefined || valueExpr === undefined) {
      return this.report(
        ErrorKind.WrongArgumentType,
        "define: Expected a symbol and a value.",
      );
    }

    // The value is evaluated before the target is checked
    const value = this.eval(valueExpr, env);
    if (!(target instanceof Sym)) {
      return this.report(
        ErrorKind.WrongArgumentType,
        "define: First operand must be a symbol.",
      );
    }
    env.define(target.name, value);
    return target;
  }

  // (lambda (param ...) body): forms after the first body form are ignored
  private evalLambda(operands: Value, env: Frame): Value {
    const paramList = operand(operands, 0);
    const body = operand(operands, 1);
    if (paramList === undefined || body === undefined) {
      return this.report(
        ErrorKind.WrongArgumentType,
        "lambda: Expected a parameter list and a body.",
      );
    }

    const params: Sym[] = [];
    let current: Value = paramList;
    while (current instanceof Pair) {
      if (!(current.car instanceof Sym)) {
        return this.report(
          ErrorKind.WrongArgumentType,
          `lambda: Parameter is not a symbol: ${printValue(current.car)}`,
        );
      }
      params.push(current.car);
      current = current.cdr;
    }
    if (current !== null) {
      return this.report(
        ErrorKind.WrongArgumentType,
        "lambda: Parameters must form a list.",
      );
    }

    return new Closure(params, body, env);
  }

  private evalApplication(expr: Pair, env: Frame): Value {
    const proc = this.eval(expr.car, env);
    const args = toArray(expr.cdr).map((arg) => this.eval(arg, env));
    return this.apply(proc, list(...args), env);
  }

  private applyClosure(closure: Closure, args: Value): Value {
    const values = toArray(args);
    if (values.length !== closure.params.length) {
      return this.report(
        ErrorKind.WrongArgumentCount,
        `lambda: Expected ${closure.params.length} arguments, got ${values.length}.`,
      );
    }

    const frame = closure.env.child();
    closure.params.forEach((param, i) => frame.define(param.name, values[i]));
    return this.eval(closure.body, frame);
  }
}
