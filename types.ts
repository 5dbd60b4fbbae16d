import type { Evaluator } from "./evaluator";

//
// Value model
//
export class Sym {
  constructor(public readonly name: string) {}

  public is(name: string): boolean {
    return this.name === name;
  }
}

export class Pair {
  constructor(
    public readonly car: Value,
    public readonly cdr: Value,
  ) {}

  // Walks the list spine; an improper tail is not yielded
  *[Symbol.iterator](): Iterator<Value> {
    let current: Value = this;
    while (current instanceof Pair) {
      yield current.car;
      current = current.cdr;
    }
  }
}

export type NativeOperation = (
  args: Value,
  env: Frame,
  evaluator: Evaluator,
) => Value;

export class Primitive {
  constructor(
    public readonly name: string,
    private readonly operation: NativeOperation,
  ) {}

  public call(args: Value, env: Frame, evaluator: Evaluator): Value {
    return this.operation(args, env, evaluator);
  }
}

export class Closure {
  constructor(
    public readonly params: Sym[],
    public readonly body: Value,
    public readonly env: Frame,
  ) {}
}

export type Procedure = Primitive | Closure;

// null is the empty list and the false value
export type Value = Sym | Pair | Procedure | number | null;

export const TRUE = new Sym("#t");

export function truthy(value: Value): boolean {
  return value !== null;
}

export function fromBoolean(value: boolean): Value {
  return value ? TRUE : null;
}

export function list(...items: Value[]): Value {
  return items.reduceRight<Value>((tail, item) => new Pair(item, tail), null);
}

export function toArray(value: Value): Value[] {
  return value instanceof Pair ? [...value] : [];
}

//
// Environment
//
export class Frame {
  private bindings: Map<string, Value>;

  constructor(public readonly parent: Frame | null = null) {
    this.bindings = new Map();
  }

  public lookup(name: string): Value | undefined {
    let frame: Frame | null = this;

    while (frame !== null) {
      if (frame.bindings.has(name)) return frame.bindings.get(name);
      frame = frame.parent;
    }

    return undefined;
  }

  public define(name: string, value: Value): void {
    // Map.set on an existing key drops the older binding, which lookup
    // could no longer reach anyway
    this.bindings.set(name, value);
  }

  public child(): Frame {
    return new Frame(this);
  }
}
