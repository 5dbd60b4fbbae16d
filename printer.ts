import { Sym, Pair, Primitive, Value } from "./types";

function stripTrailingZeros(digits: string): string {
  if (!digits.includes(".")) return digits;
  return digits.replace(/0+$/, "").replace(/\.$/, "");
}

// Six significant digits, the way printf's %g lays them out
function formatGeneral(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (!Number.isFinite(n)) return n > 0 ? "inf" : "-inf";

  const [mantissa, exponentText] = n.toExponential(5).split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 6) {
    const sign = exponent < 0 ? "-" : "+";
    const digits = String(Math.abs(exponent)).padStart(2, "0");
    return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
  }
  return stripTrailingZeros(n.toFixed(5 - exponent));
}

export function formatNumber(n: number): string {
  return Number.isInteger(n) ? String(n) : formatGeneral(n);
}

function printList(pair: Pair): string {
  const parts: string[] = [];
  let current: Value = pair;
  while (current instanceof Pair) {
    parts.push(printValue(current.car));
    current = current.cdr;
  }
  if (current !== null) {
    return `(${parts.join(" ")} . ${printValue(current)})`;
  }
  return `(${parts.join(" ")})`;
}

export function printValue(value: Value): string {
  if (value === null) {
    return "()";
  } else if (typeof value === "number") {
    return formatNumber(value);
  } else if (value instanceof Sym) {
    return value.name;
  } else if (value instanceof Pair) {
    return printList(value);
  } else if (value instanceof Primitive) {
    return "<primitive>";
  } else {
    return "<lambda>";
  }
}
