/*
Render values the way the notebook's Python kernel would print them.

Generated notebooks are Python source, so parameter values substituted into
them (and the file names derived from them) must read the way str() and
repr() render the same values in Python. JSON and Python both tell integers
from floats by how the number is written (`1` vs `1.0`), while JavaScript
has a single number type, so floats are carried as PyFloat.
*/

import { parse } from "lossless-json";

export class PyFloat {
  constructor(readonly value: number) {}
}

export type PyValue =
  | number
  | PyFloat
  | string
  | boolean
  | null
  | PyValue[]
  | { [key: string]: PyValue };

// A number literal with a fraction or an exponent is a float.
export function isFloatLiteral(text: string): boolean {
  return !/^[-+]?0[xXoObB]/.test(text) && /[.eE]/.test(text);
}

/**
 * Parse JSON text, keeping numbers written as floats (`1.0`, `1e-05`) as
 * PyFloat so they are rendered back as floats.
 */
export function parseJsonPreservingFloats(text: string): unknown {
  return parse(text, null, (value: string) =>
    isFloatLiteral(value) ? new PyFloat(Number(value)) : Number(value),
  );
}

// The plain number of an int or a float parameter.
export function numericValue(value: PyValue): number | undefined {
  if (typeof value === "number") return value;
  if (value instanceof PyFloat) return value.value;
  return;
}

function pyNumber(x: number): string {
  if (Number.isNaN(x)) return "nan";
  if (x === Infinity) return "inf";
  if (x === -Infinity) return "-inf";
  return String(x);
}

// repr() of a float: shortest round-trip digits, at least one decimal,
// exponent form below 1e-4 and from 1e16 on.
function pyFloat(x: number): string {
  if (!Number.isFinite(x)) return pyNumber(x);
  if (x === 0) return Object.is(x, -0) ? "-0.0" : "0.0";
  const abs = Math.abs(x);
  if (abs < 1e-4 || abs >= 1e16) {
    const [mantissa, exponent] = x.toExponential().split("e");
    const sign = exponent.startsWith("-") ? "-" : "+";
    const digits = exponent.replace(/^[-+]/, "").padStart(2, "0");
    return `${mantissa}e${sign}${digits}`;
  }
  const text = String(x);
  return Number.isInteger(x) ? `${text}.0` : text;
}

export function pyRepr(value: PyValue): string {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "number") return pyNumber(value);
  if (value instanceof PyFloat) return pyFloat(value.value);
  if (typeof value === "string") {
    const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
    const escaped = value
      .replace(/\\/g, "\\\\")
      .replace(/\n/g, "\\n")
      .replace(/\r/g, "\\r")
      .replace(/\t/g, "\\t");
    return quote === "'"
      ? `'${escaped.replace(/'/g, "\\'")}'`
      : `"${escaped}"`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(pyRepr).join(", ")}]`;
  }
  const items = Object.entries(value).map(
    ([k, v]) => `${pyRepr(k)}: ${pyRepr(v)}`,
  );
  return `{${items.join(", ")}}`;
}

export function pyStr(value: PyValue): string {
  return typeof value === "string" ? value : pyRepr(value);
}
