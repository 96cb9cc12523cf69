/*
Parameter grids: every combination of the values listed in params.json
becomes one generated notebook.
*/

import { setOwn } from "./misc";
import { PyFloat } from "./python-format";

export type ParameterValue = number | PyFloat | string | boolean;

export type ParameterGrid = Record<string, ParameterValue[]>;

// One concrete combination of parameter values, keys in grid order.
export type ParameterAssignment = Readonly<Record<string, ParameterValue>>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * The cartesian product of all value lists, preserving key order.
 *
 * A grid with no keys yields a single empty assignment; a grid with an empty
 * value list yields none.
 */
export function expandParameterGrid(params: ParameterGrid): ParameterAssignment[] {
  let combos: Array<Array<[string, ParameterValue]>> = [[]];
  for (const [key, values] of Object.entries(params)) {
    const next: Array<Array<[string, ParameterValue]>> = [];
    for (const combo of combos) {
      for (const value of values) {
        next.push([...combo, [key, value]]);
      }
    }
    combos = next;
  }
  return combos.map((combo) => Object.freeze(Object.fromEntries(combo)));
}

function isParameterValue(value: unknown): value is ParameterValue {
  return (
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value)) ||
    (value instanceof PyFloat && Number.isFinite(value.value))
  );
}

/**
 * Check the parsed content of a params.json file.
 */
export function validateParameterGrid(value: unknown, source = "params"): ParameterGrid {
  if (value == null || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`invalid ${source}: expected an object of value lists`);
  }
  const grid: ParameterGrid = {};
  for (const [key, values] of Object.entries(value)) {
    if (!IDENTIFIER.test(key)) {
      throw new Error(`invalid ${source}: '${key}' is not a valid parameter name`);
    }
    if (!Array.isArray(values) || values.length === 0) {
      throw new Error(`invalid ${source}: '${key}' must be a non-empty list`);
    }
    const checked: ParameterValue[] = [];
    for (const v of values) {
      if (!isParameterValue(v)) {
        throw new Error(
          `invalid ${source}: '${key}' contains ${JSON.stringify(v)}, expected a number, string or boolean`,
        );
      }
      checked.push(v);
    }
    setOwn(grid, key, checked);
  }
  if (Object.keys(grid).length === 0) {
    throw new Error(`no parameters found in ${source}`);
  }
  return grid;
}
