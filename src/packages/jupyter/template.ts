/*
Fill named fields into a parameters cell.

Field syntax follows Python's str.format, which is what the notebook authors
write against: `{name}` is replaced by str(value), `{name!r}` by repr(value),
and `{{` / `}}` produce literal braces. Positional fields, attribute or index
lookups and format specifications are rejected.
*/

import { pyRepr, pyStr, type PyValue } from "@nbperf/util/python-format";

import { TemplateSyntaxError, UnresolvedParameterError } from "./errors";

const FIELD = /^([A-Za-z_][A-Za-z0-9_]*)(?:!([rs]))?$/;

function renderField(
  field: string,
  values: Readonly<Record<string, PyValue>>,
  position: number,
): string {
  if (field === "" || /^\d/.test(field)) {
    throw new TemplateSyntaxError("positional fields are not supported", position);
  }
  if (field.includes(":")) {
    throw new TemplateSyntaxError(
      `format specification in '{${field}}' is not supported`,
      position,
    );
  }
  const match = FIELD.exec(field);
  if (match == null) {
    throw new TemplateSyntaxError(`invalid field '{${field}}'`, position);
  }
  const [, name, conversion] = match;
  if (!Object.prototype.hasOwnProperty.call(values, name)) {
    throw new UnresolvedParameterError(name);
  }
  const value = values[name];
  return conversion === "r" ? pyRepr(value) : pyStr(value);
}

export function formatTemplate(
  template: string,
  values: Readonly<Record<string, PyValue>>,
): string {
  let out = "";
  let i = 0;
  while (i < template.length) {
    const c = template[i];
    if (c === "{") {
      if (template[i + 1] === "{") {
        out += "{";
        i += 2;
        continue;
      }
      const end = template.indexOf("}", i + 1);
      if (end === -1) {
        throw new TemplateSyntaxError("expected '}' before end of string", i);
      }
      const field = template.slice(i + 1, end);
      if (field.includes("{")) {
        throw new TemplateSyntaxError("unexpected '{' in field name", i);
      }
      out += renderField(field, values, i);
      i = end + 1;
      continue;
    }
    if (c === "}") {
      if (template[i + 1] === "}") {
        out += "}";
        i += 2;
        continue;
      }
      throw new TemplateSyntaxError("single '}' encountered in format string", i);
    }
    out += c;
    i += 1;
  }
  return out;
}

// Names of every field the template refers to, in order of first use.
export function templateFields(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(/\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)(?:![rs])?\}/g)) {
    const name = match[1];
    if (name != null && !names.includes(name)) names.push(name);
  }
  return names;
}
