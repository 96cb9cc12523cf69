/*
Extract `name = literal` assignments from the source of a notebook's
parameters cell.

Only a restricted grammar is understood:

  statement  := target "=" (target "=")* literal
              | NAME ":" annotation "=" literal
  target     := NAME
  literal    := number | string+ | True | False | None
              | "(" [items] ")" | "[" [items] "]" | "{" [dict or set items] "}"
              | ("-" | "+") number

Statements that do not fit (calls, names on the right-hand side, augmented
assignments, unpacking, imports, ...) are skipped. Nothing is ever evaluated.
*/

import { setOwn } from "./misc";
import { isFloatLiteral, PyFloat, pyStr, type PyValue } from "./python-format";

type StringToken = { type: "string" | "invalid"; value: string };

type Token =
  | { type: "name"; value: string }
  | { type: "number"; value: number | PyFloat }
  | { type: "op"; value: string }
  | StringToken;

const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...",
  "==", "!=", "<=", ">=", "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=",
  "@=", "->", ":=", "**", "//", "<<", ">>",
  "=", ":", ",", "(", ")", "[", "]", "{", "}", "+", "-", "*", "/", "%",
  ".", "<", ">", "&", "|", "^", "~", "@", ";",
];

const NUMBER =
  /^(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?)[jJ]?/;

const NAME = /^[A-Za-z_][A-Za-z0-9_]*/;

const STRING_PREFIX = /^(?:[rRbBuU]|[rR][bB]|[bB][rR])?(?='|")/;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

function parseNumber(text: string): number | PyFloat | undefined {
  if (/[jJ]$/.test(text)) {
    // complex numbers have no counterpart here
    return;
  }
  const raw = text.replace(/_/g, "");
  const prefix = raw.slice(0, 2).toLowerCase();
  if (prefix === "0x") return parseInt(raw.slice(2), 16);
  if (prefix === "0o") return parseInt(raw.slice(2), 8);
  if (prefix === "0b") return parseInt(raw.slice(2), 2);
  if (/^0\d+$/.test(raw) && /[1-9]/.test(raw)) {
    // python 3 rejects leading zeros in decimal integers
    return;
  }
  const n = Number(raw);
  if (Number.isNaN(n)) return;
  return isFloatLiteral(raw) ? new PyFloat(n) : n;
}

function unescape(body: string): string {
  let out = "";
  for (let i = 0; i < body.length; i += 1) {
    const c = body[i];
    if (c !== "\\" || i === body.length - 1) {
      out += c;
      continue;
    }
    const next = body[i + 1];
    if (next === "\n") {
      i += 1;
      continue;
    }
    if (next in SIMPLE_ESCAPES) {
      out += SIMPLE_ESCAPES[next];
      i += 1;
      continue;
    }
    const octal = /^[0-7]{1,3}/.exec(body.slice(i + 1));
    if (octal != null) {
      out += String.fromCharCode(parseInt(octal[0], 8));
      i += octal[0].length;
      continue;
    }
    const hex =
      next === "x"
        ? body.slice(i + 2, i + 4)
        : next === "u"
          ? body.slice(i + 2, i + 6)
          : next === "U"
            ? body.slice(i + 2, i + 10)
            : undefined;
    if (hex != null && /^[0-9a-fA-F]+$/.test(hex)) {
      const expected = next === "x" ? 2 : next === "u" ? 4 : 8;
      if (hex.length === expected) {
        out += String.fromCodePoint(parseInt(hex, 16));
        i += 1 + expected;
        continue;
      }
    }
    // unknown escapes keep their backslash
    out += c;
  }
  return out;
}

class Tokenizer {
  private pos = 0;
  private depth = 0;

  constructor(private readonly src: string) {}

  // Logical lines, each a list of tokens.
  statements(): Token[][] {
    const statements: Token[][] = [];
    let current: Token[] = [];
    // statements nested in a block are not top-level assignments
    let nested = false;
    const flush = () => {
      if (current.length > 0 && !nested) statements.push(current);
      current = [];
      nested = false;
    };
    while (this.pos < this.src.length) {
      const c = this.src[this.pos];
      if (c === "#") {
        while (this.pos < this.src.length && this.src[this.pos] !== "\n") {
          this.pos += 1;
        }
        continue;
      }
      if (c === "\\" && this.src[this.pos + 1] === "\n") {
        this.pos += 2;
        continue;
      }
      if (c === "\n") {
        this.pos += 1;
        if (this.depth === 0) flush();
        continue;
      }
      if (/\s/.test(c)) {
        this.pos += 1;
        continue;
      }
      const start = this.pos;
      const token = this.next();
      if (token.type === "op") {
        if ("([{".includes(token.value)) this.depth += 1;
        if (")]}".includes(token.value)) this.depth = Math.max(0, this.depth - 1);
        if (token.value === ";" && this.depth === 0) {
          flush();
          continue;
        }
      }
      if (current.length === 0) nested = this.indented(start);
      current.push(token);
    }
    flush();
    return statements;
  }

  private indented(pos: number): boolean {
    const lineStart = this.src.lastIndexOf("\n", pos - 1) + 1;
    return /[ \t]/.test(this.src[lineStart] ?? "") && lineStart < pos;
  }

  private next(): Token {
    const rest = this.src.slice(this.pos);

    const prefix = rest.match(STRING_PREFIX);
    if (prefix != null) {
      return this.string(prefix[0]);
    }
    if (/^[fF]{1}[rR]?['"]|^[rR][fF]['"]/.test(rest)) {
      // f-strings are expressions, not literals
      const token = this.string(rest.match(/^[A-Za-z]+/)?.[0] ?? "");
      return { type: "invalid", value: token.value };
    }

    const number = rest.match(NUMBER);
    if (number != null && number[0] !== ".") {
      this.pos += number[0].length;
      const value = parseNumber(number[0]);
      return value == null
        ? { type: "invalid", value: number[0] }
        : { type: "number", value };
    }

    const name = rest.match(NAME);
    if (name != null) {
      this.pos += name[0].length;
      return { type: "name", value: name[0] };
    }

    for (const op of OPERATORS) {
      if (rest.startsWith(op)) {
        this.pos += op.length;
        return { type: "op", value: op };
      }
    }

    this.pos += 1;
    return { type: "invalid", value: rest[0] };
  }

  private string(prefix: string): StringToken {
    const raw = /[rR]/.test(prefix);
    let i = this.pos + prefix.length;
    const triple = this.src.startsWith(this.src[i].repeat(3), i)
      ? this.src[i].repeat(3)
      : undefined;
    const quote = triple ?? this.src[i];
    i += quote.length;
    const start = i;
    while (i < this.src.length) {
      if (this.src[i] === "\\") {
        i += 2;
        continue;
      }
      if (this.src.startsWith(quote, i)) {
        const body = this.src.slice(start, i);
        this.pos = i + quote.length;
        return { type: "string", value: raw ? body : unescape(body) };
      }
      if (!triple && this.src[i] === "\n") {
        break;
      }
      i += 1;
    }
    // unterminated: swallow the rest of the line
    const end = this.src.indexOf("\n", i);
    this.pos = end === -1 ? this.src.length : end;
    return { type: "invalid", value: this.src.slice(start - quote.length, this.pos) };
  }
}

type Sequence = { values: PyValue[]; sawComma: boolean };

class LiteralParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  // Parse the whole token list as one literal, or return undefined.
  parse(): { value: PyValue } | undefined {
    const seq = this.sequence(undefined);
    if (seq == null || seq.values.length === 0) return;
    if (this.pos !== this.tokens.length) return;
    // a bare comma separated sequence is a tuple
    const value =
      seq.values.length === 1 && !seq.sawComma ? seq.values[0] : seq.values;
    return { value };
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isOp(value: string): boolean {
    const t = this.peek();
    return t?.type === "op" && t.value === value;
  }

  // Comma separated literals, stopping before `close` (not consumed).
  private sequence(close: string | undefined): Sequence | undefined {
    const values: PyValue[] = [];
    let sawComma = false;
    while (this.peek() != null && !(close != null && this.isOp(close))) {
      const value = this.atom();
      if (value === undefined) return;
      values.push(value);
      if (!this.isOp(",")) break;
      sawComma = true;
      this.pos += 1;
    }
    return { values, sawComma };
  }

  private closed(seq: Sequence | undefined, close: string): Sequence | undefined {
    if (seq == null || !this.isOp(close)) return;
    this.pos += 1;
    return seq;
  }

  private atom(): PyValue | undefined {
    const t = this.peek();
    if (t == null) return;
    this.pos += 1;
    switch (t.type) {
      case "number":
        return t.value;
      case "string": {
        let s = t.value;
        for (let next = this.peek(); next?.type === "string"; next = this.peek()) {
          s += next.value;
          this.pos += 1;
        }
        return s;
      }
      case "name":
        if (t.value === "True") return true;
        if (t.value === "False") return false;
        if (t.value === "None") return null;
        return;
      case "invalid":
        return;
      case "op":
        return this.compound(t.value);
    }
  }

  private compound(op: string): PyValue | undefined {
    switch (op) {
      case "-":
      case "+": {
        const t = this.peek();
        if (t?.type !== "number") return;
        this.pos += 1;
        if (op === "+") return t.value;
        return t.value instanceof PyFloat ? new PyFloat(-t.value.value) : -t.value;
      }
      case "(": {
        const seq = this.closed(this.sequence(")"), ")");
        if (seq == null) return;
        // (x) is just x, (x,) and () are tuples
        return seq.values.length === 1 && !seq.sawComma ? seq.values[0] : seq.values;
      }
      case "[":
        return this.closed(this.sequence("]"), "]")?.values;
      case "{":
        return this.braces();
      default:
        return;
    }
  }

  private braces(): PyValue | undefined {
    if (this.isOp("}")) {
      this.pos += 1;
      return {};
    }
    const first = this.atom();
    if (first === undefined) return;
    if (!this.isOp(":")) {
      // a set literal
      if (this.isOp("}")) {
        this.pos += 1;
        return [first];
      }
      if (!this.isOp(",")) return;
      this.pos += 1;
      const rest = this.closed(this.sequence("}"), "}");
      return rest == null ? undefined : [first, ...rest.values];
    }
    const dict: { [key: string]: PyValue } = {};
    let key: PyValue = first;
    for (;;) {
      if (!this.isOp(":")) return;
      this.pos += 1;
      const value = this.atom();
      if (value === undefined) return;
      if (key !== null && typeof key === "object" && !(key instanceof PyFloat)) {
        // lists and dicts are not hashable
        return;
      }
      setOwn(dict, pyStr(key), value);
      if (this.isOp("}")) {
        this.pos += 1;
        return dict;
      }
      if (!this.isOp(",")) return;
      this.pos += 1;
      if (this.isOp("}")) {
        this.pos += 1;
        return dict;
      }
      const next = this.atom();
      if (next === undefined) return;
      key = next;
    }
  }
}

const KEYWORDS = new Set([
  "if", "elif", "else", "for", "while", "with", "try", "except", "finally",
  "def", "class", "lambda", "return", "import", "from", "global", "nonlocal",
  "del", "assert", "raise", "pass", "break", "continue", "yield", "async", "await",
]);

function assignmentTargets(
  tokens: Token[],
): { targets: string[]; rest: Token[] } | undefined {
  const [first, second] = tokens;
  if (first == null || (first.type === "name" && KEYWORDS.has(first.value))) return;
  if (first.type === "name" && second?.type === "op" && second.value === ":") {
    // annotated assignment: skip the annotation up to the top-level "="
    let depth = 0;
    for (let i = 2; i < tokens.length; i += 1) {
      const t = tokens[i];
      if (t.type !== "op") continue;
      if ("([{".includes(t.value)) depth += 1;
      else if (")]}".includes(t.value)) depth -= 1;
      else if (t.value === "=" && depth === 0) {
        return { targets: [first.value], rest: tokens.slice(i + 1) };
      }
    }
    return;
  }
  const targets: string[] = [];
  let i = 0;
  for (;;) {
    const name = tokens[i];
    const eq = tokens[i + 1];
    if (name?.type !== "name" || eq?.type !== "op" || eq.value !== "=") break;
    targets.push(name.value);
    i += 2;
  }
  if (targets.length === 0) return;
  return { targets, rest: tokens.slice(i) };
}

/**
 * Top-level `name = literal` assignments of `src`, in source order. Later
 * assignments to the same name win.
 */
export function parseAssignments(src: string): Record<string, PyValue> {
  const result: Record<string, PyValue> = {};
  for (const statement of new Tokenizer(src).statements()) {
    const assignment = assignmentTargets(statement);
    if (assignment == null || assignment.rest.length === 0) continue;
    const parsed = new LiteralParser(assignment.rest).parse();
    if (parsed == null) continue;
    for (const target of assignment.targets) {
      setOwn(result, target, parsed.value);
    }
  }
  return result;
}
