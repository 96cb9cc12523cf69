export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((x) => typeof x === "string");
}

// A finite number, or undefined.
export function finiteNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

// Matches fs errors by code, whatever realm they were created in.
export function hasErrorCode(err: unknown, code: string): boolean {
  return isRecord(err) && err.code === code;
}

/**
 * Set `obj[key]` as an own enumerable property, so that keys such as
 * "__proto__" are kept instead of changing the prototype.
 */
export function setOwn<T>(obj: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(obj, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
