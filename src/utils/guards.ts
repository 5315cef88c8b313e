// Narrowing helpers for untrusted input (JSON files, environment, saves)

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

export function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

export function isInteger(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x);
}

export function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

export function isString(x: unknown): x is string {
  return typeof x === "string";
}

export function isStringArray(x: unknown): x is Array<string> {
  return Array.isArray(x) && x.every(isString);
}

export type Mutable<T> = { -readonly [K in keyof T]: T[K] };
