import { ConfigError } from "./errors.js";

export type Fields = Record<string, unknown>;

export function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function ensureRecord(value: unknown, code: string, message: string): Fields {
  if (!isRecord(value)) {
    throw new ConfigError(code, message);
  }
  return value;
}

export function ensureArray(value: unknown, code: string, message: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(code, message);
  }
  return value;
}

export function ensureNonEmptyString(value: unknown, code: string, message: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigError(code, message);
  }
  return value;
}

export function ensureStringArray(value: unknown, code: string, message: string): string[] {
  const items = ensureArray(value, code, message);
  const out: string[] = [];
  for (const item of items) {
    if (typeof item !== "string") {
      throw new ConfigError(code, message);
    }
    out.push(item);
  }
  return out;
}

export function ensureFiniteNumber(value: unknown, code: string, message: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(code, message);
  }
  return value;
}

export function ensurePositiveInteger(value: unknown, code: string, message: string): number {
  const n = ensureFiniteNumber(value, code, message);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(code, message);
  }
  return n;
}

export function optionalString(value: unknown, code: string, message: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(code, message);
  }
  return value;
}

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (!isRecord(value)) return JSON.stringify(value);
  const keys = Object.keys(value)
    .filter((k) => value[k] !== undefined)
    .sort();
  const body = keys.map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`);
  return `{${body.join(",")}}`;
}
