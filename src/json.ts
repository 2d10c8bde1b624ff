import { InvalidFieldError, UnexpectedResponseError } from "./errors.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type WireRecord = { [key: string]: JsonValue };

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

export const isWireRecord = (value: unknown): value is WireRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function readNumber(raw: WireRecord, field: string): number | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && NUMERIC_STRING.test(value)) {
    return Number(value);
  }
  throw new InvalidFieldError(field, value);
}

export function readString(raw: WireRecord, field: string): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  throw new InvalidFieldError(field, value);
}

export function readBoolean(
  raw: WireRecord,
  field: string,
): boolean | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "boolean") return value;
  throw new InvalidFieldError(field, value);
}

// A 404 on a relation path decodes to null; treat it as an empty relation.
export function toRecordList(value: JsonValue | null, path: string): WireRecord[] {
  if (value === null) return [];
  if (!Array.isArray(value)) {
    throw new UnexpectedResponseError(path, value);
  }
  return value.map((entry) => {
    if (!isWireRecord(entry)) {
      throw new UnexpectedResponseError(path, value);
    }
    return entry;
  });
}
