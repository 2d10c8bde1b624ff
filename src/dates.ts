import { InvalidFieldError } from "./errors.js";
import type { WireRecord } from "./json.js";

const WIRE_DATE_PREFIX = "@D:";
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

export function parseWireDate(value: string, field: string): Date {
  const text = value.startsWith(WIRE_DATE_PREFIX)
    ? value.slice(WIRE_DATE_PREFIX.length)
    : value;
  // The API sends naive timestamps; they are UTC.
  const isoText = text.replace(/^(\d{4}-\d{2}-\d{2}) /, "$1T");
  const normalized =
    isoText.includes("T") && !HAS_ZONE.test(isoText) ? `${isoText}Z` : isoText;
  const date = new Date(normalized);
  if (text === "" || Number.isNaN(date.getTime())) {
    throw new InvalidFieldError(field, value);
  }
  return date;
}

export function formatWireDate(date: Date): string {
  return `${WIRE_DATE_PREFIX}${date.toISOString().slice(0, 19)}`;
}

export function readDate(raw: WireRecord, field: string): Date | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidFieldError(field, value);
  }
  return parseWireDate(value, field);
}
