import { UnknownCodeError } from "./errors.js";

export interface EnumerationEntry {
  code: string;
  label: string;
}

export interface Enumeration<V extends string> {
  readonly name: string;
  readonly values: readonly V[];
  from(code: string): V;
  code(value: V): string;
  label(value: V): string;
  has(code: string): boolean;
}

/**
 * Builds a closed set of string variants from a code table. `from` accepts
 * the short wire code, the variant itself, or its label, case-insensitively.
 */
export function defineEnumeration<V extends string>(
  name: string,
  table: Readonly<Record<V, EnumerationEntry>>,
): Enumeration<V> {
  const isVariant = (key: string): key is V =>
    Object.prototype.hasOwnProperty.call(table, key);

  const values = Object.freeze(Object.keys(table).filter(isVariant));
  const lookup = new Map<string, V>();
  values.forEach((value) => {
    const entry = table[value];
    lookup.set(entry.code.toLowerCase(), value);
    lookup.set(value.toLowerCase(), value);
    lookup.set(entry.label.toLowerCase(), value);
  });

  return Object.freeze({
    name,
    values,
    from(code: string): V {
      const value = lookup.get(code.trim().toLowerCase());
      if (value === undefined) {
        throw new UnknownCodeError(name, code);
      }
      return value;
    },
    code: (value: V) => table[value].code,
    label: (value: V) => table[value].label,
    has: (code: string) => lookup.has(code.trim().toLowerCase()),
  });
}

export const MemberStatus = {
  Active: "active",
  Error: "error",
  Forwarded: "forwarded",
  OptOut: "optout",
} as const;
export type MemberStatus = (typeof MemberStatus)[keyof typeof MemberStatus];

export const Status = defineEnumeration<MemberStatus>("member status", {
  active: { code: "a", label: "Active" },
  error: { code: "e", label: "Error" },
  forwarded: { code: "f", label: "Forwarded" },
  optout: { code: "o", label: "Opt-out" },
});

export const ImportStatusValue = {
  Ok: "ok",
  Error: "error",
  Queued: "queued",
  Processing: "processing",
} as const;
export type ImportStatusValue =
  (typeof ImportStatusValue)[keyof typeof ImportStatusValue];

export const ImportStatus = defineEnumeration<ImportStatusValue>(
  "import status",
  {
    ok: { code: "o", label: "Ok" },
    error: { code: "e", label: "Error" },
    queued: { code: "q", label: "Queued" },
    processing: { code: "p", label: "Processing" },
  },
);

export const ImportStyleValue = {
  AddOnly: "add_only",
  AddAndUpdate: "add_and_update",
} as const;
export type ImportStyleValue =
  (typeof ImportStyleValue)[keyof typeof ImportStyleValue];

export const ImportStyle = defineEnumeration<ImportStyleValue>("import style", {
  add_only: { code: "a", label: "Add only" },
  add_and_update: { code: "u", label: "Add and update" },
});

export const MailingStatusValue = {
  Pending: "pending",
  Paused: "paused",
  Sending: "sending",
  Canceled: "canceled",
  Complete: "complete",
  Unapproved: "unapproved",
  Failed: "failed",
} as const;
export type MailingStatusValue =
  (typeof MailingStatusValue)[keyof typeof MailingStatusValue];

export const MailingStatus = defineEnumeration<MailingStatusValue>(
  "mailing status",
  {
    pending: { code: "p", label: "Pending" },
    paused: { code: "a", label: "Paused" },
    sending: { code: "s", label: "Sending" },
    canceled: { code: "x", label: "Canceled" },
    complete: { code: "c", label: "Complete" },
    unapproved: { code: "u", label: "Unapproved" },
    failed: { code: "f", label: "Failed" },
  },
);
