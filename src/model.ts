import type { Account } from "./account.js";
import { isWireRecord, type JsonValue, type WireRecord } from "./json.js";

export interface ParsedRecord<TAttrs> {
  attributes: TAttrs;
  fields: WireRecord;
}

/**
 * Per-entity translation between wire records and typed attributes.
 * `parse` must resolve every enumeration and date attribute it knows.
 */
export interface ModelCodec<TAttrs> {
  identity: keyof TAttrs & string;
  parse(raw: WireRecord): ParsedRecord<TAttrs>;
  encode(attributes: TAttrs): WireRecord;
}

/**
 * Collects the custom-field bucket of a raw record: the entries of its
 * nested `fields` object plus every top-level key the entity does not
 * recognize. Keys listed in `dropped` are discarded.
 */
export function collectCustomFields(
  raw: WireRecord,
  known: readonly string[],
  dropped: readonly string[] = [],
): WireRecord {
  const skip = new Set([...known, ...dropped, "fields"]);
  const fields: WireRecord = {};
  Object.entries(raw).forEach(([key, value]) => {
    if (!skip.has(key)) fields[key] = value;
  });
  if (isWireRecord(raw.fields)) {
    Object.assign(fields, raw.fields);
  }
  return fields;
}

export function compactRecord(
  entries: Record<string, JsonValue | undefined>,
): WireRecord {
  const record: WireRecord = {};
  Object.entries(entries).forEach(([key, value]) => {
    if (value !== undefined) record[key] = value;
  });
  return record;
}

export abstract class ApiModel<TAttrs extends object> {
  protected attributes: TAttrs;
  protected fields: WireRecord;

  protected constructor(
    readonly account: Account,
    private readonly codec: ModelCodec<TAttrs>,
    raw?: WireRecord,
  ) {
    const parsed = codec.parse(raw ?? {});
    this.attributes = parsed.attributes;
    this.fields = parsed.fields;
  }

  get<K extends keyof TAttrs>(key: K): TAttrs[K] {
    return this.attributes[key];
  }

  set<K extends keyof TAttrs>(key: K, value: TAttrs[K]): this {
    this.attributes[key] = value;
    return this;
  }

  has(key: keyof TAttrs): boolean {
    return this.attributes[key] !== undefined;
  }

  /** True until the server has assigned this entity its identifier. */
  isNew(): boolean {
    return !this.has(this.codec.identity);
  }

  getField(name: string): JsonValue | undefined {
    return Object.prototype.hasOwnProperty.call(this.fields, name)
      ? this.fields[name]
      : undefined;
  }

  setField(name: string, value: JsonValue): this {
    this.fields[name] = value;
    return this;
  }

  removeField(name: string): boolean {
    if (!Object.prototype.hasOwnProperty.call(this.fields, name)) return false;
    delete this.fields[name];
    return true;
  }

  customFields(): WireRecord {
    return { ...this.fields };
  }

  toWire(): WireRecord {
    return { ...this.fields, ...this.codec.encode(this.attributes) };
  }

  protected defaultTopLevel(): string[] {
    return [this.codec.identity, "email"];
  }

  protected assertExtractable(): void {}

  /**
   * Projects the entity into a write body. Keys in `topLevel` stay at the
   * top; any other key the account lists as a field shortcut is nested
   * under `fields`; everything else is left out.
   */
  async extract(
    topLevel: readonly string[] = this.defaultTopLevel(),
  ): Promise<WireRecord> {
    this.assertExtractable();

    const shortcuts = new Set(await this.account.fields.exportShortcuts());
    const top = new Set(topLevel);
    const data: WireRecord = {};
    const fields: WireRecord = {};
    Object.entries(this.toWire()).forEach(([key, value]) => {
      if (top.has(key)) {
        data[key] = value;
      } else if (shortcuts.has(key)) {
        fields[key] = value;
      }
    });

    if (Object.keys(fields).length > 0) {
      data.fields = fields;
    }
    return data;
  }
}
