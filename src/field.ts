import type { Account } from "./account.js";
import { readNumber, readString, type WireRecord } from "./json.js";
import {
  ApiModel,
  collectCustomFields,
  compactRecord,
  type ModelCodec,
} from "./model.js";

/** An account-defined member field; its `shortcut_name` is the wire key. */
export interface FieldAttributes {
  field_id?: number;
  shortcut_name?: string;
  display_name?: string;
  field_type?: string;
}

const FIELD_ATTRIBUTES = [
  "field_id",
  "shortcut_name",
  "display_name",
  "field_type",
];

export const fieldCodec: ModelCodec<FieldAttributes> = {
  identity: "field_id",
  parse: (raw) => ({
    attributes: {
      field_id: readNumber(raw, "field_id"),
      shortcut_name: readString(raw, "shortcut_name"),
      display_name: readString(raw, "display_name"),
      field_type: readString(raw, "field_type"),
    },
    fields: collectCustomFields(raw, FIELD_ATTRIBUTES),
  }),
  encode: (attributes) =>
    compactRecord({
      field_id: attributes.field_id,
      shortcut_name: attributes.shortcut_name,
      display_name: attributes.display_name,
      field_type: attributes.field_type,
    }),
};

export class Field extends ApiModel<FieldAttributes> {
  constructor(account: Account, raw?: WireRecord) {
    super(account, fieldCodec, raw);
  }
}
