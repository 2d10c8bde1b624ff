import type { Account } from "./account.js";
import { readNumber, readString, type WireRecord } from "./json.js";
import {
  ApiModel,
  collectCustomFields,
  compactRecord,
  type ModelCodec,
} from "./model.js";

export interface GroupAttributes {
  group_id?: number;
  group_name?: string;
  group_type?: string;
}

const GROUP_ATTRIBUTES = ["group_id", "group_name", "group_type"];

export const groupCodec: ModelCodec<GroupAttributes> = {
  identity: "group_id",
  parse: (raw) => ({
    attributes: {
      group_id: readNumber(raw, "group_id"),
      group_name: readString(raw, "group_name"),
      group_type: readString(raw, "group_type"),
    },
    fields: collectCustomFields(raw, GROUP_ATTRIBUTES),
  }),
  encode: (attributes) =>
    compactRecord({
      group_id: attributes.group_id,
      group_name: attributes.group_name,
      group_type: attributes.group_type,
    }),
};

export class Group extends ApiModel<GroupAttributes> {
  constructor(account: Account, raw?: WireRecord) {
    super(account, groupCodec, raw);
  }
}
