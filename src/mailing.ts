import type { Account } from "./account.js";
import { formatWireDate, readDate } from "./dates.js";
import { MailingStatus, type MailingStatusValue } from "./enumeration.js";
import { readNumber, readString, type WireRecord } from "./json.js";
import {
  ApiModel,
  collectCustomFields,
  compactRecord,
  type ModelCodec,
} from "./model.js";

export interface MailingAttributes {
  mailing_id?: number;
  name?: string;
  subject?: string;
  mailing_status?: MailingStatusValue;
  delivery_ts?: Date;
  send_started?: Date;
  send_finished?: Date;
  clicked?: Date;
  opened?: Date;
}

const MAILING_DATES = [
  "delivery_ts",
  "send_started",
  "send_finished",
  "clicked",
  "opened",
] as const;

const MAILING_ATTRIBUTES = [
  "mailing_id",
  "name",
  "subject",
  "mailing_status",
  ...MAILING_DATES,
];

export const mailingCodec: ModelCodec<MailingAttributes> = {
  identity: "mailing_id",
  parse: (raw) => {
    const status = readString(raw, "mailing_status");
    const attributes: MailingAttributes = {
      mailing_id: readNumber(raw, "mailing_id"),
      name: readString(raw, "name"),
      subject: readString(raw, "subject"),
      mailing_status:
        status === undefined ? undefined : MailingStatus.from(status),
    };
    MAILING_DATES.forEach((field) => {
      attributes[field] = readDate(raw, field);
    });
    return {
      attributes,
      fields: collectCustomFields(raw, MAILING_ATTRIBUTES),
    };
  },
  encode: ({ mailing_status, ...attributes }) => {
    const record = compactRecord({
      mailing_id: attributes.mailing_id,
      name: attributes.name,
      subject: attributes.subject,
      mailing_status:
        mailing_status === undefined
          ? undefined
          : MailingStatus.code(mailing_status),
    });
    MAILING_DATES.forEach((field) => {
      const value = attributes[field];
      if (value !== undefined) record[field] = formatWireDate(value);
    });
    return record;
  },
};

export class Mailing extends ApiModel<MailingAttributes> {
  constructor(account: Account, raw?: WireRecord) {
    super(account, mailingCodec, raw);
  }
}
