import type { Account } from "./account.js";
import { formatWireDate, readDate } from "./dates.js";
import {
  ImportStatus,
  ImportStyle,
  type ImportStatusValue,
  type ImportStyleValue,
} from "./enumeration.js";
import { readNumber, readString, type WireRecord } from "./json.js";
import {
  ApiModel,
  collectCustomFields,
  compactRecord,
  type ModelCodec,
} from "./model.js";

export interface MemberImportAttributes {
  import_id?: number;
  status?: ImportStatusValue;
  style?: ImportStyleValue;
  import_started?: Date;
  import_finished?: Date;
  num_members_added?: number;
  num_members_updated?: number;
  source_filename?: string;
}

const IMPORT_ATTRIBUTES = [
  "import_id",
  "status",
  "style",
  "import_started",
  "import_finished",
  "num_members_added",
  "num_members_updated",
  "source_filename",
];

export const memberImportCodec: ModelCodec<MemberImportAttributes> = {
  identity: "import_id",
  parse: (raw) => {
    const status = readString(raw, "status");
    const style = readString(raw, "style");
    return {
      attributes: {
        import_id: readNumber(raw, "import_id"),
        status: status === undefined ? undefined : ImportStatus.from(status),
        style: style === undefined ? undefined : ImportStyle.from(style),
        import_started: readDate(raw, "import_started"),
        import_finished: readDate(raw, "import_finished"),
        num_members_added: readNumber(raw, "num_members_added"),
        num_members_updated: readNumber(raw, "num_members_updated"),
        source_filename: readString(raw, "source_filename"),
      },
      fields: collectCustomFields(raw, IMPORT_ATTRIBUTES),
    };
  },
  encode: (attributes) =>
    compactRecord({
      import_id: attributes.import_id,
      status:
        attributes.status === undefined
          ? undefined
          : ImportStatus.code(attributes.status),
      style:
        attributes.style === undefined
          ? undefined
          : ImportStyle.code(attributes.style),
      import_started:
        attributes.import_started && formatWireDate(attributes.import_started),
      import_finished:
        attributes.import_finished &&
        formatWireDate(attributes.import_finished),
      num_members_added: attributes.num_members_added,
      num_members_updated: attributes.num_members_updated,
      source_filename: attributes.source_filename,
    }),
};

/** A bulk member import and its progress. */
export class MemberImport extends ApiModel<MemberImportAttributes> {
  constructor(account: Account, raw?: WireRecord) {
    super(account, memberImportCodec, raw);
  }
}
