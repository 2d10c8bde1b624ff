export {
  Account,
  AccountFieldCollection,
  AccountImportCollection,
  AccountMemberCollection,
} from "./account.js";
export { default as FetchAdapter } from "./fetch-adapter.js";
export { Collection } from "./collection.js";
export { ApiModel, collectCustomFields, compactRecord } from "./model.js";
export {
  Member,
  MemberGroupCollection,
  MemberMailingCollection,
  memberCodec,
} from "./member.js";
export { Group, groupCodec } from "./group.js";
export { Mailing, mailingCodec } from "./mailing.js";
export { MemberImport, memberImportCodec } from "./member-import.js";
export { Field, fieldCodec } from "./field.js";
export {
  defineEnumeration,
  ImportStatus,
  ImportStatusValue,
  ImportStyle,
  ImportStyleValue,
  MailingStatus,
  MailingStatusValue,
  MemberStatus,
  Status,
} from "./enumeration.js";
export { formatWireDate, parseWireDate, readDate } from "./dates.js";
export {
  isWireRecord,
  readBoolean,
  readNumber,
  readString,
  toRecordList,
} from "./json.js";
export {
  ApiRequestFailed,
  EmmaError,
  InvalidFieldError,
  MemberUpdateError,
  MissingEmailError,
  MissingIdentifierError,
  MissingRequiredFieldError,
  MissingStatusError,
  UnexpectedResponseError,
  UnknownCodeError,
} from "./errors.js";
export {
  configFromEnv,
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  validateConfig,
} from "./config.js";

export type { Adapter, QueryParams } from "./adapter.js";
export type { EmmaConfig } from "./config.js";
export type { Enumeration, EnumerationEntry } from "./enumeration.js";
export type { JsonPrimitive, JsonValue, WireRecord } from "./json.js";
export type { ModelCodec, ParsedRecord } from "./model.js";
export type { MemberAttributes } from "./member.js";
export type { GroupAttributes } from "./group.js";
export type { MailingAttributes } from "./mailing.js";
export type { MemberImportAttributes } from "./member-import.js";
export type { FieldAttributes } from "./field.js";
