import type { Account } from "./account.js";
import { Collection } from "./collection.js";
import { formatWireDate, readDate } from "./dates.js";
import { MemberStatus, Status } from "./enumeration.js";
import {
  MemberUpdateError,
  MissingEmailError,
  MissingIdentifierError,
  MissingStatusError,
  UnexpectedResponseError,
} from "./errors.js";
import { Group } from "./group.js";
import {
  isWireRecord,
  readBoolean,
  readNumber,
  readString,
  toRecordList,
  type JsonValue,
  type WireRecord,
} from "./json.js";
import { Mailing } from "./mailing.js";
import {
  ApiModel,
  collectCustomFields,
  compactRecord,
  type ModelCodec,
} from "./model.js";

export interface MemberAttributes {
  member_id?: number;
  email?: string;
  status?: MemberStatus;
  member_since?: Date;
  last_modified_at?: Date;
  plaintext_preferred?: boolean;
}

const MEMBER_ATTRIBUTES = [
  "member_id",
  "email",
  "status",
  "member_since",
  "last_modified_at",
  "plaintext_preferred",
];

// Superseded by the resolved `status`.
const MEMBER_WIRE_INTERNAL = ["member_status_id"];

// Only these statuses may be sent as an update's `status_to`.
const TRANSITION_STATUSES: ReadonlySet<MemberStatus> = new Set([
  MemberStatus.Active,
  MemberStatus.Error,
  MemberStatus.OptOut,
]);

export const memberCodec: ModelCodec<MemberAttributes> = {
  identity: "member_id",
  parse: (raw) => {
    const status = readString(raw, "status");
    return {
      attributes: {
        member_id: readNumber(raw, "member_id"),
        email: readString(raw, "email"),
        status: status === undefined ? undefined : Status.from(status),
        member_since: readDate(raw, "member_since"),
        last_modified_at: readDate(raw, "last_modified_at"),
        plaintext_preferred: readBoolean(raw, "plaintext_preferred"),
      },
      fields: collectCustomFields(raw, MEMBER_ATTRIBUTES, MEMBER_WIRE_INTERNAL),
    };
  },
  encode: (attributes) =>
    compactRecord({
      member_id: attributes.member_id,
      email: attributes.email,
      status:
        attributes.status === undefined
          ? undefined
          : Status.code(attributes.status),
      member_since:
        attributes.member_since && formatWireDate(attributes.member_since),
      last_modified_at:
        attributes.last_modified_at &&
        formatWireDate(attributes.last_modified_at),
      plaintext_preferred: attributes.plaintext_preferred,
    }),
};

/**
 * A single audience member. `save` creates the member when it has no
 * `member_id` yet and updates it otherwise; local state only changes once
 * the server has accepted the write.
 */
export class Member extends ApiModel<MemberAttributes> {
  readonly groups: MemberGroupCollection;
  readonly mailings: MemberMailingCollection;

  constructor(account: Account, raw?: WireRecord) {
    super(account, memberCodec, raw);
    this.groups = new MemberGroupCollection(this);
    this.mailings = new MemberMailingCollection(this);
  }

  protected assertExtractable(): void {
    if (!this.attributes.email) {
      throw new MissingEmailError();
    }
  }

  async save(signupFormId?: number): Promise<void> {
    const memberId = this.attributes.member_id;
    if (memberId === undefined) {
      return this.add(signupFormId);
    }
    return this.update(memberId);
  }

  private async add(signupFormId?: number): Promise<void> {
    const path = "/members/add";
    const data = await this.extract();
    if (this.groups.size > 0) {
      data.group_ids = Array.from(this.groups.cached().values()).map(
        (group) => {
          const groupId = group.get("group_id");
          if (groupId === undefined) {
            throw new MissingIdentifierError("group_id");
          }
          return groupId;
        },
      );
    }
    if (signupFormId !== undefined) {
      data.signup_form_id = signupFormId;
    }

    const outcome = await this.account.adapter.post(path, data);
    if (!isWireRecord(outcome)) {
      throw new UnexpectedResponseError(path, outcome);
    }
    const statusCode = readString(outcome, "status");
    if (statusCode === undefined) {
      throw new UnexpectedResponseError(path, outcome);
    }
    const status = Status.from(statusCode);
    const memberId = outcome.added ? readNumber(outcome, "member_id") : undefined;
    if (outcome.added && memberId === undefined) {
      throw new UnexpectedResponseError(path, outcome);
    }

    this.attributes.status = status;
    if (memberId !== undefined) {
      this.attributes.member_id = memberId;
    }
  }

  private async update(memberId: number): Promise<void> {
    const path = `/members/${memberId}`;
    const data = await this.extract();
    const status = this.attributes.status;
    if (status !== undefined && TRANSITION_STATUSES.has(status)) {
      data.status_to = Status.code(status);
    }

    const result = await this.account.adapter.put(path, data);
    if (!result) {
      throw new MemberUpdateError(memberId);
    }
  }

  /**
   * Opts this member out of all future mailings on the account. Resolves
   * to `false`, leaving the status untouched, when the server did not
   * acknowledge the opt-out.
   */
  async optOut(): Promise<boolean> {
    const email = this.attributes.email;
    if (!email) {
      throw new MissingEmailError();
    }

    const path = `/members/email/optout/${encodeURIComponent(email)}`;
    const result = await this.account.adapter.put(path);
    if (!result) {
      return false;
    }
    this.attributes.status = MemberStatus.OptOut;
    return true;
  }

  hasOptedOut(): boolean {
    const status = this.attributes.status;
    if (status === undefined) {
      throw new MissingStatusError();
    }
    return status === MemberStatus.OptOut;
  }

  async getOptOutDetail(): Promise<JsonValue | null> {
    const memberId = this.attributes.member_id;
    if (memberId === undefined) {
      throw new MissingIdentifierError();
    }
    if (this.attributes.status !== MemberStatus.OptOut) {
      return [];
    }

    return this.account.adapter.get(`/members/${memberId}/optout`);
  }
}

abstract class MemberRelation<K, E> extends Collection<K, E> {
  constructor(protected readonly member: Member) {
    super(member.account.adapter);
  }

  protected assertReady(): void {
    if (!this.member.has("member_id")) {
      throw new MissingIdentifierError();
    }
  }

  protected async loadRecords(relation: string): Promise<WireRecord[]> {
    const path = `/members/${this.member.get("member_id")}/${relation}`;
    return toRecordList(await this.adapter.get(path), path);
  }
}

/** The groups a member belongs to, keyed by group name. */
export class MemberGroupCollection extends MemberRelation<string, Group> {
  /**
   * Stages a group locally, e.g. before a new member is first saved. A
   * staged group counts as loaded, so `fetchAll` will not fetch after it.
   */
  add(group: Group): this {
    const name = group.get("group_name");
    if (name === undefined) {
      throw new MissingIdentifierError("group_name");
    }
    if (!group.has("group_id")) {
      throw new MissingIdentifierError("group_id");
    }
    this.store(name, group);
    return this;
  }

  protected async load(): Promise<Map<string, Group>> {
    const records = await this.loadRecords("groups");
    return this.index(
      records.map((raw) => new Group(this.member.account, raw)),
      "group_name",
      (group) => group.get("group_name"),
    );
  }
}

/** The mailings a member has been sent, keyed by mailing id. */
export class MemberMailingCollection extends MemberRelation<number, Mailing> {
  protected async load(): Promise<Map<number, Mailing>> {
    const records = await this.loadRecords("mailings");
    return this.index(
      records.map((raw) => new Mailing(this.member.account, raw)),
      "mailing_id",
      (mailing) => mailing.get("mailing_id"),
    );
  }
}
