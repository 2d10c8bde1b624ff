import type { Adapter } from "./adapter.js";
import { Collection } from "./collection.js";
import { validateConfig, type EmmaConfig } from "./config.js";
import { UnexpectedResponseError } from "./errors.js";
import FetchAdapter from "./fetch-adapter.js";
import { Field } from "./field.js";
import { isWireRecord, toRecordList, type WireRecord } from "./json.js";
import { Member } from "./member.js";
import { MemberImport } from "./member-import.js";

/**
 * Entry point for one Emma account. Pass an `adapter` to replace the
 * default `fetch` transport.
 *
 * ```ts
 * const account = new Account(configFromEnv());
 * const member = await account.members.findByEmail("someone@example.com");
 * ```
 */
export class Account {
  readonly adapter: Adapter;
  readonly fields: AccountFieldCollection;
  readonly members: AccountMemberCollection;
  readonly imports: AccountImportCollection;

  constructor(
    readonly config: EmmaConfig,
    adapter?: Adapter,
  ) {
    validateConfig(config);
    this.adapter = adapter ?? new FetchAdapter(config);
    this.fields = new AccountFieldCollection(this);
    this.members = new AccountMemberCollection(this);
    this.imports = new AccountImportCollection(this);
  }

  get accountId(): string {
    return String(this.config.accountId);
  }
}

abstract class AccountRelation<K, E> extends Collection<K, E> {
  constructor(protected readonly account: Account) {
    super(account.adapter);
  }

  protected async loadRecords(path: string): Promise<WireRecord[]> {
    return toRecordList(await this.adapter.get(path), path);
  }

  protected async findRecord(path: string): Promise<WireRecord | undefined> {
    const raw = await this.adapter.get(path);
    if (raw === null) return undefined;
    if (!isWireRecord(raw)) {
      throw new UnexpectedResponseError(path, raw);
    }
    return raw;
  }
}

/** Member fields defined on the account, keyed by field id. */
export class AccountFieldCollection extends AccountRelation<number, Field> {
  /** Shortcut names allowed as custom-field keys in member writes. */
  async exportShortcuts(): Promise<string[]> {
    const fields = await this.fetchAll();
    return Array.from(fields.values())
      .map((field) => field.get("shortcut_name"))
      .filter((name): name is string => name !== undefined);
  }

  protected async load(): Promise<Map<number, Field>> {
    const records = await this.loadRecords("/fields");
    return this.index(
      records.map((raw) => new Field(this.account, raw)),
      "field_id",
      (field) => field.get("field_id"),
    );
  }
}

export class AccountMemberCollection extends AccountRelation<number, Member> {
  /** Builds a member bound to this account without contacting the server. */
  factory(raw?: WireRecord): Member {
    return new Member(this.account, raw);
  }

  async find(memberId: number): Promise<Member | undefined> {
    const cached = this.cache?.get(memberId);
    if (cached) return cached;

    const raw = await this.findRecord(`/members/${memberId}`);
    return raw && new Member(this.account, raw);
  }

  async findByEmail(email: string): Promise<Member | undefined> {
    const raw = await this.findRecord(
      `/members/email/${encodeURIComponent(email)}`,
    );
    return raw && new Member(this.account, raw);
  }

  protected async load(): Promise<Map<number, Member>> {
    const records = await this.loadRecords("/members");
    return this.index(
      records.map((raw) => new Member(this.account, raw)),
      "member_id",
      (member) => member.get("member_id"),
    );
  }
}

export class AccountImportCollection extends AccountRelation<
  number,
  MemberImport
> {
  async find(importId: number): Promise<MemberImport | undefined> {
    const cached = this.cache?.get(importId);
    if (cached) return cached;

    const raw = await this.findRecord(`/members/imports/${importId}`);
    return raw && new MemberImport(this.account, raw);
  }

  protected async load(): Promise<Map<number, MemberImport>> {
    const records = await this.loadRecords("/members/imports");
    return this.index(
      records.map((raw) => new MemberImport(this.account, raw)),
      "import_id",
      (record) => record.get("import_id"),
    );
  }
}
