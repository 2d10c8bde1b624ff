import {
  Account,
  ApiRequestFailed,
  Group,
  Member,
  MemberStatus,
  MemberUpdateError,
  MissingEmailError,
  MissingIdentifierError,
  MissingStatusError,
  UnexpectedResponseError,
} from "../src/index.js";
import { FakeAdapter, testConfig } from "./fake-adapter.js";

const setup = () => {
  const adapter = new FakeAdapter().reply("get", "/fields", [
    { field_id: 1, shortcut_name: "first_name" },
  ]);
  const account = new Account(testConfig, adapter);
  return { adapter, account };
};

describe("Member.save create path", () => {
  it("posts once and adopts the server id and status", async () => {
    const { adapter, account } = setup();
    adapter.reply("post", "/members/add", {
      added: true,
      member_id: 55,
      status: "a",
    });
    const member = new Member(account, {
      email: "new@example.com",
      first_name: "Nia",
    });

    await member.save();

    expect(member.get("member_id")).toBe(55);
    expect(member.get("status")).toBe(MemberStatus.Active);
    expect(member.isNew()).toBe(false);
    expect(adapter.callsTo("post")).toHaveLength(1);
    expect(adapter.callsTo("put")).toHaveLength(0);
    expect(adapter.callsTo("post")[0].payload).toEqual({
      email: "new@example.com",
      fields: { first_name: "Nia" },
    });
  });

  it("attaches staged groups and the signup form", async () => {
    const { adapter, account } = setup();
    adapter.reply("post", "/members/add", {
      added: true,
      member_id: 56,
      status: "a",
    });
    const member = account.members.factory({ email: "grp@example.com" });
    member.groups
      .add(new Group(account, { group_id: 1, group_name: "VIP" }))
      .add(new Group(account, { group_id: 2, group_name: "Staff" }));

    await member.save(900);

    expect(adapter.callsTo("post")[0].payload).toEqual({
      email: "grp@example.com",
      group_ids: [1, 2],
      signup_form_id: 900,
    });
  });

  it("refuses to create when a staged group lost its id", async () => {
    const { adapter, account } = setup();
    const member = new Member(account, { email: "grp@example.com" });
    const group = new Group(account, { group_id: 1, group_name: "VIP" });
    member.groups.add(group);
    group.set("group_id", undefined);

    await expect(member.save()).rejects.toThrow(MissingIdentifierError);
    expect(adapter.callsTo("post")).toHaveLength(0);
    expect(member.isNew()).toBe(true);
  });

  it("keeps the member new when the server reports an existing match", async () => {
    const { adapter, account } = setup();
    adapter.reply("post", "/members/add", { added: false, status: "o" });
    const member = new Member(account, { email: "old@example.com" });

    await member.save();

    expect(member.has("member_id")).toBe(false);
    expect(member.get("status")).toBe(MemberStatus.OptOut);
  });

  it("commits nothing when the response is malformed", async () => {
    const { adapter, account } = setup();
    adapter.reply("post", "/members/add", { added: true, status: "a" });
    const member = new Member(account, { email: "bad@example.com" });

    await expect(member.save()).rejects.toThrow(UnexpectedResponseError);
    expect(member.has("status")).toBe(false);
    expect(member.has("member_id")).toBe(false);
  });

  it("requires an email", async () => {
    const { adapter, account } = setup();
    const member = new Member(account, { first_name: "Nobody" });

    await expect(member.save()).rejects.toThrow(MissingEmailError);
    expect(adapter.calls).toHaveLength(0);
  });
});

describe("Member.save update path", () => {
  it("puts once with the transition status for Active", async () => {
    const { adapter, account } = setup();
    adapter.reply("put", "/members/55", true);
    const member = new Member(account, {
      member_id: 55,
      email: "a@example.com",
      status: "a",
    });

    await member.save();

    expect(adapter.callsTo("put")).toHaveLength(1);
    expect(adapter.callsTo("post")).toHaveLength(0);
    expect(adapter.callsTo("put", "/members/55")[0].payload).toEqual({
      member_id: 55,
      email: "a@example.com",
      status_to: "a",
    });
  });

  it("omits the transition status for Forwarded", async () => {
    const { adapter, account } = setup();
    adapter.reply("put", "/members/55", true);
    const member = new Member(account, {
      member_id: 55,
      email: "a@example.com",
      status: "f",
    });

    await member.save();

    expect(adapter.callsTo("put")[0].payload).toEqual({
      member_id: 55,
      email: "a@example.com",
    });
  });

  it("sends OptOut as a transition after a local status change", async () => {
    const { adapter, account } = setup();
    adapter.reply("put", "/members/55", true);
    const member = new Member(account, {
      member_id: 55,
      email: "a@example.com",
      status: "a",
    });

    member.set("status", MemberStatus.OptOut);
    await member.save();

    expect(adapter.callsTo("put")[0].payload).toMatchObject({ status_to: "o" });
  });

  it("raises MemberUpdateError on a falsy response and keeps local state", async () => {
    const { adapter, account } = setup();
    adapter.reply("put", "/members/55", null);
    const member = new Member(account, {
      member_id: 55,
      email: "a@example.com",
      status: "a",
      first_name: "Nia",
    });
    const before = member.toWire();

    await expect(member.save()).rejects.toThrow(MemberUpdateError);
    expect(member.toWire()).toEqual(before);
  });

  it("propagates transport failures", async () => {
    const { adapter, account } = setup();
    adapter.reply("put", "/members/55", new ApiRequestFailed(500, "boom"));
    const member = new Member(account, { member_id: 55, email: "a@example.com" });

    await expect(member.save()).rejects.toMatchObject({ code: 500 });
  });
});

describe("Member opt-out", () => {
  it("opts out by email and records the status", async () => {
    const { adapter, account } = setup();
    adapter.reply("put", "/members/email/optout/a%2Bb%40example.com", true);
    const member = new Member(account, {
      member_id: 55,
      email: "a+b@example.com",
      status: "a",
    });

    await expect(member.optOut()).resolves.toBe(true);
    expect(member.get("status")).toBe(MemberStatus.OptOut);
    expect(member.hasOptedOut()).toBe(true);
  });

  it("leaves the status alone when the opt-out is not acknowledged", async () => {
    const { adapter, account } = setup();
    adapter.reply("put", "/members/email/optout/a%40example.com", false);
    const member = new Member(account, { email: "a@example.com", status: "a" });

    await expect(member.optOut()).resolves.toBe(false);
    expect(member.get("status")).toBe(MemberStatus.Active);
  });

  it("requires an email and sends nothing without one", async () => {
    const { adapter, account } = setup();
    const member = new Member(account, { member_id: 55, status: "a" });

    await expect(member.optOut()).rejects.toThrow(MissingEmailError);
    expect(adapter.calls).toHaveLength(0);
  });

  it("requires a status to report opt-out", () => {
    const { account } = setup();
    const member = new Member(account, { member_id: 55 });

    expect(() => member.hasOptedOut()).toThrow(MissingStatusError);
    expect(new Member(account, { status: "a" }).hasOptedOut()).toBe(false);
  });
});

describe("Member.getOptOutDetail", () => {
  it("returns the history verbatim for opted-out members", async () => {
    const { adapter, account } = setup();
    const history = [{ date: "@D:2012-01-01T00:00:00", mailing_id: 200 }];
    adapter.reply("get", "/members/55/optout", history);
    const member = new Member(account, { member_id: 55, status: "o" });

    await expect(member.getOptOutDetail()).resolves.toEqual(history);
  });

  it("skips the request unless the member has opted out", async () => {
    const { adapter, account } = setup();
    const member = new Member(account, { member_id: 55, status: "a" });

    await expect(member.getOptOutDetail()).resolves.toEqual([]);
    expect(adapter.calls).toHaveLength(0);
  });

  it("requires a member id", async () => {
    const { account } = setup();
    const member = new Member(account, { status: "o" });

    await expect(member.getOptOutDetail()).rejects.toThrow(
      MissingIdentifierError,
    );
  });
});
