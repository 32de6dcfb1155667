import { conversation, conversations, inbox, sendMessage } from "../messages.js";
import { makeRecruiter, makeRedis, makeSeeker } from "./helpers.js";
import type { User } from "../types.js";

const redis = makeRedis();
let sam: User;
let rita: User;

beforeEach(async () => {
  await redis.flushall();
  sam = (await makeSeeker(redis, "sam")).user;
  rita = await makeRecruiter(redis, "rita");
});

describe("sendMessage", () => {
  it("refuses messages to yourself", async () => {
    await expect(sendMessage(redis, sam, sam.id, "hi")).rejects.toMatchObject({
      status: 400,
      message: "You can't send a message to yourself.",
    });
  });

  it("answers 404 for unknown recipients", async () => {
    await expect(sendMessage(redis, sam, 999, "hi")).rejects.toMatchObject({ status: 404 });
  });
});

describe("inbox and conversation", () => {
  it("counts unread messages until the conversation is opened", async () => {
    await sendMessage(redis, rita, sam.id, "Are you open to roles?");
    await sendMessage(redis, sam, rita.id, "Yes!");
    await sendMessage(redis, rita, sam.id, "Great");

    const before = await inbox(redis, sam);
    expect(before.messages.map((m) => m.content)).toEqual(["Great", "Are you open to roles?"]);
    expect(before.unreadCount).toBe(2);

    const thread = await conversation(redis, sam, rita.id);
    expect(thread.messages.map((m) => m.content)).toEqual(["Are you open to roles?", "Yes!", "Great"]);

    expect((await inbox(redis, sam)).unreadCount).toBe(0);
    // Rita's copy of Sam's reply is still unread
    expect((await inbox(redis, rita)).unreadCount).toBe(1);
  });

  it("lists one conversation per counterpart", async () => {
    const otto = await makeRecruiter(redis, "otto");
    await sendMessage(redis, rita, sam.id, "one");
    await sendMessage(redis, otto, sam.id, "two");
    await sendMessage(redis, rita, sam.id, "three");

    const list = await conversations(redis, sam);
    expect(list.map((c) => c.user.username).sort()).toEqual(["otto", "rita"]);
    const withRita = list.find((c) => c.user.username === "rita");
    expect(withRita?.lastMessage.content).toBe("three");
    expect(withRita?.unreadCount).toBe(2);
  });
});
