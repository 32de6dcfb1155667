import type Redis from "ioredis";
import { K, nextId } from "./keys.js";
import { bool, flag, int, str } from "./fields.js";
import { badRequest } from "./errors.js";
import { getUsers, requireExistingUser } from "./accounts.js";
import type { Message, User } from "./types.js";

function toMessage(data: Record<string, string>): Message | null {
  if (!data.id) return null;
  return {
    id: int(data, "id"),
    senderId: int(data, "sender_id"),
    recipientId: int(data, "recipient_id"),
    content: str(data, "content"),
    sentAt: str(data, "sent_at"),
    isRead: bool(data, "is_read"),
  };
}

async function getMessages(r: Redis, ids: string[]): Promise<Message[]> {
  const messages = await Promise.all(ids.map(async (id) => toMessage(await r.hgetall(K.message(parseInt(id, 10))))));
  return messages.filter((m): m is Message => m !== null);
}

export async function sendMessage(r: Redis, sender: User, recipientId: number, content: string): Promise<Message> {
  const recipient = await requireExistingUser(r, recipientId);
  if (recipient.id === sender.id) throw badRequest("You can't send a message to yourself.");

  const id = await nextId(r, "message");
  const now = new Date();
  const message: Message = {
    id,
    senderId: sender.id,
    recipientId: recipient.id,
    content,
    sentAt: now.toISOString(),
    isRead: false,
  };

  const pipe = r.pipeline();
  pipe.hset(K.message(id), {
    id: String(id),
    sender_id: String(sender.id),
    recipient_id: String(recipient.id),
    content,
    sent_at: message.sentAt,
    is_read: flag(false),
  });
  pipe.zadd(K.inbox(recipient.id), now.getTime(), String(id));
  pipe.zadd(K.outbox(sender.id), now.getTime(), String(id));
  await pipe.exec();

  return message;
}

export async function inbox(r: Redis, user: User): Promise<{ messages: Message[]; unreadCount: number }> {
  const ids = await r.zrevrange(K.inbox(user.id), 0, -1);
  const messages = await getMessages(r, ids);
  return { messages, unreadCount: messages.filter((m) => !m.isRead).length };
}

/**
 * Both directions of a conversation, oldest first. Messages addressed to
 * the reader are marked read.
 */
export async function conversation(
  r: Redis,
  user: User,
  otherId: number,
): Promise<{ other: User; messages: Message[] }> {
  const other = await requireExistingUser(r, otherId);

  const [received, sent] = await Promise.all([
    r.zrange(K.inbox(user.id), 0, -1),
    r.zrange(K.outbox(user.id), 0, -1),
  ]);
  const all = await getMessages(r, [...received, ...sent]);
  const messages = all
    .filter(
      (m) =>
        (m.senderId === other.id && m.recipientId === user.id) ||
        (m.senderId === user.id && m.recipientId === other.id),
    )
    .sort((a, b) => a.sentAt.localeCompare(b.sentAt) || a.id - b.id);

  const unread = messages.filter((m) => m.recipientId === user.id && !m.isRead);
  if (unread.length > 0) {
    const pipe = r.pipeline();
    for (const m of unread) pipe.hset(K.message(m.id), "is_read", flag(true));
    await pipe.exec();
  }

  return {
    other,
    messages: messages.map((m) => (m.recipientId === user.id ? { ...m, isRead: true } : m)),
  };
}

export interface ConversationSummary {
  user: { id: number; username: string; firstName: string; lastName: string };
  lastMessage: Message;
  unreadCount: number;
}

/** One entry per counterpart, most recent conversation first */
export async function conversations(r: Redis, user: User): Promise<ConversationSummary[]> {
  const [received, sent] = await Promise.all([
    r.zrange(K.inbox(user.id), 0, -1),
    r.zrange(K.outbox(user.id), 0, -1),
  ]);
  const messages = await getMessages(r, [...new Set([...received, ...sent])]);

  const byOther = new Map<number, { last: Message; unread: number }>();
  for (const m of messages) {
    const otherId = m.senderId === user.id ? m.recipientId : m.senderId;
    const entry = byOther.get(otherId) ?? { last: m, unread: 0 };
    if (m.sentAt > entry.last.sentAt || (m.sentAt === entry.last.sentAt && m.id > entry.last.id)) entry.last = m;
    if (m.recipientId === user.id && !m.isRead) entry.unread += 1;
    byOther.set(otherId, entry);
  }

  const users = await getUsers(r, [...byOther.keys()]);
  const out: ConversationSummary[] = [];
  for (const [otherId, entry] of byOther) {
    const other = users.get(otherId);
    if (!other) continue;
    out.push({
      user: { id: other.id, username: other.username, firstName: other.firstName, lastName: other.lastName },
      lastMessage: entry.last,
      unreadCount: entry.unread,
    });
  }
  return out.sort((a, b) => b.lastMessage.sentAt.localeCompare(a.lastMessage.sentAt));
}
