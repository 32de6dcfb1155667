import type Redis from "ioredis";
import { K, nextId } from "./keys.js";
import { bool, flag, int, strOrNull, str } from "./fields.js";
import type { SavedCandidateSearch, SearchNotification } from "./types.js";

/*
 * Storage for notification buckets:
 *   notification:<id>               hash
 *   notification_candidates:<id>    set of user ids
 *   idx:search_notifications:<sid>  zset scored by sentAt
 *   idx:recruiter_notifications:<r> zset scored by sentAt
 *   idx:candidate_notifications:<u> set of notification ids holding that user
 */

function toNotification(data: Record<string, string>, candidateIds: string[]): SearchNotification | null {
  if (!data.id) return null;
  return {
    id: int(data, "id"),
    savedSearchId: int(data, "saved_search_id"),
    candidateIds: candidateIds.map((id) => parseInt(id, 10)).sort((a, b) => a - b),
    candidatesCount: int(data, "candidates_count"),
    sentAt: str(data, "sent_at"),
    isRead: bool(data, "is_read"),
    readAt: strOrNull(data, "read_at"),
  };
}

export async function getNotification(r: Redis, id: number): Promise<SearchNotification | null> {
  const [data, candidates] = await Promise.all([
    r.hgetall(K.notification(id)),
    r.smembers(K.notificationCandidates(id)),
  ]);
  return toNotification(data, candidates);
}

export async function getNotifications(r: Redis, ids: string[]): Promise<SearchNotification[]> {
  const found = await Promise.all(ids.map((id) => getNotification(r, parseInt(id, 10))));
  return found.filter((n): n is SearchNotification => n !== null);
}

/** Notification ids of one saved search, newest first */
export async function notificationIdsForSearch(r: Redis, searchId: number): Promise<number[]> {
  const ids = await r.zrevrange(K.searchNotificationsIdx(searchId), 0, -1);
  return ids.map((id) => parseInt(id, 10));
}

export async function countNotificationsForSearch(r: Redis, searchId: number): Promise<number> {
  return r.zcard(K.searchNotificationsIdx(searchId));
}

export async function createNotification(r: Redis, search: SavedCandidateSearch, sentAt: Date): Promise<number> {
  const id = await nextId(r, "notification");
  const pipe = r.pipeline();
  pipe.hset(K.notification(id), {
    id: String(id),
    saved_search_id: String(search.id),
    recruiter_id: String(search.recruiterId),
    candidates_count: "0",
    sent_at: sentAt.toISOString(),
    is_read: flag(false),
    read_at: "",
  });
  pipe.zadd(K.searchNotificationsIdx(search.id), sentAt.getTime(), String(id));
  pipe.zadd(K.recruiterNotificationsIdx(search.recruiterId), sentAt.getTime(), String(id));
  await pipe.exec();
  return id;
}

export async function addCandidates(r: Redis, id: number, userIds: number[]): Promise<void> {
  if (userIds.length === 0) return;
  const pipe = r.pipeline();
  pipe.sadd(K.notificationCandidates(id), ...userIds.map(String));
  for (const userId of userIds) pipe.sadd(K.candidateNotificationsIdx(userId), String(id));
  await pipe.exec();
}

/** Drop one user from a bucket; returns how many candidates remain */
export async function removeCandidate(r: Redis, id: number, userId: number): Promise<number> {
  const pipe = r.pipeline();
  pipe.srem(K.notificationCandidates(id), String(userId));
  pipe.srem(K.candidateNotificationsIdx(userId), String(id));
  await pipe.exec();
  return r.scard(K.notificationCandidates(id));
}

export async function candidateCount(r: Redis, id: number): Promise<number> {
  return r.scard(K.notificationCandidates(id));
}

/**
 * Remove a bucket and every index entry pointing at it. `owner` names the
 * indexes to clean when the hash itself is already gone.
 */
export async function deleteNotification(
  r: Redis,
  id: number,
  owner?: Pick<SavedCandidateSearch, "id" | "recruiterId">,
): Promise<void> {
  const [data, candidates] = await Promise.all([
    r.hgetall(K.notification(id)),
    r.smembers(K.notificationCandidates(id)),
  ]);

  const pipe = r.pipeline();
  for (const userId of candidates) pipe.srem(K.candidateNotificationsIdx(parseInt(userId, 10)), String(id));
  const searchId = data.saved_search_id ? int(data, "saved_search_id") : owner?.id;
  const recruiterId = data.recruiter_id ? int(data, "recruiter_id") : owner?.recruiterId;
  if (searchId !== undefined) pipe.zrem(K.searchNotificationsIdx(searchId), String(id));
  if (recruiterId !== undefined) pipe.zrem(K.recruiterNotificationsIdx(recruiterId), String(id));
  pipe.del(K.notification(id), K.notificationCandidates(id));
  await pipe.exec();
}

export async function markRead(r: Redis, n: SearchNotification, at: Date = new Date()): Promise<SearchNotification> {
  if (n.isRead) return n;
  const readAt = at.toISOString();
  await r.hset(K.notification(n.id), { is_read: flag(true), read_at: readAt });
  return { ...n, isRead: true, readAt };
}
