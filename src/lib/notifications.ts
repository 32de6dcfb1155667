import type Redis from "ioredis";
import { randomUUID } from "crypto";
import { loadSettings } from "../config/settings.js";
import { K } from "./keys.js";
import { notFound, unavailable } from "./errors.js";
import { getUser, getUsers, isRecruiter, requireRecruiter } from "./accounts.js";
import { candidateMatchesSavedSearch } from "./candidates.js";
import {
  addCandidates,
  candidateCount,
  createNotification,
  deleteNotification,
  getNotification,
  getNotifications,
  markRead,
  notificationIdsForSearch,
  removeCandidate,
} from "./notification-store.js";
import { sendMatchDigest } from "./notifier.js";
import type { MatchDigestEntry } from "./notifier.js";
import { listProfilesUpdatedSince } from "./profiles.js";
import { getSavedSearch, listNotifyingSearches, savedSearchUrl, touchLastNotified } from "./saved-searches.js";
import type { JobSeekerProfile, SavedCandidateSearch, SearchNotification, User } from "./types.js";

/* ── Per-search lock ── */

const LOCK_TTL_MS = 5000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function withSearchLock<T>(r: Redis, searchId: number, fn: () => Promise<T>): Promise<T> {
  const key = K.searchLock(searchId);
  const token = randomUUID();
  const { searchLockRetries, searchLockRetryDelayMs } = loadSettings();

  let acquired = false;
  for (let attempt = 0; attempt < searchLockRetries; attempt++) {
    if ((await r.set(key, token, "PX", LOCK_TTL_MS, "NX")) === "OK") {
      acquired = true;
      break;
    }
    await sleep(searchLockRetryDelayMs);
  }
  if (!acquired) throw unavailable(`Saved search ${searchId} is busy, try again`);

  try {
    return await fn();
  } finally {
    // Only release a lock that is still ours
    if ((await r.get(key)) === token) await r.del(key);
  }
}

/* ── Reconciliation ── */

export interface BucketUpdate {
  search: SavedCandidateSearch;
  notificationId: number;
  created: boolean;
  /** True when the user was not in the bucket before */
  added: boolean;
  candidatesCount: number;
}

async function notificationsHolding(r: Redis, userId: number): Promise<SearchNotification[]> {
  return getNotifications(r, await r.smembers(K.candidateNotificationsIdx(userId)));
}

async function removeStaleMemberships(r: Redis, userId: number, matchedIds: Set<number>): Promise<void> {
  const staleSearchIds = new Set(
    (await notificationsHolding(r, userId)).map((n) => n.savedSearchId).filter((id) => !matchedIds.has(id)),
  );

  for (const searchId of staleSearchIds) {
    await withSearchLock(r, searchId, async () => {
      // Re-read under the lock: buckets may have been merged or deleted meanwhile
      for (const n of await notificationsHolding(r, userId)) {
        if (n.savedSearchId !== searchId) continue;
        const remaining = await removeCandidate(r, n.id, userId);
        if (remaining === 0) {
          await deleteNotification(r, n.id);
        } else {
          await r.hset(K.notification(n.id), "candidates_count", String(remaining));
        }
      }
    });
  }
}

async function upsertBucket(r: Redis, search: SavedCandidateSearch, userId: number): Promise<BucketUpdate> {
  return withSearchLock(r, search.id, async () => {
    const now = new Date();
    const ids = await notificationIdsForSearch(r, search.id);

    // Index entries whose hash is gone are dropped; their candidates carry over
    const live: number[] = [];
    const carried: number[] = [];
    for (const id of ids) {
      if (await getNotification(r, id)) {
        live.push(id);
        continue;
      }
      const members = await r.smembers(K.notificationCandidates(id));
      carried.push(...members.map((m) => parseInt(m, 10)));
      await deleteNotification(r, id, search);
    }

    // The newest row is the bucket; older ones are merged into it
    const created = live.length === 0;
    const bucketId = created ? await createNotification(r, search, now) : live[0];
    await addCandidates(r, bucketId, carried);

    for (const dupeId of live.slice(1)) {
      const dupe = await getNotification(r, dupeId);
      if (dupe) await addCandidates(r, bucketId, dupe.candidateIds);
      await deleteNotification(r, dupeId);
    }

    const added = (await r.sismember(K.notificationCandidates(bucketId), String(userId))) === 0;
    await addCandidates(r, bucketId, [userId]);
    const count = await candidateCount(r, bucketId);

    const pipe = r.pipeline();
    pipe.hset(K.notification(bucketId), {
      is_read: "0",
      read_at: "",
      candidates_count: String(count),
      sent_at: now.toISOString(),
    });
    pipe.zadd(K.searchNotificationsIdx(search.id), now.getTime(), String(bucketId));
    pipe.zadd(K.recruiterNotificationsIdx(search.recruiterId), now.getTime(), String(bucketId));
    await pipe.exec();

    return { search, notificationId: bucketId, created, added, candidatesCount: count };
  });
}

/**
 * Bring every notification bucket in line with the profile's current
 * content. Each saved search keeps at most one bucket.
 */
export async function reconcileProfile(r: Redis, profile: JobSeekerProfile, user: User): Promise<BucketUpdate[]> {
  const searches = await listNotifyingSearches(r);
  const matched = searches.filter((s) => candidateMatchesSavedSearch(profile, user, s));

  await removeStaleMemberships(r, user.id, new Set(matched.map((s) => s.id)));

  const updates: BucketUpdate[] = [];
  for (const search of matched) {
    updates.push(await upsertBucket(r, search, user.id));
  }
  return updates;
}

/** Number of buckets created or updated for the profile */
export async function notifySavedSearchesForProfile(r: Redis, profile: JobSeekerProfile): Promise<number> {
  const user = await getUser(r, profile.userId);
  if (!user) return 0;
  const updates = await reconcileProfile(r, profile, user);
  if (updates.length > 0) {
    console.log(`[notifications] ${user.username} is in ${updates.length} saved-search bucket(s)`);
  }
  return updates.length;
}

/* ── Sweep ── */

export interface SweepResult {
  since: string;
  profilesChecked: number;
  searches: MatchDigestEntry[];
}

/**
 * Reconcile every profile updated in the last `hours`, stamp searches that
 * gained candidates and post one digest for them.
 */
export async function checkCandidateMatches(r: Redis, hours = 24): Promise<SweepResult> {
  const since = new Date(Date.now() - hours * 3600 * 1000);
  console.log(`[notifications] Checking for candidate matches updated since ${since.toISOString()}`);

  const profiles = await listProfilesUpdatedSince(r, since);
  const users = await getUsers(r, profiles.map((p) => p.userId));

  const touched = new Map<number, { search: SavedCandidateSearch; newCandidates: number; totalCandidates: number }>();
  for (const profile of profiles) {
    const user = users.get(profile.userId);
    if (!user) continue;
    for (const update of await reconcileProfile(r, profile, user)) {
      const entry = touched.get(update.search.id) ?? { search: update.search, newCandidates: 0, totalCandidates: 0 };
      if (update.added) entry.newCandidates += 1;
      entry.totalCandidates = update.candidatesCount;
      touched.set(update.search.id, entry);
    }
  }

  const recruiters = await getUsers(r, [...touched.values()].map((t) => t.search.recruiterId));
  const now = new Date();
  const searches: MatchDigestEntry[] = [];
  for (const { search, newCandidates, totalCandidates } of touched.values()) {
    if (newCandidates === 0) continue;
    await touchLastNotified(r, search.id, now);
    const recruiterUsername = recruiters.get(search.recruiterId)?.username ?? String(search.recruiterId);
    console.log(
      `[notifications] Notified ${recruiterUsername} about ${newCandidates} new match${newCandidates === 1 ? "" : "es"} for "${search.name}"`,
    );
    searches.push({ savedSearchId: search.id, searchName: search.name, recruiterUsername, newCandidates, totalCandidates });
  }

  try {
    await sendMatchDigest(searches);
  } catch (error) {
    console.error("[notifications] Digest failed:", error);
  }

  console.log(`[notifications] Complete: ${searches.length} search(es) with new candidates`);
  return { since: since.toISOString(), profilesChecked: profiles.length, searches };
}

/* ── Recruiter views ── */

export interface NotificationView extends SearchNotification {
  savedSearchName: string;
  candidates: { id: number; username: string }[];
}

async function viewNotification(r: Redis, n: SearchNotification): Promise<NotificationView> {
  const [search, users] = await Promise.all([getSavedSearch(r, n.savedSearchId), getUsers(r, n.candidateIds)]);
  return {
    ...n,
    savedSearchName: search?.name ?? "",
    candidates: n.candidateIds.flatMap((id) => {
      const u = users.get(id);
      return u ? [{ id: u.id, username: u.username }] : [];
    }),
  };
}

async function recruiterNotifications(r: Redis, recruiter: User): Promise<SearchNotification[]> {
  const ids = await r.zrevrange(K.recruiterNotificationsIdx(recruiter.id), 0, -1);
  return getNotifications(r, ids);
}

export async function listNotifications(
  r: Redis,
  recruiter: User,
): Promise<{ unread: NotificationView[]; read: NotificationView[]; unreadCount: number; totalCount: number }> {
  requireRecruiter(recruiter);
  const views = await Promise.all((await recruiterNotifications(r, recruiter)).map((n) => viewNotification(r, n)));
  const unread = views.filter((n) => !n.isRead);
  const read = views.filter((n) => n.isRead);
  return { unread, read, unreadCount: unread.length, totalCount: views.length };
}

async function requireOwnNotification(
  r: Redis,
  recruiter: User,
  id: number,
): Promise<{ notification: SearchNotification; search: SavedCandidateSearch }> {
  requireRecruiter(recruiter);
  const notification = await getNotification(r, id);
  const search = notification ? await getSavedSearch(r, notification.savedSearchId) : null;
  if (!notification || !search || search.recruiterId !== recruiter.id) throw notFound("Notification not found");
  return { notification, search };
}

export async function markNotificationRead(r: Redis, recruiter: User, id: number): Promise<SearchNotification> {
  const { notification } = await requireOwnNotification(r, recruiter, id);
  return markRead(r, notification);
}

export async function markAllRead(r: Redis, recruiter: User): Promise<number> {
  requireRecruiter(recruiter);
  const unread = (await recruiterNotifications(r, recruiter)).filter((n) => !n.isRead);
  const now = new Date();
  for (const n of unread) await markRead(r, n, now);
  return unread.length;
}

export async function notificationDetail(
  r: Redis,
  recruiter: User,
  id: number,
): Promise<{ notification: NotificationView; url: string }> {
  const { notification, search } = await requireOwnNotification(r, recruiter, id);
  const read = await markRead(r, notification);
  return {
    notification: await viewNotification(r, read),
    url: savedSearchUrl(search, { notification: String(id) }),
  };
}

export async function unreadCount(r: Redis, user: User | null): Promise<number> {
  if (!user || !isRecruiter(user)) return 0;
  return (await recruiterNotifications(r, user)).filter((n) => !n.isRead).length;
}
