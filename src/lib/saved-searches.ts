import type Redis from "ioredis";
import { K, nextId } from "./keys.js";
import { bool, flag, int, str, strOrNull } from "./fields.js";
import { notFound } from "./errors.js";
import { requireRecruiter } from "./accounts.js";
import { countNotificationsForSearch, deleteNotification, notificationIdsForSearch } from "./notification-store.js";
import type { SavedCandidateSearch, User } from "./types.js";
import type { SaveSearchInput } from "./validation.js";

/** Skills text of a free-text search starts with this, case-insensitively */
export const NAME_PREFIX = "name:";

function toSavedSearch(data: Record<string, string>): SavedCandidateSearch | null {
  if (!data.id) return null;
  return {
    id: int(data, "id"),
    recruiterId: int(data, "recruiter_id"),
    name: str(data, "name"),
    skills: str(data, "skills"),
    location: str(data, "location"),
    notifyOnNewMatches: bool(data, "notify_on_new_matches"),
    createdAt: str(data, "created_at"),
    lastRun: strOrNull(data, "last_run"),
    lastNotified: strOrNull(data, "last_notified"),
  };
}

export async function getSavedSearch(r: Redis, id: number): Promise<SavedCandidateSearch | null> {
  return toSavedSearch(await r.hgetall(K.savedSearch(id)));
}

async function getSavedSearches(r: Redis, ids: string[]): Promise<SavedCandidateSearch[]> {
  const found = await Promise.all(ids.map((id) => getSavedSearch(r, parseInt(id, 10))));
  return found.filter((s): s is SavedCandidateSearch => s !== null);
}

/** A search owned by the given recruiter; anything else is 404 */
export async function requireOwnSearch(r: Redis, user: User, id: number): Promise<SavedCandidateSearch> {
  requireRecruiter(user);
  const search = await getSavedSearch(r, id);
  if (!search || search.recruiterId !== user.id) throw notFound("Saved search not found");
  return search;
}

/** Every saved search that wants notifications, oldest first */
export async function listNotifyingSearches(r: Redis): Promise<SavedCandidateSearch[]> {
  const ids = await r.smembers(K.notifySearchesIdx());
  const searches = await getSavedSearches(r, ids);
  return searches.filter((s) => s.notifyOnNewMatches).sort((a, b) => a.id - b.id);
}

export async function saveSearch(r: Redis, user: User, input: SaveSearchInput): Promise<SavedCandidateSearch> {
  requireRecruiter(user);

  const id = await nextId(r, "saved_search");
  const now = new Date();
  const search: SavedCandidateSearch = {
    id,
    recruiterId: user.id,
    name: input.name,
    skills: input.skills,
    location: input.location,
    notifyOnNewMatches: input.notifyOnNewMatches,
    createdAt: now.toISOString(),
    lastRun: null,
    lastNotified: null,
  };

  const pipe = r.pipeline();
  pipe.hset(K.savedSearch(id), {
    id: String(id),
    recruiter_id: String(user.id),
    name: search.name,
    skills: search.skills,
    location: search.location,
    notify_on_new_matches: flag(search.notifyOnNewMatches),
    created_at: search.createdAt,
    last_run: "",
    last_notified: "",
  });
  pipe.zadd(K.recruiterSearchesIdx(user.id), now.getTime(), String(id));
  if (search.notifyOnNewMatches) pipe.sadd(K.notifySearchesIdx(), String(id));
  await pipe.exec();

  console.log(`[saved-searches] ${user.username} saved "${search.name}"`);
  return search;
}

export interface SavedSearchListing extends SavedCandidateSearch {
  notificationCount: number;
}

export async function listSavedSearches(r: Redis, user: User): Promise<SavedSearchListing[]> {
  requireRecruiter(user);
  const ids = await r.zrevrange(K.recruiterSearchesIdx(user.id), 0, -1);
  const searches = await getSavedSearches(r, ids);
  return Promise.all(
    searches.map(async (s) => ({ ...s, notificationCount: await countNotificationsForSearch(r, s.id) })),
  );
}

export async function touchLastRun(r: Redis, search: SavedCandidateSearch, at: Date = new Date()): Promise<void> {
  await r.hset(K.savedSearch(search.id), "last_run", at.toISOString());
}

export async function touchLastNotified(r: Redis, searchId: number, at: Date = new Date()): Promise<void> {
  await r.hset(K.savedSearch(searchId), "last_notified", at.toISOString());
}

/** Removes the search together with its notifications */
export async function deleteSavedSearch(r: Redis, user: User, id: number): Promise<SavedCandidateSearch> {
  const search = await requireOwnSearch(r, user, id);

  for (const notificationId of await notificationIdsForSearch(r, id)) {
    await deleteNotification(r, notificationId);
  }

  const pipe = r.pipeline();
  pipe.del(K.savedSearch(id));
  pipe.zrem(K.recruiterSearchesIdx(user.id), String(id));
  pipe.srem(K.notifySearchesIdx(), String(id));
  await pipe.exec();

  console.log(`[saved-searches] ${user.username} deleted "${search.name}"`);
  return search;
}

export async function toggleSearchNotifications(r: Redis, user: User, id: number): Promise<SavedCandidateSearch> {
  const search = await requireOwnSearch(r, user, id);
  const notifyOnNewMatches = !search.notifyOnNewMatches;

  const pipe = r.pipeline();
  pipe.hset(K.savedSearch(id), "notify_on_new_matches", flag(notifyOnNewMatches));
  if (notifyOnNewMatches) pipe.sadd(K.notifySearchesIdx(), String(id));
  else pipe.srem(K.notifySearchesIdx(), String(id));
  await pipe.exec();

  return { ...search, notifyOnNewMatches };
}

/**
 * Query a saved search stands for. A free-text search keeps its text
 * behind the name prefix in the skills field.
 */
export function searchQueryOf(search: Pick<SavedCandidateSearch, "skills" | "location">): {
  q: string;
  skills: string;
  location: string;
} {
  const skills = search.skills.trim();
  if (skills.toLowerCase().startsWith(NAME_PREFIX)) {
    return { q: skills.slice(NAME_PREFIX.length).trim(), skills: "", location: search.location };
  }
  return { q: "", skills, location: search.location };
}

/** Candidate search URL that re-runs a saved search */
export function savedSearchUrl(search: SavedCandidateSearch, extra: Record<string, string> = {}): string {
  const query = searchQueryOf(search);
  const params = new URLSearchParams();
  if (query.q) params.set("q", query.q);
  if (query.skills) params.set("skills", query.skills);
  if (query.location) params.set("location", query.location);
  params.set("savedSearch", String(search.id));
  for (const [k, v] of Object.entries(extra)) params.set(k, v);
  return `/api/candidates?${params.toString()}`;
}
