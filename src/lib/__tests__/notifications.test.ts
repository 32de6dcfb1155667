import {
  checkCandidateMatches,
  listNotifications,
  markAllRead,
  markNotificationRead,
  notificationDetail,
  notifySavedSearchesForProfile,
  unreadCount,
} from "../notifications.js";
import { addCandidates, createNotification, getNotification, notificationIdsForSearch } from "../notification-store.js";
import { deleteSavedSearch, getSavedSearch, saveSearch, toggleSearchNotifications } from "../saved-searches.js";
import { updateProfile } from "../profiles.js";
import { K } from "../keys.js";
import { makeRecruiter, makeRedis, makeSeeker, profileInput } from "./helpers.js";
import type { SavedCandidateSearch, SearchNotification, User } from "../types.js";

const redis = makeRedis();
let recruiter: User;
let pythonSearch: SavedCandidateSearch;

beforeEach(async () => {
  await redis.flushall();
  delete process.env.NOTIFY_WEBHOOK_URL;
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  recruiter = await makeRecruiter(redis, "rita");
  pythonSearch = await saveSearch(redis, recruiter, {
    name: "Python folks",
    skills: "Python",
    location: "",
    notifyOnNewMatches: true,
  });
});

afterEach(() => {
  delete process.env.NOTIFY_WEBHOOK_URL;
  jest.restoreAllMocks();
});

async function bucketsOf(searchId: number): Promise<SearchNotification[]> {
  const ids = await notificationIdsForSearch(redis, searchId);
  const found = await Promise.all(ids.map((id) => getNotification(redis, id)));
  return found.filter((n): n is SearchNotification => n !== null);
}

async function seekerWithSkills(username: string, skills: string) {
  return makeSeeker(redis, username, { skills });
}

describe("notifySavedSearchesForProfile", () => {
  it("puts a matching profile into the search's bucket", async () => {
    const { user, profile } = await seekerWithSkills("sam", "python, SQL");

    expect(await notifySavedSearchesForProfile(redis, profile)).toBe(1);

    const buckets = await bucketsOf(pythonSearch.id);
    expect(buckets).toHaveLength(1);
    expect(buckets[0].candidateIds).toEqual([user.id]);
    expect(buckets[0].candidatesCount).toBe(1);
    expect(buckets[0].isRead).toBe(false);
  });

  it("is idempotent for an unchanged profile", async () => {
    const { profile } = await seekerWithSkills("sam", "Python");
    await notifySavedSearchesForProfile(redis, profile);
    await notifySavedSearchesForProfile(redis, profile);

    const buckets = await bucketsOf(pythonSearch.id);
    expect(buckets).toHaveLength(1);
    expect(buckets[0].candidatesCount).toBe(1);
  });

  it("collects several candidates in one bucket", async () => {
    const a = await seekerWithSkills("ann", "Python");
    const b = await seekerWithSkills("ben", "Python, Go");
    await notifySavedSearchesForProfile(redis, a.profile);
    await notifySavedSearchesForProfile(redis, b.profile);

    const buckets = await bucketsOf(pythonSearch.id);
    expect(buckets).toHaveLength(1);
    expect(buckets[0].candidateIds).toEqual([a.user.id, b.user.id]);
    expect(buckets[0].candidatesCount).toBe(2);
  });

  it("ignores searches with notifications switched off", async () => {
    await toggleSearchNotifications(redis, recruiter, pythonSearch.id);
    const { profile } = await seekerWithSkills("sam", "Python");

    expect(await notifySavedSearchesForProfile(redis, profile)).toBe(0);
    expect(await bucketsOf(pythonSearch.id)).toEqual([]);
  });

  it("removes a candidate who no longer matches and deletes empty buckets", async () => {
    const a = await seekerWithSkills("ann", "Python");
    const b = await seekerWithSkills("ben", "Python");
    await notifySavedSearchesForProfile(redis, a.profile);
    await notifySavedSearchesForProfile(redis, b.profile);

    const annNow = await updateProfile(redis, a.user.id, profileInput({ skills: "Rust" }));
    expect(await notifySavedSearchesForProfile(redis, annNow)).toBe(0);

    let buckets = await bucketsOf(pythonSearch.id);
    expect(buckets[0].candidateIds).toEqual([b.user.id]);
    expect(buckets[0].candidatesCount).toBe(1);
    expect(await redis.smembers(K.candidateNotificationsIdx(a.user.id))).toEqual([]);

    const benNow = await updateProfile(redis, b.user.id, profileInput({ skills: "Rust" }));
    await notifySavedSearchesForProfile(redis, benNow);
    buckets = await bucketsOf(pythonSearch.id);
    expect(buckets).toEqual([]);
  });

  it("re-opens a bucket that was read", async () => {
    const a = await seekerWithSkills("ann", "Python");
    await notifySavedSearchesForProfile(redis, a.profile);
    const [bucket] = await bucketsOf(pythonSearch.id);
    await markNotificationRead(redis, recruiter, bucket.id);

    const b = await seekerWithSkills("ben", "Python");
    await notifySavedSearchesForProfile(redis, b.profile);

    const [reopened] = await bucketsOf(pythonSearch.id);
    expect(reopened.id).toBe(bucket.id);
    expect(reopened.isRead).toBe(false);
    expect(reopened.readAt).toBeNull();
  });

  it("merges stray rows of a search into a single bucket", async () => {
    const a = await seekerWithSkills("ann", "Go");
    const b = await seekerWithSkills("ben", "Go");
    const older = await createNotification(redis, pythonSearch, new Date("2024-01-01T00:00:00Z"));
    const newer = await createNotification(redis, pythonSearch, new Date("2024-01-02T00:00:00Z"));
    await addCandidates(redis, older, [a.user.id]);
    await addCandidates(redis, newer, [b.user.id]);

    const c = await seekerWithSkills("cat", "Python");
    await notifySavedSearchesForProfile(redis, c.profile);

    const buckets = await bucketsOf(pythonSearch.id);
    expect(buckets).toHaveLength(1);
    expect(buckets[0].id).toBe(newer);
    expect(buckets[0].candidateIds).toEqual([a.user.id, b.user.id, c.user.id]);
    expect(buckets[0].candidatesCount).toBe(3);
    expect(await getNotification(redis, older)).toBeNull();
  });

  it("places a candidate in every matching search", async () => {
    const austin = await saveSearch(redis, recruiter, {
      name: "Austin",
      skills: "",
      location: "austin",
      notifyOnNewMatches: true,
    });
    const { profile } = await makeSeeker(redis, "sam", { skills: "Python", location: "Austin, TX" });

    expect(await notifySavedSearchesForProfile(redis, profile)).toBe(2);
    expect(await bucketsOf(austin.id)).toHaveLength(1);
  });
});

describe("buckets whose hash is gone", () => {
  it("replaces the row and keeps its candidates", async () => {
    const a = await seekerWithSkills("ann", "Python");
    await notifySavedSearchesForProfile(redis, a.profile);
    const [hollowId] = await notificationIdsForSearch(redis, pythonSearch.id);

    // What a write racing a delete leaves behind: indexed, but no identity fields
    await redis.del(K.notification(hollowId));
    await redis.hset(K.notification(hollowId), {
      is_read: "0",
      read_at: "",
      candidates_count: "1",
      sent_at: new Date().toISOString(),
    });

    const b = await seekerWithSkills("ben", "Python");
    await notifySavedSearchesForProfile(redis, b.profile);

    const buckets = await bucketsOf(pythonSearch.id);
    expect(buckets).toHaveLength(1);
    expect(buckets[0].id).not.toBe(hollowId);
    expect(buckets[0].candidateIds).toEqual([a.user.id, b.user.id]);
    expect(buckets[0].candidatesCount).toBe(2);
    expect(await notificationIdsForSearch(redis, pythonSearch.id)).toEqual([buckets[0].id]);
    expect(await redis.exists(K.notification(hollowId))).toBe(0);
    expect((await listNotifications(redis, recruiter)).totalCount).toBe(1);
  });
});

describe("per-search lock", () => {
  beforeEach(() => {
    process.env.SEARCH_LOCK_RETRIES = "3";
    process.env.SEARCH_LOCK_RETRY_DELAY_MS = "1";
  });

  afterEach(() => {
    delete process.env.SEARCH_LOCK_RETRIES;
    delete process.env.SEARCH_LOCK_RETRY_DELAY_MS;
  });

  it("answers 503 and leaves someone else's lock alone", async () => {
    await redis.set(K.searchLock(pythonSearch.id), "other-worker");
    const { profile } = await seekerWithSkills("sam", "Python");

    await expect(notifySavedSearchesForProfile(redis, profile)).rejects.toMatchObject({ status: 503 });
    expect(await redis.get(K.searchLock(pythonSearch.id))).toBe("other-worker");
    expect(await bucketsOf(pythonSearch.id)).toEqual([]);
  });

  it("removes stale memberships only while holding the lock", async () => {
    const a = await seekerWithSkills("ann", "Python");
    await notifySavedSearchesForProfile(redis, a.profile);
    await redis.set(K.searchLock(pythonSearch.id), "other-worker");

    const annNow = await updateProfile(redis, a.user.id, profileInput({ skills: "Rust" }));
    await expect(notifySavedSearchesForProfile(redis, annNow)).rejects.toMatchObject({ status: 503 });
    expect((await bucketsOf(pythonSearch.id))[0].candidateIds).toEqual([a.user.id]);

    await redis.del(K.searchLock(pythonSearch.id));
    expect(await notifySavedSearchesForProfile(redis, annNow)).toBe(0);
    expect(await bucketsOf(pythonSearch.id)).toEqual([]);
  });

  it("releases its own lock when done", async () => {
    const { profile } = await seekerWithSkills("sam", "Python");
    await notifySavedSearchesForProfile(redis, profile);
    expect(await redis.get(K.searchLock(pythonSearch.id))).toBeNull();
  });
});

describe("checkCandidateMatches", () => {
  it("stamps searches that gained candidates and posts one digest", async () => {
    process.env.NOTIFY_WEBHOOK_URL = "https://hooks.example.test/digest";
    const fetchSpy = jest.spyOn(global, "fetch").mockResolvedValue(new Response("ok", { status: 200 }));
    await seekerWithSkills("ann", "Python");
    await seekerWithSkills("ben", "Python");
    await seekerWithSkills("cat", "Rust");

    const result = await checkCandidateMatches(redis, 1);

    expect(result.profilesChecked).toBe(3);
    expect(result.searches).toEqual([
      {
        savedSearchId: pythonSearch.id,
        searchName: "Python folks",
        recruiterUsername: "rita",
        newCandidates: 2,
        totalCandidates: 2,
      },
    ]);
    expect((await getSavedSearch(redis, pythonSearch.id))?.lastNotified).not.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(await bucketsOf(pythonSearch.id)).toHaveLength(1);
  });

  it("reports nothing new on a second run", async () => {
    await seekerWithSkills("ann", "Python");
    await checkCandidateMatches(redis, 24);

    const again = await checkCandidateMatches(redis, 24);
    expect(again.searches).toEqual([]);
    expect((await bucketsOf(pythonSearch.id))[0].candidatesCount).toBe(1);
  });

  it("skips profiles updated before the window", async () => {
    const { user } = await seekerWithSkills("ann", "Python");
    await redis.zadd(K.profilesByUpdate(), Date.now() - 3 * 3600 * 1000, String(user.id));

    const result = await checkCandidateMatches(redis, 2);
    expect(result.profilesChecked).toBe(0);
    expect(await bucketsOf(pythonSearch.id)).toEqual([]);
  });
});

describe("recruiter views", () => {
  let bucketId: number;

  beforeEach(async () => {
    const { profile } = await seekerWithSkills("sam", "Python");
    await notifySavedSearchesForProfile(redis, profile);
    [bucketId] = await notificationIdsForSearch(redis, pythonSearch.id);
  });

  it("lists buckets with search names and candidate usernames", async () => {
    const list = await listNotifications(redis, recruiter);
    expect(list.unreadCount).toBe(1);
    expect(list.totalCount).toBe(1);
    expect(list.read).toEqual([]);
    expect(list.unread[0].savedSearchName).toBe("Python folks");
    expect(list.unread[0].candidates.map((c) => c.username)).toEqual(["sam"]);
  });

  it("marks everything read and counts what it marked", async () => {
    expect(await unreadCount(redis, recruiter)).toBe(1);
    expect(await markAllRead(redis, recruiter)).toBe(1);
    expect(await markAllRead(redis, recruiter)).toBe(0);
    expect(await unreadCount(redis, recruiter)).toBe(0);
  });

  it("opens a bucket as a candidate search URL and marks it read", async () => {
    const detail = await notificationDetail(redis, recruiter, bucketId);
    expect(detail.url).toBe(`/api/candidates?skills=Python&savedSearch=${pythonSearch.id}&notification=${bucketId}`);
    expect(detail.notification.isRead).toBe(true);
  });

  it("hides buckets from other users", async () => {
    const other = await makeRecruiter(redis, "otto");
    await expect(markNotificationRead(redis, other, bucketId)).rejects.toMatchObject({ status: 404 });

    const { user: seeker } = await makeSeeker(redis, "jo");
    expect(await unreadCount(redis, seeker)).toBe(0);
    await expect(listNotifications(redis, seeker)).rejects.toMatchObject({ status: 404 });
  });

  it("drops a search's buckets along with the search", async () => {
    await deleteSavedSearch(redis, recruiter, pythonSearch.id);
    expect(await getNotification(redis, bucketId)).toBeNull();
    expect((await listNotifications(redis, recruiter)).totalCount).toBe(0);
  });
});
