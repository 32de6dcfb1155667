import type Redis from "ioredis";

/* ── Key helpers ── */
export const K = {
  seq: (entity: string) => `seq:${entity}`,

  user: (id: number) => `user:${id}`,
  usersIdx: () => "idx:users",
  username: (username: string) => `idx:username:${username.toLowerCase()}`,

  profile: (userId: number) => `profile:${userId}`,
  profilesByUpdate: () => "feed:profiles_updated",
  skill: (name: string) => `skill:${name.toLowerCase()}`,

  message: (id: number) => `message:${id}`,
  inbox: (userId: number) => `idx:inbox:${userId}`,
  outbox: (userId: number) => `idx:outbox:${userId}`,

  job: (id: number) => `job:${id}`,
  jobStatusIdx: (status: string) => `idx:job_status:${status}`,
  postedByIdx: (userId: number) => `idx:posted_by:${userId}`,

  application: (jobId: number, applicantId: number) => `application:${jobId}:${applicantId}`,
  jobApplicationsIdx: (jobId: number) => `idx:job_applications:${jobId}`,
  userApplicationsIdx: (userId: number) => `idx:user_applications:${userId}`,

  report: (jobId: number, reporterId: number) => `report:${jobId}:${reporterId}`,
  reportsFeed: () => "feed:reports",

  savedSearch: (id: number) => `saved_search:${id}`,
  recruiterSearchesIdx: (recruiterId: number) => `idx:recruiter_searches:${recruiterId}`,
  notifySearchesIdx: () => "idx:notify_searches",

  notification: (id: number) => `notification:${id}`,
  notificationCandidates: (id: number) => `notification_candidates:${id}`,
  searchNotificationsIdx: (searchId: number) => `idx:search_notifications:${searchId}`,
  candidateNotificationsIdx: (userId: number) => `idx:candidate_notifications:${userId}`,
  recruiterNotificationsIdx: (recruiterId: number) => `idx:recruiter_notifications:${recruiterId}`,
  searchLock: (searchId: number) => `lock:saved_search:${searchId}`,

  geocode: (city: string, state: string) => `geo:${city.toLowerCase()}|${state.toLowerCase()}`,
};

/** Composite members are stored as "a:b" in sets and sorted sets */
export function splitPair(member: string): [number, number] {
  const [a, b] = member.split(":", 2);
  return [parseInt(a, 10), parseInt(b, 10)];
}

export async function nextId(r: Redis, entity: string): Promise<number> {
  return r.incr(K.seq(entity));
}
