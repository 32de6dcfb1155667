import type Redis from "ioredis";
import { z } from "zod";
import { K } from "./keys.js";
import { bool, flag, int, json, str } from "./fields.js";
import { getOrCreateSkills, parseSkillsCsv } from "./skills.js";
import { LINK_KINDS } from "./types.js";
import type { Education, Experience, JobSeekerProfile, Link, User } from "./types.js";
import type { ProfileUpdateInput } from "./validation.js";

/* Shapes of the JSON-encoded hash fields */
const storedEducations = z.array(
  z.object({
    school: z.string(),
    degree: z.string(),
    fieldOfStudy: z.string(),
    startDate: z.string(),
    endDate: z.string().nullable(),
    current: z.boolean(),
    description: z.string(),
    show: z.boolean(),
  }),
);
const storedExperiences = z.array(
  z.object({
    title: z.string(),
    company: z.string(),
    startDate: z.string(),
    endDate: z.string().nullable(),
    current: z.boolean(),
    description: z.string(),
    show: z.boolean(),
  }),
);
const storedLinks = z.array(
  z.object({ kind: z.enum(LINK_KINDS), label: z.string(), url: z.string(), show: z.boolean() }),
);
const storedSkills = z.array(z.string());

function toProfile(data: Record<string, string>): JobSeekerProfile | null {
  if (!data.user_id) return null;
  return {
    userId: int(data, "user_id"),
    headline: str(data, "headline"),
    summary: str(data, "summary"),
    location: str(data, "location"),
    skills: json(data, "skills", storedSkills, []),
    showHeadline: bool(data, "show_headline"),
    showLocation: bool(data, "show_location"),
    showSummary: bool(data, "show_summary"),
    showSkills: bool(data, "show_skills"),
    educations: json(data, "educations", storedEducations, []),
    experiences: json(data, "experiences", storedExperiences, []),
    links: json(data, "links", storedLinks, []),
    createdAt: str(data, "created_at"),
    updatedAt: str(data, "updated_at"),
  };
}

export async function getProfile(r: Redis, userId: number): Promise<JobSeekerProfile | null> {
  return toProfile(await r.hgetall(K.profile(userId)));
}

export async function getOrCreateProfile(r: Redis, userId: number): Promise<JobSeekerProfile> {
  const existing = await getProfile(r, userId);
  if (existing) return existing;

  const now = new Date().toISOString();
  const pipe = r.pipeline();
  pipe.hset(K.profile(userId), {
    user_id: String(userId),
    headline: "",
    summary: "",
    location: "",
    skills: "[]",
    show_headline: "1",
    show_location: "1",
    show_summary: "1",
    show_skills: "1",
    educations: "[]",
    experiences: "[]",
    links: "[]",
    created_at: now,
    updated_at: now,
  });
  pipe.zadd(K.profilesByUpdate(), Date.parse(now), String(userId));
  await pipe.exec();

  const created = await getProfile(r, userId);
  if (!created) throw new Error(`Profile ${userId} vanished after creation`);
  return created;
}

/**
 * Overwrite a profile with the submitted content. Education, experience and
 * link lists replace the stored ones wholesale.
 */
export async function updateProfile(
  r: Redis,
  userId: number,
  input: ProfileUpdateInput,
): Promise<JobSeekerProfile> {
  const current = await getOrCreateProfile(r, userId);
  const skills = await getOrCreateSkills(r, parseSkillsCsv(input.skills));
  const now = new Date();
  const nowIso = now.toISOString();

  const educations: Education[] = input.educations;
  const experiences: Experience[] = input.experiences;
  const links: Link[] = input.links;

  const pipe = r.pipeline();
  pipe.hset(K.profile(userId), {
    headline: input.headline,
    summary: input.summary,
    location: input.location,
    skills: JSON.stringify(skills),
    show_headline: flag(input.showHeadline),
    show_location: flag(input.showLocation),
    show_summary: flag(input.showSummary),
    show_skills: flag(input.showSkills),
    educations: JSON.stringify(educations),
    experiences: JSON.stringify(experiences),
    links: JSON.stringify(links),
    updated_at: nowIso,
  });
  pipe.zadd(K.profilesByUpdate(), now.getTime(), String(userId));
  await pipe.exec();

  return {
    ...current,
    headline: input.headline,
    summary: input.summary,
    location: input.location,
    skills,
    showHeadline: input.showHeadline,
    showLocation: input.showLocation,
    showSummary: input.showSummary,
    showSkills: input.showSkills,
    educations,
    experiences,
    links,
    updatedAt: nowIso,
  };
}

/** Profiles ordered by last update, newest first */
export async function listProfiles(r: Redis): Promise<JobSeekerProfile[]> {
  const ids = await r.zrevrange(K.profilesByUpdate(), 0, -1);
  const profiles = await Promise.all(ids.map((id) => getProfile(r, parseInt(id, 10))));
  return profiles.filter((p): p is JobSeekerProfile => p !== null);
}

export async function listProfilesUpdatedSince(r: Redis, since: Date): Promise<JobSeekerProfile[]> {
  const ids = await r.zrevrangebyscore(K.profilesByUpdate(), "+inf", since.getTime());
  const profiles = await Promise.all(ids.map((id) => getProfile(r, parseInt(id, 10))));
  return profiles.filter((p): p is JobSeekerProfile => p !== null);
}

interface Dated {
  current: boolean;
  startDate: string;
  endDate: string | null;
}

/** Current entries first, then by end date, then start date, newest first */
export function byRecency<T extends Dated>(entries: T[]): T[] {
  return [...entries].sort(
    (a, b) =>
      Number(b.current) - Number(a.current) ||
      (b.endDate ?? "").localeCompare(a.endDate ?? "") ||
      b.startDate.localeCompare(a.startDate),
  );
}

/** The owner's own page: every field, but only the entries marked shown */
export function myProfile(profile: JobSeekerProfile): JobSeekerProfile {
  return {
    ...profile,
    educations: byRecency(profile.educations.filter((e) => e.show)),
    experiences: byRecency(profile.experiences.filter((e) => e.show)),
    links: profile.links.filter((l) => l.show),
  };
}

export interface ProfileView {
  username: string;
  firstName: string;
  lastName: string;
  headline: string;
  summary: string;
  location: string;
  skills: string[];
  educations: Education[];
  experiences: Experience[];
  links: Link[];
  updatedAt: string;
}

/**
 * What a visitor sees: hidden entries are dropped and, for other people's
 * profiles, sections switched off by their show flag are blanked.
 */
export function viewProfile(profile: JobSeekerProfile, user: User, opts: { owner: boolean }): ProfileView {
  const reveal = (visible: boolean) => opts.owner || visible;
  return {
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    headline: reveal(profile.showHeadline) ? profile.headline : "",
    summary: reveal(profile.showSummary) ? profile.summary : "",
    location: reveal(profile.showLocation) ? profile.location : "",
    skills: reveal(profile.showSkills) ? profile.skills : [],
    educations: byRecency(profile.educations.filter((e) => e.show)),
    experiences: byRecency(profile.experiences.filter((e) => e.show)),
    links: profile.links.filter((l) => l.show),
    updatedAt: profile.updatedAt,
  };
}
