import type Redis from "ioredis";
import RedisMock from "ioredis-mock";
import { createUser } from "../accounts.js";
import { updateProfile } from "../profiles.js";
import type { JobSeekerProfile, User } from "../types.js";
import type { JobInput, ProfileUpdateInput } from "../validation.js";

/** ioredis-mock instances share one keyspace; call flushall between tests */
export function makeRedis(): Redis {
  return new RedisMock();
}

export async function makeSeeker(
  r: Redis,
  username: string,
  profile: Partial<ProfileUpdateInput> = {},
  names: { firstName?: string; lastName?: string } = {},
): Promise<{ user: User; profile: JobSeekerProfile }> {
  const user = await createUser(r, {
    username,
    email: `${username}@example.com`,
    firstName: names.firstName ?? "",
    lastName: names.lastName ?? "",
    accountType: "JOB_SEEKER",
  });
  const saved = await updateProfile(r, user.id, profileInput(profile));
  return { user, profile: saved };
}

export async function makeRecruiter(r: Redis, username: string, opts: { isStaff?: boolean } = {}): Promise<User> {
  return createUser(
    r,
    { username, email: `${username}@example.com`, firstName: "", lastName: "", accountType: "RECRUITER" },
    opts,
  );
}

export function profileInput(overrides: Partial<ProfileUpdateInput> = {}): ProfileUpdateInput {
  return {
    headline: "",
    summary: "",
    location: "",
    skills: "",
    showHeadline: true,
    showSummary: true,
    showLocation: true,
    showSkills: true,
    educations: [],
    experiences: [],
    links: [],
    ...overrides,
  };
}

export function jobInput(overrides: Partial<JobInput> = {}): JobInput {
  return {
    title: "Backend Engineer",
    company: "Acme",
    location: "Remote",
    workType: "REMOTE",
    description: "Build services.",
    requirements: "",
    salaryMin: null,
    salaryMax: null,
    salaryCurrency: "USD",
    visaSponsorship: false,
    benefits: "",
    requiredSkills: "",
    niceToHaveSkills: "",
    expiresAt: null,
    status: "ACTIVE",
    ...overrides,
  };
}

export function nominatimResponse(lat: string, lon: string): Response {
  return new Response(JSON.stringify([{ lat, lon }]), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}
