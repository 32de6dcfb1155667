import type Redis from "ioredis";
import { z } from "zod";
import { K, nextId } from "./keys.js";
import { bool, flag, floatOrNull, int, intOrNull, json, nullable, pickEnum, str, strOrNull } from "./fields.js";
import { forbidden, notFound } from "./errors.js";
import { isRecruiter } from "./accounts.js";
import { coordinatesForLocation } from "./geocoding.js";
import { getOrCreateSkills, parseSkillsCsv } from "./skills.js";
import { JOB_STATUSES, WORK_TYPES } from "./types.js";
import type { Job, User } from "./types.js";
import type { JobInput } from "./validation.js";

const storedSkills = z.array(z.string());

function toJob(data: Record<string, string>): Job | null {
  if (!data.id) return null;
  return {
    id: int(data, "id"),
    title: str(data, "title"),
    company: str(data, "company"),
    location: str(data, "location"),
    workType: pickEnum(str(data, "work_type"), WORK_TYPES, "ON_SITE"),
    description: str(data, "description"),
    requirements: str(data, "requirements"),
    salaryMin: intOrNull(data, "salary_min"),
    salaryMax: intOrNull(data, "salary_max"),
    salaryCurrency: str(data, "salary_currency") || "USD",
    visaSponsorship: bool(data, "visa_sponsorship"),
    benefits: str(data, "benefits"),
    requiredSkills: json(data, "required_skills", storedSkills, []),
    niceToHaveSkills: json(data, "nice_to_have_skills", storedSkills, []),
    postedBy: int(data, "posted_by"),
    status: pickEnum(str(data, "status"), JOB_STATUSES, "ACTIVE"),
    createdAt: str(data, "created_at"),
    updatedAt: str(data, "updated_at"),
    expiresAt: strOrNull(data, "expires_at"),
    latitude: floatOrNull(data, "latitude"),
    longitude: floatOrNull(data, "longitude"),
  };
}

function jobFields(job: Job): Record<string, string> {
  return {
    id: String(job.id),
    title: job.title,
    company: job.company,
    location: job.location,
    work_type: job.workType,
    description: job.description,
    requirements: job.requirements,
    salary_min: nullable(job.salaryMin),
    salary_max: nullable(job.salaryMax),
    salary_currency: job.salaryCurrency,
    visa_sponsorship: flag(job.visaSponsorship),
    benefits: job.benefits,
    required_skills: JSON.stringify(job.requiredSkills),
    nice_to_have_skills: JSON.stringify(job.niceToHaveSkills),
    posted_by: String(job.postedBy),
    status: job.status,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    expires_at: nullable(job.expiresAt),
    latitude: nullable(job.latitude),
    longitude: nullable(job.longitude),
  };
}

export function isJobActive(job: Job, now: Date = new Date()): boolean {
  return job.status === "ACTIVE" && (!job.expiresAt || Date.parse(job.expiresAt) > now.getTime());
}

const usd = (n: number) => `$${n.toLocaleString("en-US")}`;

export function salaryRangeDisplay(job: Pick<Job, "salaryMin" | "salaryMax">): string {
  if (job.salaryMin && job.salaryMax) return `${usd(job.salaryMin)} - ${usd(job.salaryMax)}`;
  if (job.salaryMin) return `${usd(job.salaryMin)}+`;
  if (job.salaryMax) return `Up to ${usd(job.salaryMax)}`;
  return "Salary not specified";
}

export async function getJob(r: Redis, id: number): Promise<Job | null> {
  return toJob(await r.hgetall(K.job(id)));
}

export async function getJobs(r: Redis, ids: number[]): Promise<Job[]> {
  const jobs = await Promise.all(ids.map((id) => getJob(r, id)));
  return jobs.filter((j): j is Job => j !== null);
}

/** A job that exists and is ACTIVE, else 404 */
export async function requireActiveJob(r: Redis, id: number): Promise<Job> {
  const job = await getJob(r, id);
  if (!job || job.status !== "ACTIVE") throw notFound("Job not found");
  return job;
}

/** A job the given user posted; anyone else gets 404 */
export async function requireOwnJob(r: Redis, user: User, id: number): Promise<Job> {
  const job = await getJob(r, id);
  if (!job || job.postedBy !== user.id) throw notFound("Job not found");
  return job;
}

/** All jobs with the given status, newest first */
export async function listJobsByStatus(r: Redis, status: Job["status"]): Promise<Job[]> {
  const ids = await r.smembers(K.jobStatusIdx(status));
  const jobs = await getJobs(r, ids.map((id) => parseInt(id, 10)));
  return sortNewestFirst(jobs);
}

export function sortNewestFirst(jobs: Job[]): Job[] {
  return [...jobs].sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id);
}

export async function postJob(r: Redis, user: User, input: JobInput): Promise<Job> {
  if (!isRecruiter(user)) throw forbidden("Only recruiters can post jobs.");

  const id = await nextId(r, "job");
  const now = new Date().toISOString();
  const coords = await coordinatesForLocation(r, input.location, null);

  const job: Job = {
    id,
    title: input.title,
    company: input.company,
    location: input.location,
    workType: input.workType,
    description: input.description,
    requirements: input.requirements,
    salaryMin: input.salaryMin,
    salaryMax: input.salaryMax,
    salaryCurrency: input.salaryCurrency,
    visaSponsorship: input.visaSponsorship,
    benefits: input.benefits,
    requiredSkills: await getOrCreateSkills(r, parseSkillsCsv(input.requiredSkills)),
    niceToHaveSkills: await getOrCreateSkills(r, parseSkillsCsv(input.niceToHaveSkills)),
    postedBy: user.id,
    status: input.status,
    createdAt: now,
    updatedAt: now,
    expiresAt: input.expiresAt,
    latitude: coords.latitude,
    longitude: coords.longitude,
  };

  const pipe = r.pipeline();
  pipe.hset(K.job(id), jobFields(job));
  pipe.sadd(K.jobStatusIdx(job.status), String(id));
  pipe.sadd(K.postedByIdx(user.id), String(id));
  await pipe.exec();

  console.log(`[jobs] ${user.username} posted job ${id} "${job.title}" at ${job.company}`);
  return job;
}

export async function editJob(r: Redis, user: User, id: number, input: JobInput): Promise<Job> {
  const existing = await requireOwnJob(r, user, id);
  const coords = await coordinatesForLocation(r, input.location, existing);

  const job: Job = {
    ...existing,
    title: input.title,
    company: input.company,
    location: input.location,
    workType: input.workType,
    description: input.description,
    requirements: input.requirements,
    salaryMin: input.salaryMin,
    salaryMax: input.salaryMax,
    salaryCurrency: input.salaryCurrency,
    visaSponsorship: input.visaSponsorship,
    benefits: input.benefits,
    requiredSkills: await getOrCreateSkills(r, parseSkillsCsv(input.requiredSkills)),
    niceToHaveSkills: await getOrCreateSkills(r, parseSkillsCsv(input.niceToHaveSkills)),
    status: input.status,
    updatedAt: new Date().toISOString(),
    expiresAt: input.expiresAt,
    latitude: coords.latitude,
    longitude: coords.longitude,
  };

  const pipe = r.pipeline();
  pipe.hset(K.job(id), jobFields(job));
  if (existing.status !== job.status) {
    pipe.srem(K.jobStatusIdx(existing.status), String(id));
    pipe.sadd(K.jobStatusIdx(job.status), String(id));
  }
  await pipe.exec();

  return job;
}

export async function listPostedJobs(r: Redis, user: User): Promise<Job[]> {
  const ids = await r.smembers(K.postedByIdx(user.id));
  return sortNewestFirst(await getJobs(r, ids.map((id) => parseInt(id, 10))));
}

export interface JobSummary {
  id: number;
  title: string;
  company: string;
  location: string;
  workType: Job["workType"];
  salaryRange: string;
  visaSponsorship: boolean;
  requiredSkills: string[];
  niceToHaveSkills: string[];
  status: Job["status"];
  isActive: boolean;
  createdAt: string;
  url: string;
}

export function summarizeJob(job: Job): JobSummary {
  return {
    id: job.id,
    title: job.title,
    company: job.company,
    location: job.location,
    workType: job.workType,
    salaryRange: salaryRangeDisplay(job),
    visaSponsorship: job.visaSponsorship,
    requiredSkills: job.requiredSkills,
    niceToHaveSkills: job.niceToHaveSkills,
    status: job.status,
    isActive: isJobActive(job),
    createdAt: job.createdAt,
    url: jobUrl(job.id),
  };
}

export const jobUrl = (id: number) => `/api/jobs/${id}`;
