import type Redis from "ioredis";
import { z } from "zod";
import { createUser, getUserByUsername } from "./accounts.js";
import { listJobsByStatus, postJob } from "./jobs.js";
import { getOrCreateSkills } from "./skills.js";
import { updateProfile } from "./profiles.js";
import { JOB_STATUSES, WORK_TYPES } from "./types.js";

const seekerSchema = z.object({
  username: z.string(),
  email: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  headline: z.string(),
  summary: z.string(),
  location: z.string(),
  skills: z.array(z.string()),
});

export const demoDataSchema = z.object({
  seekers: z.array(seekerSchema),
  recruiters: z.array(seekerSchema.pick({ username: true, email: true, firstName: true, lastName: true })),
  skills: z.array(z.string()),
  jobs: z.array(
    z.object({
      title: z.string(),
      company: z.string(),
      location: z.string(),
      workType: z.enum(WORK_TYPES),
      description: z.string(),
      requirements: z.string(),
      salaryMin: z.number().int().nullable(),
      salaryMax: z.number().int().nullable(),
      visaSponsorship: z.boolean(),
      benefits: z.string(),
      poster: z.string(),
      requiredSkills: z.array(z.string()),
      niceToHaveSkills: z.array(z.string()),
    }),
  ),
});
export type DemoData = z.infer<typeof demoDataSchema>;

export interface DemoSummary {
  usersCreated: string[];
  jobsCreated: string[];
  skipped: string[];
}

const DEMO_JOB_LIFETIME_DAYS = 60;

/**
 * Seed demo accounts, skills and jobs. Existing usernames and existing
 * title/company pairs are left alone, so running it twice is harmless.
 */
export async function seedDemoData(r: Redis, data: DemoData): Promise<DemoSummary> {
  const summary: DemoSummary = { usersCreated: [], jobsCreated: [], skipped: [] };

  await getOrCreateSkills(r, data.skills);

  for (const seeker of data.seekers) {
    if (await getUserByUsername(r, seeker.username)) {
      summary.skipped.push(`user ${seeker.username}`);
      continue;
    }
    const user = await createUser(r, { ...seeker, accountType: "JOB_SEEKER" });
    await updateProfile(r, user.id, {
      headline: seeker.headline,
      summary: seeker.summary,
      location: seeker.location,
      skills: seeker.skills.join(", "),
      showHeadline: true,
      showSummary: true,
      showLocation: true,
      showSkills: true,
      educations: [],
      experiences: [],
      links: [],
    });
    summary.usersCreated.push(user.username);
  }

  for (const recruiter of data.recruiters) {
    if (await getUserByUsername(r, recruiter.username)) {
      summary.skipped.push(`user ${recruiter.username}`);
      continue;
    }
    const user = await createUser(r, { ...recruiter, accountType: "RECRUITER" });
    summary.usersCreated.push(user.username);
  }

  const existing = new Set<string>();
  for (const status of JOB_STATUSES) {
    for (const job of await listJobsByStatus(r, status)) existing.add(`${job.title}|${job.company}`);
  }

  for (const job of data.jobs) {
    const label = `${job.title} @ ${job.company}`;
    const poster = await getUserByUsername(r, job.poster);
    if (existing.has(`${job.title}|${job.company}`) || !poster) {
      summary.skipped.push(`job ${label}`);
      continue;
    }
    await postJob(r, poster, {
      title: job.title,
      company: job.company,
      location: job.location,
      workType: job.workType,
      description: job.description,
      requirements: job.requirements,
      salaryMin: job.salaryMin,
      salaryMax: job.salaryMax,
      salaryCurrency: "USD",
      visaSponsorship: job.visaSponsorship,
      benefits: job.benefits,
      requiredSkills: job.requiredSkills.join(", "),
      niceToHaveSkills: job.niceToHaveSkills.join(", "),
      expiresAt: new Date(Date.now() + DEMO_JOB_LIFETIME_DAYS * 86400 * 1000).toISOString(),
      status: "ACTIVE",
    });
    summary.jobsCreated.push(label);
  }

  return summary;
}
