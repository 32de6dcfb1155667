import type Redis from "ioredis";
import { notFound } from "./errors.js";
import { getUsers, isJobSeeker } from "./accounts.js";
import { listJobsByStatus, listPostedJobs, requireOwnJob, summarizeJob } from "./jobs.js";
import type { JobSummary } from "./jobs.js";
import { getProfile, listProfiles } from "./profiles.js";
import { lowerSet } from "./skills.js";
import type { Job, JobSeekerProfile, User } from "./types.js";

/**
 * Score a job seeker against a job.
 * Higher score = better match.
 */
export function scoreCandidate(
  job: Job,
  seeker: JobSeekerProfile,
): { score: number; reasons: string[] } {
  let score = 0;
  const reasons: string[] = [];
  const seekerSkills = lowerSet(seeker.skills);

  // Skill overlap: required weighs heavily, nice-to-have lightly
  const required = job.requiredSkills.filter((s) => seekerSkills.has(s.toLowerCase()));
  const nice = job.niceToHaveSkills.filter((s) => seekerSkills.has(s.toLowerCase()));
  if (required.length > 0) {
    score += required.length * 10;
    reasons.push(`Required skills: ${required.join(", ")}`);
  }
  if (nice.length > 0) {
    score += nice.length * 3;
    reasons.push(`Nice-to-have skills: ${nice.join(", ")}`);
  }

  // Location
  if (seeker.location && job.location) {
    if (seeker.location.toLowerCase() === job.location.toLowerCase()) {
      score += 5;
      reasons.push(`Same location: "${job.location}"`);
    } else if (job.workType === "REMOTE") {
      score += 2;
      reasons.push("Remote role");
    }
  }

  // Title words mentioned in the summary
  if (seeker.summary && job.title) {
    const summary = seeker.summary.toLowerCase();
    const words = job.title.toLowerCase().split(/\s+/).filter(Boolean);
    const hits = words.filter((w) => summary.includes(w));
    if (hits.length > 0) {
      score += hits.length;
      reasons.push(`Summary mentions: ${hits.join(", ")}`);
    }
  }

  return { score, reasons };
}

export function computeMatchScore(job: Job, seeker: JobSeekerProfile): number {
  return scoreCandidate(job, seeker).score;
}

export interface RecommendedCandidate {
  userId: number;
  username: string;
  firstName: string;
  lastName: string;
  headline: string;
  location: string;
  skills: string[];
  score: number;
  matchReasons: string[];
}

/** Job seekers with a positive score, best first */
export async function getRecommendedJobseekers(r: Redis, job: Job): Promise<RecommendedCandidate[]> {
  const profiles = (await listProfiles(r)).sort((a, b) => a.userId - b.userId);
  const users = await getUsers(r, profiles.map((p) => p.userId));

  const matches: RecommendedCandidate[] = [];
  for (const profile of profiles) {
    const user = users.get(profile.userId);
    if (!user) continue;
    const { score, reasons } = scoreCandidate(job, profile);
    if (score <= 0) continue;
    matches.push({
      userId: user.id,
      username: user.username,
      firstName: user.firstName,
      lastName: user.lastName,
      headline: profile.headline,
      location: profile.location,
      skills: profile.skills,
      score,
      matchReasons: reasons,
    });
  }

  // Sort by score descending
  matches.sort((a, b) => b.score - a.score);
  return matches;
}

export interface RecommendedJob {
  job: JobSummary;
  score: number;
  matchedRequired: string[];
  matchedNice: string[];
}

/**
 * Active jobs sharing at least one skill with the seeker, scored two per
 * required match and one per nice-to-have match.
 */
export async function recommendedJobs(r: Redis, seeker: User): Promise<RecommendedJob[]> {
  const profile = await getProfile(r, seeker.id);
  if (!profile) throw notFound("Profile not found");
  const owned = lowerSet(profile.skills);

  const recommendations: RecommendedJob[] = [];
  for (const job of await listJobsByStatus(r, "ACTIVE")) {
    const matchedRequired = job.requiredSkills.filter((s) => owned.has(s.toLowerCase()));
    const matchedNice = job.niceToHaveSkills.filter((s) => owned.has(s.toLowerCase()));
    const score = matchedRequired.length * 2 + matchedNice.length;
    if (score > 0) recommendations.push({ job: summarizeJob(job), score, matchedRequired, matchedNice });
  }

  // Jobs arrive newest first, so equal scores keep that order
  recommendations.sort((a, b) => b.score - a.score);
  return recommendations;
}

export type Recommendations =
  | { role: "JOB_SEEKER"; recommendations: RecommendedJob[] }
  | { role: "RECRUITER"; jobs: { job: JobSummary; candidates: RecommendedCandidate[] }[] };

export async function recommendationsFor(r: Redis, user: User): Promise<Recommendations> {
  if (isJobSeeker(user)) {
    return { role: "JOB_SEEKER", recommendations: await recommendedJobs(r, user) };
  }

  const jobs = await listPostedJobs(r, user);
  return {
    role: "RECRUITER",
    jobs: await Promise.all(
      jobs.map(async (job) => ({ job: summarizeJob(job), candidates: await getRecommendedJobseekers(r, job) })),
    ),
  };
}

/** Candidates for one of the recruiter's own jobs */
export async function candidatesForJob(
  r: Redis,
  user: User,
  jobId: number,
): Promise<{ job: JobSummary; candidates: RecommendedCandidate[] }> {
  const job = await requireOwnJob(r, user, jobId);
  return { job: summarizeJob(job), candidates: await getRecommendedJobseekers(r, job) };
}
