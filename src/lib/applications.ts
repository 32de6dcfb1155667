import type Redis from "ioredis";
import { K } from "./keys.js";
import { int, pickEnum, str } from "./fields.js";
import { conflict, forbidden, notFound } from "./errors.js";
import { getUsers, isJobSeeker, isRecruiter } from "./accounts.js";
import { getProfile, viewProfile } from "./profiles.js";
import type { ProfileView } from "./profiles.js";
import { getJob, listPostedJobs, requireActiveJob, requireOwnJob, summarizeJob } from "./jobs.js";
import type { JobSummary } from "./jobs.js";
import { APPLICATION_STATUSES } from "./types.js";
import type { ApplicationStatus, Job, JobApplication, User } from "./types.js";

function toApplication(data: Record<string, string>): JobApplication | null {
  if (!data.job_id || !data.applicant_id) return null;
  return {
    jobId: int(data, "job_id"),
    applicantId: int(data, "applicant_id"),
    status: pickEnum(str(data, "status"), APPLICATION_STATUSES, "PENDING"),
    coverLetter: str(data, "cover_letter"),
    appliedAt: str(data, "applied_at"),
    updatedAt: str(data, "updated_at"),
  };
}

export async function getApplication(r: Redis, jobId: number, applicantId: number): Promise<JobApplication | null> {
  return toApplication(await r.hgetall(K.application(jobId, applicantId)));
}

/**
 * File an application. The (job, applicant) pair is claimed with HSETNX so
 * two concurrent submissions cannot both succeed.
 */
export async function applyForJob(
  r: Redis,
  user: User,
  jobId: number,
  coverLetter = "",
): Promise<JobApplication> {
  const job = await requireActiveJob(r, jobId);
  if (!isJobSeeker(user)) throw forbidden("Only job seekers can apply for jobs.");
  if (job.postedBy === user.id) throw forbidden("You cannot apply to your own job posting.");

  const key = K.application(jobId, user.id);
  const claimed = await r.hsetnx(key, "applicant_id", String(user.id));
  if (claimed === 0) throw conflict("You have already applied for this job.");

  const now = new Date();
  const application: JobApplication = {
    jobId,
    applicantId: user.id,
    status: "PENDING",
    coverLetter,
    appliedAt: now.toISOString(),
    updatedAt: now.toISOString(),
  };

  const pipe = r.pipeline();
  pipe.hset(key, {
    job_id: String(jobId),
    status: application.status,
    cover_letter: coverLetter,
    applied_at: application.appliedAt,
    updated_at: application.updatedAt,
  });
  pipe.zadd(K.jobApplicationsIdx(jobId), now.getTime(), String(user.id));
  pipe.zadd(K.userApplicationsIdx(user.id), now.getTime(), String(jobId));
  await pipe.exec();

  console.log(`[applications] ${user.username} applied for job ${jobId}`);
  return application;
}

export interface ApplicationWithApplicant extends JobApplication {
  applicant: { id: number; username: string; firstName: string; lastName: string; email: string };
  profile: ProfileView | null;
}

/** Applications for a job, newest first. Only the poster may look. */
export async function listJobApplications(
  r: Redis,
  user: User,
  jobId: number,
): Promise<{ job: JobSummary; applications: ApplicationWithApplicant[] }> {
  if (!isRecruiter(user)) throw notFound("Job not found");
  const job = await requireOwnJob(r, user, jobId);

  const applicantIds = (await r.zrevrange(K.jobApplicationsIdx(jobId), 0, -1)).map((id) => parseInt(id, 10));
  const users = await getUsers(r, applicantIds);

  const applications: ApplicationWithApplicant[] = [];
  for (const applicantId of applicantIds) {
    const application = await getApplication(r, jobId, applicantId);
    const applicant = users.get(applicantId);
    if (!application || !applicant) continue;
    const profile = await getProfile(r, applicantId);
    applications.push({
      ...application,
      applicant: {
        id: applicant.id,
        username: applicant.username,
        firstName: applicant.firstName,
        lastName: applicant.lastName,
        email: applicant.email,
      },
      profile: profile ? viewProfile(profile, applicant, { owner: false }) : null,
    });
  }

  return { job: summarizeJob(job), applications };
}

async function setStatus(r: Redis, application: JobApplication, status: ApplicationStatus): Promise<JobApplication> {
  const updatedAt = new Date().toISOString();
  await r.hset(K.application(application.jobId, application.applicantId), { status, updated_at: updatedAt });
  return { ...application, status, updatedAt };
}

export async function updateApplicationStatus(
  r: Redis,
  user: User,
  jobId: number,
  applicantId: number,
  status: Exclude<ApplicationStatus, "WITHDRAWN">,
): Promise<JobApplication> {
  await requireOwnJob(r, user, jobId);
  const application = await getApplication(r, jobId, applicantId);
  if (!application) throw notFound("Application not found");
  return setStatus(r, application, status);
}

export async function withdrawApplication(r: Redis, user: User, jobId: number): Promise<JobApplication> {
  const application = await getApplication(r, jobId, user.id);
  if (!application) throw notFound("Application not found");
  return setStatus(r, application, "WITHDRAWN");
}

export interface JobDetail {
  job: Job & { salaryRange: string; isActive: boolean };
  userApplied: boolean;
  application: JobApplication | null;
  canApply: boolean;
}

export async function getJobDetail(r: Redis, jobId: number, viewer: User | null): Promise<JobDetail> {
  const job = await requireActiveJob(r, jobId);
  const application = viewer ? await getApplication(r, jobId, viewer.id) : null;
  const userApplied = application !== null;
  const summary = summarizeJob(job);

  return {
    job: { ...job, salaryRange: summary.salaryRange, isActive: summary.isActive },
    userApplied,
    application,
    canApply: viewer !== null && isJobSeeker(viewer) && !userApplied && job.postedBy !== viewer.id,
  };
}

export interface MyApplication extends JobApplication {
  job: JobSummary;
}

export type MyJobs =
  | { role: "RECRUITER"; jobs: JobSummary[] }
  | { role: "JOB_SEEKER"; applications: MyApplication[] };

/** Recruiters see what they posted, job seekers what they applied for */
export async function myJobs(r: Redis, user: User): Promise<MyJobs> {
  if (isRecruiter(user)) {
    return { role: "RECRUITER", jobs: (await listPostedJobs(r, user)).map(summarizeJob) };
  }

  const jobIds = (await r.zrevrange(K.userApplicationsIdx(user.id), 0, -1)).map((id) => parseInt(id, 10));
  const applications: MyApplication[] = [];
  for (const jobId of jobIds) {
    const [application, job] = await Promise.all([getApplication(r, jobId, user.id), getJob(r, jobId)]);
    if (application && job) applications.push({ ...application, job: summarizeJob(job) });
  }
  return { role: "JOB_SEEKER", applications };
}
