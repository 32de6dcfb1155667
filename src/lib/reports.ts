import type Redis from "ioredis";
import { K, splitPair } from "./keys.js";
import { bool, flag, int, intOrNull, pickEnum, str, strOrNull } from "./fields.js";
import { conflict, notFound } from "./errors.js";
import { requireActiveJob } from "./jobs.js";
import { sendReportAlert } from "./notifier.js";
import { REPORT_REASONS } from "./types.js";
import type { JobReport, ReportReason, User } from "./types.js";

function toReport(data: Record<string, string>): JobReport | null {
  if (!data.job_id) return null;
  return {
    jobId: int(data, "job_id"),
    reportedBy: int(data, "reported_by"),
    reason: pickEnum(str(data, "reason"), REPORT_REASONS, "other"),
    description: str(data, "description"),
    createdAt: str(data, "created_at"),
    reviewed: bool(data, "reviewed"),
    reviewedBy: intOrNull(data, "reviewed_by"),
    reviewedAt: strOrNull(data, "reviewed_at"),
  };
}

export async function getReport(r: Redis, jobId: number, reporterId: number): Promise<JobReport | null> {
  return toReport(await r.hgetall(K.report(jobId, reporterId)));
}

/**
 * File a report. Staff get a webhook alert; if that fails the report
 * still stands.
 */
export async function reportJob(
  r: Redis,
  user: User,
  jobId: number,
  reason: ReportReason,
  description: string,
): Promise<JobReport> {
  const job = await requireActiveJob(r, jobId);
  const key = K.report(jobId, user.id);

  const claimed = await r.hsetnx(key, "job_id", String(jobId));
  if (claimed === 0) throw conflict("You have already reported this job.");

  const now = new Date();
  const report: JobReport = {
    jobId,
    reportedBy: user.id,
    reason,
    description,
    createdAt: now.toISOString(),
    reviewed: false,
    reviewedBy: null,
    reviewedAt: null,
  };

  const pipe = r.pipeline();
  pipe.hset(key, {
    reported_by: String(user.id),
    reason,
    description,
    created_at: report.createdAt,
    reviewed: flag(false),
    reviewed_by: "",
    reviewed_at: "",
  });
  pipe.zadd(K.reportsFeed(), now.getTime(), `${jobId}:${user.id}`);
  await pipe.exec();

  console.log(`[reports] Job ${jobId} reported by ${user.username} (${reason})`);

  try {
    await sendReportAlert({
      jobId,
      jobTitle: job.title,
      company: job.company,
      reporterUsername: user.username,
      reason,
      description,
    });
  } catch (error) {
    console.error(`[reports] Alert for job ${jobId} failed:`, error);
  }

  return report;
}

function requireStaff(user: User): void {
  if (!user.isStaff) throw notFound();
}

export async function listReports(r: Redis, user: User, opts: { reviewed?: boolean } = {}): Promise<JobReport[]> {
  requireStaff(user);
  const members = await r.zrevrange(K.reportsFeed(), 0, -1);
  const reports = await Promise.all(members.map((m) => getReport(r, ...splitPair(m))));
  return reports
    .filter((rep): rep is JobReport => rep !== null)
    .filter((rep) => opts.reviewed === undefined || rep.reviewed === opts.reviewed);
}

export async function reviewReport(r: Redis, user: User, jobId: number, reporterId: number): Promise<JobReport> {
  requireStaff(user);
  const report = await getReport(r, jobId, reporterId);
  if (!report) throw notFound("Report not found");

  const reviewedAt = new Date().toISOString();
  await r.hset(K.report(jobId, reporterId), {
    reviewed: flag(true),
    reviewed_by: String(user.id),
    reviewed_at: reviewedAt,
  });
  return { ...report, reviewed: true, reviewedBy: user.id, reviewedAt };
}
