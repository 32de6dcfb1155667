import { z } from "zod";
import {
  ACCOUNT_TYPES,
  JOB_STATUSES,
  LINK_KINDS,
  REPORT_REASONS,
  WORK_TYPES,
} from "./types.js";

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const trimmed = z.string().trim();
const optionalText = trimmed.optional().default("");

/** Query-string ints: blank means absent */
const queryInt = z
  .string()
  .optional()
  .transform((v, ctx) => {
    if (v === undefined || v.trim() === "") return undefined;
    const n = Number(v);
    if (!Number.isInteger(n) || n < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Must be a non-negative whole number" });
      return z.NEVER;
    }
    return n;
  });

const queryBool = z
  .string()
  .optional()
  .transform((v) => v === "true" || v === "on" || v === "1");

const salary = z.number().int().nonnegative().nullable().optional().default(null);

/* ── Accounts ── */

export const createUserSchema = z.object({
  username: trimmed.min(1).max(150).regex(/^[\w.@+-]+$/, "Letters, digits and @/./+/-/_ only"),
  email: trimmed.email(),
  firstName: optionalText,
  lastName: optionalText,
  accountType: z.enum(ACCOUNT_TYPES).default("JOB_SEEKER"),
});
export type CreateUserInput = z.infer<typeof createUserSchema>;

export const messageSchema = z.object({
  recipientId: z.number().int().positive(),
  content: trimmed.min(1),
});

/* ── Profiles ── */

const dateString = z.string().regex(DATE_RE, "Use YYYY-MM-DD");

function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}

interface Dated {
  startDate: string;
  endDate?: string | null;
  current: boolean;
}

/**
 * When "current" is set the end date is dropped; otherwise it is required.
 * A start date may not be in the future or after the end date.
 */
function checkDates(entry: Dated, ctx: z.RefinementCtx): void {
  const end = entry.current ? null : entry.endDate ?? null;
  if (!entry.current && !end) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["endDate"], message: "This field is required." });
  }
  if (entry.startDate > todayIso()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["startDate"], message: "Start date cannot be in the future." });
  }
  if (end && entry.startDate > end) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["startDate"], message: "Start date cannot be after end date." });
  }
}

export const educationSchema = z
  .object({
    school: trimmed.min(1).max(120),
    degree: trimmed.min(1).max(120),
    fieldOfStudy: trimmed.min(1).max(120),
    startDate: dateString,
    endDate: dateString.nullable().optional(),
    current: z.boolean().default(false),
    description: trimmed.min(1),
    show: z.boolean().default(true),
  })
  .superRefine(checkDates)
  .transform((e) => ({ ...e, endDate: e.current ? null : e.endDate ?? null }));

export const experienceSchema = z
  .object({
    title: trimmed.min(1).max(120),
    company: trimmed.min(1).max(120),
    startDate: dateString,
    endDate: dateString.nullable().optional(),
    current: z.boolean().default(false),
    description: trimmed.min(1),
    show: z.boolean().default(true),
  })
  .superRefine(checkDates)
  .transform((e) => ({ ...e, endDate: e.current ? null : e.endDate ?? null }));

export const linkSchema = z.object({
  kind: z.enum(LINK_KINDS),
  label: trimmed.min(1).max(60),
  url: trimmed.url(),
  show: z.boolean().default(true),
});

export const profileUpdateSchema = z.object({
  headline: trimmed.max(120).optional().default(""),
  summary: optionalText,
  location: trimmed.max(120).optional().default(""),
  skills: optionalText,
  showHeadline: z.boolean().default(true),
  showSummary: z.boolean().default(true),
  showLocation: z.boolean().default(true),
  showSkills: z.boolean().default(true),
  educations: z.array(educationSchema).default([]),
  experiences: z.array(experienceSchema).default([]),
  links: z.array(linkSchema).default([]),
});
export type ProfileUpdateInput = z.infer<typeof profileUpdateSchema>;

/* ── Jobs ── */

export const jobInputSchema = z
  .object({
    title: trimmed.min(1).max(200),
    company: trimmed.min(1).max(200),
    location: trimmed.max(200).optional().default(""),
    workType: z.enum(WORK_TYPES).default("ON_SITE"),
    description: trimmed.min(1),
    requirements: optionalText,
    salaryMin: salary,
    salaryMax: salary,
    salaryCurrency: trimmed.length(3).default("USD"),
    visaSponsorship: z.boolean().default(false),
    benefits: optionalText,
    requiredSkills: optionalText,
    niceToHaveSkills: optionalText,
    expiresAt: z.string().datetime({ offset: true }).nullable().optional().default(null),
    status: z.enum(JOB_STATUSES).default("ACTIVE"),
  })
  .superRefine((job, ctx) => {
    if (job.salaryMin && job.salaryMax && job.salaryMin > job.salaryMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Minimum salary cannot be greater than maximum salary." });
    }
  });
export type JobInput = z.infer<typeof jobInputSchema>;

export const jobSearchSchema = z
  .object({
    q: optionalText,
    location: optionalText,
    skills: optionalText,
    workType: z.union([z.enum(WORK_TYPES), z.literal("")]).optional().default(""),
    salaryMin: queryInt,
    salaryMax: queryInt,
    visaSponsorship: queryBool,
    near: optionalText,
    radius: queryInt,
    page: z.string().optional(),
  })
  .superRefine((q, ctx) => {
    if (q.salaryMin && q.salaryMax && q.salaryMin > q.salaryMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Minimum salary cannot be greater than maximum salary." });
    }
  });
export type JobSearchQuery = z.infer<typeof jobSearchSchema>;

export const applySchema = z.object({
  coverLetter: optionalText,
});

export const applicationStatusSchema = z.object({
  // WITHDRAWN is set by the applicant alone
  status: z.enum(["PENDING", "REVIEWING", "INTERVIEWED", "ACCEPTED", "REJECTED"]),
});

export const reportSchema = z.object({
  reason: z.enum(REPORT_REASONS),
  description: trimmed.min(1),
});

/* ── Candidates ── */

export const candidateSearchSchema = z.object({
  q: optionalText,
  location: optionalText,
  skills: optionalText,
  savedSearch: z.string().optional(),
  page: z.string().optional(),
});
export type CandidateSearchQuery = z.infer<typeof candidateSearchSchema>;

export const saveSearchSchema = z.object({
  name: trimmed.min(1, "Please provide a name for your search.").max(100),
  skills: optionalText,
  location: optionalText,
  notifyOnNewMatches: z.boolean().default(true),
});
export type SaveSearchInput = z.infer<typeof saveSearchSchema>;

export const sweepSchema = z.object({
  hours: z.number().int().positive().default(24),
});
