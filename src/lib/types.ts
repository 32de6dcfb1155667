/* ── Recruit Board Entities ── */

export const ACCOUNT_TYPES = ["JOB_SEEKER", "RECRUITER"] as const;
export type AccountType = (typeof ACCOUNT_TYPES)[number];

export interface User {
  id: number;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  accountType: AccountType;
  isStaff: boolean;
  dateJoined: string;
}

export interface Message {
  id: number;
  senderId: number;
  recipientId: number;
  content: string;
  sentAt: string;
  isRead: boolean;
}

/* ── Profiles ── */

export const LINK_KINDS = ["WEBSITE", "LINKEDIN", "GITHUB", "PORTFOLIO", "OTHER"] as const;
export type LinkKind = (typeof LINK_KINDS)[number];

export interface Education {
  school: string;
  degree: string;
  fieldOfStudy: string;
  startDate: string;        // YYYY-MM-DD
  endDate: string | null;
  current: boolean;
  description: string;
  show: boolean;
}

export interface Experience {
  title: string;
  company: string;
  startDate: string;
  endDate: string | null;
  current: boolean;
  description: string;
  show: boolean;
}

export interface Link {
  kind: LinkKind;
  label: string;
  url: string;
  show: boolean;
}

export interface JobSeekerProfile {
  userId: number;
  headline: string;
  summary: string;
  location: string;
  skills: string[];
  showHeadline: boolean;
  showLocation: boolean;
  showSummary: boolean;
  showSkills: boolean;
  educations: Education[];
  experiences: Experience[];
  links: Link[];
  createdAt: string;
  updatedAt: string;
}

/* ── Jobs ── */

export const WORK_TYPES = ["REMOTE", "ON_SITE", "HYBRID"] as const;
export type WorkType = (typeof WORK_TYPES)[number];

export const JOB_STATUSES = ["ACTIVE", "CLOSED", "DRAFT"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface Job {
  id: number;
  title: string;
  company: string;
  location: string;
  workType: WorkType;
  description: string;
  requirements: string;
  salaryMin: number | null;
  salaryMax: number | null;
  salaryCurrency: string;
  visaSponsorship: boolean;
  benefits: string;
  requiredSkills: string[];
  niceToHaveSkills: string[];
  postedBy: number;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  expiresAt: string | null;
  latitude: number | null;
  longitude: number | null;
}

export const APPLICATION_STATUSES = [
  "PENDING",
  "REVIEWING",
  "INTERVIEWED",
  "ACCEPTED",
  "REJECTED",
  "WITHDRAWN",
] as const;
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface JobApplication {
  jobId: number;
  applicantId: number;
  status: ApplicationStatus;
  coverLetter: string;
  appliedAt: string;
  updatedAt: string;
}

export const REPORT_REASONS = ["spam", "inappropriate", "fake", "discriminatory", "other"] as const;
export type ReportReason = (typeof REPORT_REASONS)[number];

export interface JobReport {
  jobId: number;
  reportedBy: number;
  reason: ReportReason;
  description: string;
  createdAt: string;
  reviewed: boolean;
  reviewedBy: number | null;
  reviewedAt: string | null;
}

/* ── Saved searches & notifications ── */

export interface SavedCandidateSearch {
  id: number;
  recruiterId: number;
  name: string;
  /** CSV of skill names, or "Name: <query>" for a free-text search */
  skills: string;
  location: string;
  notifyOnNewMatches: boolean;
  createdAt: string;
  lastRun: string | null;
  lastNotified: string | null;
}

export interface SearchNotification {
  id: number;
  savedSearchId: number;
  candidateIds: number[];
  candidatesCount: number;
  sentAt: string;
  isRead: boolean;
  readAt: string | null;
}

export interface Coordinates {
  lat: number;
  lng: number;
}

export interface Page<T> {
  items: T[];
  page: number;
  numPages: number;
  totalCount: number;
}
