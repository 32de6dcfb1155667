import type Redis from "ioredis";
import { loadSettings } from "../config/settings.js";
import { geocodeFreeText, haversineMiles } from "./geocoding.js";
import { jobUrl, listJobsByStatus, summarizeJob } from "./jobs.js";
import type { JobSummary } from "./jobs.js";
import { paginate } from "./pagination.js";
import { lowerSet, splitCsv } from "./skills.js";
import type { Job, Page } from "./types.js";
import type { JobSearchQuery } from "./validation.js";

export interface MapPin {
  id: number;
  title: string;
  company: string;
  location: string;
  url: string;
  latitude: number;
  longitude: number;
}

export interface JobSearchResult {
  jobs: Page<JobSummary>;
  totalCount: number;
  hasFilters: boolean;
  jobsForMap: MapPin[];
}

const contains = (haystack: string, needle: string) => haystack.toLowerCase().includes(needle.toLowerCase());

/**
 * Predicate for every filter that needs nothing but the job itself.
 */
export function jobMatchesFilters(job: Job, query: JobSearchQuery): boolean {
  if (query.q && !(contains(job.title, query.q) || contains(job.company, query.q) || contains(job.description, query.q))) {
    return false;
  }
  if (query.location && !contains(job.location, query.location)) return false;
  if (query.workType && job.workType !== query.workType) return false;

  // Salary filters keep jobs whose range overlaps, or that did not state that bound
  if (query.salaryMin && job.salaryMax !== null && job.salaryMax < query.salaryMin) return false;
  if (query.salaryMax && job.salaryMin !== null && job.salaryMin > query.salaryMax) return false;

  if (query.visaSponsorship && !job.visaSponsorship) return false;

  const wanted = splitCsv(query.skills);
  if (wanted.length > 0) {
    const listed = lowerSet([...job.requiredSkills, ...job.niceToHaveSkills]);
    if (!wanted.some((s) => listed.has(s.toLowerCase()))) return false;
  }

  return true;
}

function hasAnyFilter(query: JobSearchQuery): boolean {
  return Boolean(
    query.q ||
      query.location ||
      query.skills ||
      query.workType ||
      query.salaryMin !== undefined ||
      query.salaryMax !== undefined ||
      query.visaSponsorship ||
      query.near,
  );
}

export async function searchJobs(r: Redis, query: JobSearchQuery): Promise<JobSearchResult> {
  let jobs = (await listJobsByStatus(r, "ACTIVE")).filter((job) => jobMatchesFilters(job, query));

  if (query.near) {
    const origin = await geocodeFreeText(r, query.near);
    const radius = query.radius ?? 25;
    jobs = origin
      ? jobs.filter(
          (job) =>
            job.latitude !== null &&
            job.longitude !== null &&
            haversineMiles(origin, { lat: job.latitude, lng: job.longitude }) <= radius,
        )
      : [];
  }

  const jobsForMap: MapPin[] = [];
  for (const job of jobs) {
    if (job.latitude === null || job.longitude === null) continue;
    jobsForMap.push({
      id: job.id,
      title: job.title,
      company: job.company,
      location: job.location,
      url: jobUrl(job.id),
      latitude: job.latitude,
      longitude: job.longitude,
    });
  }

  return {
    jobs: paginate(jobs.map(summarizeJob), query.page, loadSettings().pageSize),
    totalCount: jobs.length,
    hasFilters: hasAnyFilter(query),
    jobsForMap,
  };
}
