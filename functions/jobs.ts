import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, queryOf, readBody, requireUser } from "../src/lib/http.js";
import { searchJobs } from "../src/lib/job-search.js";
import { postJob } from "../src/lib/jobs.js";
import { jobInputSchema, jobSearchSchema } from "../src/lib/validation.js";

/**
 * GET /api/jobs
 * Search active jobs, newest first.
 *
 * Query params:
 *   q                 - text in title, company or description
 *   location          - text in the job location
 *   skills            - comma-separated, any of them listed on the job
 *   workType          - REMOTE, ON_SITE or HYBRID
 *   salaryMin/Max     - overlap with the advertised range
 *   visaSponsorship   - "true" for sponsoring jobs only
 *   near, radius      - "City, ST" and miles (default 25)
 *   page              - 1-based page number
 *
 * POST /api/jobs
 * Post a job (recruiters only).
 */
export default handle("jobs", async (req, ctx) => {
  if (req.method === "GET") {
    const query = jobSearchSchema.parse(queryOf(req));
    return json(await searchJobs(ctx.redis, query));
  }

  const user = await requireUser(req, ctx.redis);
  const input = jobInputSchema.parse(await readBody(req));
  const job = await postJob(ctx.redis, user, input);
  return json({ job }, 201);
});

export const config: RouteConfig = {
  path: "/api/jobs",
  method: ["GET", "POST"],
};
