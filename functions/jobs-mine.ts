import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, requireUser } from "../src/lib/http.js";
import { myJobs } from "../src/lib/applications.js";

/** GET /api/jobs/mine: posted jobs for recruiters, applications for job seekers */
export default handle("jobs-mine", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await myJobs(ctx.redis, user));
});

export const config: RouteConfig = {
  path: "/api/jobs/mine",
  method: ["GET"],
};
