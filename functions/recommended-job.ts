import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { candidatesForJob } from "../src/lib/recommendations.js";

/** GET /api/recommended/job/:jobId */
export default handle("recommended-job", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await candidatesForJob(ctx.redis, user, intParam(ctx, "jobId")));
});

export const config: RouteConfig = {
  path: "/api/recommended/job/:jobId",
  method: ["GET"],
};
