import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { reviewReport } from "../src/lib/reports.js";

/** POST /api/reports/:jobId/:reporterId/review */
export default handle("report-review", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json({ report: await reviewReport(ctx.redis, user, intParam(ctx, "jobId"), intParam(ctx, "reporterId")) });
});

export const config: RouteConfig = {
  path: "/api/reports/:jobId/:reporterId/review",
  method: ["POST"],
};
