import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, readBody, requireUser } from "../src/lib/http.js";
import { reportJob } from "../src/lib/reports.js";
import { reportSchema } from "../src/lib/validation.js";

/**
 * POST /api/jobs/:id/report
 * Body: { reason, description }
 */
export default handle("job-report", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const { reason, description } = reportSchema.parse(await readBody(req));
  const report = await reportJob(ctx.redis, user, intParam(ctx, "id"), reason, description);
  return json({ report }, 201);
});

export const config: RouteConfig = {
  path: "/api/jobs/:id/report",
  method: ["POST"],
};
