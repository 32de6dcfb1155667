import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { listJobApplications } from "../src/lib/applications.js";

/** GET /api/jobs/:id/applications */
export default handle("job-applications", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await listJobApplications(ctx.redis, user, intParam(ctx, "id")));
});

export const config: RouteConfig = {
  path: "/api/jobs/:id/applications",
  method: ["GET"],
};
