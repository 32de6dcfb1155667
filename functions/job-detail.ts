import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, optionalUser, readBody, requireUser } from "../src/lib/http.js";
import { getJobDetail } from "../src/lib/applications.js";
import { editJob } from "../src/lib/jobs.js";
import { jobInputSchema } from "../src/lib/validation.js";

/**
 * GET /api/jobs/:id: an active job, with the viewer's application state
 * PUT /api/jobs/:id: edit (poster only)
 */
export default handle("job-detail", async (req, ctx) => {
  const id = intParam(ctx, "id");

  if (req.method === "GET") {
    const viewer = await optionalUser(req, ctx.redis);
    return json(await getJobDetail(ctx.redis, id, viewer));
  }

  const user = await requireUser(req, ctx.redis);
  const input = jobInputSchema.parse(await readBody(req));
  return json({ job: await editJob(ctx.redis, user, id, input) });
});

export const config: RouteConfig = {
  path: "/api/jobs/:id",
  method: ["GET", "PUT"],
};
