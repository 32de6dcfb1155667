import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, readBody, requireUser } from "../src/lib/http.js";
import { applyForJob } from "../src/lib/applications.js";
import { applySchema } from "../src/lib/validation.js";

/**
 * POST /api/jobs/:id/apply
 * Body: { coverLetter? }. One application per job and applicant.
 */
export default handle("job-apply", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const { coverLetter } = applySchema.parse(await readBody(req));
  const application = await applyForJob(ctx.redis, user, intParam(ctx, "id"), coverLetter);
  return json({ application, message: "Application submitted successfully!" }, 201);
});

export const config: RouteConfig = {
  path: "/api/jobs/:id/apply",
  method: ["POST"],
};
