import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, readBody, requireUser } from "../src/lib/http.js";
import { updateApplicationStatus } from "../src/lib/applications.js";
import { applicationStatusSchema } from "../src/lib/validation.js";

/**
 * PUT /api/jobs/:id/applications/:applicantId
 * Body: { status }. The poster moves an application through review.
 */
export default handle("application-status", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const { status } = applicationStatusSchema.parse(await readBody(req));
  const application = await updateApplicationStatus(
    ctx.redis,
    user,
    intParam(ctx, "id"),
    intParam(ctx, "applicantId"),
    status,
  );
  return json({ application });
});

export const config: RouteConfig = {
  path: "/api/jobs/:id/applications/:applicantId",
  method: ["PUT"],
};
