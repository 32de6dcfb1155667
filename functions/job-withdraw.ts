import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { withdrawApplication } from "../src/lib/applications.js";

/** POST /api/jobs/:id/withdraw */
export default handle("job-withdraw", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json({ application: await withdrawApplication(ctx.redis, user, intParam(ctx, "id")) });
});

export const config: RouteConfig = {
  path: "/api/jobs/:id/withdraw",
  method: ["POST"],
};
