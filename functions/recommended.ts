import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, requireUser } from "../src/lib/http.js";
import { recommendationsFor } from "../src/lib/recommendations.js";

/**
 * GET /api/recommended
 * Job seekers get jobs that share their skills; recruiters get candidates
 * for each of their postings.
 */
export default handle("recommended", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await recommendationsFor(ctx.redis, user));
});

export const config: RouteConfig = {
  path: "/api/recommended",
  method: ["GET"],
};
