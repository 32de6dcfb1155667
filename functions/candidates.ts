import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, queryOf, requireUser } from "../src/lib/http.js";
import { searchCandidates } from "../src/lib/candidates.js";
import { candidateSearchSchema } from "../src/lib/validation.js";

/**
 * GET /api/candidates
 * Recruiters only.
 *
 * Query params:
 *   q            - name, username, headline or summary
 *   location     - text in the profile location
 *   skills       - comma-separated, every one required
 *   savedSearch  - id of the saved search being run (stamps its last run)
 *   page
 */
export default handle("candidates", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const query = candidateSearchSchema.parse(queryOf(req));
  return json(await searchCandidates(ctx.redis, user, query));
});

export const config: RouteConfig = {
  path: "/api/candidates",
  method: ["GET"],
};
