import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { runSavedSearch } from "../src/lib/candidates.js";

/** POST /api/saved-searches/:id/run */
export default handle("saved-search-run", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await runSavedSearch(ctx.redis, user, intParam(ctx, "id")));
});

export const config: RouteConfig = {
  path: "/api/saved-searches/:id/run",
  method: ["POST"],
};
