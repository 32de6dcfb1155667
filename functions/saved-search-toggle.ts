import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { toggleSearchNotifications } from "../src/lib/saved-searches.js";

/** POST /api/saved-searches/:id/toggle */
export default handle("saved-search-toggle", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const search = await toggleSearchNotifications(ctx.redis, user, intParam(ctx, "id"));
  const message = `Notifications ${search.notifyOnNewMatches ? "enabled" : "disabled"} for "${search.name}"`;
  return json({ search, message });
});

export const config: RouteConfig = {
  path: "/api/saved-searches/:id/toggle",
  method: ["POST"],
};
