import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { deleteSavedSearch } from "../src/lib/saved-searches.js";

/** DELETE /api/saved-searches/:id: also drops its notifications */
export default handle("saved-search-delete", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const search = await deleteSavedSearch(ctx.redis, user, intParam(ctx, "id"));
  return json({ deleted: search.id, message: `Search "${search.name}" deleted.` });
});

export const config: RouteConfig = {
  path: "/api/saved-searches/:id",
  method: ["DELETE"],
};
