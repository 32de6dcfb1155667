import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, readBody, requireUser } from "../src/lib/http.js";
import { listSavedSearches, saveSearch } from "../src/lib/saved-searches.js";
import { saveSearchSchema } from "../src/lib/validation.js";

/**
 * GET /api/saved-searches: the recruiter's searches, newest first
 * POST /api/saved-searches: Body: { name, skills?, location?, notifyOnNewMatches? }
 */
export default handle("saved-searches", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);

  if (req.method === "GET") {
    return json({ searches: await listSavedSearches(ctx.redis, user) });
  }

  const search = await saveSearch(ctx.redis, user, saveSearchSchema.parse(await readBody(req)));
  const message = search.notifyOnNewMatches
    ? `Search "${search.name}" saved successfully! You'll be notified of new matches.`
    : `Search "${search.name}" saved successfully!`;
  return json({ search, message }, 201);
});

export const config: RouteConfig = {
  path: "/api/saved-searches",
  method: ["GET", "POST"],
};
