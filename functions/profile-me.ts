import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, readBody, requireUser } from "../src/lib/http.js";
import { isJobSeeker } from "../src/lib/accounts.js";
import { notFound } from "../src/lib/errors.js";
import { notifySavedSearchesForProfile } from "../src/lib/notifications.js";
import { getOrCreateProfile, myProfile, updateProfile } from "../src/lib/profiles.js";
import { profileUpdateSchema } from "../src/lib/validation.js";

/**
 * GET /api/profiles/me: the caller's profile with the entries they chose to show
 * PUT /api/profiles/me: replace it; saved-search notifications follow the edit
 */
export default handle("profile-me", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  if (!isJobSeeker(user)) throw notFound("Page not found");

  if (req.method === "GET") {
    return json({ user, profile: myProfile(await getOrCreateProfile(ctx.redis, user.id)) });
  }

  const input = profileUpdateSchema.parse(await readBody(req));
  const profile = await updateProfile(ctx.redis, user.id, input);
  const notified = await notifySavedSearchesForProfile(ctx.redis, profile);
  console.log(`[profiles] ${user.username} updated their profile (${notified} saved-search match(es))`);

  return json({ user, profile });
});

export const config: RouteConfig = {
  path: "/api/profiles/me",
  method: ["GET", "PUT"],
};
