import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, optionalUser } from "../src/lib/http.js";
import { getUserByUsername } from "../src/lib/accounts.js";
import { notFound } from "../src/lib/errors.js";
import { getProfile, viewProfile } from "../src/lib/profiles.js";

/**
 * GET /api/profiles/u/:username
 * What a visitor sees. Sections the owner switched off are blanked for
 * everyone but the owner. Users without a profile answer { profile: null }.
 */
export default handle("profile-public", async (req, ctx) => {
  const owner = await getUserByUsername(ctx.redis, ctx.params.username ?? "");
  if (!owner) throw notFound("Profile not found");
  const profile = await getProfile(ctx.redis, owner.id);
  if (!profile) return json({ profile: null });

  const viewer = await optionalUser(req, ctx.redis);
  return json({ profile: viewProfile(profile, owner, { owner: viewer?.id === owner.id }) });
});

export const config: RouteConfig = {
  path: "/api/profiles/u/:username",
  method: ["GET"],
};
