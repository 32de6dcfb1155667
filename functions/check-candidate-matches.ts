import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, readBody } from "../src/lib/http.js";
import { loadSettings } from "../src/config/settings.js";
import { checkCandidateMatches } from "../src/lib/notifications.js";
import { sweepSchema } from "../src/lib/validation.js";

/**
 * POST /api/internal/check-candidate-matches
 * Called by a scheduler with the x-webhook-secret header.
 * Body: { hours? } (default 24)
 */
export default handle("check-candidate-matches", async (req, ctx) => {
  const secret = req.headers.get("x-webhook-secret");
  if (secret !== loadSettings().internalWebhookSecret) {
    return new Response("Unauthorized", { status: 401 });
  }

  const { hours } = sweepSchema.parse(await readBody(req));
  return json(await checkCandidateMatches(ctx.redis, hours));
});

export const config: RouteConfig = {
  path: "/api/internal/check-candidate-matches",
  method: ["POST"],
};
