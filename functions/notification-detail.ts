import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { notificationDetail } from "../src/lib/notifications.js";

/**
 * GET /api/notifications/:id
 * Marks the bucket read and returns the candidate search that shows it.
 */
export default handle("notification-detail", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await notificationDetail(ctx.redis, user, intParam(ctx, "id")));
});

export const config: RouteConfig = {
  path: "/api/notifications/:id",
  method: ["GET"],
};
