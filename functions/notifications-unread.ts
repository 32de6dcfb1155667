import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, optionalUser } from "../src/lib/http.js";
import { unreadCount } from "../src/lib/notifications.js";

/**
 * GET /api/notifications/unread-count
 * Always answers; anonymous callers and job seekers get 0.
 */
export default handle("notifications-unread", async (req, ctx) => {
  const user = await optionalUser(req, ctx.redis);
  return json({ unreadCount: await unreadCount(ctx.redis, user) });
});

export const config: RouteConfig = {
  path: "/api/notifications/unread-count",
  method: ["GET"],
};
