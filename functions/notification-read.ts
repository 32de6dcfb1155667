import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { markNotificationRead } from "../src/lib/notifications.js";

/** POST /api/notifications/:id/read */
export default handle("notification-read", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const notification = await markNotificationRead(ctx.redis, user, intParam(ctx, "id"));
  return json({ success: true, isRead: notification.isRead });
});

export const config: RouteConfig = {
  path: "/api/notifications/:id/read",
  method: ["POST"],
};
