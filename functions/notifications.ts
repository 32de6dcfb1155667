import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, requireUser } from "../src/lib/http.js";
import { listNotifications } from "../src/lib/notifications.js";

/** GET /api/notifications: unread and read buckets, newest first */
export default handle("notifications", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await listNotifications(ctx.redis, user));
});

export const config: RouteConfig = {
  path: "/api/notifications",
  method: ["GET"],
};
