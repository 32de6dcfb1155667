import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, requireUser } from "../src/lib/http.js";
import { markAllRead } from "../src/lib/notifications.js";

/** POST /api/notifications/read-all */
export default handle("notifications-read-all", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const count = await markAllRead(ctx.redis, user);
  return json({ marked: count, message: `Marked ${count} notification${count === 1 ? "" : "s"} as read.` });
});

export const config: RouteConfig = {
  path: "/api/notifications/read-all",
  method: ["POST"],
};
