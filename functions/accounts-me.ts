import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, requireUser } from "../src/lib/http.js";
import { homePath } from "../src/lib/accounts.js";
import { unreadCount } from "../src/lib/notifications.js";

/** GET /api/accounts/me */
export default handle("accounts-me", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json({
    user,
    home: homePath(user),
    unreadNotifications: await unreadCount(ctx.redis, user),
  });
});

export const config: RouteConfig = {
  path: "/api/accounts/me",
  method: ["GET"],
};
