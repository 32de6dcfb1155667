import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, requireUser } from "../src/lib/http.js";
import { conversations } from "../src/lib/messages.js";

/** GET /api/messages */
export default handle("messages-list", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json({ conversations: await conversations(ctx.redis, user) });
});

export const config: RouteConfig = {
  path: "/api/messages",
  method: ["GET"],
};
