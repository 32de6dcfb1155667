import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, requireUser } from "../src/lib/http.js";
import { inbox } from "../src/lib/messages.js";

/** GET /api/messages/inbox: received messages, newest first */
export default handle("messages-inbox", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  return json(await inbox(ctx.redis, user));
});

export const config: RouteConfig = {
  path: "/api/messages/inbox",
  method: ["GET"],
};
