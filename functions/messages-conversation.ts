import type { RouteConfig } from "../src/lib/http.js";
import { handle, intParam, json, requireUser } from "../src/lib/http.js";
import { conversation } from "../src/lib/messages.js";

/**
 * GET /api/messages/:userId
 * The thread with one user, oldest first. Marks incoming messages read.
 */
export default handle("messages-conversation", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const { other, messages } = await conversation(ctx.redis, user, intParam(ctx, "userId"));
  return json({
    with: { id: other.id, username: other.username, firstName: other.firstName, lastName: other.lastName },
    messages,
  });
});

export const config: RouteConfig = {
  path: "/api/messages/:userId",
  method: ["GET"],
};
