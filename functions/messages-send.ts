import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, readBody, requireUser } from "../src/lib/http.js";
import { sendMessage } from "../src/lib/messages.js";
import { messageSchema } from "../src/lib/validation.js";

/**
 * POST /api/messages
 * Body: { recipientId, content }
 */
export default handle("messages-send", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const { recipientId, content } = messageSchema.parse(await readBody(req));
  const message = await sendMessage(ctx.redis, user, recipientId, content);
  return json({ message }, 201);
});

export const config: RouteConfig = {
  path: "/api/messages",
  method: ["POST"],
};
