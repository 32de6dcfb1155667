import type { RouteConfig } from "../src/lib/http.js";
import { handle, json } from "../src/lib/http.js";
import { getUserByUsername } from "../src/lib/accounts.js";
import { notFound } from "../src/lib/errors.js";

/**
 * GET /api/accounts/:username
 * Public account card. Email stays private.
 */
export default handle("accounts-user", async (_req, ctx) => {
  const user = await getUserByUsername(ctx.redis, ctx.params.username ?? "");
  if (!user) throw notFound("User not found");

  return json({
    id: user.id,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    accountType: user.accountType,
    dateJoined: user.dateJoined,
  });
});

export const config: RouteConfig = {
  path: "/api/accounts/:username",
  method: ["GET"],
};
