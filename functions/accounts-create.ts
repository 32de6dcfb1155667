import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, readBody } from "../src/lib/http.js";
import { createUser, homePath } from "../src/lib/accounts.js";
import { createUserSchema } from "../src/lib/validation.js";

/**
 * POST /api/accounts
 * Register a job seeker or recruiter. Job seekers get an empty profile.
 */
export default handle("accounts-create", async (req, ctx) => {
  const input = createUserSchema.parse(await readBody(req));
  const user = await createUser(ctx.redis, input);
  return json({ user, home: homePath(user) }, 201);
});

export const config: RouteConfig = {
  path: "/api/accounts",
  method: ["POST"],
};
