import type { RouteConfig } from "../src/lib/http.js";
import { handle, json, queryOf, requireUser } from "../src/lib/http.js";
import { listReports } from "../src/lib/reports.js";

/**
 * GET /api/reports
 * Staff only. ?reviewed=true|false narrows the list.
 */
export default handle("reports", async (req, ctx) => {
  const user = await requireUser(req, ctx.redis);
  const { reviewed } = queryOf(req);
  const reports = await listReports(ctx.redis, user, {
    reviewed: reviewed === "true" ? true : reviewed === "false" ? false : undefined,
  });
  return json({ count: reports.length, reports });
});

export const config: RouteConfig = {
  path: "/api/reports",
  method: ["GET"],
};
