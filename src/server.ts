import "dotenv/config";
import { serve } from "@hono/node-server";
import { loadSettings } from "./config/settings.js";
import { disconnectRedis, getRedisClient } from "./lib/redis.js";
import { createRouter } from "./lib/router.js";
import { routes } from "../functions/index.js";

const settings = loadSettings();
const fetch = createRouter(routes, { redis: getRedisClient, corsOrigin: settings.corsOrigin });

const server = serve({ fetch, port: settings.port }, (info) => {
  console.log(`recruit-board listening on http://localhost:${info.port} (${routes.length} routes)`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down`);
  server.close();
  await disconnectRedis();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}
