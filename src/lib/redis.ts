import Redis from "ioredis";
import { loadSettings } from "../config/settings.js";

let client: Redis | null = null;

/** Shared connection for the server and scripts; tests pass their own */
export function getRedisClient(): Redis {
  if (client) return client;

  const { redisHost, redisPort, redisPassword } = loadSettings();
  const created = new Redis({
    host: redisHost,
    port: redisPort,
    password: redisPassword || undefined,
    maxRetriesPerRequest: 3,
    connectTimeout: 5000,
    commandTimeout: 10000,
  });
  created.on("error", (err: Error) => {
    console.error(`[redis] ${redisHost}:${redisPort} ${err.message}`);
  });

  client = created;
  return client;
}

export async function disconnectRedis(): Promise<void> {
  if (!client) return;
  const closing = client;
  client = null;
  await closing.quit();
}
