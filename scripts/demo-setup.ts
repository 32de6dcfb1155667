/**
 * Seed demo accounts, skills and jobs
 * Run with: npm run build && npm run demo:setup
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";
import { getRedisClient, disconnectRedis } from "../src/lib/redis.js";
import { demoDataSchema, seedDemoData } from "../src/lib/demo.js";

// dist/scripts/ at run time, so the data directory is two levels up
const DATA_FILE = join(__dirname, "..", "..", "data", "demo.json");

async function main() {
  console.log("Setting up demo data...\n");

  const redis = getRedisClient();

  try {
    const data = demoDataSchema.parse(JSON.parse(readFileSync(DATA_FILE, "utf8")));
    const summary = await seedDemoData(redis, data);

    console.log(`Users created: ${summary.usersCreated.join(", ") || "none"}`);
    console.log(`Jobs created:  ${summary.jobsCreated.join(", ") || "none"}`);
    if (summary.skipped.length > 0) {
      console.log(`Skipped (already present): ${summary.skipped.join(", ")}`);
    }

    console.log("\nDemo data setup complete!");
    console.log("Send requests with the header x-user-id: <id> to act as one of these users.");
  } catch (error) {
    console.error("Error:", error);
    process.exitCode = 1;
  } finally {
    await disconnectRedis();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
