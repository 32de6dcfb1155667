/**
 * Reconcile saved-search notifications for recently updated profiles
 * Run with: npm run check-matches -- --hours 1
 *
 * Hourly cron example:
 *   0 * * * * cd /srv/recruit-board && npm run check-matches -- --hours 1
 */

import "dotenv/config";
import { getRedisClient, disconnectRedis } from "../src/lib/redis.js";
import { checkCandidateMatches } from "../src/lib/notifications.js";

export function parseHours(argv: string[]): number {
  const i = argv.findIndex((a) => a === "--hours" || a.startsWith("--hours="));
  if (i === -1) return 24;
  const raw = argv[i].includes("=") ? argv[i].split("=", 2)[1] : argv[i + 1];
  const hours = parseInt(raw ?? "", 10);
  if (Number.isNaN(hours) || hours <= 0) {
    throw new Error(`--hours needs a positive whole number, got "${raw ?? ""}"`);
  }
  return hours;
}

async function main() {
  const hours = parseHours(process.argv.slice(2));
  const redis = getRedisClient();

  try {
    const result = await checkCandidateMatches(redis, hours);
    console.log(`Checked ${result.profilesChecked} profile(s) updated since ${result.since}`);
    for (const s of result.searches) {
      console.log(`  ${s.recruiterUsername}: +${s.newCandidates} for "${s.searchName}" (${s.totalCandidates} waiting)`);
    }
  } catch (error) {
    console.error("Error:", error);
    process.exitCode = 1;
  } finally {
    await disconnectRedis();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
