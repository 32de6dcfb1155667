import { readFileSync } from "fs";
import { join } from "path";
import { demoDataSchema, seedDemoData } from "../demo.js";
import { getUserByUsername } from "../accounts.js";
import { getProfile } from "../profiles.js";
import { listJobsByStatus } from "../jobs.js";
import { makeRedis } from "./helpers.js";

const redis = makeRedis();
const data = demoDataSchema.parse(
  JSON.parse(readFileSync(join(__dirname, "..", "..", "..", "data", "demo.json"), "utf8")),
);

beforeEach(async () => {
  await redis.flushall();
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  // The UX job is in Austin; answer its geocode from the cache
  await redis.hset("geo:austin|tx", { lat: "30.2672", lng: "-97.7431" });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("seedDemoData", () => {
  it("creates the demo accounts, profiles and jobs", async () => {
    const summary = await seedDemoData(redis, data);

    expect(summary.usersCreated).toHaveLength(7);
    expect(summary.jobsCreated).toEqual(["Full Stack Engineer @ Brightwave", "UX Designer @ Northpine Studio"]);

    const seeker = await getUserByUsername(redis, "demo_seeker");
    expect(seeker?.accountType).toBe("JOB_SEEKER");
    const profile = seeker ? await getProfile(redis, seeker.id) : null;
    expect(profile?.skills).toContain("PostgreSQL");

    const recruiter = await getUserByUsername(redis, "recruiter3");
    expect(recruiter?.accountType).toBe("RECRUITER");
  });

  it("is safe to run twice", async () => {
    await seedDemoData(redis, data);
    const again = await seedDemoData(redis, data);

    expect(again.usersCreated).toEqual([]);
    expect(again.jobsCreated).toEqual([]);
    expect(await listJobsByStatus(redis, "ACTIVE")).toHaveLength(2);
  });
});
