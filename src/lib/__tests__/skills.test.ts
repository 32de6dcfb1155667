import { getOrCreateSkills, parseSkillsCsv, splitCsv } from "../skills.js";
import { makeRedis } from "./helpers.js";

const redis = makeRedis();

beforeEach(async () => {
  await redis.flushall();
});

describe("splitCsv", () => {
  it("trims and drops empty tokens", () => {
    expect(splitCsv(" Python, ,React ,, ")).toEqual(["Python", "React"]);
    expect(splitCsv("")).toEqual([]);
  });
});

describe("parseSkillsCsv", () => {
  it("keeps the first spelling of case-insensitive repeats", () => {
    expect(parseSkillsCsv("Python, python, React, PYTHON, react")).toEqual(["Python", "React"]);
  });
});

describe("getOrCreateSkills", () => {
  it("reuses the spelling registered first", async () => {
    await getOrCreateSkills(redis, ["PostgreSQL"]);
    expect(await getOrCreateSkills(redis, ["postgresql", "Redis"])).toEqual(["PostgreSQL", "Redis"]);
  });
});
