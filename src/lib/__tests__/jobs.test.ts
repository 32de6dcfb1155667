import { editJob, getJob, isJobActive, listJobsByStatus, postJob, salaryRangeDisplay } from "../jobs.js";
import { K } from "../keys.js";
import { HttpError } from "../errors.js";
import { jobInput, makeRecruiter, makeRedis, makeSeeker } from "./helpers.js";
import type { Job } from "../types.js";

const redis = makeRedis();

beforeEach(async () => {
  await redis.flushall();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("salaryRangeDisplay", () => {
  it("formats each shape of range", () => {
    expect(salaryRangeDisplay({ salaryMin: 90000, salaryMax: 120000 })).toBe("$90,000 - $120,000");
    expect(salaryRangeDisplay({ salaryMin: 90000, salaryMax: null })).toBe("$90,000+");
    expect(salaryRangeDisplay({ salaryMin: null, salaryMax: 120000 })).toBe("Up to $120,000");
    expect(salaryRangeDisplay({ salaryMin: null, salaryMax: null })).toBe("Salary not specified");
  });
});

describe("isJobActive", () => {
  const base = { status: "ACTIVE", expiresAt: null } as const;
  const now = new Date("2024-06-01T00:00:00Z");

  it("is active without an expiry", () => {
    expect(isJobActive({ ...jobFixture(), ...base }, now)).toBe(true);
  });

  it("is inactive once expired or not ACTIVE", () => {
    expect(isJobActive({ ...jobFixture(), ...base, expiresAt: "2024-05-31T00:00:00.000Z" }, now)).toBe(false);
    expect(isJobActive({ ...jobFixture(), status: "CLOSED" }, now)).toBe(false);
  });
});

describe("postJob", () => {
  it("stores the job with de-duplicated skills and indexes it", async () => {
    const recruiter = await makeRecruiter(redis, "rita");
    const job = await postJob(
      redis,
      recruiter,
      jobInput({ requiredSkills: "Python, python, Django", niceToHaveSkills: "AWS" }),
    );

    expect(job.requiredSkills).toEqual(["Python", "Django"]);
    expect(job.latitude).toBeNull();
    expect(await getJob(redis, job.id)).toEqual(job);
    expect(await redis.smembers(K.jobStatusIdx("ACTIVE"))).toEqual([String(job.id)]);
  });

  it("refuses job seekers", async () => {
    const { user } = await makeSeeker(redis, "sam");
    await expect(postJob(redis, user, jobInput())).rejects.toMatchObject({
      status: 403,
      message: "Only recruiters can post jobs.",
    });
  });

  it("geocodes a City, ST location", async () => {
    const fetchSpy = jest
      .spyOn(global, "fetch")
      .mockResolvedValue(
        new Response(JSON.stringify([{ lat: "30.2672", lon: "-97.7431" }]), { status: 200 }),
      );
    const recruiter = await makeRecruiter(redis, "rita");
    const job = await postJob(redis, recruiter, jobInput({ location: "Austin, Texas", workType: "ON_SITE" }));

    expect(job.latitude).toBe(30.2672);
    expect(job.longitude).toBe(-97.7431);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(String(fetchSpy.mock.calls[0][0])).toContain("q=Austin%2C+TX%2C+USA");
  });
});

describe("editJob", () => {
  it("moves the status index when the status changes", async () => {
    const recruiter = await makeRecruiter(redis, "rita");
    const job = await postJob(redis, recruiter, jobInput());
    const edited = await editJob(redis, recruiter, job.id, jobInput({ status: "CLOSED", title: "Closed role" }));

    expect(edited.title).toBe("Closed role");
    expect(edited.createdAt).toBe(job.createdAt);
    expect(await listJobsByStatus(redis, "ACTIVE")).toEqual([]);
    expect((await listJobsByStatus(redis, "CLOSED")).map((j) => j.id)).toEqual([job.id]);
  });

  it("answers 404 to anyone but the poster", async () => {
    const owner = await makeRecruiter(redis, "rita");
    const other = await makeRecruiter(redis, "otto");
    const job = await postJob(redis, owner, jobInput());

    const attempt = editJob(redis, other, job.id, jobInput({ title: "Hijacked" }));
    await expect(attempt).rejects.toBeInstanceOf(HttpError);
    await expect(editJob(redis, other, job.id, jobInput())).rejects.toMatchObject({ status: 404 });
    expect((await getJob(redis, job.id))?.title).toBe("Backend Engineer");
  });
});

function jobFixture(): Job {
  return {
    id: 1,
    title: "Engineer",
    company: "Acme",
    location: "",
    workType: "REMOTE",
    description: "",
    requirements: "",
    salaryMin: null,
    salaryMax: null,
    salaryCurrency: "USD",
    visaSponsorship: false,
    benefits: "",
    requiredSkills: [],
    niceToHaveSkills: [],
    postedBy: 1,
    status: "ACTIVE",
    createdAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
    expiresAt: null,
    latitude: null,
    longitude: null,
  };
}
