import { listReports, reportJob, reviewReport } from "../reports.js";
import { postJob } from "../jobs.js";
import { jobInput, makeRecruiter, makeRedis, makeSeeker } from "./helpers.js";
import type { Job, User } from "../types.js";

const redis = makeRedis();
let seeker: User;
let staff: User;
let job: Job;

beforeEach(async () => {
  await redis.flushall();
  delete process.env.NOTIFY_WEBHOOK_URL;
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  const recruiter = await makeRecruiter(redis, "rita");
  staff = await makeRecruiter(redis, "mod", { isStaff: true });
  seeker = (await makeSeeker(redis, "sam")).user;
  job = await postJob(redis, recruiter, jobInput());
});

afterEach(() => {
  delete process.env.NOTIFY_WEBHOOK_URL;
  jest.restoreAllMocks();
});

describe("reportJob", () => {
  it("accepts one report per user per job", async () => {
    const report = await reportJob(redis, seeker, job.id, "spam", "Looks like a scam");
    expect(report).toMatchObject({ jobId: job.id, reportedBy: seeker.id, reason: "spam", reviewed: false });

    await expect(reportJob(redis, seeker, job.id, "fake", "again")).rejects.toMatchObject({ status: 409 });
  });

  it("alerts staff through the webhook", async () => {
    process.env.NOTIFY_WEBHOOK_URL = "https://hooks.example.test/alerts";
    const fetchSpy = jest.spyOn(global, "fetch").mockResolvedValue(new Response("ok", { status: 200 }));

    await reportJob(redis, seeker, job.id, "inappropriate", "Offensive wording");

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][0]).toBe("https://hooks.example.test/alerts");
  });

  it("keeps the report when the alert fails", async () => {
    process.env.NOTIFY_WEBHOOK_URL = "https://hooks.example.test/alerts";
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(global, "fetch").mockRejectedValue(new Error("connection refused"));

    await reportJob(redis, seeker, job.id, "other", "Broken link");
    expect(await listReports(redis, staff)).toHaveLength(1);
  });
});

describe("moderation", () => {
  it("is hidden from non-staff", async () => {
    await expect(listReports(redis, seeker)).rejects.toMatchObject({ status: 404 });
  });

  it("marks reports reviewed and filters on it", async () => {
    await reportJob(redis, seeker, job.id, "spam", "Spam");
    const reviewed = await reviewReport(redis, staff, job.id, seeker.id);
    expect(reviewed.reviewed).toBe(true);
    expect(reviewed.reviewedBy).toBe(staff.id);

    expect(await listReports(redis, staff, { reviewed: false })).toEqual([]);
    expect((await listReports(redis, staff, { reviewed: true }))[0].reviewedAt).toBe(reviewed.reviewedAt);
  });
});
