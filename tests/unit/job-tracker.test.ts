import { JobTracker } from "../../src/application/jobs/JobTracker";
import type { ArchiveUserResult, SnapshotBackfillResult } from "../../src/core/jobs/ArchiveJob";

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

const doneResult: ArchiveUserResult = {
  status: "done",
  user: "alice",
  instance: "https://notes.example",
  archived: 3,
  skipped: 1,
  total: 4
};

describe("JobTracker archive jobs", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("reports running progress then the final result", async () => {
    let next = 0;
    const jobs = new JobTracker(() => `job-${++next}`);
    const gate = deferred<ArchiveUserResult>();
    let report: (done: number, total: number) => void = () => undefined;

    const jobId = jobs.startArchiveJob((onProgress) => {
      report = onProgress;
      return gate.promise;
    });

    expect(jobId).toBe("job-1");
    expect(jobs.getArchiveJob(jobId)).toEqual({ status: "running", done: 0, total: 0 });

    report(20, 20);
    report(10, 15);
    expect(jobs.getArchiveJob(jobId)).toEqual({ status: "running", done: 20, total: 20 });

    gate.resolve(doneResult);
    await jobs.drain();
    expect(jobs.getArchiveJob(jobId)).toEqual(doneResult);
  });

  it("stores the error message of a failed job and logs it", async () => {
    const jobs = new JobTracker(() => "job-x");

    jobs.startArchiveJob(async () => {
      throw new Error("instance unreachable");
    });
    await jobs.drain();

    expect(jobs.getArchiveJob("job-x")).toEqual({ status: "error", error: "instance unreachable" });
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "job.failed",
      kind: "archive",
      jobId: "job-x",
      message: "instance unreachable"
    });
  });

  it("answers unknown for ids it never issued", () => {
    expect(new JobTracker().getArchiveJob("nope")).toEqual({ status: "unknown" });
  });

  it("issues distinct ids by default", () => {
    const jobs = new JobTracker();
    const a = jobs.startArchiveJob(async () => doneResult);
    const b = jobs.startArchiveJob(async () => doneResult);
    expect(a).not.toBe(b);
    expect(a).toHaveLength(10);
    return jobs.drain();
  });

  it("returns copies so callers cannot mutate job state", () => {
    const jobs = new JobTracker(() => "job-c");
    jobs.startArchiveJob(() => new Promise<ArchiveUserResult>(() => undefined));

    const snapshot = jobs.getArchiveJob("job-c");
    if (snapshot.status === "running") snapshot.done = 99;
    expect(jobs.getArchiveJob("job-c")).toEqual({ status: "running", done: 0, total: 0 });
  });
});

describe("JobTracker snapshot backfill", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("starts idle", () => {
    expect(new JobTracker().getSnapshotBackfill()).toEqual({ status: "idle", done: 0, total: 0, failed: 0 });
  });

  it("has nothing to do when no post is missing a snapshot", async () => {
    const jobs = new JobTracker();
    const run = jest.fn();

    await expect(jobs.startSnapshotBackfill({ countMissing: async () => 0, run })).resolves.toEqual({
      status: "nothing_to_do",
      message: "All posts already have snapshots."
    });
    expect(run).not.toHaveBeenCalled();
    expect(jobs.getSnapshotBackfill().status).toBe("idle");
  });

  it("runs one backfill at a time and reports progress", async () => {
    const jobs = new JobTracker();
    const gate = deferred<SnapshotBackfillResult>();
    let report: (done: number, total: number) => void = () => undefined;
    const task = {
      countMissing: async () => 3,
      run: (onProgress: (done: number, total: number) => void) => {
        report = onProgress;
        return gate.promise;
      }
    };

    const [first, second] = await Promise.all([jobs.startSnapshotBackfill(task), jobs.startSnapshotBackfill(task)]);

    expect(first).toEqual({ status: "started", total: 3 });
    expect(second).toEqual({ status: "already_running", job: { status: "running", done: 0, total: 0, failed: 0 } });

    report(2, 3);
    await expect(jobs.startSnapshotBackfill(task)).resolves.toEqual({
      status: "already_running",
      job: { status: "running", done: 2, total: 3, failed: 0 }
    });

    gate.resolve({ done: 2, failed: 1, total: 3 });
    await jobs.drain();
    expect(jobs.getSnapshotBackfill()).toEqual({ status: "done", done: 2, failed: 1, total: 3 });
  });

  it("reports running while the missing snapshots are still being counted", async () => {
    const jobs = new JobTracker();
    const counted = deferred<number>();
    const run = jest.fn(async () => ({ done: 4, failed: 0, total: 4 }));

    const first = jobs.startSnapshotBackfill({ countMissing: () => counted.promise, run });

    await expect(jobs.startSnapshotBackfill({ countMissing: async () => 4, run })).resolves.toEqual({
      status: "already_running",
      job: { status: "running", done: 0, total: 0, failed: 0 }
    });
    expect(jobs.getSnapshotBackfill()).toEqual({ status: "running", done: 0, total: 0, failed: 0 });

    counted.resolve(4);
    await expect(first).resolves.toEqual({ status: "started", total: 4 });
    await jobs.drain();
    expect(run).toHaveBeenCalledTimes(1);
    expect(jobs.getSnapshotBackfill()).toEqual({ status: "done", done: 4, failed: 0, total: 4 });
  });

  it("restores the previous state when there is nothing to snapshot", async () => {
    const jobs = new JobTracker();
    await jobs.startSnapshotBackfill({ countMissing: async () => 1, run: async () => ({ done: 1, failed: 0, total: 1 }) });
    await jobs.drain();

    await expect(jobs.startSnapshotBackfill({ countMissing: async () => 0, run: jest.fn() })).resolves.toMatchObject({
      status: "nothing_to_do"
    });
    expect(jobs.getSnapshotBackfill()).toEqual({ status: "done", done: 1, failed: 0, total: 1 });
  });

  it("can start again once the previous run finished", async () => {
    const jobs = new JobTracker();
    const run = jest.fn(async () => ({ done: 1, failed: 0, total: 1 }));

    await jobs.startSnapshotBackfill({ countMissing: async () => 1, run });
    await jobs.drain();
    await expect(jobs.startSnapshotBackfill({ countMissing: async () => 1, run })).resolves.toEqual({
      status: "started",
      total: 1
    });
    await jobs.drain();
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("records a failed run and releases the claim", async () => {
    const jobs = new JobTracker();

    await jobs.startSnapshotBackfill({
      countMissing: async () => 2,
      run: async () => {
        throw new Error("browser crashed");
      }
    });
    await jobs.drain();

    expect(jobs.getSnapshotBackfill()).toEqual({ status: "error", error: "browser crashed" });
    await expect(jobs.startSnapshotBackfill({ countMissing: async () => 0, run: jest.fn() })).resolves.toMatchObject({
      status: "nothing_to_do"
    });
  });

  it("releases the claim when counting fails", async () => {
    const jobs = new JobTracker();

    await expect(jobs.startSnapshotBackfill({
      countMissing: async () => {
        throw new Error("db down");
      },
      run: jest.fn()
    })).rejects.toThrow("db down");
    await expect(jobs.startSnapshotBackfill({ countMissing: async () => 0, run: jest.fn() })).resolves.toMatchObject({
      status: "nothing_to_do"
    });
  });
});
