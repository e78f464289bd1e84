import { nanoid } from "nanoid";
import type {
  ArchiveJobState,
  ArchiveUserResult,
  ProgressCallback,
  SnapshotBackfillResult,
  SnapshotBackfillStart,
  SnapshotBackfillState
} from "../../core/jobs/ArchiveJob";
import { toErrorMessage } from "../../core/errors";

export type ArchiveTask = (onProgress: ProgressCallback) => Promise<ArchiveUserResult>;

export type SnapshotBackfillTask = {
  countMissing: () => Promise<number>;
  run: (onProgress: ProgressCallback) => Promise<SnapshotBackfillResult>;
};

const idleBackfill: SnapshotBackfillState = { status: "idle", done: 0, total: 0, failed: 0 };

/**
 * Process-wide registry of background jobs, polled by the HTTP layer.
 * Archive jobs are keyed by id and may run side by side; the snapshot
 * backfill is a singleton.
 */
export class JobTracker {
  private readonly archiveJobs = new Map<string, ArchiveJobState>();
  private readonly inFlight = new Set<Promise<void>>();
  private backfill: SnapshotBackfillState = idleBackfill;
  private backfillClaimed = false;

  constructor(private readonly newJobId: () => string = () => nanoid(10)) {}

  startArchiveJob(task: ArchiveTask): string {
    const jobId = this.newJobId();
    const state: ArchiveJobState = { status: "running", done: 0, total: 0 };
    this.archiveJobs.set(jobId, state);

    const onProgress: ProgressCallback = (done, total) => {
      if (state.status !== "running") return;
      state.done = Math.max(state.done, done);
      state.total = Math.max(state.total, total);
    };

    this.track(
      task(onProgress).then(
        (result) => {
          this.archiveJobs.set(jobId, result);
        },
        (err: unknown) => {
          this.logFailure("archive", jobId, err);
          this.archiveJobs.set(jobId, { status: "error", error: toErrorMessage(err) });
        }
      )
    );

    return jobId;
  }

  getArchiveJob(jobId: string): ArchiveJobState | { status: "unknown" } {
    const state = this.archiveJobs.get(jobId);
    return state ? { ...state } : { status: "unknown" };
  }

  /**
   * The claim and the `running` state are set before the first await, so a
   * concurrent start sees the run it lost to.
   */
  async startSnapshotBackfill(task: SnapshotBackfillTask): Promise<SnapshotBackfillStart> {
    if (this.backfillClaimed) {
      return { status: "already_running", job: this.getSnapshotBackfill() };
    }
    this.backfillClaimed = true;
    const previous = this.backfill;
    const state: Extract<SnapshotBackfillState, { status: "running" }> = { status: "running", done: 0, total: 0, failed: 0 };
    this.backfill = state;

    let total: number;
    try {
      total = await task.countMissing();
    } catch (err) {
      this.backfill = previous;
      this.backfillClaimed = false;
      throw err;
    }

    if (total === 0) {
      this.backfill = previous;
      this.backfillClaimed = false;
      return { status: "nothing_to_do", message: "All posts already have snapshots." };
    }

    state.total = total;

    const onProgress: ProgressCallback = (done, progressTotal) => {
      state.done = Math.max(state.done, done);
      state.total = progressTotal;
    };

    this.track(
      task
        .run(onProgress)
        .then(
          (result) => {
            this.backfill = { status: "done", ...result };
          },
          (err: unknown) => {
            this.logFailure("snapshot_backfill", "singleton", err);
            this.backfill = { status: "error", error: toErrorMessage(err) };
          }
        )
        .finally(() => {
          this.backfillClaimed = false;
        })
    );

    return { status: "started", total };
  }

  getSnapshotBackfill(): SnapshotBackfillState {
    return { ...this.backfill };
  }

  /**
   * Resolves once every job started so far has reached a terminal state.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private track(run: Promise<void>): void {
    const tracked = run.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
  }

  private logFailure(kind: string, jobId: string, err: unknown): void {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ event: "job.failed", kind, jobId, message: toErrorMessage(err) }));
  }
}
