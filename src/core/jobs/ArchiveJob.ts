export type ArchiveUserResult = {
  status: "done";
  user: string;
  instance: string;
  archived: number;
  skipped: number;
  total: number;
};

/**
 * `total` is the number of notes fetched so far; it grows page by page because
 * the size of a user's history is not known up front.
 */
export type ArchiveJobState =
  | { status: "running"; done: number; total: number }
  | ArchiveUserResult
  | { status: "error"; error: string };

export type SnapshotBackfillResult = {
  done: number;
  failed: number;
  total: number;
};

export type SnapshotBackfillState =
  | { status: "idle"; done: 0; total: 0; failed: 0 }
  | ({ status: "running" } & SnapshotBackfillResult)
  | ({ status: "done" } & SnapshotBackfillResult)
  | { status: "error"; error: string };

export type SnapshotBackfillStart =
  | { status: "started"; total: number }
  | { status: "already_running"; job: SnapshotBackfillState }
  | { status: "nothing_to_do"; message: string };

export type ProgressCallback = (done: number, total: number) => void;
