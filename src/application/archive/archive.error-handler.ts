import { RemoteError, StorageError, toErrorMessage, type ErrorContext } from "../../core/errors";

const overloadFragmentLength = 120;

/**
 * A `users/notes` failure that looks like the instance buckling under load,
 * reworded for the user with the original error kept as a fragment.
 */
export class ArchiveOverloadError extends Error {
  readonly code = "instance_overloaded";
  readonly status?: number;
  readonly context: ErrorContext;
  readonly cause?: unknown;

  constructor(original: unknown, context: ErrorContext) {
    const fragment = toErrorMessage(original).slice(0, overloadFragmentLength);
    super(
      "The instance returned a server error while fetching posts. " +
        "This usually means the server is under load. " +
        `Try again in a few minutes, or reduce Max Posts. (${fragment})`
    );
    this.name = "ArchiveOverloadError";
    this.status = original instanceof RemoteError ? original.status : undefined;
    this.context = context;
    this.cause = original;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isOverloadError = (err: unknown): boolean => {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current != null; depth += 1) {
    if (current instanceof RemoteError && current.status === 500) return true;
    if (current instanceof Error && current.message.includes("INTERNAL_ERROR")) return true;
    current = current instanceof RemoteError ? current.cause : undefined;
  }
  return false;
};

export const rewriteOverloadError = (err: unknown, context: ErrorContext): unknown =>
  isOverloadError(err) ? new ArchiveOverloadError(err, context) : err;

export const wrapStorageFailure = (reason: unknown, action: string, context: ErrorContext): StorageError =>
  reason instanceof StorageError
    ? reason
    : new StorageError(`Storage failed while ${action}: ${toErrorMessage(reason)}`, context, reason);

export type ArchiveRunTally = {
  archived: number;
  skipped: number;
  fetched: number;
  pages: number;
};

export const createArchiveRunTracker = () => {
  let archived = 0;
  let skipped = 0;
  let fetched = 0;
  let pages = 0;

  return {
    fetched: () => fetched,
    nextPageNumber: () => pages + 1,
    addArchived: () => {
      archived += 1;
    },
    addSkipped: () => {
      skipped += 1;
    },
    addPage: (size: number) => {
      pages += 1;
      fetched += size;
    },
    handled: () => archived + skipped,
    tally: (): ArchiveRunTally => ({ archived, skipped, fetched, pages })
  };
};
