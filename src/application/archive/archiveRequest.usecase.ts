import { applyInstance, resolveInput } from "../../core/target/resolveInput";
import { InputError } from "../../core/errors";
import type { JobTracker } from "../jobs/JobTracker";
import type { SleepFn } from "../../shared/time/sleep";
import { archiveCaps, type ArchiveConfigInput } from "./archive.config";
import { archiveSingle, type ArchiveDeps, type ArchiveSingleResult } from "./archiveSingle.usecase";
import { archiveUser } from "./archiveUser.usecase";

export type ArchiveRequest = {
  input: string;
  instance?: string | null;
  maxPosts?: number;
};

export type ArchiveRequestResult =
  | ArchiveSingleResult
  | { status: "started"; jobId: string; user: string; instance: string };

export type ArchiveRequestDeps = ArchiveDeps & {
  jobs: JobTracker;
  config?: ArchiveConfigInput;
  sleepFn?: SleepFn;
};

const validateMaxPosts = (value: number | undefined): void => {
  if (value == null) return;
  const { min, max } = archiveCaps.maxPosts;
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InputError("invalid_option", `Max posts must be an integer between ${min} and ${max}. Received: ${value}`);
  }
};

/**
 * Entry point for "archive this": a note is archived before returning, a user
 * becomes a background job whose id the caller polls.
 */
export const submitArchiveRequest = async (
  deps: ArchiveRequestDeps,
  request: ArchiveRequest
): Promise<ArchiveRequestResult> => {
  const raw = request.input.trim();
  if (!raw) {
    throw new InputError("unrecognized_input", "Input is required.");
  }

  const target = applyInstance(resolveInput(raw), request.instance);
  validateMaxPosts(request.maxPosts);

  if (target.kind === "note") {
    return archiveSingle(deps, target.instance, target.noteId);
  }

  const { instance, username } = target;
  const jobId = deps.jobs.startArchiveJob((onProgress) =>
    archiveUser(deps, { instance, username, maxPosts: request.maxPosts, onProgress })
  );

  return { status: "started", jobId, user: username, instance };
};
