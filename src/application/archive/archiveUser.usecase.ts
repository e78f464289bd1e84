import type { ArchiveUserResult, ProgressCallback } from "../../core/jobs/ArchiveJob";
import type { RawNote } from "../../core/note/note.types";
import { readNoteId } from "../../core/note/parseNote";
import { sleep, type SleepFn } from "../../shared/time/sleep";
import type { ArchiveConfigInput } from "./archive.config";
import { resolveArchiveConfig } from "./archive.config";
import { createArchiveRunTracker, rewriteOverloadError } from "./archive.error-handler";
import type { ArchiveDeps } from "./archiveSingle.usecase";

export type ArchiveUserParams = {
  instance: string;
  username: string;
  maxPosts?: number;
  onProgress?: ProgressCallback;
};

/**
 * Walks a user's original notes newest-first with an `untilId` cursor, one
 * page at a time, pausing between pages so loaded instances are not hammered.
 */
export const archiveUser = async (
  deps: ArchiveDeps & { config?: ArchiveConfigInput; sleepFn?: SleepFn },
  params: ArchiveUserParams
): Promise<ArchiveUserResult> => {
  const { client, store } = deps;
  const config = resolveArchiveConfig({
    ...deps.config,
    ...(params.maxPosts != null ? { maxPosts: params.maxPosts } : {})
  });
  const wait = deps.sleepFn ?? sleep;
  const { instance, username } = params;

  const user = await client.lookupUser(instance, username);
  const tracker = createArchiveRunTracker();
  let untilId: string | undefined;

  while (tracker.fetched() < config.maxPosts) {
    const page = tracker.nextPageNumber();
    const limit = Math.min(config.pageSize, config.maxPosts - tracker.fetched());

    let batch: RawNote[];
    try {
      batch = await client.fetchUserNotes(instance, { userId: user.id, limit, untilId });
    } catch (err) {
      throw rewriteOverloadError(err, { instance, page, fetched: tracker.fetched() });
    }

    if (batch.length === 0) break;

    for (const note of batch) {
      const postId = await store.upsertPost(instance, note);
      if (postId == null) {
        tracker.addSkipped();
        continue;
      }
      tracker.addArchived();
      await deps.snapshots?.snapshotPost(postId);
    }

    tracker.addPage(batch.length);
    const nextUntilId = readNoteId(batch[batch.length - 1].id);
    params.onProgress?.(tracker.handled(), tracker.fetched());

    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "archive.page", instance, user: username, page, size: batch.length, untilId: nextUntilId ?? null }));

    if (nextUntilId == null || nextUntilId === untilId) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "archive.cursor_stalled", instance, user: username, page, untilId: untilId ?? null }));
      break;
    }
    untilId = nextUntilId;

    if (batch.length < config.pageSize) break;
    if (tracker.fetched() >= config.maxPosts) break;

    await wait(config.pageDelayMs);
  }

  const { archived, skipped, fetched } = tracker.tally();
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "archive.completed", instance, user: username, archived, skipped, total: fetched }));

  return { status: "done", user: username, instance, archived, skipped, total: fetched };
};
