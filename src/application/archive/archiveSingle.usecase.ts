import type { RemoteNotesClient } from "../../ports/RemoteNotesClient";
import { noteUrl } from "../../core/post/buildPost";
import type { PostStore } from "./PostStore";

export type PostSnapshotter = {
  snapshotPost(postId: string): Promise<string | null>;
};

export type ArchiveSingleResult =
  | { status: "already_archived"; postId: string }
  | { status: "archived"; postId: string; url: string };

export type ArchiveDeps = {
  client: RemoteNotesClient;
  store: PostStore;
  snapshots?: PostSnapshotter | null;
};

/**
 * Fetches one note and stores it. A first-time insert is snapshotted before
 * returning; snapshot problems never fail the archive.
 */
export const archiveSingle = async (
  deps: ArchiveDeps,
  instance: string,
  noteId: string
): Promise<ArchiveSingleResult> => {
  const note = await deps.client.fetchNote(instance, noteId);
  const insertedId = await deps.store.upsertPost(instance, note);

  if (insertedId == null) {
    return { status: "already_archived", postId: deps.store.postIdFor(instance, noteId) };
  }

  await deps.snapshots?.snapshotPost(insertedId);
  return { status: "archived", postId: insertedId, url: noteUrl(instance, noteId) };
};
