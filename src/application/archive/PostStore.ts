import type { PostRepository } from "../../ports/PostRepository";
import type { MediaFetcher } from "../../ports/MediaFetcher";
import type { RawNote } from "../../core/note/note.types";
import type { MediaRecord, PostListing, PostRecord } from "../../core/post/post.types";
import { parseNote } from "../../core/note/parseNote";
import { attachmentIdFor, buildMediaRecord, buildPostRecord, computePostId, toBucket } from "../../core/post/buildPost";
import { wrapStorageFailure } from "./archive.error-handler";

/**
 * Idempotent persistence of fetched notes. A note that is already stored is
 * left untouched; a new one is written post-first, then attachment by attachment.
 */
export class PostStore {
  constructor(
    private readonly repo: PostRepository,
    private readonly media: MediaFetcher,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Resolves to the new post id, or `null` when the note was already archived
   * (or carries no id).
   */
  async upsertPost(instance: string, raw: RawNote): Promise<string | null> {
    const note = parseNote(raw);
    if (!note.id) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "archive.note_skipped", instance, reason: "missing note id" }));
      return null;
    }

    const post = buildPostRecord({
      instance,
      noteId: note.id,
      note,
      rawJson: JSON.stringify(raw),
      archivedAt: this.now()
    });

    const inserted = await this.write("inserting post", post._id, () => this.repo.insertPostIfAbsent(post));
    if (!inserted) return null;

    const bucket = toBucket(post._id);
    for (const file of note.files) {
      const localPath = file.url ? await this.media.fetch(file.url, bucket, attachmentIdFor(file)) : null;
      const record = buildMediaRecord(post._id, file, localPath);
      await this.write("inserting media", post._id, () => this.repo.insertMediaIfAbsent(record));
    }

    return post._id;
  }

  postIdFor(instance: string, noteId: string): string {
    return computePostId(instance, noteId);
  }

  async updateSnapshotPath(postId: string, path: string): Promise<boolean> {
    return this.write("storing snapshot path", postId, () => this.repo.setScreenshotPathIfMissing(postId, path));
  }

  getPost(postId: string): Promise<PostRecord | null> {
    return this.repo.getPost(postId);
  }

  listMedia(postId: string): Promise<MediaRecord[]> {
    return this.repo.listMedia(postId);
  }

  listPosts(): Promise<PostListing[]> {
    return this.repo.listPosts();
  }

  listPostIdsMissingSnapshot(): Promise<string[]> {
    return this.repo.listPostIdsMissingScreenshot();
  }

  countPostsMissingSnapshot(): Promise<number> {
    return this.repo.countPostsMissingScreenshot();
  }

  private async write<T>(action: string, postId: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      throw wrapStorageFailure(err, action, { postId });
    }
  }
}
