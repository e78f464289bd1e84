import type { MediaRecord, PostListing, PostRecord } from "../core/post/post.types";

/**
 * Every write is a single-row insert-if-absent or a guarded update, so
 * concurrent archive jobs over overlapping notes are safe.
 */
export interface PostRepository {
  insertPostIfAbsent(post: PostRecord): Promise<boolean>;
  insertMediaIfAbsent(media: MediaRecord): Promise<boolean>;
  setScreenshotPathIfMissing(postId: string, path: string): Promise<boolean>;
  getPost(postId: string): Promise<PostRecord | null>;
  listMedia(postId: string): Promise<MediaRecord[]>;
  listPosts(): Promise<PostListing[]>;
  listPostIdsMissingScreenshot(): Promise<string[]>;
  countPostsMissingScreenshot(): Promise<number>;
}
