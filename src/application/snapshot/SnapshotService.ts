import { mkdir } from "fs/promises";
import path from "path";
import type { SnapshotRenderer } from "../../ports/SnapshotRenderer";
import type { MediaRecord } from "../../core/post/post.types";
import type { ProgressCallback, SnapshotBackfillResult } from "../../core/jobs/ArchiveJob";
import { RendererUnavailableError, toErrorMessage } from "../../core/errors";
import { toBucket } from "../../core/post/buildPost";
import { renderPostMirror } from "../../presentation/postMirror";
import type { PostStore } from "../archive/PostStore";
import type { PostSnapshotter } from "../archive/archiveSingle.usecase";
import type { RenderTokenRegistry } from "./RenderTokenRegistry";

export type SnapshotResult =
  | { status: "captured"; path: string }
  | { status: "unavailable" }
  | { status: "failed"; reason: string };

export const snapshotFileName = "screenshot.png";

/**
 * `src` for media inside a mirror served by the local server: downloaded files
 * go through `/media/...`, everything else keeps its origin URL.
 */
export const localMediaSrc = (mediaRoot: string) => (media: MediaRecord): string => {
  if (!media.localPath) return media.url;
  const relative = path.relative(mediaRoot, media.localPath);
  if (relative.startsWith("..") || path.isAbsolute(relative)) return media.url;
  return "/media/" + relative.split(path.sep).map(encodeURIComponent).join("/");
};

export type SnapshotServiceDeps = {
  store: PostStore;
  renderer: SnapshotRenderer | null;
  registry: RenderTokenRegistry;
  mediaRoot: string;
  /** Base URL of the running loopback server, or null while it is not listening. */
  renderBaseUrl: () => string | null;
};

/**
 * Optional enhancement: every path here degrades to "no snapshot" instead of
 * failing the archive that asked for it.
 */
export class SnapshotService implements PostSnapshotter {
  constructor(private readonly deps: SnapshotServiceDeps) {}

  async isAvailable(): Promise<boolean> {
    if (!this.deps.renderer) return false;
    return this.deps.renderer.isAvailable();
  }

  async buildMirror(postId: string): Promise<string | null> {
    const post = await this.deps.store.getPost(postId);
    if (!post) return null;
    const media = await this.deps.store.listMedia(postId);
    return renderPostMirror(post, media, { mediaSrc: localMediaSrc(this.deps.mediaRoot) });
  }

  async snapshot(postId: string, html: string): Promise<SnapshotResult> {
    const { renderer, registry } = this.deps;
    const baseUrl = this.deps.renderBaseUrl();
    if (!renderer || !baseUrl) return { status: "unavailable" };

    const destPath = path.join(this.deps.mediaRoot, toBucket(postId), snapshotFileName);
    try {
      await mkdir(path.dirname(destPath), { recursive: true });
      await registry.withRegistration(html, (token) =>
        renderer.capture({ url: `${baseUrl}/render/${token}`, destPath })
      );
      return { status: "captured", path: destPath };
    } catch (err) {
      if (err instanceof RendererUnavailableError) return { status: "unavailable" };
      const reason = toErrorMessage(err);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "snapshot.failed", postId, reason }));
      return { status: "failed", reason };
    }
  }

  async snapshotPost(postId: string): Promise<string | null> {
    try {
      const html = await this.buildMirror(postId);
      if (html == null) return null;

      const result = await this.snapshot(postId, html);
      if (result.status !== "captured") return null;

      await this.deps.store.updateSnapshotPath(postId, result.path);
      return result.path;
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "snapshot.failed", postId, reason: toErrorMessage(err) }));
      return null;
    }
  }

  countMissing(): Promise<number> {
    return this.deps.store.countPostsMissingSnapshot();
  }

  /**
   * Snapshots every post that has none yet. Posts that already have one are
   * never revisited, so re-running after a full pass does nothing.
   */
  async retakeBackfill(onProgress?: ProgressCallback): Promise<SnapshotBackfillResult> {
    const postIds = await this.deps.store.listPostIdsMissingSnapshot();
    const total = postIds.length;
    let done = 0;
    let failed = 0;

    for (const postId of postIds) {
      const stored = await this.snapshotPost(postId);
      if (stored) {
        done += 1;
      } else {
        failed += 1;
      }
      onProgress?.(done + failed, total);
    }

    return { done, failed, total };
  }
}
