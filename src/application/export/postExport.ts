import { readFile } from "fs/promises";
import path from "path";
import type { MediaRecord } from "../../core/post/post.types";
import { renderPostMirror } from "../../presentation/postMirror";
import type { PostStore } from "../archive/PostStore";

export type ExportEntry = {
  name: string;
  data: Buffer;
};

const readIfPresent = async (filePath: string): Promise<Buffer | null> => {
  try {
    return await readFile(filePath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
};

const bundledMediaName = (media: MediaRecord): string | null =>
  media.localPath ? `media/${path.basename(media.localPath)}` : null;

/**
 * Named blobs making up a self-contained export of one post: metadata, the
 * mirror page (pointing at the bundled media), the media files and the
 * snapshot. Packaging them is left to the caller.
 */
export const buildPostExport = async (store: PostStore, postId: string): Promise<ExportEntry[] | null> => {
  const post = await store.getPost(postId);
  if (!post) return null;
  const media = await store.listMedia(postId);

  const { rawJson, ...fields } = post;
  const raw: unknown = JSON.parse(rawJson || "{}");
  const meta = { ...fields, raw };

  const entries: ExportEntry[] = [
    { name: "post.json", data: Buffer.from(JSON.stringify(meta, null, 2), "utf8") }
  ];

  const bundled: MediaRecord[] = [];
  const files: ExportEntry[] = [];
  for (const m of media) {
    const name = bundledMediaName(m);
    const data = m.localPath ? await readIfPresent(m.localPath) : null;
    if (name && data) {
      bundled.push(m);
      files.push({ name, data });
    }
  }

  const html = renderPostMirror(post, media, {
    mediaSrc: (m) => (bundled.includes(m) ? bundledMediaName(m) ?? m.url : m.url)
  });
  entries.push({ name: "post.html", data: Buffer.from(html, "utf8") });
  entries.push(...files);

  const screenshot = post.screenshotPath ? await readIfPresent(post.screenshotPath) : null;
  if (screenshot) {
    entries.push({ name: "screenshot.png", data: screenshot });
  }

  return entries;
};
