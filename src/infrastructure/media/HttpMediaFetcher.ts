import { mkdir, writeFile } from "fs/promises";
import path from "path";
import mime from "mime-types";
import type { MediaFetcher } from "../../ports/MediaFetcher";
import { toBucket } from "../../core/post/buildPost";

const extensionAliases: Record<string, string> = {
  jpeg: "jpg",
  jpe: "jpg"
};

export const extensionForContentType = (contentType: string | null): string => {
  const essence = (contentType ?? "application/octet-stream").split(";")[0].trim().toLowerCase();
  const ext = mime.extension(essence);
  if (!ext) return "bin";
  return extensionAliases[ext] ?? ext;
};

/**
 * Downloads attachments into `<mediaRoot>/<bucket>/<assetId>.<ext>`.
 * Failures are logged and reported as `null`; the post is archived regardless.
 */
export class HttpMediaFetcher implements MediaFetcher {
  constructor(
    private readonly mediaRoot: string,
    private readonly timeoutMs = 30000,
    private readonly userAgent = "notes-archiver/1.0"
  ) {}

  async fetch(url: string, bucket: string, assetId: string): Promise<string | null> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(url, {
        headers: { "User-Agent": this.userAgent },
        signal: controller.signal
      });
      if (!res.ok) {
        await res.body?.cancel().catch(() => undefined);
        throw new Error(`HTTP ${res.status}`);
      }

      const data = Buffer.from(await res.arrayBuffer());
      const ext = extensionForContentType(res.headers.get("content-type"));
      const dest = path.join(this.mediaRoot, toBucket(bucket), `${toBucket(assetId)}.${ext}`);
      await mkdir(path.dirname(dest), { recursive: true });
      await writeFile(dest, data);
      return dest;
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timeout after ${this.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "media.download_failed", url, bucket, assetId, reason }));
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }
}
