import http from "http";
import { readFile, stat } from "fs/promises";
import path from "path";
import mime from "mime-types";
import type { ArchiverContext } from "./composition/root";
import { InputError, toErrorMessage } from "./core/errors";
import { isRecord } from "./core/note/parseNote";
import { submitArchiveRequest, type ArchiveRequest } from "./application/archive/archiveRequest.usecase";
import { buildPostExport } from "./application/export/postExport";
import { localMediaSrc } from "./application/snapshot/SnapshotService";
import { renderPostMirror } from "./presentation/postMirror";

const maxBodyBytes = 1024 * 1024;

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const sendJson = (res: http.ServerResponse, status: number, data: unknown) => {
  const body = Buffer.from(JSON.stringify(data), "utf8");
  res.writeHead(status, { "content-type": "application/json", "content-length": body.length });
  res.end(body);
};

const sendHtml = (res: http.ServerResponse, status: number, html: string) => {
  const body = Buffer.from(html, "utf8");
  res.writeHead(status, { "content-type": "text/html; charset=utf-8", "content-length": body.length });
  res.end(body);
};

const sendFile = async (res: http.ServerResponse, filePath: string, contentType?: string) => {
  const info = await stat(filePath).catch(() => null);
  if (!info || !info.isFile()) throw new HttpError(404, "Not found");
  const data = await readFile(filePath);
  res.writeHead(200, {
    "content-type": contentType ?? (mime.lookup(filePath) || "application/octet-stream"),
    "content-length": data.length
  });
  res.end(data);
};

const readJsonBody = async (req: http.IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > maxBodyBytes) throw new HttpError(413, "Request body too large");
    chunks.push(buf);
  }
  if (size === 0) return {};
  try {
    const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf8"));
    return parsed;
  } catch {
    throw new HttpError(400, "Request body is not valid JSON");
  }
};

const readOptionalInteger = (value: unknown): number | undefined => {
  if (value == null || value === "") return undefined;
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InputError("invalid_option", `Max posts must be an integer. Received: ${String(value)}`);
  }
  return parsed;
};

export const parseArchiveRequest = (body: unknown): ArchiveRequest => {
  const record = isRecord(body) ? body : {};
  return {
    input: typeof record.input === "string" ? record.input : "",
    instance: typeof record.instance === "string" ? record.instance : null,
    maxPosts: readOptionalInteger(record.maxPosts ?? record.max_posts)
  };
};

/**
 * Resolves `relative` inside `root`, refusing anything that escapes it.
 */
export const resolveInside = (root: string, relative: string): string | null => {
  const base = path.resolve(root);
  const target = path.resolve(base, relative);
  return target.startsWith(base + path.sep) ? target : null;
};

const decodeTail = (pathname: string, prefix: string): string => {
  try {
    return decodeURIComponent(pathname.slice(prefix.length));
  } catch {
    throw new HttpError(400, "Malformed path");
  }
};

export const createServer = (ctx: ArchiverContext) => {
  const { store, jobs, snapshots, registry, mediaRoot } = ctx;

  const routeGet = async (url: URL, res: http.ServerResponse): Promise<void> => {
    const { pathname } = url;

    if (pathname === "/" || pathname === "") {
      return sendJson(res, 200, { ok: true, message: "notes archiver" });
    }
    if (pathname === "/api/posts") {
      return sendJson(res, 200, await store.listPosts());
    }
    if (pathname === "/api/progress") {
      return sendJson(res, 200, jobs.getArchiveJob(url.searchParams.get("job") ?? ""));
    }
    if (pathname === "/api/screenshot-progress") {
      return sendJson(res, 200, jobs.getSnapshotBackfill());
    }
    if (pathname === "/api/renderer-status") {
      return sendJson(res, 200, { available: await snapshots.isAvailable() });
    }
    if (pathname.startsWith("/render/")) {
      const html = registry.resolve(pathname.slice("/render/".length));
      if (html == null) throw new HttpError(404, "Not found");
      return sendHtml(res, 200, html);
    }
    if (pathname.startsWith("/post/")) {
      const postId = decodeTail(pathname, "/post/");
      const post = await store.getPost(postId);
      if (!post) return sendHtml(res, 404, "<h1>Post not found</h1>");
      const media = await store.listMedia(postId);
      return sendHtml(res, 200, renderPostMirror(post, media, { mediaSrc: localMediaSrc(mediaRoot) }));
    }
    if (pathname.startsWith("/media/")) {
      const filePath = resolveInside(mediaRoot, decodeTail(pathname, "/media/"));
      if (!filePath) throw new HttpError(404, "Not found");
      return sendFile(res, filePath);
    }
    if (pathname.startsWith("/screenshot/")) {
      const post = await store.getPost(decodeTail(pathname, "/screenshot/"));
      if (!post?.screenshotPath) throw new HttpError(404, "Not found");
      return sendFile(res, post.screenshotPath, "image/png");
    }
    if (pathname.startsWith("/api/export/")) {
      const postId = decodeTail(pathname, "/api/export/");
      const entries = await buildPostExport(store, postId);
      if (!entries) throw new HttpError(404, "Post not found");
      return sendJson(res, 200, {
        postId,
        entries: entries.map((entry) => ({ name: entry.name, encoding: "base64", data: entry.data.toString("base64") }))
      });
    }
    throw new HttpError(404, "Not found");
  };

  const routePost = async (url: URL, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    if (url.pathname === "/api/archive") {
      const request = parseArchiveRequest(await readJsonBody(req));
      return sendJson(res, 200, await submitArchiveRequest(ctx, request));
    }
    if (url.pathname === "/api/retake-screenshots") {
      const started = await jobs.startSnapshotBackfill({
        countMissing: () => snapshots.countMissing(),
        run: (onProgress) => snapshots.retakeBackfill(onProgress)
      });
      return sendJson(res, 200, started);
    }
    throw new HttpError(404, "Not found");
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://127.0.0.1");
    try {
      if (req.method === "GET" || req.method === "HEAD") {
        await routeGet(url, res);
      } else if (req.method === "POST") {
        await routePost(url, req, res);
      } else {
        throw new HttpError(405, "Method not allowed");
      }
    } catch (err) {
      if (res.headersSent) {
        res.destroy();
        return;
      }
      if (err instanceof HttpError) return sendJson(res, err.status, { error: err.message });
      if (err instanceof InputError) return sendJson(res, 400, { error: err.message, code: err.code });
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "http.request_failed", method: req.method, path: url.pathname, message: toErrorMessage(err) }));
      sendJson(res, 500, { error: toErrorMessage(err) });
    }
  };

  return http.createServer((req, res) => {
    void handle(req, res);
  });
};

const isAddressInUse = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "EADDRINUSE";

/**
 * Listens on the first free port in `[startPort, startPort + attempts)`.
 */
export const listenOnFreePort = async (
  server: http.Server,
  host: string,
  startPort: number,
  attempts = 20
): Promise<number> => {
  for (let offset = 0; offset < attempts; offset += 1) {
    const port = startPort === 0 ? 0 : startPort + offset;
    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => {
          server.off("listening", onListening);
          reject(err);
        };
        const onListening = () => {
          server.off("error", onError);
          resolve();
        };
        server.once("error", onError);
        server.once("listening", onListening);
        server.listen(port, host);
      });
      const address = server.address();
      if (address == null || typeof address === "string") {
        throw new Error("Server is not listening on a TCP port");
      }
      return address.port;
    } catch (err) {
      if (!isAddressInUse(err) || startPort === 0) throw err;
    }
  }
  throw new Error(`No free port in range ${startPort}..${startPort + attempts - 1}`);
};
