import http from "http";
import type { RawNote } from "./core/note/note.types";
import { isRecord } from "./core/note/parseNote";

/**
 * Minimal fake Misskey-family instance for local runs and tests.
 * - POST /api/users/show   { username }
 * - POST /api/notes/show   { noteId }
 * - POST /api/users/notes  { userId, limit, untilId? }  newest first
 * - GET  /files/<name>     tiny PNG attachment
 */
export type FakeInstanceOptions = {
  username?: string;
  userId?: string;
  noteCount?: number;
  /** Answer this many API requests with HTTP 500 before behaving. */
  failFirst?: number;
  withAttachments?: boolean;
};

export type FakeInstance = {
  server: http.Server;
  requests: Array<{ endpoint: string; payload: Record<string, unknown> }>;
  notes: RawNote[];
};

const pngPixel = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNk+M9QDwADhgGAWjR9awAAAABJRU5ErkJggg==",
  "base64"
);

const noteIdFor = (n: number) => `n${String(n).padStart(4, "0")}`;

export const buildFakeNotes = (count: number, opts: { host: string; username: string; withAttachments: boolean }): RawNote[] => {
  const notes: RawNote[] = [];
  // newest first: highest number first
  for (let n = count; n >= 1; n -= 1) {
    notes.push({
      id: noteIdFor(n),
      createdAt: new Date(Date.UTC(2024, 0, 1, 0, n)).toISOString(),
      text: `note number ${n}`,
      cw: null,
      user: { name: "Fake User", username: opts.username, host: null, avatarUrl: `${opts.host}/files/avatar.png` },
      repliesCount: n % 3,
      renoteCount: n % 2,
      reactions: { "👍": n % 5, ":blobcat:": 1 },
      visibility: "public",
      files: opts.withAttachments && n % 10 === 0
        ? [{ id: `f${n}`, url: `${opts.host}/files/f${n}.png`, name: `f${n}.png`, type: "image/png", properties: { width: 1, height: 1 }, isSensitive: false, comment: `file ${n}` }]
        : []
    });
  }
  return notes;
};

const readBody = async (req: http.IncomingMessage): Promise<Record<string, unknown>> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  if (chunks.length === 0) return {};
  const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf8"));
  return isRecord(parsed) ? parsed : {};
};

const sendJson = (res: http.ServerResponse, status: number, data: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(data));
};

export const createFakeMisskeyServer = (options: FakeInstanceOptions = {}): FakeInstance => {
  const username = options.username ?? "alice";
  const userId = options.userId ?? "u1";
  const requests: FakeInstance["requests"] = [];
  let failuresLeft = options.failFirst ?? 0;
  let notes: RawNote[] = [];

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://127.0.0.1");

    if (req.method === "GET" && url.pathname.startsWith("/files/")) {
      res.writeHead(200, { "content-type": "image/png" });
      res.end(pngPixel);
      return;
    }

    if (req.method !== "POST" || !url.pathname.startsWith("/api/")) {
      res.writeHead(404);
      res.end();
      return;
    }

    readBody(req)
      .then((payload) => {
        const endpoint = url.pathname.slice("/api/".length);
        requests.push({ endpoint, payload });

        if (failuresLeft > 0) {
          failuresLeft -= 1;
          return sendJson(res, 500, { error: { code: "INTERNAL_ERROR", message: "Internal error occurred." } });
        }

        if (endpoint === "users/show") {
          if (payload.username !== username) return sendJson(res, 404, { error: { code: "NO_SUCH_USER" } });
          return sendJson(res, 200, { id: userId, username });
        }
        if (endpoint === "notes/show") {
          const note = notes.find((n) => n.id === payload.noteId);
          return note ? sendJson(res, 200, note) : sendJson(res, 404, { error: { code: "NO_SUCH_NOTE" } });
        }
        if (endpoint === "users/notes") {
          const limit = typeof payload.limit === "number" ? payload.limit : 10;
          const start = typeof payload.untilId === "string"
            ? notes.findIndex((n) => n.id === payload.untilId) + 1
            : 0;
          return sendJson(res, 200, payload.userId === userId ? notes.slice(start, start + limit) : []);
        }
        return sendJson(res, 404, { error: { code: "NO_SUCH_ENDPOINT" } });
      })
      .catch(() => sendJson(res, 400, { error: { code: "INVALID_PARAM" } }));
  });

  const instance: FakeInstance = { server, requests, notes };
  server.on("listening", () => {
    const address = server.address();
    const host = address && typeof address === "object" ? `http://127.0.0.1:${address.port}` : "http://127.0.0.1";
    notes = buildFakeNotes(options.noteCount ?? 45, { host, username, withAttachments: options.withAttachments ?? false });
    instance.notes = notes;
  });

  return instance;
};

if (require.main === module) {
  const port = Number(process.env.FAKE_INSTANCE_PORT ?? 3999);
  const { server } = createFakeMisskeyServer({ withAttachments: true });
  server.listen(port, "127.0.0.1", () => {
    // eslint-disable-next-line no-console
    console.log(`Fake instance on http://127.0.0.1:${port}`);
  });
}
