import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { extensionForContentType, HttpMediaFetcher } from "../../src/infrastructure/media/HttpMediaFetcher";
import { startServer, type TestServer } from "../helpers/test-server";

describe("extensionForContentType", () => {
  it.each([
    ["image/jpeg", "jpg"],
    ["image/png; charset=binary", "png"],
    ["video/mp4", "mp4"],
    ["application/x-not-a-type", "bin"]
  ])("maps %s to %s", (contentType, ext) => {
    expect(extensionForContentType(contentType)).toBe(ext);
  });

  it("falls back to bin without a content type", () => {
    expect(extensionForContentType(null)).toBe("bin");
  });
});

describe("HttpMediaFetcher", () => {
  let server: TestServer;
  let mediaRoot: string;
  let warnSpy: jest.SpyInstance;

  beforeAll(async () => {
    server = await startServer((req, res) => {
      if (req.url === "/cat") {
        res.writeHead(200, { "Content-Type": "image/jpeg" });
        res.end(Buffer.from([0xff, 0xd8, 0xff]));
        return;
      }
      if (req.url === "/slow") {
        setTimeout(() => {
          res.writeHead(200, { "Content-Type": "image/png" });
          res.end("late");
        }, 300);
        return;
      }
      res.writeHead(404);
      res.end("missing");
    });
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(async () => {
    mediaRoot = await mkdtemp(path.join(os.tmpdir(), "media-fetcher-"));
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    await rm(mediaRoot, { recursive: true, force: true });
  });

  it("stores the body under the bucket with an extension from the content type", async () => {
    const fetcher = new HttpMediaFetcher(mediaRoot);

    const dest = await fetcher.fetch(`${server.baseUrl}/cat`, "notes.example/n1", "f1");

    expect(dest).toBe(path.join(mediaRoot, "notes_example_n1", "f1.jpg"));
    expect([...(await readFile(path.join(mediaRoot, "notes_example_n1", "f1.jpg")))]).toEqual([0xff, 0xd8, 0xff]);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("returns null and logs on a non-2xx status", async () => {
    const fetcher = new HttpMediaFetcher(mediaRoot);

    await expect(fetcher.fetch(`${server.baseUrl}/gone`, "b", "f2")).resolves.toBeNull();
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toEqual({
      event: "media.download_failed",
      url: `${server.baseUrl}/gone`,
      bucket: "b",
      assetId: "f2",
      reason: "HTTP 404"
    });
  });

  it("returns null when the download times out", async () => {
    const fetcher = new HttpMediaFetcher(mediaRoot, 50);

    await expect(fetcher.fetch(`${server.baseUrl}/slow`, "b", "f3")).resolves.toBeNull();
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toMatchObject({ reason: "timeout after 50ms" });
  });
});
