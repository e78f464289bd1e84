import { archiveUser } from "../../src/application/archive/archiveUser.usecase";
import { ArchiveOverloadError } from "../../src/application/archive/archive.error-handler";
import { PostStore } from "../../src/application/archive/PostStore";
import { RemoteError } from "../../src/core/errors";
import { FakeMediaFetcher } from "../helpers/fake-media-fetcher";
import { FakeNotesClient } from "../helpers/fake-notes-client";
import { InMemoryPostRepository } from "../helpers/in-memory-post-repository";
import { makeNote } from "../helpers/notes";
import { silenceConsole } from "../helpers/console";

const instance = "https://notes.example";

describe("archiveUser", () => {
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    consoleSpies = silenceConsole();
  });

  afterEach(() => {
    consoleSpies.restore();
  });

  const setup = (count: number) => {
    const client = new FakeNotesClient(count);
    const repo = new InMemoryPostRepository();
    const store = new PostStore(repo, new FakeMediaFetcher());
    const slept: number[] = [];
    const sleepFn = async (ms: number) => {
      slept.push(ms);
    };
    return { client, repo, store, slept, sleepFn };
  };

  it("fetches 45 notes in exactly three pages when maxPosts is 45", async () => {
    const { client, repo, store, slept, sleepFn } = setup(45);
    const progress: Array<[number, number]> = [];

    const result = await archiveUser({ client, store, sleepFn }, {
      instance,
      username: "alice",
      maxPosts: 45,
      onProgress: (done, total) => progress.push([done, total])
    });

    expect(result).toEqual({ status: "done", user: "alice", instance, archived: 45, skipped: 0, total: 45 });
    expect(client.pageCalls).toEqual([
      { userId: "u1", limit: 20, untilId: undefined },
      { userId: "u1", limit: 20, untilId: "n0026" },
      { userId: "u1", limit: 5, untilId: "n0006" }
    ]);
    expect(progress).toEqual([[20, 20], [40, 40], [45, 45]]);
    expect(slept).toEqual([1000, 1000]);
    expect(repo.posts.size).toBe(45);
  });

  it("follows the untilId cursor until a short page", async () => {
    const { client, store, sleepFn } = setup(45);

    const result = await archiveUser({ client, store, sleepFn }, { instance, username: "alice" });

    expect(client.pageCalls.map((call) => call.untilId)).toEqual([undefined, "n0026", "n0006"]);
    expect(client.pageCalls.map((call) => call.limit)).toEqual([20, 20, 20]);
    expect(result.total).toBe(45);
  });

  it("stops when the last note of a page has no id to continue from", async () => {
    const { client, store, slept, sleepFn } = setup(45);
    client.notes[19] = makeNote("n0026", { id: null });

    const result = await archiveUser({ client, store, sleepFn }, { instance, username: "alice" });

    expect(result).toEqual({ status: "done", user: "alice", instance, archived: 19, skipped: 1, total: 20 });
    expect(client.pageCalls).toHaveLength(1);
    expect(slept).toEqual([]);
    const warnings = consoleSpies.warn.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(warnings).toContainEqual({
      event: "archive.cursor_stalled",
      instance,
      user: "alice",
      page: 1,
      untilId: null
    });
  });

  it("shrinks the last page to stop exactly at maxPosts", async () => {
    const { client, store, sleepFn } = setup(45);

    const result = await archiveUser({ client, store, sleepFn }, { instance, username: "alice", maxPosts: 30 });

    expect(client.pageCalls.map((call) => call.limit)).toEqual([20, 10]);
    expect(result.total).toBe(30);
    expect(result.archived).toBe(30);
  });

  it("stops after a page that fills maxPosts without sleeping", async () => {
    const { client, store, slept, sleepFn } = setup(45);

    await archiveUser({ client, store, sleepFn }, { instance, username: "alice", maxPosts: 20 });

    expect(client.pageCalls).toHaveLength(1);
    expect(slept).toEqual([]);
  });

  it("uses the configured page size and delay", async () => {
    const { client, store, slept, sleepFn } = setup(12);

    const result = await archiveUser(
      { client, store, sleepFn, config: { pageSize: 5, pageDelayMs: 0 } },
      { instance, username: "alice" }
    );

    expect(client.pageCalls.map((call) => call.untilId)).toEqual([undefined, "n0008", "n0003"]);
    expect(slept).toEqual([0, 0]);
    expect(result.total).toBe(12);
  });

  it("counts already archived notes as skipped on a second run", async () => {
    const { client, store, sleepFn } = setup(25);
    await archiveUser({ client, store, sleepFn }, { instance, username: "alice" });

    const again = await archiveUser({ client, store, sleepFn }, { instance, username: "alice" });

    expect(again).toMatchObject({ archived: 0, skipped: 25, total: 25 });
  });

  it("stops on an empty first page", async () => {
    const { client, store, sleepFn } = setup(0);

    const result = await archiveUser({ client, store, sleepFn }, { instance, username: "alice" });

    expect(result).toEqual({ status: "done", user: "alice", instance, archived: 0, skipped: 0, total: 0 });
    expect(client.pageCalls).toHaveLength(1);
  });

  it("snapshots every newly archived post", async () => {
    const { client, store, sleepFn } = setup(3);
    const snapshotted: string[] = [];

    await archiveUser({
      client,
      store,
      sleepFn,
      snapshots: {
        snapshotPost: async (postId) => {
          snapshotted.push(postId);
          return null;
        }
      }
    }, { instance, username: "alice" });

    expect(snapshotted).toEqual(["notes.example/n0003", "notes.example/n0002", "notes.example/n0001"]);
  });

  it("rewrites overload failures into a user-facing error", async () => {
    const { client, store, sleepFn } = setup(45);
    client.failPagesWith = new RemoteError({
      code: "remote_exhausted",
      message: "API request failed after 3 attempts: API error 500 from https://notes.example: INTERNAL_ERROR",
      status: 500
    });

    const promise = archiveUser({ client, store, sleepFn }, { instance, username: "alice" });

    await expect(promise).rejects.toBeInstanceOf(ArchiveOverloadError);
    await expect(promise).rejects.toMatchObject({
      code: "instance_overloaded",
      status: 500,
      context: { instance, page: 1, fetched: 0 }
    });
    await expect(promise).rejects.toThrow(
      "The instance returned a server error while fetching posts. This usually means the server is under load. " +
        "Try again in a few minutes, or reduce Max Posts."
    );
  });

  it("passes other failures through unchanged", async () => {
    const { client, store, sleepFn } = setup(45);
    const forbidden = new RemoteError({ code: "remote_status", message: "API error 403", status: 403 });
    client.failPagesWith = forbidden;

    await expect(archiveUser({ client, store, sleepFn }, { instance, username: "alice" })).rejects.toBe(forbidden);
  });

  it("logs a line per page and a completion summary", async () => {
    const { client, store, sleepFn } = setup(5);

    await archiveUser({ client, store, sleepFn }, { instance, username: "alice" });

    const lines = consoleSpies.log.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(lines).toEqual([
      { event: "archive.page", instance, user: "alice", page: 1, size: 5, untilId: "n0001" },
      { event: "archive.completed", instance, user: "alice", archived: 5, skipped: 0, total: 5 }
    ]);
  });
});
