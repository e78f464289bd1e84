import { MongoServerError, type Db } from "mongodb";
import { MongoPostRepository } from "../../src/infrastructure/mongo/MongoPostRepository";
import { migrations, runMigrations, type Migration } from "../../src/infrastructure/mongo/mongo.migrations";
import type { MediaRecord, PostRecord } from "../../src/core/post/post.types";

const post: PostRecord = {
  _id: "notes.example/n1",
  instance: "https://notes.example",
  noteId: "n1",
  url: "https://notes.example/notes/n1",
  archivedAt: "2024-05-01T00:00:00.000Z",
  userName: "Alice",
  userHandle: "@alice",
  userAvatar: "",
  content: "hello",
  cw: null,
  createdAt: "2024-03-01T12:00:00.000Z",
  replyCount: 0,
  renoteCount: 0,
  reactionCount: 0,
  visibility: "public",
  rawJson: "{\"id\":\"n1\"}",
  screenshotPath: null
};

const withCollections = (posts: Record<string, jest.Mock>, media: Record<string, jest.Mock> = {}) => {
  const repo = new MongoPostRepository("mongodb://localhost:27017/notes_archive");
  (repo as unknown as { collections: unknown }).collections = {
    posts: { collectionName: "posts", ...posts },
    media: { collectionName: "media", ...media }
  };
  return repo;
};

describe("MongoPostRepository", () => {
  it("inserts a post with $setOnInsert and reports whether it was new", async () => {
    const updateOne = jest
      .fn()
      .mockResolvedValueOnce({ upsertedCount: 1 })
      .mockResolvedValueOnce({ upsertedCount: 0 });
    const repo = withCollections({ updateOne });

    await expect(repo.insertPostIfAbsent(post)).resolves.toBe(true);
    await expect(repo.insertPostIfAbsent(post)).resolves.toBe(false);

    const { _id, ...fields } = post;
    expect(updateOne).toHaveBeenCalledWith({ _id }, { $setOnInsert: fields }, { upsert: true });
  });

  it("inserts media rows the same way", async () => {
    const updateOne = jest.fn().mockResolvedValue({ upsertedCount: 1 });
    const repo = withCollections({}, { updateOne });
    const record: MediaRecord = {
      _id: "notes.example/n1/f1",
      postId: "notes.example/n1",
      filename: "f1",
      url: "https://cdn.example/f1",
      mimeType: "image/png",
      localPath: null,
      width: null,
      height: null,
      isSensitive: false,
      altText: ""
    };

    await expect(repo.insertMediaIfAbsent(record)).resolves.toBe(true);
    expect(updateOne.mock.calls[0]?.[0]).toEqual({ _id: "notes.example/n1/f1" });
  });

  it("only sets the screenshot path on posts without one", async () => {
    const updateOne = jest.fn().mockResolvedValue({ modifiedCount: 0 });
    const repo = withCollections({ updateOne });

    await expect(repo.setScreenshotPathIfMissing("notes.example/n1", "/shot.png")).resolves.toBe(false);
    expect(updateOne).toHaveBeenCalledWith(
      { _id: "notes.example/n1", $or: [{ screenshotPath: null }, { screenshotPath: "" }] },
      { $set: { screenshotPath: "/shot.png" } }
    );
  });

  it("lists missing snapshot ids oldest first", async () => {
    const toArray = jest.fn().mockResolvedValue([{ _id: "a/1" }, { _id: "a/2" }]);
    const sort = jest.fn().mockReturnValue({ toArray });
    const find = jest.fn().mockReturnValue({ sort });
    const repo = withCollections({ find });

    await expect(repo.listPostIdsMissingScreenshot()).resolves.toEqual(["a/1", "a/2"]);
    expect(find).toHaveBeenCalledWith(
      { $or: [{ screenshotPath: null }, { screenshotPath: "" }] },
      { projection: { _id: 1 } }
    );
    expect(sort).toHaveBeenCalledWith({ archivedAt: 1 });
  });

  it("lists posts newest first with a media count and without raw payloads", async () => {
    const toArray = jest.fn().mockResolvedValue([]);
    const aggregate = jest.fn().mockReturnValue({ toArray });
    const repo = withCollections({ aggregate });

    await repo.listPosts();

    expect(aggregate).toHaveBeenCalledWith([
      { $sort: { archivedAt: -1 } },
      { $lookup: { from: "media", localField: "_id", foreignField: "postId", as: "media" } },
      { $addFields: { mediaCount: { $size: "$media" } } },
      { $project: { media: 0, rawJson: 0, instance: 0, noteId: 0 } }
    ]);
  });

  it("shares one connection attempt between concurrent first callers", async () => {
    const repo = new MongoPostRepository("mongodb://localhost:27017/notes_archive");
    const countDocuments = jest.fn().mockResolvedValue(2);
    const open = jest.fn(async () => ({ posts: { countDocuments }, media: {} }));
    (repo as unknown as { open: typeof open }).open = open;

    await expect(Promise.all([repo.countPostsMissingScreenshot(), repo.countPostsMissingScreenshot()])).resolves.toEqual([2, 2]);
    expect(open).toHaveBeenCalledTimes(1);
  });

  it("retries the connection after a failed attempt", async () => {
    const repo = new MongoPostRepository("mongodb://localhost:27017/notes_archive");
    const countDocuments = jest.fn().mockResolvedValue(0);
    const open = jest
      .fn()
      .mockRejectedValueOnce(new Error("server selection timed out"))
      .mockResolvedValueOnce({ posts: { countDocuments }, media: {} });
    (repo as unknown as { open: typeof open }).open = open;

    await expect(repo.countPostsMissingScreenshot()).rejects.toThrow("server selection timed out");
    await expect(repo.countPostsMissingScreenshot()).resolves.toBe(0);
    expect(open).toHaveBeenCalledTimes(2);
  });
});

describe("runMigrations", () => {
  const fakeDb = (appliedIds: string[], insertOne: jest.Mock = jest.fn().mockResolvedValue({})) => {
    const applied = {
      findOne: jest.fn(async ({ _id }: { _id: string }) => (appliedIds.includes(_id) ? { _id } : null)),
      insertOne
    };
    const posts = { updateMany: jest.fn().mockResolvedValue({ modifiedCount: 0 }) };
    const db = {
      collection: jest.fn((name: string) => (name === "_migrations" ? applied : posts))
    };
    return { db: db as unknown as Db, applied, posts };
  };

  it("applies pending migrations and records them", async () => {
    const { db, applied, posts } = fakeDb([]);

    await expect(runMigrations(db)).resolves.toEqual(["001_posts_screenshot_path"]);
    expect(posts.updateMany).toHaveBeenCalledWith(
      { screenshotPath: { $exists: false } },
      { $set: { screenshotPath: null } }
    );
    expect(applied.insertOne).toHaveBeenCalledWith({ _id: "001_posts_screenshot_path", appliedAt: expect.any(Date) });
  });

  it("skips migrations that were already applied", async () => {
    const { db, posts } = fakeDb(migrations.map((m) => m.id));

    await expect(runMigrations(db)).resolves.toEqual([]);
    expect(posts.updateMany).not.toHaveBeenCalled();
  });

  it("tolerates another process recording the same migration", async () => {
    const duplicate = new MongoServerError({ message: "E11000 duplicate key error", code: 11000 });
    const { db } = fakeDb([], jest.fn().mockRejectedValue(duplicate));
    const up = jest.fn(async () => undefined);
    const list: Migration[] = [{ id: "002_test", up }];

    await expect(runMigrations(db, list)).resolves.toEqual(["002_test"]);
    expect(up).toHaveBeenCalledTimes(1);
  });

  it("propagates other failures", async () => {
    const { db } = fakeDb([], jest.fn().mockRejectedValue(new Error("not primary")));

    await expect(runMigrations(db, [{ id: "003_test", up: async () => undefined }])).rejects.toThrow("not primary");
  });
});
