import type { Collection, Db, Filter, MongoClient } from "mongodb";
import type { PostRepository } from "../../ports/PostRepository";
import type { MediaRecord, PostListing, PostRecord } from "../../core/post/post.types";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";
import { runMigrations } from "./mongo.migrations";

type Collections = {
  posts: Collection<PostRecord>;
  media: Collection<MediaRecord>;
};

const missingScreenshot: Filter<PostRecord> = { $or: [{ screenshotPath: null }, { screenshotPath: "" }] };

/**
 * Mongo-backed store. Inserts are `$setOnInsert` upserts keyed by `_id`, which
 * makes "insert if absent" a single atomic operation per row.
 */
export class MongoPostRepository implements PostRepository {
  private client?: MongoClient;
  private collections?: Collections;
  private opening?: Promise<Collections>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "notes_archive"
  ) {}

  private async getCollections(): Promise<Collections> {
    if (this.collections) return this.collections;
    // Concurrent first callers share one connection attempt.
    if (!this.opening) {
      this.opening = this.open().catch((err: unknown) => {
        this.opening = undefined;
        throw err;
      });
    }
    return this.opening;
  }

  private async open(): Promise<Collections> {
    this.client = await createMongoClient(this.mongoUri);
    const db = this.client.db(this.dbName);
    const collections = await this.prepare(db);
    this.collections = collections;
    return collections;
  }

  private async prepare(db: Db): Promise<Collections> {
    const posts = db.collection<PostRecord>("posts");
    const media = db.collection<MediaRecord>("media");

    for (const idx of mongoIndexes.posts) {
      await posts.createIndex({ ...idx.keys }, { ...idx.options });
    }
    for (const idx of mongoIndexes.media) {
      await media.createIndex({ ...idx.keys }, { ...idx.options });
    }
    await runMigrations(db);

    return { posts, media };
  }

  async insertPostIfAbsent(post: PostRecord): Promise<boolean> {
    const { posts } = await this.getCollections();
    const { _id, ...fields } = post;
    const res = await posts.updateOne({ _id }, { $setOnInsert: fields }, { upsert: true });
    return (res.upsertedCount ?? 0) === 1;
  }

  async insertMediaIfAbsent(record: MediaRecord): Promise<boolean> {
    const { media } = await this.getCollections();
    const { _id, ...fields } = record;
    const res = await media.updateOne({ _id }, { $setOnInsert: fields }, { upsert: true });
    return (res.upsertedCount ?? 0) === 1;
  }

  async setScreenshotPathIfMissing(postId: string, path: string): Promise<boolean> {
    const { posts } = await this.getCollections();
    const res = await posts.updateOne({ _id: postId, ...missingScreenshot }, { $set: { screenshotPath: path } });
    return (res.modifiedCount ?? 0) === 1;
  }

  async getPost(postId: string): Promise<PostRecord | null> {
    const { posts } = await this.getCollections();
    return posts.findOne({ _id: postId });
  }

  async listMedia(postId: string): Promise<MediaRecord[]> {
    const { media } = await this.getCollections();
    return media.find({ postId }).toArray();
  }

  async listPosts(): Promise<PostListing[]> {
    const { posts, media } = await this.getCollections();
    return posts
      .aggregate<PostListing>([
        { $sort: { archivedAt: -1 } },
        { $lookup: { from: media.collectionName, localField: "_id", foreignField: "postId", as: "media" } },
        { $addFields: { mediaCount: { $size: "$media" } } },
        { $project: { media: 0, rawJson: 0, instance: 0, noteId: 0 } }
      ])
      .toArray();
  }

  async listPostIdsMissingScreenshot(): Promise<string[]> {
    const { posts } = await this.getCollections();
    const rows = await posts
      .find(missingScreenshot, { projection: { _id: 1 } })
      .sort({ archivedAt: 1 })
      .toArray();
    return rows.map((row) => row._id);
  }

  async countPostsMissingScreenshot(): Promise<number> {
    const { posts } = await this.getCollections();
    return posts.countDocuments(missingScreenshot);
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collections = undefined;
    this.opening = undefined;
  }
}
