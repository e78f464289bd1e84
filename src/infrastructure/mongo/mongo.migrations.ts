import { MongoServerError, type Db } from "mongodb";

export type Migration = {
  id: string;
  up: (db: Db) => Promise<void>;
};

type MigrationDoc = {
  _id: string;
  appliedAt: Date;
};

export const migrationsCollectionName = "_migrations";

/**
 * Additive only. Stores created before snapshots existed have posts without
 * `screenshotPath`; backfill reads rely on the field being present.
 */
export const migrations: Migration[] = [
  {
    id: "001_posts_screenshot_path",
    up: async (db) => {
      await db.collection("posts").updateMany(
        { screenshotPath: { $exists: false } },
        { $set: { screenshotPath: null } }
      );
    }
  }
];

const isDuplicateKeyError = (err: unknown): boolean =>
  err instanceof MongoServerError && err.code === 11000;

export const runMigrations = async (db: Db, list: Migration[] = migrations): Promise<string[]> => {
  const applied = db.collection<MigrationDoc>(migrationsCollectionName);
  const ran: string[] = [];

  for (const migration of list) {
    const existing = await applied.findOne({ _id: migration.id });
    if (existing) continue;

    await migration.up(db);
    try {
      await applied.insertOne({ _id: migration.id, appliedAt: new Date() });
    } catch (err) {
      // Another process recorded it first; the migration itself is idempotent.
      if (!isDuplicateKeyError(err)) throw err;
    }
    ran.push(migration.id);
  }

  return ran;
};
