import path from "path";
import type { ArchiveConfig } from "../application/archive/archive.config";
import { PostStore } from "../application/archive/PostStore";
import { JobTracker } from "../application/jobs/JobTracker";
import { RenderTokenRegistry } from "../application/snapshot/RenderTokenRegistry";
import { SnapshotService } from "../application/snapshot/SnapshotService";
import { HttpMediaFetcher } from "../infrastructure/media/HttpMediaFetcher";
import { MisskeyHttpClient } from "../infrastructure/misskey/MisskeyHttpClient";
import { MongoPostRepository } from "../infrastructure/mongo/MongoPostRepository";
import { PlaywrightRenderer } from "../infrastructure/render/PlaywrightRenderer";
import type { PostRepository } from "../ports/PostRepository";
import type { RemoteNotesClient } from "../ports/RemoteNotesClient";
import type { SnapshotRenderer } from "../ports/SnapshotRenderer";
import type { MediaFetcher } from "../ports/MediaFetcher";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";
import { createServer, listenOnFreePort } from "../server";

export type ArchiverContext = {
  store: PostStore;
  client: RemoteNotesClient;
  snapshots: SnapshotService;
  registry: RenderTokenRegistry;
  jobs: JobTracker;
  mediaRoot: string;
  config: ArchiveConfig;
};

export type ArchiverOverrides = Partial<{
  repo: PostRepository;
  client: RemoteNotesClient;
  media: MediaFetcher;
  renderer: SnapshotRenderer | null;
}>;

export type Archiver = {
  context: ArchiverContext;
  setRenderBaseUrl: (url: string | null) => void;
  /** Closes the store; jobs still running are abandoned. */
  close: () => Promise<void>;
};

export const createArchiver = (env: Env, runtime: RuntimeConfig, overrides: ArchiverOverrides = {}): Archiver => {
  const mediaRoot = path.resolve(env.MEDIA_DIR);
  let mongoRepo: MongoPostRepository | undefined;
  let repo: PostRepository;
  if (overrides.repo) {
    repo = overrides.repo;
  } else {
    mongoRepo = new MongoPostRepository(env.MONGO_URI, env.MONGO_DB);
    repo = mongoRepo;
  }

  const client =
    overrides.client ??
    new MisskeyHttpClient({
      timeoutMs: runtime.remote.timeoutMs,
      maxAttempts: runtime.remote.maxAttempts,
      retryDelayMs: runtime.remote.retryDelayMs
    });
  const media = overrides.media ?? new HttpMediaFetcher(mediaRoot, runtime.mediaTimeoutMs);
  const renderer =
    overrides.renderer !== undefined
      ? overrides.renderer
      : runtime.render.enabled
        ? new PlaywrightRenderer({
            navigationTimeoutMs: runtime.render.navigationTimeoutMs,
            idleTimeoutMs: runtime.render.idleTimeoutMs,
            executablePath: runtime.render.executablePath
          })
        : null;

  let renderBaseUrl: string | null = null;
  const store = new PostStore(repo, media);
  const registry = new RenderTokenRegistry();
  const snapshots = new SnapshotService({
    store,
    renderer,
    registry,
    mediaRoot,
    renderBaseUrl: () => renderBaseUrl
  });
  const jobs = new JobTracker();

  return {
    context: { store, client, snapshots, registry, jobs, mediaRoot, config: runtime.archiveConfig },
    setRenderBaseUrl: (url) => {
      renderBaseUrl = url;
    },
    close: async () => {
      await mongoRepo?.close();
    }
  };
};

export const startArchiver = async (): Promise<{ url: string }> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const archiver = createArchiver(env, runtime);
  const server = createServer(archiver.context);

  const port = await listenOnFreePort(server, env.HOST, env.PORT);
  const host = env.HOST === "::1" ? "[::1]" : env.HOST;
  const url = `http://${host}:${port}`;
  archiver.setRenderBaseUrl(url);
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "server.listening", url }));

  const shutdown = () => {
    server.close();
    archiver
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "server.shutdown_failed", message: String(err) }));
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return { url };
};
