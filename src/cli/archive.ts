import { createArchiver } from "../composition/root";
import { archiveSingle } from "../application/archive/archiveSingle.usecase";
import { archiveUser } from "../application/archive/archiveUser.usecase";
import { applyInstance, resolveInput } from "../core/target/resolveInput";
import { InputError, type ErrorContext } from "../core/errors";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

type CliErrorEnvelope = {
  event: string;
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

export type ArchiveCliArgs = {
  input: string;
  instance?: string;
  maxPosts?: number;
};

const allowedNumberKeys = ["page", "fetched"] as const;
const allowedStringKeys = ["instance", "endpoint", "postId"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedNumberKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
  }
  for (const key of allowedStringKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw !== "") {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean, event = "archive.failed"): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event,
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const usage = "Usage: archive <url | @user@host | username> [--instance URL] [--max-posts N]";

export const parseArchiveCliArgs = (argv: string[]): ArchiveCliArgs => {
  let input: string | undefined;
  let instance: string | undefined;
  let maxPosts: number | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--instance") {
      instance = argv[i + 1];
      i += 1;
    } else if (arg === "--max-posts") {
      const raw = argv[i + 1] ?? "";
      const value = Number(raw);
      if (!Number.isInteger(value) || value < 1) {
        throw new InputError("invalid_option", `--max-posts must be a positive integer. Received: ${raw}`);
      }
      maxPosts = value;
      i += 1;
    } else if (arg.startsWith("--")) {
      throw new InputError("invalid_option", `Unknown option ${arg}. ${usage}`);
    } else if (input == null) {
      input = arg;
    } else {
      throw new InputError("invalid_option", `Unexpected argument ${arg}. ${usage}`);
    }
  }

  if (!input) {
    throw new InputError("unrecognized_input", usage);
  }
  if (instance == null && argv.includes("--instance")) {
    throw new InputError("invalid_option", "--instance needs a value");
  }
  return { input, instance, maxPosts };
};

/**
 * Archives a note or a whole user in the foreground, printing JSON lines.
 * Snapshots need the loopback server, so this path stores posts without them.
 */
export const runArchiveCli = async (argv: string[]): Promise<void> => {
  const args = parseArchiveCliArgs(argv);
  const target = applyInstance(resolveInput(args.input), args.instance);
  const archiver = createArchiver(loadEnv(), loadRuntimeConfigFromEnv(), { renderer: null });
  const { context } = archiver;

  try {
    if (target.kind === "note") {
      const result = await archiveSingle(context, target.instance, target.noteId);
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "archive.result", ...result }));
      return;
    }

    const result = await archiveUser(context, {
      instance: target.instance,
      username: target.username,
      maxPosts: args.maxPosts,
      onProgress: (done, total) => {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ event: "archive.progress", done, total }));
      }
    });
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "archive.result", ...result }));
  } finally {
    await archiver.close();
  }
};

export const executeArchiveCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    await runArchiveCli(argv);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeArchiveCli();
}
