export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
  MEDIA_DIR: string;
  HOST: string;
  PORT: number;
};

const validateMongoUri = (value: string): string => {
  if (!/^mongodb(\+srv)?:\/\//.test(value)) {
    throw new Error(`MONGO_URI must use the mongodb:// or mongodb+srv:// scheme. Received: ${value}`);
  }
  return value;
};

const loopbackHosts = new Set(["127.0.0.1", "localhost", "::1"]);

const validateLoopbackHost = (value: string): string => {
  if (!loopbackHosts.has(value)) {
    throw new Error(`HOST must be a loopback address (127.0.0.1, localhost or ::1). Received: ${value}`);
  }
  return value;
};

const parsePort = (raw: string | undefined): number => {
  if (raw == null || raw.trim() === "") return 5757;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`PORT=${raw} is out of allowed range [1..65535]`);
  }
  return value;
};

const nonEmpty = (value: string | undefined, fallback: string): string =>
  value != null && value.trim() !== "" ? value.trim() : fallback;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri(nonEmpty(env.MONGO_URI, "mongodb://localhost:27017/notes_archive"));
  const MONGO_DB = nonEmpty(env.MONGO_DB, "notes_archive");
  const MEDIA_DIR = nonEmpty(env.MEDIA_DIR, "archive_data/media");
  const HOST = validateLoopbackHost(nonEmpty(env.HOST, "127.0.0.1"));
  const PORT = parsePort(env.PORT);

  return { MONGO_URI, MONGO_DB, MEDIA_DIR, HOST, PORT };
};
