import {
  archiveCaps,
  defaultArchiveConfig,
  type ArchiveConfig,
  validateArchiveConfig
} from "../../application/archive/archive.config";

export const runtimeCaps = {
  remoteTimeoutMs: { min: 1000, max: 30000 },
  remoteMaxAttempts: { min: 1, max: 5 },
  remoteRetryDelayMs: { min: 0, max: 60000 },
  mediaTimeoutMs: { min: 1000, max: 120000 },
  renderNavigationTimeoutMs: { min: 1000, max: 60000 },
  renderIdleTimeoutMs: { min: 0, max: 60000 }
} as const;

export type RemoteConfig = {
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
};

export type RenderConfig = {
  enabled: boolean;
  navigationTimeoutMs: number;
  idleTimeoutMs: number;
  executablePath?: string;
};

export type RuntimeConfig = {
  archiveConfig: ArchiveConfig;
  remote: RemoteConfig;
  mediaTimeoutMs: number;
  render: RenderConfig;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  throw new Error(`${name}=${raw} must be one of true, false, 1, 0`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const archiveConfig = validateArchiveConfig({
    pageSize: parseOptionalIntInRange(env, "ARCHIVE_PAGE_SIZE", archiveCaps.pageSize) ?? defaultArchiveConfig.pageSize,
    pageDelayMs:
      parseOptionalIntInRange(env, "ARCHIVE_PAGE_DELAY_MS", archiveCaps.pageDelayMs) ?? defaultArchiveConfig.pageDelayMs,
    maxPosts: parseOptionalIntInRange(env, "ARCHIVE_MAX_POSTS", archiveCaps.maxPosts) ?? defaultArchiveConfig.maxPosts
  });

  const remote: RemoteConfig = {
    timeoutMs: parseOptionalIntInRange(env, "REMOTE_TIMEOUT_MS", runtimeCaps.remoteTimeoutMs) ?? 30000,
    maxAttempts: parseOptionalIntInRange(env, "REMOTE_MAX_ATTEMPTS", runtimeCaps.remoteMaxAttempts) ?? 3,
    retryDelayMs: parseOptionalIntInRange(env, "REMOTE_RETRY_DELAY_MS", runtimeCaps.remoteRetryDelayMs) ?? 2000
  };

  const executablePath = env.CHROMIUM_PATH?.trim();
  const render: RenderConfig = {
    enabled: parseOptionalBoolean(env, "SNAPSHOTS_ENABLED") ?? true,
    navigationTimeoutMs:
      parseOptionalIntInRange(env, "RENDER_NAV_TIMEOUT_MS", runtimeCaps.renderNavigationTimeoutMs) ?? 15000,
    idleTimeoutMs: parseOptionalIntInRange(env, "RENDER_IDLE_TIMEOUT_MS", runtimeCaps.renderIdleTimeoutMs) ?? 6000,
    executablePath: executablePath ? executablePath : undefined
  };

  const mediaTimeoutMs = parseOptionalIntInRange(env, "MEDIA_TIMEOUT_MS", runtimeCaps.mediaTimeoutMs) ?? 30000;

  return { archiveConfig, remote, mediaTimeoutMs, render };
};
