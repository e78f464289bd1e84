export type ArchiveConfig = {
  pageSize: number;
  pageDelayMs: number;
  maxPosts: number;
};

export type ArchiveConfigInput = Partial<ArchiveConfig>;

/**
 * Pages stay small on purpose: busy instances hit statement timeouts on large
 * `users/notes` queries, so 20 is a ceiling rather than a default.
 */
export const maxRemotePageSize = 20;

export const defaultArchiveConfig: ArchiveConfig = {
  pageSize: maxRemotePageSize,
  pageDelayMs: 1000,
  maxPosts: 500
};

export const archiveCaps = {
  pageSize: { min: 1, max: maxRemotePageSize },
  pageDelayMs: { min: 0, max: 60000 },
  maxPosts: { min: 1, max: 100000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateArchiveConfig = (config: ArchiveConfig): ArchiveConfig => {
  assertIntegerInRange("pageSize", config.pageSize, archiveCaps.pageSize.min, archiveCaps.pageSize.max);
  assertIntegerInRange("pageDelayMs", config.pageDelayMs, archiveCaps.pageDelayMs.min, archiveCaps.pageDelayMs.max);
  assertIntegerInRange("maxPosts", config.maxPosts, archiveCaps.maxPosts.min, archiveCaps.maxPosts.max);
  return config;
};

export const resolveArchiveConfig = (input: ArchiveConfigInput = {}): ArchiveConfig =>
  validateArchiveConfig({
    ...defaultArchiveConfig,
    ...input
  });
