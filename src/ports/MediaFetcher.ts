export interface MediaFetcher {
  /**
   * Resolves to the local path, or `null` when the download failed.
   */
  fetch(url: string, bucket: string, assetId: string): Promise<string | null>;
}
