export type CaptureRequest = {
  url: string;
  destPath: string;
};

export interface SnapshotRenderer {
  /**
   * Rejects with `RendererUnavailableError` when no browser can be started.
   */
  capture(request: CaptureRequest): Promise<void>;
  isAvailable(): Promise<boolean>;
}
