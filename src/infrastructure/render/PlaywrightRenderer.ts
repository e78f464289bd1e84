import type { Browser, BrowserType } from "playwright-core";
import type { CaptureRequest, SnapshotRenderer } from "../../ports/SnapshotRenderer";
import { RenderError, RendererUnavailableError, toErrorMessage } from "../../core/errors";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";

export type PlaywrightRendererOptions = {
  navigationTimeoutMs?: number;
  idleTimeoutMs?: number;
  executablePath?: string;
  viewport?: { width: number; height: number };
  concurrency?: number;
  cardSelector?: string;
};

type ChromiumLoader = () => Promise<BrowserType>;

const loadChromium: ChromiumLoader = async () => {
  const playwright = await import("playwright-core");
  return playwright.chromium;
};

/**
 * Headless Chromium through playwright-core. No browser is bundled: when none
 * can be launched the renderer reports itself unavailable.
 */
export class PlaywrightRenderer implements SnapshotRenderer {
  private readonly navigationTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private readonly viewport: { width: number; height: number };
  private readonly cardSelector: string;
  private readonly limit: Limiter;
  private availability?: Promise<boolean>;

  constructor(
    private readonly options: PlaywrightRendererOptions = {},
    private readonly loader: ChromiumLoader = loadChromium
  ) {
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 15000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 6000;
    this.viewport = options.viewport ?? { width: 700, height: 900 };
    this.cardSelector = options.cardSelector ?? ".card";
    this.limit = createLimiter(options.concurrency ?? 1);
  }

  isAvailable(): Promise<boolean> {
    if (!this.availability) {
      this.availability = this.launch()
        .then(async (browser) => {
          await browser.close();
          return true;
        })
        .catch((err: unknown) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({ event: "renderer.unavailable", reason: toErrorMessage(err) }));
          return false;
        });
    }
    return this.availability;
  }

  capture(request: CaptureRequest): Promise<void> {
    return this.limit(() => this.captureNow(request));
  }

  private async launch(): Promise<Browser> {
    let chromium: BrowserType;
    try {
      chromium = await this.loader();
    } catch (err) {
      throw new RendererUnavailableError("playwright-core is not installed", err);
    }
    try {
      return await chromium.launch({ headless: true, executablePath: this.options.executablePath });
    } catch (err) {
      throw new RendererUnavailableError(`Chromium could not be launched: ${toErrorMessage(err)}`, err);
    }
  }

  private async captureNow({ url, destPath }: CaptureRequest): Promise<void> {
    const browser = await this.launch();
    try {
      const page = await browser.newPage({ viewport: this.viewport });
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs });

      try {
        await page.waitForLoadState("networkidle", { timeout: this.idleTimeoutMs });
      } catch {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "snapshot.idle_timeout", url, timeoutMs: this.idleTimeoutMs }));
      }

      const card = await page.$(this.cardSelector);
      if (card) {
        await card.screenshot({ path: destPath });
      } else {
        await page.screenshot({ path: destPath, fullPage: false });
      }
    } catch (err) {
      throw new RenderError(`Snapshot of ${url} failed: ${toErrorMessage(err)}`, err);
    } finally {
      await browser.close().catch(() => undefined);
    }
  }
}
