import { chromium, firefox, webkit, type Browser, type BrowserContext, type BrowserType } from "playwright";
import type { AppConfig, BrowserEngine } from "../config/types";
import { BrowserInitError, errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import { PlaywrightPortalPage, type PortalPage, type PortalPageFactory } from "./portalPage";

export const VIEWPORT = { width: 1280, height: 800 } as const;

const ENGINES: Record<BrowserEngine, BrowserType> = { chromium, firefox, webkit };

export type BrowserSessionConfig = Pick<
  AppConfig,
  "browserEngine" | "headless" | "browserArgs" | "userAgent" | "pageTimeoutMs" | "ignoreHttpsErrors"
>;

/** One browser process and one context for the whole run. */
export class BrowserSession implements PortalPageFactory {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly pageTimeoutMs: number,
    private readonly logger: Logger,
  ) {}

  static async launch(config: BrowserSessionConfig, logger: Logger): Promise<BrowserSession> {
    let browser: Browser | undefined;
    try {
      browser = await ENGINES[config.browserEngine].launch({
        headless: config.headless,
        args: config.browserEngine === "chromium" ? config.browserArgs : [],
      });
      const context = await browser.newContext({
        viewport: VIEWPORT,
        userAgent: config.userAgent,
        ignoreHTTPSErrors: config.ignoreHttpsErrors,
      });
      logger.info("browser_started", { engine: config.browserEngine, headless: config.headless });
      return new BrowserSession(browser, context, config.pageTimeoutMs, logger);
    } catch (error) {
      await browser?.close();
      throw new BrowserInitError(`Failed to initialize browser: ${errorMessage(error)}`, error);
    }
  }

  async newPage(): Promise<PortalPage> {
    const page = await this.context.newPage();
    page.setDefaultTimeout(this.pageTimeoutMs);
    return new PlaywrightPortalPage(page);
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
    this.logger.info("browser_closed");
  }
}
