import { errors, type Page } from "playwright";
import { CaptchaError, NavigationError } from "../core/errors";

export const SELECTORS = {
  registrationNumber: "#registrationNumber",
  email: "#email",
  captchaImage: "#captcha_pic",
  captchaResponse: "#adcopy_response",
  submit: 'button[type="submit"]',
  formError: ".alert-error, .error",
} as const;

/** The few page operations the status fetcher needs from a browser tab. */
export interface PortalPage {
  goto(url: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  exists(selector: string): Promise<boolean>;
  /** Waits for the element to be visible and returns a PNG of it. */
  captureElement(selector: string, visibleTimeoutMs: number): Promise<Buffer>;
  click(selector: string): Promise<void>;
  waitForNetworkIdle(): Promise<void>;
  currentUrl(): string;
  innerText(selector: string): Promise<string | undefined>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface PortalPageFactory {
  newPage(): Promise<PortalPage>;
}

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

export class PlaywrightPortalPage implements PortalPage {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<void> {
    try {
      await this.page.goto(url);
    } catch (error) {
      const reason = isTimeout(error) ? "timed out" : "failed";
      throw new NavigationError(`Navigation to ${url} ${reason}`, error);
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.withTimeoutMapping(`fill ${selector}`, () => this.page.fill(selector, value));
  }

  async exists(selector: string): Promise<boolean> {
    return (await this.page.$(selector)) !== null;
  }

  async captureElement(selector: string, visibleTimeoutMs: number): Promise<Buffer> {
    const locator = this.page.locator(selector);
    try {
      await locator.waitFor({ state: "visible", timeout: visibleTimeoutMs });
      return await locator.screenshot({ type: "png" });
    } catch (error) {
      if (isTimeout(error)) {
        throw new CaptchaError(`CAPTCHA image ${selector} did not become visible`, error);
      }
      throw new CaptchaError(`Could not capture CAPTCHA image: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }

  async click(selector: string): Promise<void> {
    await this.withTimeoutMapping(`click ${selector}`, () => this.page.click(selector));
  }

  async waitForNetworkIdle(): Promise<void> {
    await this.withTimeoutMapping("wait for network idle", () => this.page.waitForLoadState("networkidle"));
  }

  currentUrl(): string {
    return this.page.url();
  }

  async innerText(selector: string): Promise<string | undefined> {
    const element = await this.page.$(selector);
    if (!element) {
      return undefined;
    }
    return (await element.innerText()).trim();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.page.close();
  }

  private async withTimeoutMapping(action: string, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error) {
      if (isTimeout(error)) {
        throw new NavigationError(`Timed out during ${action}`, error);
      }
      throw error;
    }
  }
}
