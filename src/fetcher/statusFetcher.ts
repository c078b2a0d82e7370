import { NavigationError } from "../core/errors";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import { describeError, type Logger, type MetricsRegistry } from "../observability";
import type { ResultPageParser } from "../parse";
import type { CaptchaResolver } from "../captcha";
import { createEmptyResult, finalizeResult, type InputRecord, type StatusResult } from "../types";
import { type PortalPage, type PortalPageFactory, SELECTORS } from "./portalPage";
import { runWithRetry } from "./retryPolicy";

export type FetchState =
  | "idle"
  | "navigating"
  | "form_filling"
  | "captcha_solving"
  | "submitting"
  | "awaiting_result"
  | "extracting"
  | "done"
  | "failed";

export const RESULT_PATH_MARKER = "/tracking/";

export interface StatusFetcherOptions {
  pages: PortalPageFactory;
  captcha: CaptchaResolver;
  parser: ResultPageParser;
  logger: Logger;
  metrics: MetricsRegistry;
  trackingUrl: string;
  maxAttempts: number;
  requestDelaySeconds: number;
  captchaVisibleTimeoutMs: number;
  sleep?: SleepFn;
  now?: () => Date;
}

/**
 * Drives one portal query per record: navigate, fill the form, solve the
 * CAPTCHA if one is shown, submit and parse. Each attempt uses a fresh page.
 */
export class RetryingStatusFetcher {
  private readonly options: StatusFetcherOptions;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(options: StatusFetcherOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(input: InputRecord): Promise<StatusResult> {
    const { logger, metrics } = this.options;
    const recordLogger = logger.child("fetcher");
    const fields = { registrationToken: input.registrationToken, sourceIndex: input.sourceIndex };
    const stopTimer = metrics.startTimer("fetch_ms");

    const outcome = await runWithRetry((attempt) => this.attempt(input, attempt, recordLogger), {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.requestDelaySeconds * 1000,
      sleep: this.sleep,
      onRetry: (retry) => {
        metrics.incrementCounter("fetch_retries");
        recordLogger.warn("fetch_retry_scheduled", { ...fields, ...retry });
      },
    });
    stopTimer();

    if (outcome.ok) {
      metrics.incrementCounter("records_ok");
      recordLogger.info("fetch_state", { ...fields, state: "done", attempt: outcome.attempts });
      return finalizeResult(outcome.value);
    }

    metrics.incrementCounter("records_failed");
    if (outcome.fatal) {
      recordLogger.error("fetch_state", {
        ...fields,
        state: "failed",
        attempt: outcome.attempts,
        ...describeError(outcome.error),
      });
    } else {
      recordLogger.error("fetch_state", {
        ...fields,
        state: "failed",
        attempt: outcome.attempts,
        error: outcome.errorMessage,
      });
    }
    return finalizeResult(createEmptyResult(input, this.now()), outcome.errorMessage);
  }

  private async attempt(input: InputRecord, attempt: number, logger: Logger): Promise<StatusResult> {
    this.options.metrics.incrementCounter("fetch_attempts");
    const transition = (state: FetchState): void => {
      logger.debug("fetch_state", {
        registrationToken: input.registrationToken,
        sourceIndex: input.sourceIndex,
        attempt,
        state,
      });
    };

    transition("idle");
    const page = await this.options.pages.newPage();
    try {
      return await this.runSteps(page, input, transition);
    } finally {
      await this.closePage(page, input, attempt, logger);
    }
  }

  /** Teardown never changes the attempt's outcome. */
  private async closePage(page: PortalPage, input: InputRecord, attempt: number, logger: Logger): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      logger.warn("page_close_failed", {
        registrationToken: input.registrationToken,
        sourceIndex: input.sourceIndex,
        attempt,
        ...describeError(error),
      });
    }
  }

  private async runSteps(
    page: PortalPage,
    input: InputRecord,
    transition: (state: FetchState) => void,
  ): Promise<StatusResult> {
    transition("navigating");
    await page.goto(this.options.trackingUrl);

    transition("form_filling");
    await page.fill(SELECTORS.registrationNumber, input.registrationToken);
    await page.fill(SELECTORS.email, input.contactEmail);

    if (await page.exists(SELECTORS.captchaImage)) {
      transition("captcha_solving");
      const imageBytes = await page.captureElement(SELECTORS.captchaImage, this.options.captchaVisibleTimeoutMs);
      const answer = await this.options.captcha.resolve({ imageBytes, discoveredAt: this.now().toISOString() });
      await page.fill(SELECTORS.captchaResponse, answer);
    }

    transition("submitting");
    await page.click(SELECTORS.submit);

    transition("awaiting_result");
    await page.waitForNetworkIdle();
    if (!page.currentUrl().includes(RESULT_PATH_MARKER)) {
      const banner = await page.innerText(SELECTORS.formError);
      throw new NavigationError(
        banner ? `Form submission error: ${banner}` : "Failed to navigate to tracking result page",
      );
    }

    transition("extracting");
    const stopParse = this.options.metrics.startTimer("parse_ms");
    try {
      return this.options.parser.parse(await page.content(), input, this.now());
    } finally {
      stopParse();
    }
  }
}
