import { z } from "zod";
import { CaptchaError, errorMessage } from "../core/errors";
import { type FetchLike, fetchWithTimeout } from "../core/fetch";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import type { Logger } from "../observability";
import type { CaptchaChallenge } from "../types";
import type { CaptchaStrategy } from "./types";

export const NOT_READY = "CAPCHA_NOT_READY";

const serviceResponseSchema = z.object({
  status: z.coerce.number(),
  request: z.coerce.string(),
});

type ServiceResponse = z.infer<typeof serviceResponseSchema>;

export interface RemoteSolverOptions {
  apiKey: string;
  fetchFn: FetchLike;
  logger: Logger;
  baseUrl?: string;
  pollIntervalMs?: number;
  maxPolls?: number;
  requestTimeoutMs?: number;
  sleep?: SleepFn;
}

/**
 * Image-to-text solving through a 2Captcha-compatible service: the image is
 * uploaded as base64 to `in.php` and the answer is polled from `res.php`.
 */
export class RemoteCaptchaSolver implements CaptchaStrategy {
  readonly name = "remote";

  private readonly apiKey: string;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;
  private readonly requestTimeoutMs: number;
  private readonly sleep: SleepFn;

  constructor(options: RemoteSolverOptions) {
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetchFn;
    this.logger = options.logger;
    this.baseUrl = (options.baseUrl ?? "https://2captcha.com").replace(/\/+$/, "");
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.maxPolls = options.maxPolls ?? 30;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 20_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async attempt(challenge: CaptchaChallenge): Promise<string | undefined> {
    const jobId = await this.submit(challenge.imageBytes);
    this.logger.info("remote_captcha_submitted", { jobId });
    return this.poll(jobId);
  }

  private async submit(imageBytes: Buffer): Promise<string> {
    const body = new URLSearchParams({
      key: this.apiKey,
      method: "base64",
      body: imageBytes.toString("base64"),
      json: "1",
    });

    const response = await this.call(`${this.baseUrl}/in.php`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
    });

    if (response.status !== 1) {
      throw new CaptchaError(`Remote solver rejected the image: ${response.request}`);
    }
    return response.request;
  }

  private async poll(jobId: string): Promise<string> {
    const query = new URLSearchParams({ key: this.apiKey, action: "get", id: jobId, json: "1" });
    const url = `${this.baseUrl}/res.php?${query.toString()}`;

    for (let poll = 1; poll <= this.maxPolls; poll += 1) {
      await this.sleep(this.pollIntervalMs);
      const response = await this.call(url, { method: "GET", headers: {} });

      if (response.status === 1) {
        return response.request;
      }
      if (response.request !== NOT_READY) {
        throw new CaptchaError(`Remote solver failed job ${jobId}: ${response.request}`);
      }
      this.logger.debug("remote_captcha_not_ready", { jobId, poll, maxPolls: this.maxPolls });
    }

    throw new CaptchaError(`Remote solver timed out after ${this.maxPolls} polls for job ${jobId}`);
  }

  private async call(
    url: string,
    init: { method: "GET" | "POST"; headers: Record<string, string>; body?: string },
  ): Promise<ServiceResponse> {
    let raw: string;
    try {
      const response = await fetchWithTimeout(this.fetchFn, url, init, this.requestTimeoutMs);
      raw = await response.text();
      if (!response.ok) {
        throw new CaptchaError(`Remote solver HTTP ${response.status}: ${raw.slice(0, 200)}`);
      }
    } catch (error) {
      if (error instanceof CaptchaError) {
        throw error;
      }
      throw new CaptchaError(`Remote solver request failed: ${errorMessage(error)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CaptchaError(`Remote solver returned non-JSON body: ${raw.slice(0, 200)}`, error);
    }

    const parsed = serviceResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new CaptchaError(`Remote solver returned an unexpected body: ${raw.slice(0, 200)}`);
    }
    return parsed.data;
  }
}
