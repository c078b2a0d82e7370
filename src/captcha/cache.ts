import crypto from "node:crypto";
import type { Logger, MetricsRegistry } from "../observability";
import type { CaptchaChallenge } from "../types";
import type { CaptchaResolver } from "./types";

export function challengeKey(imageBytes: Buffer): string {
  return crypto.createHash("sha256").update(imageBytes).digest("hex");
}

/**
 * Remembers accepted answers by image content for the lifetime of the process.
 * Entries are only ever added, never replaced.
 */
export class CachingCaptchaResolver implements CaptchaResolver {
  private readonly answers = new Map<string, string>();

  constructor(
    private readonly inner: CaptchaResolver,
    private readonly logger: Logger,
    private readonly metrics?: MetricsRegistry,
  ) {}

  get size(): number {
    return this.answers.size;
  }

  async resolve(challenge: CaptchaChallenge): Promise<string> {
    const key = challengeKey(challenge.imageBytes);
    const cached = this.answers.get(key);
    if (cached !== undefined) {
      this.logger.info("captcha_cache_hit", { key: key.slice(0, 16) });
      this.metrics?.incrementCounter("captcha_cache_hits");
      return cached;
    }

    const answer = await this.inner.resolve(challenge);
    if (!this.answers.has(key)) {
      this.answers.set(key, answer);
    }
    return answer;
  }
}
