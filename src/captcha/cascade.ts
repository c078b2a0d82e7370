import { CaptchaUnresolved, errorMessage } from "../core/errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { CaptchaChallenge } from "../types";
import { type CaptchaResolver, type CaptchaStrategy, isAcceptableAnswer, MIN_ANSWER_LENGTH } from "./types";

export interface CaptchaCascadeDeps {
  strategies: readonly CaptchaStrategy[];
  logger: Logger;
  metrics?: MetricsRegistry;
}

/**
 * Tries each strategy in order and returns the first answer of at least
 * `MIN_ANSWER_LENGTH` characters. A strategy that throws only ends its own turn.
 */
export class CaptchaCascade implements CaptchaResolver {
  private readonly strategies: readonly CaptchaStrategy[];
  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;

  constructor(deps: CaptchaCascadeDeps) {
    this.strategies = deps.strategies;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
  }

  get strategyNames(): string[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  async resolve(challenge: CaptchaChallenge): Promise<string> {
    const stopTimer = this.metrics?.startTimer("captcha_ms");
    const failures: string[] = [];

    try {
      for (const strategy of this.strategies) {
        this.logger.info("captcha_strategy_start", { strategy: strategy.name });
        let answer: string | undefined;
        try {
          answer = await strategy.attempt(challenge);
        } catch (error) {
          this.logger.warn("captcha_strategy_failed", { strategy: strategy.name, error: errorMessage(error) });
          failures.push(`${strategy.name}: ${errorMessage(error)}`);
          continue;
        }

        if (isAcceptableAnswer(answer)) {
          this.logger.info("captcha_strategy_solved", { strategy: strategy.name, answerLength: answer.length });
          this.metrics?.recordCaptchaSolved(strategy.name);
          return answer;
        }

        this.logger.warn("captcha_strategy_no_answer", { strategy: strategy.name, answerLength: answer?.length ?? 0 });
        failures.push(`${strategy.name}: no answer of ${MIN_ANSWER_LENGTH}+ characters`);
      }
    } finally {
      stopTimer?.();
    }

    this.metrics?.incrementCounter("captcha_unresolved");
    const detail = failures.length > 0 ? failures.join("; ") : "no strategy configured";
    throw new CaptchaUnresolved(`CAPTCHA unresolved: ${detail}`);
  }
}
