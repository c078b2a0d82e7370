import type { Logger } from "./logger";
import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
  p95: number;
}

export interface RunRates {
  records: number;
  successRate: number;
  attemptsPerRecord: number;
  /** Share of CAPTCHA lookups answered from the cache. */
  cacheHitRate: number;
}

function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : Number((part / whole).toFixed(3));
}

function summarizeDurations(values: readonly number[]): TimerSummary {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  return {
    count: sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Number((total / sorted.length).toFixed(2)),
    p95: sorted[Math.ceil(sorted.length * 0.95) - 1],
  };
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly solvedBy = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  recordCaptchaSolved(strategy: string): void {
    this.incrementCounter("captcha_solved");
    this.solvedBy.set(strategy, (this.solvedBy.get(strategy) ?? 0) + 1);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    const count = (name: MetricCounterName): number => this.counters.get(name) ?? 0;
    return {
      records_ok: count("records_ok"),
      records_failed: count("records_failed"),
      fetch_attempts: count("fetch_attempts"),
      fetch_retries: count("fetch_retries"),
      captcha_cache_hits: count("captcha_cache_hits"),
      captcha_solved: count("captcha_solved"),
      captcha_unresolved: count("captcha_unresolved"),
    };
  }

  getSolvedByStrategy(): Record<string, number> {
    return Object.fromEntries(this.solvedBy);
  }

  getRates(): RunRates {
    const counters = this.getCounters();
    const records = counters.records_ok + counters.records_failed;
    const lookups = counters.captcha_cache_hits + counters.captcha_solved + counters.captcha_unresolved;
    return {
      records,
      successRate: ratio(counters.records_ok, records),
      attemptsPerRecord: ratio(counters.fetch_attempts, records),
      cacheHitRate: ratio(counters.captcha_cache_hits, lookups),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    const durations = (name: MetricTimerName): number[] => this.timers.get(name) ?? [];
    return {
      fetch_ms: summarizeDurations(durations("fetch_ms")),
      captcha_ms: summarizeDurations(durations("captcha_ms")),
      parse_ms: summarizeDurations(durations("parse_ms")),
    };
  }

  /** One `metrics_summary` line at the end of a command. */
  logSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: this.getCounters(),
      rates: this.getRates(),
      captchaSolvedBy: this.getSolvedByStrategy(),
      timers: this.getTimerSummaries(),
    });
  }
}
