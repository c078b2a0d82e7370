export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  registrationToken?: string;
  sourceIndex?: number;
  attempt?: number;
  strategy?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "records_ok"
  | "records_failed"
  | "fetch_attempts"
  | "fetch_retries"
  | "captcha_cache_hits"
  | "captcha_solved"
  | "captcha_unresolved";

export type MetricTimerName = "fetch_ms" | "captcha_ms" | "parse_ms";
