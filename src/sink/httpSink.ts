import { StatusCheckError } from "../core/errors";
import { type FetchLike, fetchWithTimeout } from "../core/fetch";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import type { StatusResult } from "../types";
import { BaseSink } from "./baseSink";

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  runId: string;
  fetchFn: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: SleepFn;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

class PermanentHttpSinkError extends Error {}

export class HttpSink extends BaseSink {
  readonly name = "http";
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly runId: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: SleepFn;

  constructor(options: HttpSinkOptions) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.runId = options.runId;
    this.fetchFn = options.fetchFn;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.sleep = options.sleep ?? defaultSleep;
  }

  describeTarget(): string {
    return this.endpoint ?? "(unconfigured)";
  }

  async publishResults(results: readonly StatusResult[]): Promise<void> {
    if (results.length === 0) {
      return;
    }

    this.ensureConfigured("HTTP", Boolean(this.endpoint));
    const endpoint = this.endpoint ?? "";
    const keys = results.map((result) => `${result.sourceIndex}:${result.registrationToken}`);

    const body = JSON.stringify({
      runId: this.runId,
      sentAt: new Date().toISOString(),
      items: results,
    });

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": `${this.runId}:${keys.join(",")}`,
    };

    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        const response = await fetchWithTimeout(
          this.fetchFn,
          endpoint,
          { method: "POST", headers, body },
          this.timeoutMs,
        );

        if (response.ok) {
          return;
        }

        const responseText = await response.text();
        if (!isRetriableStatus(response.status)) {
          throw new PermanentHttpSinkError(`HTTP sink permanent error ${response.status}: ${responseText}`);
        }

        if (attempt > this.maxRetries) {
          throw new StatusCheckError(`HTTP sink exhausted retries on status ${response.status}: ${responseText}`, {
            code: "SINK_ERROR",
          });
        }
      } catch (error) {
        if (error instanceof PermanentHttpSinkError) {
          throw error;
        }
        if (attempt > this.maxRetries) {
          throw error;
        }
      }

      await this.sleep(this.retryDelayMs * attempt);
    }
  }
}
