import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import { describeError, type Logger } from "../observability";
import type { InputRecord, StatusResult } from "../types";

export type ProgressCallback = (completed: number, total: number, latest: StatusResult) => void | Promise<void>;

export interface RecordFetcher {
  fetch(input: InputRecord): Promise<StatusResult>;
}

export interface BatchCoordinatorOptions {
  fetcher: RecordFetcher;
  logger: Logger;
  requestDelaySeconds: number;
  sleep?: SleepFn;
  /** Uniform jitter source in [0, 1). */
  random?: () => number;
}

/**
 * Processes records one at a time in input order. `stop()` is checked before
 * each record; a record already in flight runs to completion.
 */
export class BatchCoordinator {
  private readonly fetcher: RecordFetcher;
  private readonly logger: Logger;
  private readonly requestDelaySeconds: number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private stopRequested = false;
  private running = false;
  /** Set once a run has finished; the next run starts with a cleared stop flag. */
  private finishedRun = false;

  constructor(options: BatchCoordinatorOptions) {
    this.fetcher = options.fetcher;
    this.logger = options.logger;
    this.requestDelaySeconds = options.requestDelaySeconds;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get stopped(): boolean {
    return this.stopRequested;
  }

  /** Stops the current run, or the next one when none is running. */
  stop(): void {
    if (!this.stopRequested || this.finishedRun) {
      this.logger.info("batch_stop_requested");
    }
    this.stopRequested = true;
    this.finishedRun = false;
  }

  async process(records: readonly InputRecord[], onProgress?: ProgressCallback): Promise<StatusResult[]> {
    const results: StatusResult[] = [];
    const total = records.length;
    if (this.finishedRun) {
      this.stopRequested = false;
      this.finishedRun = false;
    }
    this.running = true;
    this.logger.info("batch_start", { total });

    try {
      for (let index = 0; index < total; index += 1) {
        if (this.stopRequested) {
          this.logger.warn("batch_stopped", { completed: results.length, total });
          break;
        }

        const record = records[index];
        const result = await this.fetcher.fetch(record);
        results.push(result);
        await this.notify(onProgress, results.length, total, result);

        if (index < total - 1 && !this.stopRequested) {
          await this.sleep((this.requestDelaySeconds + this.random()) * 1000);
        }
      }
    } finally {
      this.running = false;
      this.finishedRun = true;
    }

    this.logger.info("batch_complete", {
      completed: results.length,
      total,
      failed: results.filter((result) => !result.success).length,
    });
    return results;
  }

  private async notify(
    onProgress: ProgressCallback | undefined,
    completed: number,
    total: number,
    latest: StatusResult,
  ): Promise<void> {
    if (!onProgress) {
      return;
    }
    try {
      await onProgress(completed, total, latest);
    } catch (error) {
      this.logger.warn("batch_progress_callback_failed", {
        registrationToken: latest.registrationToken,
        sourceIndex: latest.sourceIndex,
        ...describeError(error),
      });
    }
  }
}
