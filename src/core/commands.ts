import path from "node:path";
import { BatchCoordinator, type RecordFetcher } from "../batch";
import { buildCaptchaEngine, type CaptchaResolver } from "../captcha";
import type { AppConfig } from "../config";
import { BrowserSession, type PortalPageFactory, RetryingStatusFetcher } from "../fetcher";
import { loadInputFile } from "../input";
import { describeError, type Logger, type MetricsRegistry } from "../observability";
import { loadCountryCodes, ResultPageParser } from "../parse";
import type { ReportSink } from "../sink";
import type { ResultStore } from "../store";
import type { StatusResult } from "../types";
import type { FetchLike } from "./fetch";
import type { SleepFn } from "./sleep";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: ResultStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: ReportSink;
  fetchFn: FetchLike;
}

/** Browser pages and a CAPTCHA resolver for one `check` run. */
export interface CheckRuntime {
  pages: PortalPageFactory;
  captcha: CaptchaResolver;
  close(): Promise<void>;
}

export type RuntimeFactory = (ctx: CommandContext) => Promise<CheckRuntime>;

export interface CheckOptions {
  limit?: number;
  runtime?: RuntimeFactory;
  sleep?: SleepFn;
  random?: () => number;
  /** Receives the coordinator before processing starts, so callers can wire `stop()`. */
  onStart?: (coordinator: BatchCoordinator) => void;
}

export interface CheckSummary {
  runId: string;
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  rejectedRows: number;
  stopped: boolean;
  reportTarget: string;
}

export const createBrowserRuntime: RuntimeFactory = async (ctx) => {
  const session = await BrowserSession.launch(ctx.config, ctx.logger.child("browser"));
  const engine = buildCaptchaEngine(ctx.config, {
    logger: ctx.logger,
    fetchFn: ctx.fetchFn,
    metrics: ctx.metrics,
  });
  return {
    pages: session,
    captcha: engine.resolver,
    close: async () => {
      try {
        await engine.shutdown();
      } finally {
        await session.close();
      }
    },
  };
};

export async function runCheck(ctx: CommandContext, inputPath: string, options: CheckOptions = {}): Promise<CheckSummary> {
  const loaded = await loadInputFile(
    inputPath,
    ctx.config.inputColumns,
    ctx.logger.child("input"),
    ctx.config.inputSheet,
  );
  const records = options.limit !== undefined ? loaded.records.slice(0, Math.max(0, options.limit)) : loaded.records;
  const parser = new ResultPageParser({
    countryCodes: loadCountryCodes(ctx.config.countryCodesPath),
    noticeMarkers: ctx.config.noticeMarkers,
  });

  await ctx.store.startRun(ctx.runId, new Date().toISOString(), path.resolve(inputPath));
  ctx.logger.info("check_start", { inputPath, records: records.length, rejectedRows: loaded.rejected.length });

  let runtime: CheckRuntime;
  try {
    runtime = await (options.runtime ?? createBrowserRuntime)(ctx);
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  }

  try {
    const fetcher = new RetryingStatusFetcher({
      pages: runtime.pages,
      captcha: runtime.captcha,
      parser,
      logger: ctx.logger,
      metrics: ctx.metrics,
      trackingUrl: ctx.config.trackingUrl,
      maxAttempts: ctx.config.maxRetryAttempts,
      requestDelaySeconds: ctx.config.requestDelaySeconds,
      captchaVisibleTimeoutMs: ctx.config.captchaVisibleTimeoutMs,
      sleep: options.sleep,
    });
    const persisting: RecordFetcher = {
      fetch: async (input) => {
        const result = await fetcher.fetch(input);
        try {
          await ctx.store.saveResult(ctx.runId, result);
        } catch (error) {
          ctx.logger.error("result_save_failed", {
            registrationToken: input.registrationToken,
            sourceIndex: input.sourceIndex,
            ...describeError(error),
          });
        }
        return result;
      },
    };

    const coordinator = new BatchCoordinator({
      fetcher: persisting,
      logger: ctx.logger.child("batch"),
      requestDelaySeconds: ctx.config.requestDelaySeconds,
      sleep: options.sleep,
      random: options.random,
    });
    options.onStart?.(coordinator);

    const results = await coordinator.process(records, (completed, total, latest) => {
      ctx.logger.info("check_progress", {
        completed,
        total,
        registrationToken: latest.registrationToken,
        sourceIndex: latest.sourceIndex,
        success: latest.success,
      });
    });

    await ctx.sink.publishResults(results);
    const stopped = coordinator.stopped && results.length < records.length;
    await ctx.store.finishRun(ctx.runId, stopped ? "stopped" : "completed", new Date().toISOString());

    const summary = summarize(ctx, results, records.length, loaded.rejected.length, stopped);
    ctx.logger.info("check_complete", { ...summary });
    return summary;
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  } finally {
    await runtime.close();
  }
}

function summarize(
  ctx: CommandContext,
  results: readonly StatusResult[],
  total: number,
  rejectedRows: number,
  stopped: boolean,
): CheckSummary {
  const succeeded = results.filter((result) => result.success).length;
  return {
    runId: ctx.runId,
    total,
    processed: results.length,
    succeeded,
    failed: results.length - succeeded,
    rejectedRows,
    stopped,
    reportTarget: ctx.sink.describeTarget(),
  };
}

/** Re-exports the stored results of `runId`, or of the latest run. Returns how many were written. */
export async function runReport(ctx: CommandContext, runId?: string): Promise<number | undefined> {
  const targetRunId = runId ?? (await ctx.store.latestRunId());
  if (!targetRunId || !(await ctx.store.getRun(targetRunId))) {
    ctx.logger.warn("report_run_not_found", { requestedRunId: runId });
    return undefined;
  }

  const results = await ctx.store.listResults(targetRunId);
  await ctx.sink.publishResults(results);
  ctx.logger.info("report_complete", {
    reportRunId: targetRunId,
    results: results.length,
    target: ctx.sink.describeTarget(),
  });
  return results.length;
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
}
