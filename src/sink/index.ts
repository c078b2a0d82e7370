import type { AppConfig } from "../config/types";
import type { FetchLike } from "../core/fetch";
import { CsvReportSink } from "./csvReportSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import type { ReportSink } from "./types";
import { XlsxReportSink } from "./xlsxReportSink";

export function createSink(
  config: Pick<AppConfig, "reportSink" | "outputDirs" | "httpSinkEndpoint" | "httpSinkToken" | "requestTimeoutMs">,
  runId: string,
  fetchFn: FetchLike,
): ReportSink {
  switch (config.reportSink) {
    case "csv":
      return new CsvReportSink(config.outputDirs.reports, runId);
    case "xlsx":
      return new XlsxReportSink(config.outputDirs.reports, runId);
    case "jsonl":
      return new LocalJsonlSink(config.outputDirs.reports, runId);
    case "http":
      return new HttpSink({
        endpoint: config.httpSinkEndpoint,
        token: config.httpSinkToken,
        runId,
        fetchFn,
        timeoutMs: config.requestTimeoutMs,
      });
  }
}

export * from "./baseSink";
export * from "./csvReportSink";
export * from "./httpSink";
export * from "./localJsonlSink";
export * from "./types";
export * from "./xlsxReportSink";
