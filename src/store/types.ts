import type { StatusResult } from "../types";

export type RunStatus = "running" | "completed" | "stopped" | "failed";
export type FinishedRunStatus = Exclude<RunStatus, "running">;

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus;
  inputPath?: string;
}

export interface StoreStats {
  runs: number;
  results: number;
  succeeded: number;
  failed: number;
  latestRun?: RunSummary;
}

export interface ResultStore {
  startRun(runId: string, startedAt: string, inputPath?: string): Promise<void>;
  finishRun(runId: string, status: FinishedRunStatus, finishedAt: string): Promise<void>;
  /** Stores one finished result; saving the same record of a run again replaces it. */
  saveResult(runId: string, result: StatusResult): Promise<void>;
  /** Results of a run in input order. */
  listResults(runId: string): Promise<StatusResult[]>;
  getRun(runId: string): Promise<RunSummary | undefined>;
  latestRunId(): Promise<string | undefined>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
