import type { StatusResult } from "../types";
import type { FinishedRunStatus, ResultStore, RunSummary, StoreStats } from "./types";

export class InMemoryStore implements ResultStore {
  private readonly runs = new Map<string, RunSummary>();
  private readonly results = new Map<string, Map<number, StatusResult>>();

  async startRun(runId: string, startedAt: string, inputPath?: string): Promise<void> {
    this.runs.delete(runId);
    this.runs.set(runId, { runId, startedAt, status: "running", inputPath });
  }

  async finishRun(runId: string, status: FinishedRunStatus, finishedAt: string): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, status, finishedAt });
    }
  }

  async saveResult(runId: string, result: StatusResult): Promise<void> {
    const byIndex = this.results.get(runId) ?? new Map<number, StatusResult>();
    byIndex.set(result.sourceIndex, result);
    this.results.set(runId, byIndex);
  }

  async listResults(runId: string): Promise<StatusResult[]> {
    const byIndex = this.results.get(runId);
    if (!byIndex) {
      return [];
    }
    return [...byIndex.values()].sort((a, b) => a.sourceIndex - b.sourceIndex);
  }

  async getRun(runId: string): Promise<RunSummary | undefined> {
    return this.runs.get(runId);
  }

  async latestRunId(): Promise<string | undefined> {
    let latest: RunSummary | undefined;
    for (const run of this.runs.values()) {
      if (!latest || run.startedAt >= latest.startedAt) {
        latest = run;
      }
    }
    return latest?.runId;
  }

  async getStats(): Promise<StoreStats> {
    const all = [...this.results.values()].flatMap((byIndex) => [...byIndex.values()]);
    const latestRunId = await this.latestRunId();
    return {
      runs: this.runs.size,
      results: all.length,
      succeeded: all.filter((result) => result.success).length,
      failed: all.filter((result) => !result.success).length,
      latestRun: latestRunId ? this.runs.get(latestRunId) : undefined,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
