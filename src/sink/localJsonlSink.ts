import fs from "node:fs";
import path from "node:path";
import type { StatusResult } from "../types";
import { BaseSink } from "./baseSink";

export class LocalJsonlSink extends BaseSink {
  readonly name = "jsonl";
  private readonly resultsPath: string;
  private readonly runId: string;

  constructor(reportsDir: string, runId: string) {
    super();
    this.resultsPath = path.join(path.resolve(reportsDir), "results.jsonl");
    this.runId = runId;
  }

  describeTarget(): string {
    return this.resultsPath;
  }

  async publishResults(results: readonly StatusResult[]): Promise<void> {
    await this.appendLines(results.map((result) => ({ runId: this.runId, ...result })));
  }

  private async appendLines(records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.mkdir(path.dirname(this.resultsPath), { recursive: true });
    await fs.promises.appendFile(this.resultsPath, content, "utf-8");
  }
}
