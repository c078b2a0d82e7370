import type { StatusResult } from "../types";

export interface ReportSink {
  readonly name: string;
  publishResults(results: readonly StatusResult[]): Promise<void>;
  /** Where published results end up: a file path or an endpoint. */
  describeTarget(): string;
}
