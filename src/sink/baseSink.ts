import { ConfigError } from "../core/errors";
import type { StatusResult } from "../types";
import type { ReportSink } from "./types";

export abstract class BaseSink implements ReportSink {
  abstract readonly name: string;
  abstract publishResults(results: readonly StatusResult[]): Promise<void>;
  abstract describeTarget(): string;

  protected ensureConfigured(name: string, ready: boolean): void {
    if (!ready) {
      throw new ConfigError(`${name} sink is not configured`);
    }
  }
}
