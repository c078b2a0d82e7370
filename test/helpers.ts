import { vi } from "vitest";
import { Logger } from "../src/observability";
import { createEmptyResult, finalizeResult, type InputRecord, type StatusResult } from "../src/types";

/** A logger whose lines are captured instead of printed. */
export function createTestLogger(): { logger: Logger; lines: () => Array<Record<string, unknown>> } {
  const captured: string[] = [];
  vi.spyOn(console, "log").mockImplementation((line: unknown) => {
    captured.push(String(line));
  });
  vi.spyOn(console, "error").mockImplementation((line: unknown) => {
    captured.push(String(line));
  });
  const logger = new Logger({ component: "test", runId: "run_test" });
  return {
    logger,
    lines: () =>
      captured
        .map((line): unknown => JSON.parse(line))
        .filter((value): value is Record<string, unknown> => typeof value === "object" && value !== null),
  };
}

export function inputRecord(sourceIndex: number, registrationToken = `ECU-1052${sourceIndex}/25`): InputRecord {
  return { registrationToken, contactEmail: `applicant${sourceIndex}@example.com`, sourceIndex };
}

export function okResult(input: InputRecord, fields: Partial<StatusResult> = {}): StatusResult {
  return finalizeResult({ ...createEmptyResult(input, new Date("2025-03-01T09:15:42.120Z")), ...fields });
}

export const noSleep = async (_ms: number): Promise<void> => {};
