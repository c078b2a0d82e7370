import { describe, expect, it, vi } from "vitest";
import { BatchCoordinator, type RecordFetcher } from "../src/batch/coordinator";
import type { InputRecord, StatusResult } from "../src/types";
import { createTestLogger, inputRecord, okResult } from "./helpers";

function recordingFetcher(): RecordFetcher & { seen: number[] } {
  const seen: number[] = [];
  return {
    seen,
    fetch: async (input: InputRecord): Promise<StatusResult> => {
      seen.push(input.sourceIndex);
      return okResult(input);
    },
  };
}

function coordinatorWith(fetcher: RecordFetcher, delays: number[]) {
  const { logger, lines } = createTestLogger();
  const coordinator = new BatchCoordinator({
    fetcher,
    logger,
    requestDelaySeconds: 1.5,
    sleep: async (ms) => {
      delays.push(ms);
    },
    random: () => 0.25,
  });
  return { coordinator, lines };
}

describe("BatchCoordinator", () => {
  it("returns one result per record in input order", async () => {
    const fetcher = recordingFetcher();
    const { coordinator } = coordinatorWith(fetcher, []);
    const records = [inputRecord(0), inputRecord(1), inputRecord(2)];

    const results = await coordinator.process(records);

    expect(results.map((result) => result.sourceIndex)).toEqual([0, 1, 2]);
    expect(results.map((result) => result.registrationToken)).toEqual(records.map((record) => record.registrationToken));
    expect(fetcher.seen).toEqual([0, 1, 2]);
  });

  it("waits the request delay plus jitter between records but not after the last", async () => {
    const delays: number[] = [];
    const { coordinator } = coordinatorWith(recordingFetcher(), delays);

    await coordinator.process([inputRecord(0), inputRecord(1), inputRecord(2)]);

    expect(delays).toEqual([1750, 1750]);
  });

  it("reports progress after every record", async () => {
    const { coordinator } = coordinatorWith(recordingFetcher(), []);
    const progress: Array<[number, number, number]> = [];

    await coordinator.process([inputRecord(0), inputRecord(1)], async (completed, total, latest) => {
      progress.push([completed, total, latest.sourceIndex]);
    });

    expect(progress).toEqual([
      [1, 2, 0],
      [2, 2, 1],
    ]);
  });

  it("stops before the next record once stop() is called", async () => {
    const delays: number[] = [];
    const fetcher = recordingFetcher();
    const { coordinator } = coordinatorWith(fetcher, delays);
    const records = [inputRecord(0), inputRecord(1), inputRecord(2), inputRecord(3)];

    const results = await coordinator.process(records, (completed) => {
      if (completed === 2) {
        coordinator.stop();
      }
    });

    expect(results).toHaveLength(2);
    expect(fetcher.seen).toEqual([0, 1]);
    expect(delays).toEqual([1750]);
    expect(coordinator.stopped).toBe(true);
    expect(coordinator.isRunning).toBe(false);
  });

  it("lets an in-flight record finish when stopped mid-fetch", async () => {
    let coordinator: BatchCoordinator | undefined;
    const fetcher: RecordFetcher = {
      fetch: async (input) => {
        coordinator?.stop();
        return okResult(input);
      },
    };
    coordinator = coordinatorWith(fetcher, []).coordinator;

    const results = await coordinator.process([inputRecord(0), inputRecord(1)]);

    expect(results.map((result) => result.sourceIndex)).toEqual([0]);
  });

  it("logs and ignores failing progress callbacks", async () => {
    const { coordinator, lines } = coordinatorWith(recordingFetcher(), []);
    const callback = vi
      .fn<(completed: number, total: number, latest: StatusResult) => Promise<void>>()
      .mockRejectedValueOnce(new Error("ui closed"))
      .mockImplementationOnce(() => {
        throw new Error("render failed");
      });

    const results = await coordinator.process([inputRecord(0), inputRecord(1)], callback);

    expect(results).toHaveLength(2);
    expect(
      lines()
        .filter((line) => line.msg === "batch_progress_callback_failed")
        .map((line) => line.error),
    ).toEqual(["ui closed", "render failed"]);
  });

  it("handles an empty batch", async () => {
    const delays: number[] = [];
    const { coordinator } = coordinatorWith(recordingFetcher(), delays);

    await expect(coordinator.process([])).resolves.toEqual([]);
    expect(delays).toEqual([]);
  });

  it("starts a later run afresh after a stopped one", async () => {
    const fetcher = recordingFetcher();
    const { coordinator } = coordinatorWith(fetcher, []);

    await coordinator.process([inputRecord(0), inputRecord(1)], () => coordinator.stop());
    const second = await coordinator.process([inputRecord(2), inputRecord(3)]);

    expect(second.map((result) => result.sourceIndex)).toEqual([2, 3]);
    expect(fetcher.seen).toEqual([0, 2, 3]);
    expect(coordinator.stopped).toBe(false);
  });

  it("honours a stop requested before the run starts", async () => {
    const fetcher = recordingFetcher();
    const { coordinator } = coordinatorWith(fetcher, []);

    await coordinator.process([inputRecord(0)]);
    coordinator.stop();
    const results = await coordinator.process([inputRecord(1), inputRecord(2)]);

    expect(results).toEqual([]);
    expect(fetcher.seen).toEqual([0]);
    expect(coordinator.stopped).toBe(true);
  });
});
