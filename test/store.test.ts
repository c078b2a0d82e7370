import { afterEach, describe, expect, it } from "vitest";
import { InMemoryStore, type ResultStore, SqliteStore } from "../src/store";
import { createEmptyResult, finalizeResult } from "../src/types";
import { inputRecord, okResult } from "./helpers";

const implementations: Array<[string, () => ResultStore]> = [
  ["SqliteStore", () => new SqliteStore(":memory:")],
  ["InMemoryStore", () => new InMemoryStore()],
];

describe.each(implementations)("%s", (_name, create) => {
  let store: ResultStore | undefined;

  afterEach(async () => {
    await store?.close();
    store = undefined;
  });

  it("returns a run's results in input order", async () => {
    const opened = create();
    store = opened;
    await opened.startRun("run_a", "2025-03-01T09:00:00.000Z", "/data/applicants.csv");
    const second = okResult(inputRecord(1), { country: "Эквадор", statusMessage: "Строка 1\nСтрока 2" });
    const first = okResult(inputRecord(0));
    await opened.saveResult("run_a", second);
    await opened.saveResult("run_a", first);

    await expect(opened.listResults("run_a")).resolves.toEqual([first, second]);
    await expect(opened.listResults("run_missing")).resolves.toEqual([]);
  });

  it("replaces a record saved twice in the same run", async () => {
    const opened = create();
    store = opened;
    await opened.startRun("run_a", "2025-03-01T09:00:00.000Z");
    const failed = finalizeResult(createEmptyResult(inputRecord(0)), "Attempt 3: timeout");
    const retried = okResult(inputRecord(0));
    await opened.saveResult("run_a", failed);
    await opened.saveResult("run_a", retried);

    await expect(opened.listResults("run_a")).resolves.toEqual([retried]);
  });

  it("tracks run status and the latest run", async () => {
    const opened = create();
    store = opened;
    await opened.startRun("run_a", "2025-03-01T09:00:00.000Z");
    await opened.startRun("run_b", "2025-03-02T09:00:00.000Z", "/data/b.csv");
    await opened.finishRun("run_a", "stopped", "2025-03-01T09:30:00.000Z");

    await expect(opened.latestRunId()).resolves.toBe("run_b");
    await expect(opened.getRun("run_a")).resolves.toEqual({
      runId: "run_a",
      startedAt: "2025-03-01T09:00:00.000Z",
      finishedAt: "2025-03-01T09:30:00.000Z",
      status: "stopped",
      inputPath: undefined,
    });
    await expect(opened.getRun("run_missing")).resolves.toBeUndefined();
  });

  it("counts runs and outcomes", async () => {
    const opened = create();
    store = opened;
    await opened.startRun("run_a", "2025-03-01T09:00:00.000Z");
    await opened.saveResult("run_a", okResult(inputRecord(0)));
    await opened.saveResult("run_a", finalizeResult(createEmptyResult(inputRecord(1)), "Unexpected error: boom"));
    await opened.finishRun("run_a", "completed", "2025-03-01T09:10:00.000Z");

    const stats = await opened.getStats();

    expect(stats).toMatchObject({ runs: 1, results: 2, succeeded: 1, failed: 1 });
    expect(stats.latestRun).toMatchObject({ runId: "run_a", status: "completed" });
  });

  it("reports an empty store", async () => {
    const opened = create();
    store = opened;
    await expect(opened.getStats()).resolves.toEqual({ runs: 0, results: 0, succeeded: 0, failed: 0, latestRun: undefined });
    await expect(opened.latestRunId()).resolves.toBeUndefined();
  });
});
