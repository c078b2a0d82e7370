import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../src/config";
import { type CheckRuntime, type CommandContext, runCheck, runReport, runStatus } from "../src/core/commands";
import { BrowserInitError } from "../src/core/errors";
import type { FetchLike } from "../src/core/fetch";
import type { PortalPage, PortalPageFactory } from "../src/fetcher/portalPage";
import { MetricsRegistry } from "../src/observability";
import { LocalJsonlSink } from "../src/sink";
import { InMemoryStore, type ResultStore } from "../src/store";
import type { StatusResult } from "../src/types";
import { createTestLogger, noSleep } from "./helpers";

const RESULT_HTML = fs.readFileSync(path.join(__dirname, "fixtures", "result-page.html"), "utf-8");

class ResultOnlyPage implements PortalPage {
  private url = "about:blank";

  async goto(url: string): Promise<void> {
    this.url = url;
  }
  async fill(): Promise<void> {}
  async exists(): Promise<boolean> {
    return false;
  }
  async captureElement(): Promise<Buffer> {
    return Buffer.alloc(0);
  }
  async click(): Promise<void> {
    this.url = "https://portal.test/tracking/result";
  }
  async waitForNetworkIdle(): Promise<void> {}
  currentUrl(): string {
    return this.url;
  }
  async innerText(): Promise<string | undefined> {
    return undefined;
  }
  async content(): Promise<string> {
    return RESULT_HTML;
  }
  async close(): Promise<void> {}
}

class LockedOnceStore extends InMemoryStore {
  saveCalls = 0;

  async saveResult(runId: string, result: StatusResult): Promise<void> {
    this.saveCalls += 1;
    if (this.saveCalls === 1) {
      throw new Error("SQLITE_BUSY: database is locked");
    }
    await super.saveResult(runId, result);
  }
}

const pages: PortalPageFactory = { newPage: async () => new ResultOnlyPage() };

const offline: FetchLike = async () => {
  throw new Error("network disabled in tests");
};

describe("commands", () => {
  let dir: string;
  let inputPath: string;
  let ctx: CommandContext;
  let runtimeClosed: number;

  const runtime = async (): Promise<CheckRuntime> => ({
    pages,
    captcha: { resolve: async () => "kwpxz" },
    close: async () => {
      runtimeClosed += 1;
    },
  });

  function contextFor(runId: string, store: ResultStore = new InMemoryStore()): CommandContext {
    const { logger } = createTestLogger();
    return {
      runId,
      config: {
        ...DEFAULT_CONFIG,
        trackingUrl: "https://portal.test/",
        requestDelaySeconds: 0,
        outputDirs: { reports: dir, captchas: path.join(dir, "captchas") },
      },
      store,
      logger,
      metrics: new MetricsRegistry(),
      sink: new LocalJsonlSink(dir, runId),
      fetchFn: offline,
    };
  }

  function reportLines(): Array<Record<string, unknown>> {
    return fs
      .readFileSync(path.join(dir, "results.jsonl"), "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "status-commands-"));
    inputPath = path.join(dir, "applicants.csv");
    fs.writeFileSync(
      inputPath,
      [
        "№ SOLICITUD,CORREO RUSO",
        "ECU-10520/25,first@example.com",
        "ECU-10521/25,not-an-email",
        "BOL-10522/25,third@example.com",
        "",
      ].join("\n"),
      "utf-8",
    );
    ctx = contextFor("run_check");
    runtimeClosed = 0;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("checks every valid row, stores the results and publishes them", async () => {
    const summary = await runCheck(ctx, inputPath, { runtime, sleep: noSleep, random: () => 0 });

    expect(summary).toEqual({
      runId: "run_check",
      total: 2,
      processed: 2,
      succeeded: 2,
      failed: 0,
      rejectedRows: 1,
      stopped: false,
      reportTarget: path.join(dir, "results.jsonl"),
    });
    expect((await ctx.store.listResults("run_check")).map((result) => result.registrationToken)).toEqual([
      "ECU-10520/25",
      "BOL-10522/25",
    ]);
    expect(await ctx.store.getRun("run_check")).toMatchObject({ status: "completed", inputPath });
    expect(reportLines().map((line) => [line.runId, line.sourceIndex])).toEqual([
      ["run_check", 0],
      ["run_check", 2],
    ]);
    expect(runtimeClosed).toBe(1);
  });

  it("keeps checking and publishing when a result cannot be saved", async () => {
    const store = new LockedOnceStore();
    const { logger, lines } = createTestLogger();
    const lockedCtx = { ...contextFor("run_locked", store), logger };

    const summary = await runCheck(lockedCtx, inputPath, { runtime, sleep: noSleep });

    expect(summary).toMatchObject({ processed: 2, succeeded: 2, stopped: false });
    expect(store.saveCalls).toBe(2);
    expect((await store.listResults("run_locked")).map((result) => result.sourceIndex)).toEqual([2]);
    expect(await store.getRun("run_locked")).toMatchObject({ status: "completed" });
    expect(reportLines().map((line) => line.sourceIndex)).toEqual([0, 2]);
    expect(lines().find((line) => line.msg === "result_save_failed")).toMatchObject({
      sourceIndex: 0,
      error: "SQLITE_BUSY: database is locked",
    });
  });

  it("honours the record limit", async () => {
    const summary = await runCheck(ctx, inputPath, { runtime, limit: 1, sleep: noSleep });

    expect(summary).toMatchObject({ total: 1, processed: 1 });
  });

  it("marks the run stopped when the batch is interrupted", async () => {
    const summary = await runCheck(ctx, inputPath, {
      runtime,
      sleep: noSleep,
      onStart: (coordinator) => coordinator.stop(),
    });

    expect(summary).toMatchObject({ processed: 0, stopped: true });
    expect(await ctx.store.getRun("run_check")).toMatchObject({ status: "stopped" });
    expect(runtimeClosed).toBe(1);
  });

  it("marks the run failed when the browser cannot start", async () => {
    const failing = async (): Promise<CheckRuntime> => {
      throw new BrowserInitError("Failed to initialize browser: chromium missing");
    };

    await expect(runCheck(ctx, inputPath, { runtime: failing })).rejects.toThrow(
      "Failed to initialize browser: chromium missing",
    );
    expect(await ctx.store.getRun("run_check")).toMatchObject({ status: "failed" });
  });

  it("re-exports the latest run on report", async () => {
    await runCheck(ctx, inputPath, { runtime, sleep: noSleep });
    fs.rmSync(path.join(dir, "results.jsonl"));

    const reportCtx = contextFor("run_report", ctx.store);
    await expect(runReport(reportCtx)).resolves.toBe(2);
    expect(reportLines().map((line) => line.registrationToken)).toEqual(["ECU-10520/25", "BOL-10522/25"]);
  });

  it("returns undefined from report when no run exists", async () => {
    await expect(runReport(ctx)).resolves.toBeUndefined();
    await expect(runReport(ctx, "run_missing")).resolves.toBeUndefined();
  });

  it("logs store statistics on status", async () => {
    const { logger, lines } = createTestLogger();
    await runCheck(ctx, inputPath, { runtime, sleep: noSleep });

    await runStatus({ ...ctx, logger });

    const complete = lines().find((line) => line.msg === "status_complete");
    expect(complete?.stats).toMatchObject({ runs: 1, results: 2, succeeded: 2, failed: 0 });
  });
});
