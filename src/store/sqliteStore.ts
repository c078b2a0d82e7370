import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { StatusResult } from "../types";
import type { FinishedRunStatus, ResultStore, RunStatus, RunSummary, StoreStats } from "./types";

const statusResultSchema = z.object({
  registrationToken: z.string(),
  contactEmail: z.string(),
  sourceIndex: z.number().int(),
  cyrillicName: z.string().optional(),
  latinName: z.string().optional(),
  resolvedRegistrationNumber: z.string().optional(),
  country: z.string().optional(),
  statusLabel: z.string().optional(),
  statusMessage: z.string().optional(),
  educationLevel: z.string().optional(),
  educationProgram: z.string().optional(),
  preparatoryFaculty: z.string().optional(),
  retrievedAt: z.string(),
  errorMessage: z.string(),
  success: z.boolean(),
});

const runStatusSchema = z.enum(["running", "completed", "stopped", "failed"]);

type RunRow = {
  runId: string;
  startedAt: string;
  finishedAt: string | null;
  status: string;
  inputPath: string | null;
};

type PayloadRow = {
  payload: string;
};

type CountRow = {
  count: number;
};

function parseRunStatus(value: string): RunStatus {
  const parsed = runStatusSchema.safeParse(value);
  return parsed.success ? parsed.data : "failed";
}

function toRunSummary(row: RunRow): RunSummary {
  return {
    runId: row.runId,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt ?? undefined,
    status: parseRunStatus(row.status),
    inputPath: row.inputPath ?? undefined,
  };
}

export class SqliteStore implements ResultStore {
  private readonly db: Database.Database;

  /** `:memory:` opens a private in-memory database. */
  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string, inputPath?: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status, inputPath)
        VALUES (@runId, @startedAt, NULL, 'running', @inputPath)
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running',
          inputPath = excluded.inputPath
      `,
      )
      .run({
        runId,
        startedAt,
        inputPath: inputPath ?? null,
      });
  }

  async finishRun(runId: string, status: FinishedRunStatus, finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
      });
  }

  async saveResult(runId: string, result: StatusResult): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO results (
          runId, sourceIndex, registrationToken, success, errorMessage, retrievedAt, payload
        )
        VALUES (
          @runId, @sourceIndex, @registrationToken, @success, @errorMessage, @retrievedAt, @payload
        )
        ON CONFLICT(runId, sourceIndex) DO UPDATE SET
          registrationToken = excluded.registrationToken,
          success = excluded.success,
          errorMessage = excluded.errorMessage,
          retrievedAt = excluded.retrievedAt,
          payload = excluded.payload
      `,
      )
      .run({
        runId,
        sourceIndex: result.sourceIndex,
        registrationToken: result.registrationToken,
        success: result.success ? 1 : 0,
        errorMessage: result.errorMessage,
        retrievedAt: result.retrievedAt,
        payload: JSON.stringify(result),
      });
  }

  async listResults(runId: string): Promise<StatusResult[]> {
    const rows = this.db
      .prepare<{ runId: string }, PayloadRow>(
        `SELECT payload FROM results WHERE runId = @runId ORDER BY sourceIndex ASC`,
      )
      .all({ runId });
    return rows.map((row) => statusResultSchema.parse(JSON.parse(row.payload)));
  }

  async getRun(runId: string): Promise<RunSummary | undefined> {
    const row = this.db
      .prepare<{ runId: string }, RunRow>(
        `SELECT runId, startedAt, finishedAt, status, inputPath FROM runs WHERE runId = @runId`,
      )
      .get({ runId });
    return row ? toRunSummary(row) : undefined;
  }

  async latestRunId(): Promise<string | undefined> {
    const row = this.db
      .prepare<[], Pick<RunRow, "runId">>(`SELECT runId FROM runs ORDER BY startedAt DESC, rowid DESC LIMIT 1`)
      .get();
    return row?.runId;
  }

  async getStats(): Promise<StoreStats> {
    const latestRunId = await this.latestRunId();
    return {
      runs: this.count("SELECT COUNT(*) AS count FROM runs"),
      results: this.count("SELECT COUNT(*) AS count FROM results"),
      succeeded: this.count("SELECT COUNT(*) AS count FROM results WHERE success = 1"),
      failed: this.count("SELECT COUNT(*) AS count FROM results WHERE success = 0"),
      latestRun: latestRunId ? await this.getRun(latestRunId) : undefined,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(sql: string): number {
    return this.db.prepare<[], CountRow>(sql).get()?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        inputPath TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS results (
        runId TEXT NOT NULL,
        sourceIndex INTEGER NOT NULL,
        registrationToken TEXT NOT NULL,
        success INTEGER NOT NULL,
        errorMessage TEXT NOT NULL,
        retrievedAt TEXT NOT NULL,
        payload TEXT NOT NULL,
        PRIMARY KEY (runId, sourceIndex),
        FOREIGN KEY (runId) REFERENCES runs(runId)
      );

      CREATE INDEX IF NOT EXISTS idx_results_token ON results(registrationToken);
    `);
  }
}
