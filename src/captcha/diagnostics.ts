import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors";
import { createDiagnosticId, type Logger } from "../observability";

export interface RecognitionLogEntry {
  variant: string;
  config: string;
  text: string;
}

export interface CaptchaDiagnostics {
  /** Starts a diagnostic record for one challenge and returns its id. */
  saveChallenge(imageBytes: Buffer): Promise<string>;
  saveVariant(diagnosticId: string, variant: string, image: Buffer): Promise<void>;
  appendRecognitions(diagnosticId: string, entries: RecognitionLogEntry[]): Promise<void>;
}

/**
 * Writes challenge images, processed variants and every recognized string under
 * one directory. Failures are logged; they never interrupt solving.
 */
export class FileCaptchaDiagnostics implements CaptchaDiagnostics {
  private readonly rootDir: string;
  private readonly processedDir: string;
  private readonly logPath: string;

  constructor(
    rootDir: string,
    private readonly logger: Logger,
  ) {
    this.rootDir = path.resolve(rootDir);
    this.processedDir = path.join(this.rootDir, "processed");
    this.logPath = path.join(this.rootDir, "logs", "recognitions.jsonl");
  }

  async saveChallenge(imageBytes: Buffer): Promise<string> {
    const diagnosticId = createDiagnosticId();
    await this.write(path.join(this.rootDir, `captcha_${diagnosticId}.png`), imageBytes);
    return diagnosticId;
  }

  async saveVariant(diagnosticId: string, variant: string, image: Buffer): Promise<void> {
    await this.write(path.join(this.processedDir, `captcha_${diagnosticId}_${variant}.png`), image);
  }

  async appendRecognitions(diagnosticId: string, entries: RecognitionLogEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    const recordedAt = new Date().toISOString();
    const content = entries.map((entry) => JSON.stringify({ diagnosticId, recordedAt, ...entry })).join("\n") + "\n";
    try {
      await fs.promises.mkdir(path.dirname(this.logPath), { recursive: true });
      await fs.promises.appendFile(this.logPath, content, "utf-8");
    } catch (error) {
      this.logger.error("captcha_diagnostics_write_failed", { path: this.logPath, error: errorMessage(error) });
    }
  }

  private async write(filePath: string, bytes: Buffer): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, bytes);
    } catch (error) {
      this.logger.error("captcha_diagnostics_write_failed", { path: filePath, error: errorMessage(error) });
    }
  }
}

/** Keeps everything in memory; used where nothing should touch the disk. */
export class InMemoryCaptchaDiagnostics implements CaptchaDiagnostics {
  readonly challenges = new Map<string, Buffer>();
  readonly variants = new Map<string, Buffer>();
  readonly recognitions: Array<RecognitionLogEntry & { diagnosticId: string }> = [];
  private counter = 0;

  async saveChallenge(imageBytes: Buffer): Promise<string> {
    this.counter += 1;
    const diagnosticId = `challenge-${this.counter}`;
    this.challenges.set(diagnosticId, imageBytes);
    return diagnosticId;
  }

  async saveVariant(diagnosticId: string, variant: string, image: Buffer): Promise<void> {
    this.variants.set(`${diagnosticId}/${variant}`, image);
  }

  async appendRecognitions(diagnosticId: string, entries: RecognitionLogEntry[]): Promise<void> {
    for (const entry of entries) {
      this.recognitions.push({ diagnosticId, ...entry });
    }
  }
}
