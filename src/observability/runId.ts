import crypto from "node:crypto";

function timestampSlug(now: Date): string {
  return now.toISOString().replace(/[:.]/g, "-");
}

export function createRunId(now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `run_${timestampSlug(now)}_${suffix}`;
}

/** Identifier shared by every diagnostic file written for one CAPTCHA image. */
export function createDiagnosticId(now = new Date()): string {
  return `${timestampSlug(now)}_${crypto.randomBytes(2).toString("hex")}`;
}
