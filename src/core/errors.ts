export type ErrorCode =
  | "BROWSER_INIT_ERROR"
  | "NAVIGATION_ERROR"
  | "CAPTCHA_ERROR"
  | "CAPTCHA_UNRESOLVED"
  | "EXTRACTION_ERROR"
  | "VALIDATION_ERROR"
  | "CONFIG_ERROR"
  | "SINK_ERROR";

export class StatusCheckError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, options: { code: ErrorCode; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

/** The browser could not be started; the whole run is aborted. */
export class BrowserInitError extends StatusCheckError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "BROWSER_INIT_ERROR", retryable: false, cause });
  }
}

export class NavigationError extends StatusCheckError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "NAVIGATION_ERROR", retryable: true, cause });
  }
}

export class CaptchaError extends StatusCheckError {
  constructor(message: string, cause?: unknown, code: ErrorCode = "CAPTCHA_ERROR") {
    super(message, { code, retryable: true, cause });
  }
}

/** Every configured solving strategy failed for one challenge. */
export class CaptchaUnresolved extends CaptchaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause, "CAPTCHA_UNRESOLVED");
  }
}

export class ExtractionError extends StatusCheckError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "EXTRACTION_ERROR", retryable: true, cause });
  }
}

/** An input row was rejected before reaching the pipeline. */
export class ValidationError extends StatusCheckError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, { code: "VALIDATION_ERROR", retryable: false });
    this.issues = issues;
  }
}

export class ConfigError extends StatusCheckError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", retryable: false, cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
