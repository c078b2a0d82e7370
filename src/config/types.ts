import type { LogLevel } from "../observability/types";

export type BrowserEngine = "chromium" | "firefox" | "webkit";

export type ReportSinkType = "csv" | "xlsx" | "jsonl" | "http";

export interface OutputDirs {
  reports: string;
  captchas: string;
}

export interface InputColumns {
  registrationToken: string;
  contactEmail: string;
}

export interface NoticeMarkers {
  educationProgram: string;
  preparatoryFaculty: string;
}

export interface AppConfig {
  trackingUrl: string;
  userAgent: string;
  headless: boolean;
  browserEngine: BrowserEngine;
  browserArgs: string[];
  pageTimeoutMs: number;
  captchaVisibleTimeoutMs: number;
  maxRetryAttempts: number;
  requestDelaySeconds: number;
  manualCaptcha: boolean;
  manualCaptchaOnly: boolean;
  twoCaptchaApiKey?: string;
  twoCaptchaBaseUrl: string;
  remotePollIntervalMs: number;
  remoteMaxPolls: number;
  requestTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  ocrLanguage: string;
  ocrLangPath?: string;
  ocrCachePath: string;
  noticeMarkers: NoticeMarkers;
  countryCodesPath?: string;
  inputColumns: InputColumns;
  /** Workbook sheet to read; the first sheet when unset. */
  inputSheet?: string;
  reportSink: ReportSinkType;
  httpSinkEndpoint?: string;
  httpSinkToken?: string;
  logLevel: LogLevel;
  outputDirs: OutputDirs;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "inputColumns" | "noticeMarkers">> & {
  outputDirs?: Partial<OutputDirs>;
  inputColumns?: Partial<InputColumns>;
  noticeMarkers?: Partial<NoticeMarkers>;
};
