import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import { parseLogLevel } from "../observability/logger";
import type { AppConfig, BrowserEngine, ConfigOverrides, ReportSinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  trackingUrl: "https://russia-edu.minobrnauki.gov.ru/",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  headless: true,
  browserEngine: "chromium",
  browserArgs: ["--disable-dev-shm-usage"],
  pageTimeoutMs: 60_000,
  captchaVisibleTimeoutMs: 10_000,
  maxRetryAttempts: 3,
  requestDelaySeconds: 1.5,
  manualCaptcha: true,
  manualCaptchaOnly: false,
  twoCaptchaApiKey: undefined,
  twoCaptchaBaseUrl: "https://2captcha.com",
  remotePollIntervalMs: 5_000,
  remoteMaxPolls: 30,
  requestTimeoutMs: 20_000,
  ignoreHttpsErrors: false,
  ocrLanguage: "eng",
  ocrLangPath: undefined,
  ocrCachePath: "data/ocr-cache",
  noticeMarkers: {
    educationProgram: "В 2026 году",
    preparatoryFaculty: "В 2025 году",
  },
  countryCodesPath: undefined,
  inputColumns: {
    registrationToken: "№ SOLICITUD",
    contactEmail: "CORREO RUSO",
  },
  inputSheet: undefined,
  reportSink: "csv",
  httpSinkEndpoint: undefined,
  httpSinkToken: undefined,
  logLevel: "info",
  outputDirs: {
    reports: "data/reports",
    captchas: "data/captchas",
  },
  storePath: "data/state.sqlite",
};

const browserEngineSchema = z.enum(["chromium", "firefox", "webkit"]);
const reportSinkSchema = z.enum(["csv", "xlsx", "jsonl", "http"]);

const configFileSchema = z
  .object({
    trackingUrl: z.string().url(),
    userAgent: z.string().min(1),
    headless: z.boolean(),
    browserEngine: browserEngineSchema,
    browserArgs: z.array(z.string()),
    pageTimeoutMs: z.number().int().positive(),
    captchaVisibleTimeoutMs: z.number().int().positive(),
    maxRetryAttempts: z.number().int().min(1),
    requestDelaySeconds: z.number().min(0),
    manualCaptcha: z.boolean(),
    manualCaptchaOnly: z.boolean(),
    twoCaptchaApiKey: z.string().min(1),
    twoCaptchaBaseUrl: z.string().url(),
    remotePollIntervalMs: z.number().int().min(0),
    remoteMaxPolls: z.number().int().min(1),
    requestTimeoutMs: z.number().int().positive(),
    ignoreHttpsErrors: z.boolean(),
    ocrLanguage: z.string().min(1),
    ocrLangPath: z.string().min(1),
    ocrCachePath: z.string().min(1),
    noticeMarkers: z
      .object({
        educationProgram: z.string(),
        preparatoryFaculty: z.string(),
      })
      .partial(),
    countryCodesPath: z.string().min(1),
    inputColumns: z
      .object({
        registrationToken: z.string().min(1),
        contactEmail: z.string().min(1),
      })
      .partial(),
    inputSheet: z.string().min(1),
    reportSink: reportSinkSchema,
    httpSinkEndpoint: z.string().url(),
    httpSinkToken: z.string().min(1),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    outputDirs: z
      .object({
        reports: z.string().min(1),
        captchas: z.string().min(1),
      })
      .partial(),
    storePath: z.string().min(1),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON`, error);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toBrowserEngine(value: string | undefined, fallback: BrowserEngine): BrowserEngine {
  const parsed = browserEngineSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

function toReportSink(value: string | undefined, fallback: ReportSinkType): ReportSinkType {
  const parsed = reportSinkSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    noticeMarkers: {
      ...DEFAULT_CONFIG.noticeMarkers,
      ...(fileConfig.noticeMarkers ?? {}),
    },
    inputColumns: {
      ...DEFAULT_CONFIG.inputColumns,
      ...(fileConfig.inputColumns ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    trackingUrl: env.TRACKING_URL ?? merged.trackingUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    headless: toBool(env.HEADLESS, merged.headless),
    browserEngine: toBrowserEngine(env.BROWSER_ENGINE, merged.browserEngine),
    pageTimeoutMs: toInt(env.PAGE_TIMEOUT_MS, merged.pageTimeoutMs),
    captchaVisibleTimeoutMs: toInt(env.CAPTCHA_VISIBLE_TIMEOUT_MS, merged.captchaVisibleTimeoutMs),
    maxRetryAttempts: toInt(env.MAX_RETRY_ATTEMPTS, merged.maxRetryAttempts),
    requestDelaySeconds: toFloat(env.REQUEST_DELAY_SECONDS, merged.requestDelaySeconds),
    manualCaptcha: toBool(env.MANUAL_CAPTCHA, merged.manualCaptcha),
    manualCaptchaOnly: toBool(env.MANUAL_CAPTCHA_ONLY, merged.manualCaptchaOnly),
    twoCaptchaApiKey: env.TWO_CAPTCHA_API_KEY ?? merged.twoCaptchaApiKey,
    twoCaptchaBaseUrl: env.TWO_CAPTCHA_BASE_URL ?? merged.twoCaptchaBaseUrl,
    remotePollIntervalMs: toInt(env.REMOTE_POLL_INTERVAL_MS, merged.remotePollIntervalMs),
    remoteMaxPolls: toInt(env.REMOTE_MAX_POLLS, merged.remoteMaxPolls),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    ocrLanguage: env.OCR_LANGUAGE ?? merged.ocrLanguage,
    ocrLangPath: env.OCR_LANG_PATH ?? merged.ocrLangPath,
    ocrCachePath: env.OCR_CACHE_PATH ?? merged.ocrCachePath,
    countryCodesPath: env.COUNTRY_CODES_PATH ?? merged.countryCodesPath,
    inputSheet: env.INPUT_SHEET ?? merged.inputSheet,
    reportSink: toReportSink(env.REPORT_SINK, merged.reportSink),
    httpSinkEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.httpSinkEndpoint,
    httpSinkToken: env.HTTP_SINK_TOKEN ?? merged.httpSinkToken,
    logLevel: parseLogLevel(env.LOG_LEVEL, merged.logLevel),
    storePath: env.STORE_PATH ?? merged.storePath,
    outputDirs: {
      reports: env.OUTPUT_REPORTS_DIR ?? merged.outputDirs.reports,
      captchas: env.CAPTCHA_DIAGNOSTICS_DIR ?? merged.outputDirs.captchas,
    },
  };
}

export { DEFAULT_CONFIG };
