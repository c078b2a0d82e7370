import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../src/config";
import { ConfigError } from "../src/core/errors";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "status-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const filePath = path.join(dir, "config.json");
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("returns the defaults without a file or environment", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  it("layers the file over defaults and the environment over the file", () => {
    const configPath = writeConfig(
      JSON.stringify({
        maxRetryAttempts: 5,
        headless: true,
        noticeMarkers: { educationProgram: "В 2027 году" },
        outputDirs: { reports: "out" },
      }),
    );

    const config = loadConfig(configPath, {
      HEADLESS: "false",
      REQUEST_DELAY_SECONDS: "2.5",
      BROWSER_ENGINE: "Firefox",
      MAX_RETRY_ATTEMPTS: "many",
      TWO_CAPTCHA_API_KEY: "test-secret",
    });

    expect(config.maxRetryAttempts).toBe(5);
    expect(config.headless).toBe(false);
    expect(config.requestDelaySeconds).toBe(2.5);
    expect(config.browserEngine).toBe("firefox");
    expect(config.twoCaptchaApiKey).toBe("test-secret");
    expect(config.noticeMarkers).toEqual({ educationProgram: "В 2027 году", preparatoryFaculty: "В 2025 году" });
    expect(config.outputDirs).toEqual({ reports: "out", captchas: "data/captchas" });
  });

  it("places the OCR cache from the file or the environment", () => {
    const configPath = writeConfig(JSON.stringify({ ocrCachePath: "cache/ocr", ocrLangPath: "models/eng" }));

    expect(loadConfig(configPath, {})).toMatchObject({ ocrCachePath: "cache/ocr", ocrLangPath: "models/eng" });
    expect(loadConfig(configPath, { OCR_CACHE_PATH: "/var/cache/ocr" }).ocrCachePath).toBe("/var/cache/ocr");
    expect(DEFAULT_CONFIG.ocrCachePath).toBe("data/ocr-cache");
  });

  it("ignores environment values it cannot parse", () => {
    const config = loadConfig(undefined, { REPORT_SINK: "excel", MANUAL_CAPTCHA: "maybe", LOG_LEVEL: "loud" });

    expect(config.reportSink).toBe("csv");
    expect(config.manualCaptcha).toBe(true);
    expect(config.logLevel).toBe("info");
  });

  it("rejects unknown keys in the file", () => {
    const configPath = writeConfig(JSON.stringify({ pollIntervalMinutes: 5 }));
    expect(() => loadConfig(configPath, {})).toThrow(ConfigError);
  });

  it("rejects values of the wrong type", () => {
    const configPath = writeConfig(JSON.stringify({ maxRetryAttempts: 0 }));
    expect(() => loadConfig(configPath, {})).toThrow(/maxRetryAttempts/);
  });

  it("reports a missing or malformed file", () => {
    expect(() => loadConfig(path.join(dir, "absent.json"), {})).toThrow("Config file not found");
    const configPath = writeConfig("{ not json");
    expect(() => loadConfig(configPath, {})).toThrow("is not valid JSON");
  });
});
