import type { AppConfig } from "../config/types";
import type { FetchLike } from "../core/fetch";
import type { SleepFn } from "../core/sleep";
import type { Logger, MetricsRegistry } from "../observability";
import { CachingCaptchaResolver } from "./cache";
import { CaptchaCascade } from "./cascade";
import { type CaptchaDiagnostics, FileCaptchaDiagnostics } from "./diagnostics";
import { ManualEntryStrategy, type OperatorPrompt } from "./manualEntry";
import { OcrEnsembleStrategy, TesseractRecognizer, type TextRecognizer } from "./ocr";
import { RemoteCaptchaSolver } from "./remoteSolver";
import { TerminalPrompt } from "./terminalPrompt";
import type { CaptchaStrategy } from "./types";

export type CaptchaEngineConfig = Pick<
  AppConfig,
  | "manualCaptcha"
  | "manualCaptchaOnly"
  | "twoCaptchaApiKey"
  | "twoCaptchaBaseUrl"
  | "remotePollIntervalMs"
  | "remoteMaxPolls"
  | "requestTimeoutMs"
  | "ocrLanguage"
  | "ocrLangPath"
  | "ocrCachePath"
  | "outputDirs"
>;

export interface CaptchaEngineDeps {
  logger: Logger;
  fetchFn: FetchLike;
  metrics?: MetricsRegistry;
  recognizer?: TextRecognizer;
  diagnostics?: CaptchaDiagnostics;
  prompt?: OperatorPrompt;
  sleep?: SleepFn;
}

export interface CaptchaEngine {
  resolver: CachingCaptchaResolver;
  strategyNames: string[];
  shutdown(): Promise<void>;
}

/**
 * Assembles the solving order: remote service (when a key is set), local OCR,
 * then the operator. Manual-only mode keeps the operator alone, even when
 * manual entry is otherwise switched off.
 */
export function buildCaptchaEngine(config: CaptchaEngineConfig, deps: CaptchaEngineDeps): CaptchaEngine {
  const logger = deps.logger.child("captcha");
  const recognizer =
    deps.recognizer ??
    new TesseractRecognizer({
      language: config.ocrLanguage,
      langPath: config.ocrLangPath,
      cachePath: config.ocrCachePath,
      logger,
    });
  const manual = (): CaptchaStrategy =>
    new ManualEntryStrategy(deps.prompt ?? new TerminalPrompt({ imageDir: config.outputDirs.captchas }), logger);

  const strategies: CaptchaStrategy[] = [];
  if (config.manualCaptchaOnly) {
    strategies.push(manual());
  } else {
    if (config.twoCaptchaApiKey) {
      strategies.push(
        new RemoteCaptchaSolver({
          apiKey: config.twoCaptchaApiKey,
          fetchFn: deps.fetchFn,
          logger,
          baseUrl: config.twoCaptchaBaseUrl,
          pollIntervalMs: config.remotePollIntervalMs,
          maxPolls: config.remoteMaxPolls,
          requestTimeoutMs: config.requestTimeoutMs,
          sleep: deps.sleep,
        }),
      );
    }
    strategies.push(
      new OcrEnsembleStrategy({
        recognizer,
        diagnostics: deps.diagnostics ?? new FileCaptchaDiagnostics(config.outputDirs.captchas, logger),
        logger,
      }),
    );
    if (config.manualCaptcha) {
      strategies.push(manual());
    }
  }

  const cascade = new CaptchaCascade({ strategies, logger, metrics: deps.metrics });
  logger.info("captcha_engine_ready", { strategies: cascade.strategyNames.join(",") });

  return {
    resolver: new CachingCaptchaResolver(cascade, logger, deps.metrics),
    strategyNames: cascade.strategyNames,
    shutdown: () => recognizer.terminate(),
  };
}
