import { errorMessage } from "../../core/errors";
import type { Logger } from "../../observability";
import type { CaptchaChallenge } from "../../types";
import type { CaptchaDiagnostics, RecognitionLogEntry } from "../diagnostics";
import { MIN_ANSWER_LENGTH, type CaptchaStrategy } from "../types";
import { type ImagePreprocessor, preprocessChallenge } from "./preprocess";
import { RECOGNITION_CONFIGS, type RecognitionConfig, type TextRecognizer } from "./recognizer";

const PREFERRED_MIN_LENGTH = 5;
const PREFERRED_MAX_LENGTH = 6;

/**
 * Picks the first candidate whose length matches the portal's usual answer
 * length, falling back to the first candidate at all.
 */
export function selectCandidate(candidates: readonly string[]): string | undefined {
  const preferred = candidates.find(
    (candidate) => candidate.length >= PREFERRED_MIN_LENGTH && candidate.length <= PREFERRED_MAX_LENGTH,
  );
  return preferred ?? candidates[0];
}

export interface OcrEnsembleOptions {
  recognizer: TextRecognizer;
  diagnostics: CaptchaDiagnostics;
  logger: Logger;
  preprocess?: ImagePreprocessor;
  configs?: readonly RecognitionConfig[];
}

export class OcrEnsembleStrategy implements CaptchaStrategy {
  readonly name = "ocr";

  private readonly recognizer: TextRecognizer;
  private readonly diagnostics: CaptchaDiagnostics;
  private readonly logger: Logger;
  private readonly preprocess: ImagePreprocessor;
  private readonly configs: readonly RecognitionConfig[];

  constructor(options: OcrEnsembleOptions) {
    this.recognizer = options.recognizer;
    this.diagnostics = options.diagnostics;
    this.logger = options.logger;
    this.preprocess = options.preprocess ?? preprocessChallenge;
    this.configs = options.configs ?? RECOGNITION_CONFIGS;
  }

  async attempt(challenge: CaptchaChallenge): Promise<string | undefined> {
    const diagnosticId = await this.diagnostics.saveChallenge(challenge.imageBytes);
    const variants = await this.preprocess(challenge.imageBytes);
    for (const variant of variants) {
      await this.diagnostics.saveVariant(diagnosticId, variant.name, variant.image);
    }

    const entries: RecognitionLogEntry[] = [];
    const candidates: string[] = [];
    for (const config of this.configs) {
      for (const variant of variants) {
        const text = await this.recognizeSafely(variant.image, config, variant.name);
        entries.push({ variant: variant.name, config: config.name, text });
        if (text.length >= MIN_ANSWER_LENGTH) {
          candidates.push(text);
        }
      }
    }
    await this.diagnostics.appendRecognitions(diagnosticId, entries);

    const selected = selectCandidate(candidates);
    this.logger.info("ocr_ensemble_complete", {
      diagnosticId,
      recognitions: entries.length,
      candidates: candidates.length,
      selectedLength: selected?.length ?? 0,
    });
    return selected;
  }

  private async recognizeSafely(image: Buffer, config: RecognitionConfig, variant: string): Promise<string> {
    try {
      return await this.recognizer.recognize(image, config);
    } catch (error) {
      this.logger.warn("ocr_recognition_failed", { variant, config: config.name, error: errorMessage(error) });
      return "";
    }
  }
}
