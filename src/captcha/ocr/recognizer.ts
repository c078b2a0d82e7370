import fs from "node:fs";
import path from "node:path";
import { createWorker, OEM, PSM, type Worker } from "tesseract.js";
import { ConfigError } from "../../core/errors";
import { describeError, type Logger } from "../../observability";

export const CAPTCHA_ALPHABET = "abcdefghijklmnopqrstuvwxyz";

/** Tesseract page segmentation modes used by the ensemble. */
export type PageSegMode = "6" | "7" | "8" | "13";

export interface RecognitionConfig {
  name: string;
  pageSegMode: PageSegMode;
}

export const RECOGNITION_CONFIGS: readonly RecognitionConfig[] = [
  { name: "single_line", pageSegMode: "7" },
  { name: "single_word", pageSegMode: "8" },
  { name: "single_block", pageSegMode: "6" },
  // Raw line skips Tesseract's layout analysis entirely.
  { name: "raw_line", pageSegMode: "13" },
];

export interface TextRecognizer {
  recognize(image: Buffer, config: RecognitionConfig): Promise<string>;
  terminate(): Promise<void>;
}

export function cleanRecognizedText(text: string): string {
  return text.replace(/[^\p{L}\p{N}]/gu, "").toLowerCase();
}

const PAGE_SEG_MODES: Record<PageSegMode, PSM> = {
  "6": PSM.SINGLE_BLOCK,
  "7": PSM.SINGLE_LINE,
  "8": PSM.SINGLE_WORD,
  "13": PSM.RAW_LINE,
};

/** Model set shipped inside each `@tesseract.js-data/<lang>` package. */
export const BUNDLED_MODEL_DIR = "4.0.0_best_int";

/** Directory of the installed `@tesseract.js-data/<language>` package. */
export function bundledLangPath(language: string, resolve: (id: string) => string = require.resolve): string {
  try {
    return path.join(path.dirname(resolve(`@tesseract.js-data/${language}/package.json`)), BUNDLED_MODEL_DIR);
  } catch (error) {
    throw new ConfigError(
      `No installed language data for OCR language "${language}"; install @tesseract.js-data/${language} or set ocrLangPath`,
      error,
    );
  }
}

export interface TesseractRecognizerOptions {
  language: string;
  /** Defaults to the installed `@tesseract.js-data` package for `language`. */
  langPath?: string;
  cachePath: string;
  logger: Logger;
}

/**
 * Recognition on a tesseract.js worker thread. The worker is created on first
 * use and kept for the rest of the run.
 */
export class TesseractRecognizer implements TextRecognizer {
  private worker?: Promise<Worker>;

  constructor(private readonly options: TesseractRecognizerOptions) {}

  async recognize(image: Buffer, config: RecognitionConfig): Promise<string> {
    const worker = await this.getWorker();
    await worker.setParameters({
      tessedit_pageseg_mode: PAGE_SEG_MODES[config.pageSegMode],
      tessedit_char_whitelist: CAPTCHA_ALPHABET,
    });
    const { data } = await worker.recognize(image);
    return cleanRecognizedText(data.text);
  }

  async terminate(): Promise<void> {
    if (!this.worker) {
      return;
    }
    const pending = this.worker;
    this.worker = undefined;
    let worker: Worker;
    try {
      worker = await pending;
    } catch (error) {
      this.options.logger.warn("ocr_worker_never_started", describeError(error));
      return;
    }
    await worker.terminate();
  }

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      this.worker = this.startWorker();
    }
    return this.worker;
  }

  private async startWorker(): Promise<Worker> {
    const { language, cachePath, logger } = this.options;
    const langPath = this.options.langPath ?? bundledLangPath(language);
    await fs.promises.mkdir(cachePath, { recursive: true });
    logger.info("ocr_worker_start", { language, langPath, cachePath });
    return createWorker(language, OEM.DEFAULT, { langPath, cachePath });
  }
}
