import { describe, expect, it } from "vitest";
import { InMemoryCaptchaDiagnostics } from "../src/captcha/diagnostics";
import {
  cleanRecognizedText,
  type ImagePreprocessor,
  OcrEnsembleStrategy,
  type RecognitionConfig,
  selectCandidate,
  type TextRecognizer,
} from "../src/captcha/ocr";
import { createTestLogger } from "./helpers";

const CONFIGS: RecognitionConfig[] = [
  { name: "single_line", pageSegMode: "7" },
  { name: "single_word", pageSegMode: "8" },
];

const twoVariants: ImagePreprocessor = async () => [
  { name: "global", image: Buffer.from("g") },
  { name: "adaptive", image: Buffer.from("a") },
];

class TableRecognizer implements TextRecognizer {
  readonly calls: string[] = [];
  terminated = false;

  constructor(private readonly table: Record<string, string | Error>) {}

  async recognize(image: Buffer, config: RecognitionConfig): Promise<string> {
    const key = `${config.name}/${image.toString()}`;
    this.calls.push(key);
    const value = this.table[key] ?? "";
    if (value instanceof Error) {
      throw value;
    }
    return value;
  }

  async terminate(): Promise<void> {
    this.terminated = true;
  }
}

describe("selectCandidate", () => {
  it("prefers the first candidate of five or six characters", () => {
    expect(selectCandidate(["abcd", "abcdefg", "xyzuv", "qwerty"])).toBe("xyzuv");
  });

  it("falls back to the first candidate", () => {
    expect(selectCandidate(["abcd", "abcdefg"])).toBe("abcd");
  });

  it("returns undefined without candidates", () => {
    expect(selectCandidate([])).toBeUndefined();
  });
});

describe("cleanRecognizedText", () => {
  it("keeps letters and digits, lower-cased", () => {
    expect(cleanRecognizedText(" Ab-c D1\n")).toBe("abcd1");
  });
});

describe("OcrEnsembleStrategy", () => {
  it("evaluates configurations in the outer loop and variants in the inner loop", async () => {
    const { logger } = createTestLogger();
    const recognizer = new TableRecognizer({
      "single_line/g": "abcd",
      "single_line/a": "abcdefg",
      "single_word/g": "xyzuv",
      "single_word/a": "",
    });
    const diagnostics = new InMemoryCaptchaDiagnostics();
    const ocr = new OcrEnsembleStrategy({ recognizer, diagnostics, logger, preprocess: twoVariants, configs: CONFIGS });

    const answer = await ocr.attempt({ imageBytes: Buffer.from("raw"), discoveredAt: "2025-03-01T09:15:42.120Z" });

    expect(answer).toBe("xyzuv");
    expect(recognizer.calls).toEqual(["single_line/g", "single_line/a", "single_word/g", "single_word/a"]);
  });

  it("persists the raw image, every variant and every recognition", async () => {
    const { logger } = createTestLogger();
    const recognizer = new TableRecognizer({ "single_line/g": "kwpx" });
    const diagnostics = new InMemoryCaptchaDiagnostics();
    const ocr = new OcrEnsembleStrategy({ recognizer, diagnostics, logger, preprocess: twoVariants, configs: CONFIGS });

    await ocr.attempt({ imageBytes: Buffer.from("raw"), discoveredAt: "2025-03-01T09:15:42.120Z" });

    expect(diagnostics.challenges.get("challenge-1")?.toString()).toBe("raw");
    expect([...diagnostics.variants.keys()]).toEqual(["challenge-1/global", "challenge-1/adaptive"]);
    expect(diagnostics.recognitions).toEqual([
      { diagnosticId: "challenge-1", variant: "global", config: "single_line", text: "kwpx" },
      { diagnosticId: "challenge-1", variant: "adaptive", config: "single_line", text: "" },
      { diagnosticId: "challenge-1", variant: "global", config: "single_word", text: "" },
      { diagnosticId: "challenge-1", variant: "adaptive", config: "single_word", text: "" },
    ]);
  });

  it("counts a failed recognition as empty text", async () => {
    const { logger, lines } = createTestLogger();
    const recognizer = new TableRecognizer({
      "single_line/g": new Error("worker crashed"),
      "single_line/a": "plmok",
    });
    const ocr = new OcrEnsembleStrategy({
      recognizer,
      diagnostics: new InMemoryCaptchaDiagnostics(),
      logger,
      preprocess: twoVariants,
      configs: CONFIGS,
    });

    await expect(ocr.attempt({ imageBytes: Buffer.from("raw"), discoveredAt: "2025-03-01T09:15:42.120Z" })).resolves.toBe(
      "plmok",
    );
    expect(lines().find((line) => line.msg === "ocr_recognition_failed")).toMatchObject({
      variant: "global",
      config: "single_line",
      error: "worker crashed",
    });
  });

  it("has no answer when every output is shorter than four characters", async () => {
    const { logger } = createTestLogger();
    const ocr = new OcrEnsembleStrategy({
      recognizer: new TableRecognizer({ "single_line/g": "abc" }),
      diagnostics: new InMemoryCaptchaDiagnostics(),
      logger,
      preprocess: twoVariants,
      configs: CONFIGS,
    });

    await expect(ocr.attempt({ imageBytes: Buffer.from("raw"), discoveredAt: "2025-03-01T09:15:42.120Z" })).resolves.toBeUndefined();
  });
});
