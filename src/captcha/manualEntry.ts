import sharp from "sharp";
import type { Logger } from "../observability";
import type { CaptchaChallenge } from "../types";
import type { CaptchaStrategy } from "./types";

/** Shows an image to a person and returns what they typed; `undefined` when dismissed. */
export interface OperatorPrompt {
  ask(image: Buffer): Promise<string | undefined>;
}

export type ImageScaler = (imageBytes: Buffer) => Promise<Buffer>;

export const DISPLAY_SCALE = 2;

export const scaleForDisplay: ImageScaler = async (imageBytes) => {
  const { width, height } = await sharp(imageBytes).metadata();
  if (!width || !height) {
    return imageBytes;
  }
  return sharp(imageBytes)
    .resize(width * DISPLAY_SCALE, height * DISPLAY_SCALE, { kernel: "lanczos3" })
    .png()
    .toBuffer();
};

export class ManualEntryStrategy implements CaptchaStrategy {
  readonly name = "manual";

  constructor(
    private readonly prompt: OperatorPrompt,
    private readonly logger: Logger,
    private readonly scale: ImageScaler = scaleForDisplay,
  ) {}

  async attempt(challenge: CaptchaChallenge): Promise<string | undefined> {
    const image = await this.scale(challenge.imageBytes);
    const typed = await this.prompt.ask(image);
    const answer = typed?.trim().toLowerCase();
    if (!answer) {
      this.logger.warn("manual_captcha_dismissed");
      return undefined;
    }
    return answer;
  }
}
