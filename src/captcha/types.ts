import type { CaptchaChallenge } from "../types";

/** Shortest answer any strategy may return; the portal's challenges are longer. */
export const MIN_ANSWER_LENGTH = 4;

export interface CaptchaStrategy {
  readonly name: string;
  /** Resolves to the recognized text, or `undefined` when this strategy has no answer. */
  attempt(challenge: CaptchaChallenge): Promise<string | undefined>;
}

export interface CaptchaResolver {
  resolve(challenge: CaptchaChallenge): Promise<string>;
}

export function isAcceptableAnswer(answer: string | undefined): answer is string {
  return answer !== undefined && answer.length >= MIN_ANSWER_LENGTH;
}
