export interface InputRecord {
  readonly registrationToken: string;
  readonly contactEmail: string;
  readonly sourceIndex: number;
}

export interface StatusResult {
  registrationToken: string;
  contactEmail: string;
  sourceIndex: number;
  cyrillicName?: string;
  latinName?: string;
  resolvedRegistrationNumber?: string;
  country?: string;
  statusLabel?: string;
  statusMessage?: string;
  educationLevel?: string;
  educationProgram?: string;
  preparatoryFaculty?: string;
  retrievedAt: string;
  errorMessage: string;
  success: boolean;
}

export interface CaptchaChallenge {
  imageBytes: Buffer;
  discoveredAt: string;
}

export type ExtractedFields = Omit<
  StatusResult,
  "registrationToken" | "contactEmail" | "sourceIndex" | "retrievedAt" | "errorMessage" | "success"
>;

export function createEmptyResult(input: InputRecord, now = new Date()): StatusResult {
  return {
    registrationToken: input.registrationToken,
    contactEmail: input.contactEmail,
    sourceIndex: input.sourceIndex,
    retrievedAt: now.toISOString(),
    errorMessage: "",
    success: false,
  };
}

/** Seals a result so that `success` always mirrors an empty error message. */
export function finalizeResult(result: StatusResult, errorMessage = ""): StatusResult {
  return Object.freeze({
    ...result,
    errorMessage,
    success: errorMessage === "",
  });
}
