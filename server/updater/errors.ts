import type { UpdateErrorCode } from "./types.js";

const fatalCodes = new Set<UpdateErrorCode>([
  "VERSION_UNDETECTABLE",
  "NETWORK_FAILURE",
  "DIRTY_WORKING_TREE",
  "BRANCH_NOT_FOUND",
  "CHECKOUT_CONFLICT",
  "TIMEOUT",
  "CANCELLED",
  "BUSY",
  "INVALID_REQUEST"
]);

const httpStatusByCode: Partial<Record<UpdateErrorCode, number>> = {
  BUSY: 409,
  INVALID_REQUEST: 400,
  VERSION_UNDETECTABLE: 422,
  NETWORK_FAILURE: 502,
  TIMEOUT: 504
};

export class UpdateError extends Error {
  readonly code: UpdateErrorCode;

  constructor(code: UpdateErrorCode, message: string) {
    super(message);
    this.name = "UpdateError";
    this.code = code;
  }

  get statusCode(): number {
    return httpStatusByCode[this.code] ?? 500;
  }
}

export function isUpdateError(error: unknown): error is UpdateError {
  return error instanceof UpdateError;
}

/** Warning-level codes (backup, dependency sync) let a session continue. */
export function isFatalUpdateErrorCode(code: UpdateErrorCode): boolean {
  return fatalCodes.has(code);
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  return String(error);
}
