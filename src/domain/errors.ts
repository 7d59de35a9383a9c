export const ErrorCode = {
  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',

  // Portal navigation
  PORTAL_UNREACHABLE: 'PORTAL_UNREACHABLE',
  NAVIGATION_TIMEOUT: 'NAVIGATION_TIMEOUT',
  /** An entry listed earlier is gone when the branch is re-entered. */
  PORTAL_NODE_ABSENT: 'PORTAL_NODE_ABSENT',

  // Gazette search
  CAPTCHA_UNRESOLVED: 'CAPTCHA_UNRESOLVED',
  DOWNLOAD_FAILED: 'DOWNLOAD_FAILED',

  // Documents
  PARSING_ERROR: 'PARSING_ERROR',
  CONTRACT_DOCUMENT_MISSING: 'CONTRACT_DOCUMENT_MISSING',

  // Extraction service
  EXTRACTION_RATE_LIMITED: 'EXTRACTION_RATE_LIMITED',
  EXTRACTION_MALFORMED_RESPONSE: 'EXTRACTION_MALFORMED_RESPONSE',
  EXTRACTION_UNAVAILABLE: 'EXTRACTION_UNAVAILABLE',
  EXTRACTION_AUTH_ERROR: 'EXTRACTION_AUTH_ERROR',

  // Run control
  CANCELLED: 'CANCELLED',

  // Persistence
  PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  LANGFUSE_UNAVAILABLE: 'LANGFUSE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
  /** State-machine state the unit was in when it failed. */
  state?: string;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
  state?: string,
): AppError {
  return { code, message, retryable, details, ...(state !== undefined && { state }) };
}

/** Errors that end the whole run instead of a single unit. */
const FATAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.CONFIG_INVALID,
  ErrorCode.PERSISTENCE_ERROR,
]);

export function isFatal(error: AppError): boolean {
  return FATAL_CODES.has(error.code);
}

const REVISITED_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.CONTRACT_DOCUMENT_MISSING,
  ErrorCode.DOWNLOAD_FAILED,
]);

/** Unit failures a resumed run tries again: the document may be there next time. */
export function isRevisitedOnResume(error: AppError): boolean {
  return REVISITED_CODES.has(error.code);
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
