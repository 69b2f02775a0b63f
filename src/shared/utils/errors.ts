// ============================================
// Application Errors
// Every error the HTTP layer can map to a status code
// ============================================

export const ErrorCode = {
  // Files
  FILE_FORMAT_UNSUPPORTED: 'FILE_001',
  FILE_TOO_LARGE: 'FILE_002',
  FILE_CONTENT_INVALID: 'FILE_003',
  FILE_UPLOAD_FAILED: 'FILE_004',

  // LLM
  LLM_API_ERROR: 'LLM_001',
  LLM_RESPONSE_INVALID: 'LLM_002',

  // Storage
  STORAGE_IO: 'STORE_001',
  NOT_FOUND: 'STORE_002',

  // System
  INTERNAL_ERROR: 'SYS_001',
  SERVICE_UNAVAILABLE: 'SYS_002',
  INVALID_REQUEST: 'SYS_003',
  CONFIGURATION_INVALID: 'CFG_001'
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class AppError extends Error {
  readonly code: ErrorCodeValue;
  readonly status: number;
  readonly details?: string;

  constructor(code: ErrorCodeValue, message: string, status: number, details?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

/**
 * I/O failure while reading, writing or deleting an artifact
 */
export class StorageError extends AppError {
  readonly sessionId?: string;

  constructor(message: string, options: { sessionId?: string; cause?: unknown } = {}) {
    const details = options.cause instanceof Error ? options.cause.message : undefined;
    super(ErrorCode.STORAGE_IO, message, 503, details);
    this.sessionId = options.sessionId;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message, 404);
  }
}

/**
 * Invalid settings detected at startup. Fatal.
 */
export class ConfigurationError extends AppError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(ErrorCode.CONFIGURATION_INVALID, `Invalid configuration: ${problems.join('; ')}`, 500);
    this.problems = problems;
  }
}

export class FileValidationError extends AppError {
  constructor(
    code:
      | typeof ErrorCode.FILE_FORMAT_UNSUPPORTED
      | typeof ErrorCode.FILE_TOO_LARGE
      | typeof ErrorCode.FILE_CONTENT_INVALID,
    message: string
  ) {
    super(code, message, 400);
  }
}

export class ChartGenerationError extends AppError {
  constructor(
    code: typeof ErrorCode.LLM_API_ERROR | typeof ErrorCode.LLM_RESPONSE_INVALID,
    message: string,
    details?: string
  ) {
    super(code, message, 502, details);
  }
}

/**
 * Well-formed request that names something this server does not offer
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(ErrorCode.INVALID_REQUEST, message, 400);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(ErrorCode.SERVICE_UNAVAILABLE, message, 503);
  }
}

/**
 * True for the "no such file or directory" family of fs errors
 */
export function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
