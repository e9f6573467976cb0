export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

/** The remote video could not be resolved or described. */
export class ExtractionError extends AppError {
  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(code, message, details);
    this.name = 'ExtractionError';
  }
}

/** A transfer failed or was interrupted. */
export class DownloadError extends AppError {
  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(code, message, details);
    this.name = 'DownloadError';
  }
}

/** A post-processing subprocess failed or could not be started. */
export class ProcessingError extends AppError {
  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(code, message, details);
    this.name = 'ProcessingError';
  }
}

/** A path was invalid, unwritable, or the disk ran out of space. */
export class FilesystemError extends AppError {
  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(code, message, details);
    this.name = 'FilesystemError';
  }
}

export const ERROR_CODES = {
  ERR_PRIVATE_OR_RESTRICTED: 'ERR_PRIVATE_OR_RESTRICTED',
  ERR_GEO_BLOCKED: 'ERR_GEO_BLOCKED',
  ERR_FETCH_FAILED: 'ERR_FETCH_FAILED',
  ERR_UNSUPPORTED_URL: 'ERR_UNSUPPORTED_URL',
  ERR_INVALID_RESPONSE: 'ERR_INVALID_RESPONSE',
  ERR_FILE_NOT_FOUND: 'ERR_FILE_NOT_FOUND',
  ERR_DISK_FULL: 'ERR_DISK_FULL',
  ERR_PERMISSION_DENIED: 'ERR_PERMISSION_DENIED',
  ERR_INVALID_PATH: 'ERR_INVALID_PATH',
  ERR_TOOL_NOT_FOUND: 'ERR_TOOL_NOT_FOUND',
  ERR_PROCESSING_FAILED: 'ERR_PROCESSING_FAILED',
  ERR_INVALID_STATE: 'ERR_INVALID_STATE',
  ERR_INTERNAL: 'ERR_INTERNAL',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export function toUserMessage(error: AppError): string {
  const messages: Record<ErrorCode, string> = {
    [ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED]: '❌ Video is private, age-restricted, or requires login.',
    [ERROR_CODES.ERR_GEO_BLOCKED]: '❌ Video is geo-blocked in your region. Try setting GEO_BYPASS_COUNTRY.',
    [ERROR_CODES.ERR_FETCH_FAILED]: '❌ Failed to reach YouTube. Please try again later.',
    [ERROR_CODES.ERR_UNSUPPORTED_URL]: '❌ Unsupported URL format or video not found',
    [ERROR_CODES.ERR_INVALID_RESPONSE]: '❌ yt-dlp returned data that could not be understood',
    [ERROR_CODES.ERR_FILE_NOT_FOUND]: '❌ Expected file is missing',
    [ERROR_CODES.ERR_DISK_FULL]: '❌ Not enough disk space',
    [ERROR_CODES.ERR_PERMISSION_DENIED]: '❌ Permission denied on the output location',
    [ERROR_CODES.ERR_INVALID_PATH]: '❌ Output path is not a usable directory',
    [ERROR_CODES.ERR_TOOL_NOT_FOUND]: '❌ Required tool (yt-dlp or ffmpeg) was not found on PATH',
    [ERROR_CODES.ERR_PROCESSING_FAILED]: '❌ ffmpeg failed to process the file',
    [ERROR_CODES.ERR_INVALID_STATE]: '❌ Request is in an unexpected state',
    [ERROR_CODES.ERR_INTERNAL]: '❌ Internal error. Please try again.',
  };

  return `${messages[error.code]} (${error.code})`;
}
