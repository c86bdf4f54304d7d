// Error taxonomy shared by validation, transcoding and the job queue

export enum ErrorCode {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_INVALID_FORMAT = 'FILE_INVALID_FORMAT',
  FILE_CORRUPTED = 'FILE_CORRUPTED',
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  DISK_SPACE_LOW = 'DISK_SPACE_LOW',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  CONVERSION_PROCESS_FAILED = 'CONVERSION_PROCESS_FAILED',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
  QUEUE_CAPACITY_EXCEEDED = 'QUEUE_CAPACITY_EXCEEDED',
}

export interface ErrorDescription {
  code: ErrorCode;
  message: string;
  suggestedAction: string;
}

const ERROR_DESCRIPTIONS: Record<ErrorCode, { message: string; suggestedAction: string }> = {
  [ErrorCode.FILE_NOT_FOUND]: {
    message: 'The file could not be found',
    suggestedAction: 'Check that the file still exists and try again.',
  },
  [ErrorCode.FILE_INVALID_FORMAT]: {
    message: 'This file is not a supported audio format',
    suggestedAction: 'Drop an MP3, WAV, M4A, AAC, FLAC, OGG or Opus file.',
  },
  [ErrorCode.FILE_CORRUPTED]: {
    message: 'The file appears to be damaged',
    suggestedAction: 'Try another copy of the file, or re-export it from the original source.',
  },
  [ErrorCode.FILE_TOO_LARGE]: {
    message: 'The file is too large',
    suggestedAction: 'Use a file smaller than 2 GB.',
  },
  [ErrorCode.DISK_SPACE_LOW]: {
    message: 'There is not enough free disk space',
    suggestedAction: 'Free up space on the output drive, or choose another output folder.',
  },
  [ErrorCode.PERMISSION_DENIED]: {
    message: 'The file or folder cannot be accessed',
    suggestedAction: 'Check read permission on the file and write permission on the output folder.',
  },
  [ErrorCode.CONVERSION_PROCESS_FAILED]: {
    message: 'The conversion failed',
    suggestedAction: 'Wait a moment and try again. Check that FFmpeg is installed if this keeps happening.',
  },
  [ErrorCode.OPERATION_CANCELLED]: {
    message: 'The conversion was cancelled',
    suggestedAction: 'Drop the file again to restart the conversion.',
  },
  [ErrorCode.QUEUE_CAPACITY_EXCEEDED]: {
    message: 'Too many files are waiting to be converted',
    suggestedAction: 'Wait for some conversions to finish before adding more files.',
  },
};

export function describeError(code: ErrorCode): ErrorDescription {
  return { code, ...ERROR_DESCRIPTIONS[code] };
}

/**
 * Error carrying a taxonomy code. The message is technical detail for logs;
 * user-facing text comes from describeError(code).
 */
export class ConversionError extends Error {
  constructor(
    readonly code: ErrorCode,
    message?: string,
  ) {
    super(message ?? ERROR_DESCRIPTIONS[code].message);
    this.name = 'ConversionError';
  }
}

/**
 * Thrown when ConversionJob is asked for a transition its current state forbids.
 * This is a coordinator bug, never a user-facing condition.
 */
export class IllegalTransitionError extends Error {
  constructor(jobId: string, from: string, action: string) {
    super(`Illegal transition for job ${jobId}: cannot ${action} from ${from}`);
    this.name = 'IllegalTransitionError';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

// FFmpeg stderr phrases worth a more specific code than a generic failure
const STDERR_PATTERNS: Array<[RegExp, ErrorCode]> = [
  [/No space left on device/i, ErrorCode.DISK_SPACE_LOW],
  [/Permission denied/i, ErrorCode.PERMISSION_DENIED],
  [/Invalid data found when processing input|could not find codec parameters|moov atom not found/i, ErrorCode.FILE_CORRUPTED],
  [/No such file or directory/i, ErrorCode.FILE_NOT_FOUND],
];

export function classifyStderr(stderr: string): ErrorCode {
  for (const [pattern, code] of STDERR_PATTERNS) {
    if (pattern.test(stderr)) {
      return code;
    }
  }
  return ErrorCode.CONVERSION_PROCESS_FAILED;
}

/**
 * Map anything thrown at a process or filesystem boundary onto the taxonomy.
 */
export function classifyError(error: unknown): ErrorCode {
  if (error instanceof ConversionError) {
    return error.code;
  }

  if (isErrnoException(error)) {
    switch (error.code) {
      case 'ENOENT':
        // A missing binary is a process failure, not a missing input
        return error.syscall?.startsWith('spawn') ? ErrorCode.CONVERSION_PROCESS_FAILED : ErrorCode.FILE_NOT_FOUND;
      case 'EACCES':
      case 'EPERM':
      case 'EROFS':
      // A file sits where the output folder should be
      case 'ENOTDIR':
      case 'EEXIST':
        return ErrorCode.PERMISSION_DENIED;
      case 'ENOSPC':
        return ErrorCode.DISK_SPACE_LOW;
    }
  }

  return ErrorCode.CONVERSION_PROCESS_FAILED;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
