/**
 * html5-conformance-harness - Error Codes
 *
 * Every failure the harness raises on purpose is a HarnessError carrying a
 * stable numeric code and the process exit status the CLI should end with.
 *
 * Error Code Ranges:
 * - 1xxx: Fixture corpus errors
 * - 2xxx: Engine / batch protocol errors
 * - 3xxx: Allowlist and history errors
 * - 4xxx: Configuration and usage errors
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCode = {
  /** A fixture file is malformed (missing directive, bad JSON shape) */
  CORPUS_FORMAT_ERROR: 1001,

  /** Engine exited non-zero, printed bad output, or answered the wrong count */
  PROTOCOL_ERROR: 2001,

  /** Engine did not finish within the configured wall-clock budget */
  ENGINE_TIMEOUT: 2002,

  /** The engine build command failed */
  ENGINE_BUILD_ERROR: 2003,

  /** Allowlist document failed validation */
  ALLOWLIST_ERROR: 3001,

  /** A revision could not be resolved or read from version control */
  HISTORY_ERROR: 3002,

  /** Invalid configuration file or value */
  CONFIG_ERROR: 4001,

  /** Bad command-line usage */
  USAGE_ERROR: 4002,
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export const ErrorCodeName: Record<ErrorCodeType, string> = {
  [ErrorCode.CORPUS_FORMAT_ERROR]: 'CORPUS_FORMAT_ERROR',
  [ErrorCode.PROTOCOL_ERROR]: 'PROTOCOL_ERROR',
  [ErrorCode.ENGINE_TIMEOUT]: 'ENGINE_TIMEOUT',
  [ErrorCode.ENGINE_BUILD_ERROR]: 'ENGINE_BUILD_ERROR',
  [ErrorCode.ALLOWLIST_ERROR]: 'ALLOWLIST_ERROR',
  [ErrorCode.HISTORY_ERROR]: 'HISTORY_ERROR',
  [ErrorCode.CONFIG_ERROR]: 'CONFIG_ERROR',
  [ErrorCode.USAGE_ERROR]: 'USAGE_ERROR',
};

/** Exit status for a run that found mismatches or a regression. */
export const EXIT_FAILURE = 1;

/** Exit status for usage and validation errors. */
export const EXIT_USAGE = 2;

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all harness errors.
 *
 * Error Hierarchy:
 * - HarnessError (base)
 *   - CorpusFormatError: malformed fixture; fatal for that fixture
 *   - ProtocolError: batch failed as a whole
 *     - EngineTimeoutError: batch exceeded its wall-clock budget
 *   - EngineBuildError: build command failed
 *   - AllowlistError: allowlist document is invalid
 *   - HistoryError: historical snapshot unavailable
 *   - ConfigError: configuration could not be resolved
 *   - UsageError: bad CLI arguments
 *
 * @example
 * ```typescript
 * try {
 *   loadAllowlist(config.allowlistPath);
 * } catch (error) {
 *   if (error instanceof HarnessError) {
 *     console.error(`[${error.codeName}] ${error.message}`);
 *     process.exitCode = error.exitCode;
 *   }
 * }
 * ```
 */
export class HarnessError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'HarnessError';
  }

  get codeName(): string {
    return ErrorCodeName[this.code];
  }

  toJSON(): { name: string; message: string; code: number; codeName: string } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: this.codeName,
    };
  }
}

// ============================================================================
// Specific Error Types
// ============================================================================

/**
 * A fixture file does not follow its family's grammar.
 *
 * Never recovered by skipping a single case: later case numbers would no
 * longer line up with the allowlist.
 */
export class CorpusFormatError extends HarnessError {
  constructor(
    message: string,
    public readonly fixture?: string
  ) {
    super(fixture ? `${fixture}: ${message}` : message, ErrorCode.CORPUS_FORMAT_ERROR, EXIT_USAGE);
    this.name = 'CorpusFormatError';
  }
}

/**
 * The engine batch failed as a whole. No element of its output is trusted.
 */
export class ProtocolError extends HarnessError {
  constructor(
    message: string,
    public readonly stderr?: string,
    code: ErrorCodeType = ErrorCode.PROTOCOL_ERROR
  ) {
    super(message, code, EXIT_FAILURE);
    this.name = 'ProtocolError';
  }
}

export class EngineTimeoutError extends ProtocolError {
  constructor(public readonly timeoutMs: number) {
    super(`engine timed out after ${timeoutMs}ms`, undefined, ErrorCode.ENGINE_TIMEOUT);
    this.name = 'EngineTimeoutError';
  }
}

export class EngineBuildError extends HarnessError {
  constructor(message: string) {
    super(message, ErrorCode.ENGINE_BUILD_ERROR, EXIT_FAILURE);
    this.name = 'EngineBuildError';
  }
}

export class AllowlistError extends HarnessError {
  constructor(message: string) {
    super(message, ErrorCode.ALLOWLIST_ERROR, EXIT_USAGE);
    this.name = 'AllowlistError';
  }
}

export class HistoryError extends HarnessError {
  constructor(message: string) {
    super(message, ErrorCode.HISTORY_ERROR, EXIT_USAGE);
    this.name = 'HistoryError';
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string) {
    super(message, ErrorCode.CONFIG_ERROR, EXIT_USAGE);
    this.name = 'ConfigError';
  }
}

export class UsageError extends HarnessError {
  constructor(message: string) {
    super(message, ErrorCode.USAGE_ERROR, EXIT_USAGE);
    this.name = 'UsageError';
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
