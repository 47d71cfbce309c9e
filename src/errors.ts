/**
 * Custom Error Classes for BVH Operations
 *
 * Error handling with Zod validation and tagged union pattern.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base BVH Error Class
 *
 * Base error class for all BVH operations with tagged union pattern.
 */
export abstract class BaseBvhError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * BVH Parse Error
 *
 * Grammar violation in BVH text: missing keyword, wrong brace, bad channel
 * count. The parse aborts; there is no partial document.
 */
export class BvhParseError extends BaseBvhError {
  readonly _tag: 'BvhParseError' | 'BvhNumericParseError' = 'BvhParseError';
  readonly code: string = ERROR_CODES.PARSE_ERROR;
  readonly offset: number;
  readonly expected: string;
  readonly contextWindow: string;

  constructor(offset: number, expected: string, contextWindow: string) {
    super(
      `Failed to parse BVH data at position ${offset}. Expected ${expected} around here: ${contextWindow}`,
      { offset, expected, contextWindow }
    );
    this.offset = offset;
    this.expected = expected;
    this.contextWindow = contextWindow;
  }
}

/**
 * BVH Numeric Parse Error
 *
 * Malformed integer or float at a known position.
 */
export class BvhNumericParseError extends BvhParseError {
  readonly _tag = 'BvhNumericParseError' as const;
  readonly code = ERROR_CODES.NUMERIC_PARSE_ERROR;
}

/**
 * BVH Name Resolution Error
 *
 * A BVH joint name has no matching rig node.
 */
export class BvhNameResolutionError extends BaseBvhError {
  readonly _tag = 'BvhNameResolutionError' as const;
  readonly code = ERROR_CODES.NAME_RESOLUTION_ERROR;
  readonly jointName: string;
  readonly searchedUnder: string | null;

  constructor(message: string, jointName: string, searchedUnder: string | null, context?: Record<string, unknown>) {
    super(message, { jointName, searchedUnder, ...context });
    this.jointName = jointName;
    this.searchedUnder = searchedUnder;
  }
}

/**
 * BVH State Error
 *
 * An operation was called before its precondition was met, such as
 * capturing frames before the hierarchy exists.
 */
export class BvhStateError extends BaseBvhError {
  readonly _tag = 'BvhStateError' as const;
  readonly code = ERROR_CODES.STATE_ERROR;
  readonly operation: string;

  constructor(message: string, operation: string, context?: Record<string, unknown>) {
    super(message, { operation, ...context });
    this.operation = operation;
  }
}

/**
 * BVH Configuration Error
 *
 * Error for configuration validation failures.
 */
export class BvhConfigError extends BaseBvhError {
  readonly _tag = 'BvhConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;
  readonly zodError?: ZodError;

  constructor(message: string, configKey: string, zodError?: ZodError) {
    super(message, { configKey, zodError });
    this.configKey = configKey;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * BVH File System Error
 *
 * Error for file system operations.
 */
export class BvhFileSystemError extends BaseBvhError {
  readonly _tag = 'BvhFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all BVH errors
 */
export type BvhError =
  | BvhParseError
  | BvhNumericParseError
  | BvhNameResolutionError
  | BvhStateError
  | BvhConfigError
  | BvhFileSystemError;

/**
 * Error factory functions
 */
export const BvhErrorFactory = {
  /**
   * Create structural parse error
   */
  parseError(offset: number, expected: string, contextWindow: string): BvhParseError {
    return new BvhParseError(offset, expected, contextWindow);
  },

  /**
   * Create numeric parse error
   */
  numericParseError(offset: number, expected: string, contextWindow: string): BvhNumericParseError {
    return new BvhNumericParseError(offset, expected, contextWindow);
  },

  /**
   * Create name resolution error
   */
  nameResolutionError(message: string, jointName: string, searchedUnder: string | null, context?: Record<string, unknown>): BvhNameResolutionError {
    return new BvhNameResolutionError(message, jointName, searchedUnder, context);
  },

  /**
   * Create precondition error
   */
  stateError(message: string, operation: string, context?: Record<string, unknown>): BvhStateError {
    return new BvhStateError(message, operation, context);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, zodError?: ZodError): BvhConfigError {
    return new BvhConfigError(message, configKey, zodError);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): BvhFileSystemError {
    return new BvhFileSystemError(message, filePath, operation, context);
  },
};
