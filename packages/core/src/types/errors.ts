/**
 * Error hierarchy for yangtree
 * Structured errors with a stable code, context and exit code
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  module?: string; // Module name the error relates to
  revision?: string; // Requested module revision
  schemaPath?: string; // Schema node identifier (e.g. '/ex:top/ex:inner')
  documentPath?: string; // JSON Pointer into the schema document
  setting?: string; // Option name for configuration errors
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface YangTreeErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

type SubclassParams = Omit<YangTreeErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

/**
 * Base error class for all yangtree errors
 */
export abstract class YangTreeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: YangTreeErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Schema document errors (structure, dangling references)
 */
export class SchemaError extends YangTreeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCHEMA_DOCUMENT,
    });
  }

  get documentPath(): string | undefined {
    return this.context?.documentPath;
  }
}

/**
 * A module, revision or augment target that the schema context does not hold
 */
export class NotFoundError extends YangTreeError {
  constructor(
    what: 'Module' | 'Augment target',
    name: string,
    context: ErrorContext = {}
  ) {
    super({
      message: `${what} not found: ${name}`,
      errorCode:
        what === 'Module'
          ? ErrorCode.MODULE_NOT_FOUND
          : ErrorCode.AUGMENT_TARGET_NOT_FOUND,
      context,
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends YangTreeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Schema document could not be read as JSON
 */
export class ParseError extends YangTreeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR,
    });
  }
}

/**
 * Wraps anything thrown that is not a YangTreeError
 */
export class InternalError extends YangTreeError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isYangTreeError(error: unknown): error is YangTreeError {
  return error instanceof YangTreeError;
}
