/**
 * Error hierarchy for objfuzz
 * Every failure carries a stable ErrorCode plus structured context.
 */

import { ErrorCode, getErrorPhase, type ErrorPhase } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  type?: string; // name of the class or type token involved
  property?: string; // human-readable property description
  value?: unknown; // offending value, may be arbitrary user data
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  phase: ErrorPhase;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface FuzzErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all objfuzz errors
 */
export abstract class FuzzError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: FuzzErrorParams) {
    const { message, errorCode, context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get phase(): ErrorPhase {
    return getErrorPhase(this.errorCode);
  }

  /**
   * Serialize error to JSON for logging and debugging.
   * The stack is omitted unless requested since traces of deep recursive
   * passes get long.
   */
  toJSON(includeStack = false): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      phase: this.phase,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (includeStack) {
      base.stack = this.stack;
    }
    return base;
  }
}

type SubclassParams = Omit<FuzzErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

/**
 * Registration-time errors: bad arguments, duplicate rules, unknown properties
 */
export class ConfigurationError extends FuzzError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INVALID_ARGUMENT });
  }
}

/**
 * No rule could be found for a property after exhausting the resolver chain
 */
export class ResolutionError extends FuzzError {
  constructor(params: Omit<FuzzErrorParams, 'errorCode'>) {
    super({ ...params, errorCode: ErrorCode.RULE_NOT_FOUND });
  }
}

/**
 * Two values of related classes would be compared with different equality rules
 */
export class EqualityConflictError extends FuzzError {
  constructor(params: Omit<FuzzErrorParams, 'errorCode'>) {
    super({ ...params, errorCode: ErrorCode.AMBIGUOUS_EQUALITY });
  }
}

/**
 * The non-equality wrapper ran out of attempts
 */
export class RetryExhaustedError extends FuzzError {
  public readonly attempts: number;

  constructor(params: Omit<FuzzErrorParams, 'errorCode'> & { attempts: number }) {
    const { attempts, ...rest } = params;
    super({
      ...rest,
      errorCode: ErrorCode.RETRY_EXHAUSTED,
      context: { attempts, ...(rest.context ?? {}) },
    });
    this.attempts = attempts;
  }
}

/**
 * A property could not be read or written on the target object
 */
export class PropertyAccessError extends FuzzError {
  constructor(params: Omit<FuzzErrorParams, 'errorCode'>) {
    super({ ...params, errorCode: ErrorCode.ACCESS_DENIED });
  }
}

export function isFuzzError(error: unknown): error is FuzzError {
  return error instanceof FuzzError;
}
