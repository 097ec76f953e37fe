/**
 * Application errors
 *
 * Every error the HTTP layer knows how to map extends AppError.
 * `expose` decides whether the message may reach the caller.
 */

export interface AppErrorOptions {
  cause?: unknown;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly expose: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    expose: boolean,
    options: AppErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.expose = expose;
  }
}

/**
 * Caller-supplied value broke a documented precondition
 */
export class InvalidArgumentError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, 400, 'INVALID_ARGUMENT', true, options);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Unexpected failure; message stays in server logs
 */
export class InternalError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, 500, 'INTERNAL', false, options);
    this.name = 'InternalError';
  }
}

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

/**
 * Request did not match its schema (422)
 */
export class RequestValidationError extends AppError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      issues.map(i => `${i.loc.join('.')}: ${i.msg}`).join('; '),
      422,
      'VALIDATION_ERROR',
      true
    );
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}
