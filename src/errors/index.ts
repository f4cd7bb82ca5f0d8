/**
 * Error types for cluster deployment and stabilization.
 *
 * Every failure surfaced by a deploy or clean call is an ApplicationError.
 * Wrappers (StepError, StabilityError) keep the original error as `cause`,
 * so the message reads as a chain: "waiting for resources to be stable: job/migrate: ...".
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;
  public override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    cause?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      ...(this.cause && { cause: this.cause.message }),
    };
  }
}

/**
 * The command channel could not be reached at all
 */
export class ConnectionError extends ApplicationError {
  constructor(message: string, cause?: Error, context?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', context, cause);
  }
}

/**
 * The remote side rejected the command before running it
 */
export class DispatchError extends ApplicationError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, 'DISPATCH_ERROR', { ...context, statusCode }, cause);
  }
}

/**
 * The remote command ran and exited non-zero
 */
export class CommandFailure extends ApplicationError {
  constructor(
    public readonly exitCode: number,
    public readonly command?: string,
    context?: Record<string, unknown>,
  ) {
    super(`command failed with exit code ${exitCode}`, 'COMMAND_FAILED', {
      ...context,
      exitCode,
      command,
    });
  }
}

/**
 * The operation reached a failed terminal state without reporting an exit code
 */
export class TransportFailure extends ApplicationError {
  constructor(
    message: string,
    public readonly reason?: string,
    cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, 'TRANSPORT_FAILURE', { ...context, reason }, cause);
  }
}

export class SerializationError extends ApplicationError {
  constructor(
    message: string,
    public readonly index: number,
    cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, 'SERIALIZATION_ERROR', { ...context, index }, cause);
  }
}

/**
 * The caller's signal fired while waiting. The remote command keeps running.
 */
export class CancelledError extends ApplicationError {
  constructor(message = 'operation cancelled', cause?: Error) {
    super(message, 'CANCELLED', {}, cause);
  }
}

export class CredentialError extends ApplicationError {
  constructor(message: string, cause?: Error) {
    super(message, 'CREDENTIAL_ERROR', {}, cause);
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly configKeys: string[] = [],
  ) {
    super(message, 'CONFIG_ERROR', { configKeys });
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, field });
  }
}

export type DeployStep = 'Packaging' | 'Submitting' | 'AwaitingCompletion' | 'CheckingStability';

const STEP_DESCRIPTIONS: Record<DeployStep, string> = {
  Packaging: 'packaging manifests',
  Submitting: 'submitting command',
  AwaitingCompletion: 'waiting for command to complete',
  CheckingStability: 'waiting for resources to be stable',
};

/**
 * Wraps the failure of one orchestration step
 */
export class StepError extends ApplicationError {
  constructor(
    public readonly step: DeployStep,
    cause: Error,
    context?: Record<string, unknown>,
  ) {
    super(`${STEP_DESCRIPTIONS[step]}: ${cause.message}`, 'STEP_FAILED', { ...context, step }, cause);
  }
}

/**
 * Failure of one command inside a stability check, e.g. "following job logs"
 */
export class CheckError extends ApplicationError {
  constructor(
    public readonly check: string,
    cause: Error,
  ) {
    super(`${check}: ${cause.message}`, 'CHECK_FAILED', { check }, cause);
  }
}

/**
 * First failed stability check of a deploy, tagged with the object it belongs to
 */
export class StabilityError extends ApplicationError {
  constructor(
    public readonly kind: string,
    public readonly objectName: string,
    public readonly namespace: string,
    cause: Error,
    public readonly additionalFailures = 0,
  ) {
    super(
      `${kind}/${objectName} in namespace ${namespace}: ${cause.message}`,
      'UNSTABLE',
      { kind, name: objectName, namespace, additionalFailures },
      cause,
    );
  }
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : String(error));
}

/**
 * Walk the cause chain to the innermost error
 */
export function rootCause(error: Error): Error {
  let current = error;
  while (current.cause instanceof Error) {
    current = current.cause;
  }
  return current;
}

/**
 * True when a CancelledError sits anywhere in the cause chain
 */
export function isCancellation(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof CancelledError) {
      return true;
    }
    current = current.cause;
  }
  return false;
}
