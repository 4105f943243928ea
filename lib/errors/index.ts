/**
 * Error taxonomy
 *
 * Every error raised by the engine carries a stable code and serializes to a
 * problem-details shape, so the transport layer can marshal it unchanged.
 */

export const ErrorCode = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  EVALUATOR_FAILURE: 'EVALUATOR_FAILURE',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  CIRCUIT_OPEN: 'CIRCUIT_OPEN',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  ANALYSIS_CANCELLED: 'ANALYSIS_CANCELLED',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface FieldError {
  field: string;
  message: string;
}

export interface ProblemDetails {
  type: string;
  title: string;
  detail: string;
  code: ErrorCodeValue;
  [key: string]: unknown;
}

const ERROR_TITLES: Record<ErrorCodeValue, string> = {
  CONFIGURATION_ERROR: 'Invalid Configuration',
  EVALUATOR_FAILURE: 'Evaluator Failed',
  EXTERNAL_SERVICE_ERROR: 'External Service Unavailable',
  CIRCUIT_OPEN: 'Circuit Open',
  OPERATION_TIMEOUT: 'Operation Timed Out',
  ANALYSIS_CANCELLED: 'Analysis Cancelled',
};

/**
 * Base class for all engine errors
 */
export class DetectionError extends Error {
  readonly code: ErrorCodeValue;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodeValue, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DetectionError';
    this.code = code;
    this.details = details;
  }

  toJSON(): ProblemDetails {
    return {
      type: `urn:phish-risk-engine:error:${this.code.toLowerCase().replace(/_/g, '-')}`,
      title: ERROR_TITLES[this.code],
      detail: this.message,
      code: this.code,
      ...this.details,
    };
  }
}

/**
 * Invalid configuration. Raised at construction time only, never retried.
 */
export class ConfigurationError extends DetectionError {
  readonly errors: FieldError[];

  constructor(message: string, errors: FieldError[] = []) {
    super(message, ErrorCode.CONFIGURATION_ERROR, errors.length > 0 ? { errors } : undefined);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

/**
 * An evaluator threw or timed out. Converted to a neutral finding by the analyzer.
 */
export class EvaluatorFailure extends DetectionError {
  readonly evaluator: string;

  constructor(evaluator: string, cause: unknown) {
    super(`${evaluator} failed: ${describeError(cause)}`, ErrorCode.EVALUATOR_FAILURE, { evaluator }, { cause });
    this.name = 'EvaluatorFailure';
    this.evaluator = evaluator;
  }
}

/**
 * A collaborator outside the process (registration lookup, classifier, codec) failed.
 */
export class ExternalServiceError extends DetectionError {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown; code?: ErrorCodeValue }) {
    super(message, options?.code ?? ErrorCode.EXTERNAL_SERVICE_ERROR, { service }, { cause: options?.cause });
    this.name = 'ExternalServiceError';
    this.service = service;
  }
}

export class CircuitOpenError extends ExternalServiceError {
  constructor(service: string) {
    super(service, 'Circuit is open', { code: ErrorCode.CIRCUIT_OPEN });
    this.name = 'CircuitOpenError';
  }
}

export class OperationTimeoutError extends ExternalServiceError {
  readonly timeoutMs: number;

  constructor(service: string, timeoutMs: number) {
    super(service, `Operation timed out after ${timeoutMs}ms`, { code: ErrorCode.OPERATION_TIMEOUT });
    this.name = 'OperationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The caller aborted the analysis; no result is produced.
 */
export class AnalysisCancelledError extends DetectionError {
  constructor(reason?: unknown) {
    super(
      reason === undefined ? 'Analysis cancelled' : `Analysis cancelled: ${describeError(reason)}`,
      ErrorCode.ANALYSIS_CANCELLED,
      undefined,
      { cause: reason }
    );
    this.name = 'AnalysisCancelledError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function isDetectionError(error: unknown): error is DetectionError {
  return error instanceof DetectionError;
}
