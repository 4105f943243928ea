/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AnalysisCancelledError,
  CircuitOpenError,
  ConfigurationError,
  describeError,
  ErrorCode,
  EvaluatorFailure,
  ExternalServiceError,
  isDetectionError,
  OperationTimeoutError,
} from '@/lib/errors';

describe('Errors', () => {
  it('should serialize configuration errors with their field list', () => {
    const error = new ConfigurationError('Invalid fusion weights', [
      { field: 'qr', message: 'must be between 0 and 1' },
    ]);

    expect(error.toJSON()).toEqual({
      type: 'urn:phish-risk-engine:error:configuration-error',
      title: 'Invalid Configuration',
      detail: 'Invalid fusion weights',
      code: ErrorCode.CONFIGURATION_ERROR,
      errors: [{ field: 'qr', message: 'must be between 0 and 1' }],
    });
  });

  it('should name the evaluator and keep the cause', () => {
    const cause = new Error('model offline');
    const failure = new EvaluatorFailure('content', cause);

    expect(failure.message).toBe('content failed: model offline');
    expect(failure.cause).toBe(cause);
    expect(failure.toJSON()).toMatchObject({ code: 'EVALUATOR_FAILURE', evaluator: 'content' });
  });

  it('should classify breaker errors as external service errors', () => {
    const open = new CircuitOpenError('whois');
    const timeout = new OperationTimeoutError('classifier', 250);

    expect(open).toBeInstanceOf(ExternalServiceError);
    expect(open.code).toBe(ErrorCode.CIRCUIT_OPEN);
    expect(open.service).toBe('whois');
    expect(timeout.message).toBe('Operation timed out after 250ms');
    expect(timeout.toJSON().type).toBe('urn:phish-risk-engine:error:operation-timeout');
  });

  it('should describe cancellations with and without a reason', () => {
    expect(new AnalysisCancelledError().message).toBe('Analysis cancelled');
    expect(new AnalysisCancelledError(new Error('shutdown')).message).toBe('Analysis cancelled: shutdown');
  });

  it('should describe any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });

  it('should recognize engine errors', () => {
    expect(isDetectionError(new CircuitOpenError('qr-codec'))).toBe(true);
    expect(isDetectionError(new Error('other'))).toBe(false);
  });
});
