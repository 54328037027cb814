/**
 * Unit tests for the error types
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ConfigValidationError,
  ErrorCategory,
  FeatureDisabledError,
  IssueNotFoundError,
  ReentrancyError,
  SafetyHubError,
  UnknownSourceError,
  categorizeError,
  createErrorResponse,
  logError
} from '../../../types/index.js';

describe('Error handling', () => {
  it('should categorize hub errors by their class', () => {
    expect(categorizeError(new ConfigValidationError('bad'))).toBe(ErrorCategory.INVALID_CONFIG);
    expect(categorizeError(new UnknownSourceError('x'))).toBe(ErrorCategory.UNKNOWN_SOURCE);
    expect(categorizeError(new IssueNotFoundError('gone'))).toBe(ErrorCategory.UNKNOWN_ISSUE);
    expect(categorizeError(new ReentrancyError())).toBe(ErrorCategory.REENTRANT_CALL);
    expect(categorizeError(new FeatureDisabledError('op'))).toBe(ErrorCategory.FEATURE_DISABLED);
    expect(categorizeError(new Error('plain'))).toBe(ErrorCategory.UNKNOWN);
    expect(categorizeError('text')).toBe(ErrorCategory.UNKNOWN);
  });

  it('should list configuration issues in the message', () => {
    const error = new ConfigValidationError('Invalid config', ['a: missing', 'b: duplicate']);
    expect(error.message).toBe('Invalid config: a: missing; b: duplicate');
    expect(error.issues).toEqual(['a: missing', 'b: duplicate']);
    expect(new ConfigValidationError('Invalid config').message).toBe('Invalid config');
  });

  it('should build responses from hub errors', () => {
    const error = new SafetyHubError('missing issue', ErrorCategory.UNKNOWN_ISSUE, false, 'corr-1');
    const response = error.toErrorResponse();

    expect(response.errorCode).toBe('ERR_UNKNOWN_ISSUE');
    expect(response.technicalDetails).toBe('missing issue');
    expect(response.correlationId).toBe('corr-1');
    expect(response.retryable).toBe(false);
  });

  it('should build responses from other values', () => {
    const response = createErrorResponse(new Error('plain'), 'corr-2');
    expect(response.category).toBe(ErrorCategory.UNKNOWN);
    expect(response.errorCode).toBe('ERR_UNKNOWN');
    expect(response.technicalDetails).toBe('plain');
    expect(response.correlationId).toBe('corr-2');
    expect(createErrorResponse(404).technicalDetails).toBe('404');
  });

  it('should log errors with their context', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logError(new UnknownSourceError('x'), { operation: 'setSourceData' });

    expect(errorSpy).toHaveBeenCalledWith(
      '[SafetyHubError]',
      expect.objectContaining({
        category: ErrorCategory.UNKNOWN_SOURCE,
        errorCode: 'ERR_UNKNOWN_SOURCE',
        technicalDetails: 'Unexpected source id: x',
        context: { operation: 'setSourceData' }
      })
    );
    errorSpy.mockRestore();
  });
});
