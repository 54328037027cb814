/**
 * Error Handling Types and Infrastructure for the Safety Status Hub
 *
 * Provides:
 * - Error categories and response types
 * - Error classes for configuration, source data and protocol failures
 * - Structured error logging
 */

// ==================== Error Category Enum ====================

/**
 * Error category enum for categorizing errors
 */
export enum ErrorCategory {
  /** Source configuration or persisted records are malformed */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** A source sent data that violates its configuration */
  INVALID_SOURCE_DATA = 'INVALID_SOURCE_DATA',
  /** A call referenced a source that is not configured */
  UNKNOWN_SOURCE = 'UNKNOWN_SOURCE',
  /** A call referenced an issue that is not currently reported */
  UNKNOWN_ISSUE = 'UNKNOWN_ISSUE',
  /** The critical section was entered while already held */
  REENTRANT_CALL = 'REENTRANT_CALL',
  /** The hub is disabled by configuration */
  FEATURE_DISABLED = 'FEATURE_DISABLED',
  /** Unknown error */
  UNKNOWN = 'UNKNOWN',
}

// ==================== Error Response Interface ====================

/**
 * Error response structure handed to callers of the hub
 */
export interface ErrorResponse {
  /** Error category */
  category: ErrorCategory;
  /** User-friendly message (safe to display) */
  userMessage: string;
  /** Technical details (for logging only, not shown to user) */
  technicalDetails?: string;
  /** Whether the operation can be retried */
  retryable: boolean;
  /** Suggested actions for the user */
  suggestedActions: string[];
  /** Error code for programmatic handling */
  errorCode?: string;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Correlation ID for tracking */
  correlationId?: string;
}

// ==================== Error Handlers ====================

/**
 * Default error responses for each category
 */
export const ERROR_HANDLERS: Record<ErrorCategory, Omit<ErrorResponse, 'technicalDetails' | 'timestamp' | 'correlationId'>> = {
  [ErrorCategory.INVALID_CONFIG]: {
    category: ErrorCategory.INVALID_CONFIG,
    userMessage: 'The safety source configuration could not be loaded.',
    retryable: false,
    suggestedActions: ['Fix configuration'],
    errorCode: 'ERR_INVALID_CONFIG',
  },
  [ErrorCategory.INVALID_SOURCE_DATA]: {
    category: ErrorCategory.INVALID_SOURCE_DATA,
    userMessage: 'A safety source sent data that could not be accepted.',
    retryable: false,
    suggestedActions: ['Check source data'],
    errorCode: 'ERR_INVALID_SOURCE_DATA',
  },
  [ErrorCategory.UNKNOWN_SOURCE]: {
    category: ErrorCategory.UNKNOWN_SOURCE,
    userMessage: 'That safety source is not configured.',
    retryable: false,
    suggestedActions: ['Check source id'],
    errorCode: 'ERR_UNKNOWN_SOURCE',
  },
  [ErrorCategory.UNKNOWN_ISSUE]: {
    category: ErrorCategory.UNKNOWN_ISSUE,
    userMessage: 'That issue is no longer reported.',
    retryable: false,
    suggestedActions: ['Refresh'],
    errorCode: 'ERR_UNKNOWN_ISSUE',
  },
  [ErrorCategory.REENTRANT_CALL]: {
    category: ErrorCategory.REENTRANT_CALL,
    userMessage: 'Something unexpected happened. Please try again.',
    retryable: true,
    suggestedActions: ['Retry'],
    errorCode: 'ERR_REENTRANT_CALL',
  },
  [ErrorCategory.FEATURE_DISABLED]: {
    category: ErrorCategory.FEATURE_DISABLED,
    userMessage: 'Safety status is turned off on this device.',
    retryable: false,
    suggestedActions: ['Enable the feature'],
    errorCode: 'ERR_FEATURE_DISABLED',
  },
  [ErrorCategory.UNKNOWN]: {
    category: ErrorCategory.UNKNOWN,
    userMessage: 'Something unexpected happened. Please try again.',
    retryable: true,
    suggestedActions: ['Retry', 'Contact support'],
    errorCode: 'ERR_UNKNOWN',
  },
};

// ==================== Custom Error Classes ====================

/**
 * Base error class for hub errors
 */
export class SafetyHubError extends Error {
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;
  public readonly correlationId: string;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    retryable: boolean = false,
    correlationId?: string
  ) {
    super(message);
    this.name = 'SafetyHubError';
    this.category = category;
    this.retryable = retryable;
    this.correlationId = correlationId || generateCorrelationId();
    this.timestamp = new Date();
  }

  /**
   * Convert to ErrorResponse for callers
   */
  toErrorResponse(): ErrorResponse {
    const handler = ERROR_HANDLERS[this.category];
    return {
      ...handler,
      technicalDetails: this.message,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }
}

/**
 * Error for malformed configuration; fatal at load time
 */
export class ConfigValidationError extends SafetyHubError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, ErrorCategory.INVALID_CONFIG);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Error for source data that violates the source configuration
 */
export class SourceDataValidationError extends SafetyHubError {
  public readonly sourceId: string;

  constructor(sourceId: string, message: string) {
    super(message, ErrorCategory.INVALID_SOURCE_DATA);
    this.name = 'SourceDataValidationError';
    this.sourceId = sourceId;
  }
}

/**
 * Error for a source id that is not in the configuration
 */
export class UnknownSourceError extends SafetyHubError {
  public readonly sourceId: string;

  constructor(sourceId: string) {
    super(`Unexpected source id: ${sourceId}`, ErrorCategory.UNKNOWN_SOURCE);
    this.name = 'UnknownSourceError';
    this.sourceId = sourceId;
  }
}

/**
 * Error for an issue or issue action that is not currently reported
 */
export class IssueNotFoundError extends SafetyHubError {
  constructor(message: string) {
    super(message, ErrorCategory.UNKNOWN_ISSUE);
    this.name = 'IssueNotFoundError';
  }
}

/**
 * Error for a nested entry into the critical section
 */
export class ReentrancyError extends SafetyHubError {
  constructor() {
    super('Critical section entered while already held', ErrorCategory.REENTRANT_CALL);
    this.name = 'ReentrancyError';
  }
}

/**
 * Error for operations attempted while the hub is disabled
 */
export class FeatureDisabledError extends SafetyHubError {
  constructor(operation: string) {
    super(`${operation} called while the hub is disabled`, ErrorCategory.FEATURE_DISABLED);
    this.name = 'FeatureDisabledError';
  }
}

// ==================== Utility Functions ====================

/**
 * Generate a correlation ID for error tracking
 */
export function generateCorrelationId(): string {
  return `err-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Categorize an error based on its type
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof SafetyHubError) {
    return error.category;
  }
  return ErrorCategory.UNKNOWN;
}

/**
 * Create an ErrorResponse from any error
 */
export function createErrorResponse(
  error: unknown,
  correlationId?: string
): ErrorResponse {
  if (error instanceof SafetyHubError) {
    return error.toErrorResponse();
  }

  const category = categorizeError(error);
  const handler = ERROR_HANDLERS[category];
  const technicalDetails = error instanceof Error ? error.message : String(error);

  return {
    ...handler,
    technicalDetails,
    timestamp: new Date(),
    correlationId: correlationId || generateCorrelationId(),
  };
}

/**
 * Log error for debugging (without exposing to user)
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const errorResponse = createErrorResponse(error);

  console.error('[SafetyHubError]', {
    category: errorResponse.category,
    errorCode: errorResponse.errorCode,
    correlationId: errorResponse.correlationId,
    timestamp: errorResponse.timestamp,
    technicalDetails: errorResponse.technicalDetails,
    context,
  });
}
