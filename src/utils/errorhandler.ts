import { logger } from './logger.js';

export class TrackerError extends Error {
  public readonly code: string;
  public readonly userMessage: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'UNKNOWN_ERROR',
    userMessage?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TrackerError';
    this.code = code;
    this.userMessage = userMessage || 'Something went wrong. Please try again.';
    this.context = context;
  }
}

// Rejected at the boundary: bad dates, out-of-range progress, duplicate check-ins.
export class ValidationError extends TrackerError {
  constructor(message: string, field?: string, value?: unknown) {
    super(
      message,
      'VALIDATION_ERROR',
      `Invalid input: ${message}`,
      { field, value }
    );
    this.name = 'ValidationError';
  }
}

export class MissingRecordError extends TrackerError {
  public readonly key: string;

  constructor(key: string, context?: Record<string, unknown>) {
    super(
      `Record not found: ${key}`,
      'MISSING_RECORD',
      `Nothing stored under ${key}.`,
      { key, ...context }
    );
    this.name = 'MissingRecordError';
    this.key = key;
  }
}

export class MalformedRecordError extends TrackerError {
  public readonly key: string;

  constructor(key: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Malformed record ${key}: ${reason}`,
      'MALFORMED_RECORD',
      `The record ${key} could not be read. Fix or restore the file and retry.`,
      { key, reason, ...context }
    );
    this.name = 'MalformedRecordError';
    this.key = key;
  }
}

export function isRecordError(error: unknown): error is MissingRecordError | MalformedRecordError {
  return error instanceof MissingRecordError || error instanceof MalformedRecordError;
}

// Error reporting helpers
export function formatErrorForUser(error: unknown): string {
  if (error instanceof TrackerError) {
    return error.userMessage;
  }

  return 'An unexpected error occurred. Please try again.';
}

export function formatErrorForLogging(error: unknown, context?: Record<string, unknown>) {
  const baseInfo = {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    name: error instanceof Error ? error.name : 'Unknown',
    ...context
  };

  if (error instanceof TrackerError) {
    return {
      ...baseInfo,
      code: error.code,
      userMessage: error.userMessage,
      context: error.context
    };
  }

  return baseInfo;
}

export function trackError(error: unknown, context?: Record<string, unknown>) {
  logger.error('Error tracked', formatErrorForLogging(error, context));
}
