import { logger, type LogMeta } from './logger.js';

export class LedgerError extends Error {
  public readonly code: string;
  public readonly userMessage: string;
  public readonly context?: LogMeta;

  constructor(
    message: string,
    code: string = 'UNKNOWN_ERROR',
    userMessage?: string,
    context?: LogMeta
  ) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.userMessage = userMessage || message;
    this.context = context;
  }
}

export class ValidationError extends LedgerError {
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

export class RulesetLoadError extends LedgerError {
  constructor(message: string, file?: string, context?: LogMeta) {
    super(
      message,
      'RULESET_LOAD_ERROR',
      `Could not load rule data${file ? ` from ${file}` : ''}.`,
      { file, ...context }
    );
    this.name = 'RulesetLoadError';
  }
}

export class SaveStoreError extends LedgerError {
  constructor(message: string, operation?: string, context?: LogMeta) {
    super(
      message,
      'SAVE_STORE_ERROR',
      'Save file operation failed.',
      { operation, ...context }
    );
    this.name = 'SaveStoreError';
  }
}

export class QualityLookupError extends LedgerError {
  constructor(message: string, query?: string, matches?: string[]) {
    super(
      message,
      'QUALITY_LOOKUP_ERROR',
      matches && matches.length > 0 ? `${message}:\n\t${matches.join('\n\t')}` : message,
      { query, matches }
    );
    this.name = 'QualityLookupError';
  }
}

// Error reporting helpers
export function formatErrorForUser(error: unknown): string {
  if (error instanceof LedgerError) {
    return error.userMessage;
  }

  return error instanceof Error ? error.message : 'An unexpected error occurred.';
}

export function formatErrorForLogging(error: unknown, context?: LogMeta): LogMeta {
  const baseInfo: LogMeta = {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    name: error instanceof Error ? error.name : 'Unknown',
    ...context
  };

  if (error instanceof LedgerError) {
    return {
      ...baseInfo,
      code: error.code,
      userMessage: error.userMessage,
      context: error.context
    };
  }

  return baseInfo;
}

export function trackError(error: unknown, context?: LogMeta) {
  logger.error('Error tracked', formatErrorForLogging(error, context));
}
