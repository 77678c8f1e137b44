/**
 * Error taxonomy for the crawler.
 *
 * Only INVALID_TARGET stops work on a target before any network traffic.
 * Nothing here is allowed to abort a batch run.
 */

export type ErrorCode =
  | 'INVALID_TARGET'
  | 'TRANSPORT_MISS'
  | 'PAGE_MISS'
  | 'STATE_CORRUPTION'
  | 'BUDGET_EXHAUSTED'
  | 'NOTIFY_FAILED';

export interface ErrorInfo {
  title: string;
  severity: 'info' | 'warning' | 'error';
  fatalForTarget: boolean;
}

export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  INVALID_TARGET: {
    title: 'Invalid target',
    severity: 'error',
    fatalForTarget: true,
  },
  TRANSPORT_MISS: {
    title: 'Attempt missed',
    severity: 'info',
    fatalForTarget: false,
  },
  PAGE_MISS: {
    title: 'Every attempt for the step missed',
    severity: 'info',
    fatalForTarget: false,
  },
  STATE_CORRUPTION: {
    title: 'State file unreadable, reset from backup',
    severity: 'warning',
    fatalForTarget: false,
  },
  BUDGET_EXHAUSTED: {
    title: 'Page or cycle budget reached',
    severity: 'info',
    fatalForTarget: false,
  },
  NOTIFY_FAILED: {
    title: 'Notification delivery failed',
    severity: 'error',
    fatalForTarget: false,
  },
};

export class CrawlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CrawlError';
    this.code = code;
  }
}

export class InvalidTargetError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_TARGET', message, options);
    this.name = 'InvalidTargetError';
  }
}

export class StateCorruptionError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STATE_CORRUPTION', message, options);
    this.name = 'StateCorruptionError';
  }
}

export class NotifyError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOTIFY_FAILED', message, options);
    this.name = 'NotifyError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof CrawlError) {
    return `${ERROR_TAXONOMY[error.code].title}: ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
