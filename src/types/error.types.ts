// Error taxonomy shared by the store, the carrier client and the services

export type TrackingErrorType =
  | 'DuplicateError'
  | 'NotFoundError'
  | 'TransportError'
  | 'DecodeError'
  | 'ValidationError';

export abstract class TrackingError extends Error {
  abstract readonly errorType: TrackingErrorType;
}

export class DuplicateError extends TrackingError {
  readonly errorType = 'DuplicateError';

  constructor(public readonly trackingNumber: string) {
    super(`Package ${trackingNumber} is already tracked`);
    this.name = 'DuplicateError';
  }
}

export class NotFoundError extends TrackingError {
  readonly errorType = 'NotFoundError';

  constructor(public readonly trackingNumber: string) {
    super(`Package ${trackingNumber} not found`);
    this.name = 'NotFoundError';
  }
}

export class TransportError extends TrackingError {
  readonly errorType = 'TransportError';

  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class DecodeError extends TrackingError {
  readonly errorType = 'DecodeError';

  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
    this.name = 'DecodeError';
  }
}

export class ValidationError extends TrackingError {
  readonly errorType = 'ValidationError';

  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
    this.name = 'ValidationError';
  }
}

export function isTrackingError(error: unknown): error is TrackingError {
  return error instanceof TrackingError;
}

/**
 * Flattens zod issues into `path: message` strings.
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
