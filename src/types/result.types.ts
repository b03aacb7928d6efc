// Result types for service responses

import { PackageStatus, PackageWithEvents, TrackedPackage } from './domain.types';
import { TrackingErrorType } from './error.types';

/**
 * Outcome of applying one status+events payload to a package.
 */
export interface MergeResult {
  readonly trackingNumber: string;
  readonly previousStatus: PackageStatus;
  readonly status: PackageStatus;
  readonly statusChanged: boolean;
  readonly eventsAdded: number;
}

export interface SyncItemError {
  trackingNumber: string;
  errorType: TrackingErrorType | 'UnexpectedError';
  message: string;
}

export interface SyncResult {
  readonly success: true;
  readonly requested: number;
  readonly synced: number;
  readonly unchanged: string[];     // requested but absent from the carrier response
  readonly errors: SyncItemError[];
  readonly message: string;
}

export interface ImportRecordError {
  index: number;
  trackingNumber?: string;
  errorType: TrackingErrorType | 'UnexpectedError';
  message: string;
}

export interface ImportResult {
  readonly success: true;
  readonly imported: number;
  readonly skipped: number;         // duplicates
  readonly errors: ImportRecordError[];
}

export interface ExportResult {
  readonly success: true;
  readonly count: number;
  readonly outputPath?: string;
  readonly packages: PackageWithEvents[];
}

export interface ListResult {
  readonly success: true;
  readonly count: number;
  readonly statusFilter: PackageStatus | 'all';
  readonly packages: TrackedPackage[];
}

/**
 * Webhook acknowledgement. `applied` stays internal; the HTTP layer
 * only echoes `success` and `trackingNumber`.
 */
export interface WebhookResult {
  readonly success: true;
  readonly trackingNumber: string | null;
  readonly applied: boolean;
}

/**
 * Failure envelope printed by the CLI.
 */
export interface FailureResult {
  readonly success: false;
  readonly error: {
    type: string;
    message: string;
  };
}
