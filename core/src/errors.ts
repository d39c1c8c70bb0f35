import type { Modality } from './types';

export type AnalysisErrorKind =
  | 'input'
  | 'scorer'
  | 'not_found'
  | 'conflict'
  | 'immutable'
  | 'transition'
  | 'not_ready'
  | 'timeout'
  | 'config'
  | 'polling';

export class AnalysisError extends Error {
  constructor(message: string, readonly kind: AnalysisErrorKind) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unreadable, corrupt or unsupported media. */
export class InputError extends AnalysisError {
  constructor(message: string) {
    super(message, 'input');
  }
}

export class ScorerError extends AnalysisError {
  constructor(readonly modality: Modality, message: string) {
    super(`${modality} scorer: ${message}`, 'scorer');
  }
}

export class JobNotFoundError extends AnalysisError {
  constructor(readonly jobId: string) {
    super(`Analysis job not found: ${jobId}`, 'not_found');
  }
}

export class JobConflictError extends AnalysisError {
  constructor(message: string) {
    super(message, 'conflict');
  }
}

export class JobImmutableError extends AnalysisError {
  constructor(readonly jobId: string, status: string) {
    super(`Analysis job ${jobId} is ${status} and can no longer change`, 'immutable');
  }
}

export class InvalidTransitionError extends AnalysisError {
  constructor(message: string) {
    super(message, 'transition');
  }
}

export class ReportNotReadyError extends AnalysisError {
  constructor(readonly jobId: string, status: string) {
    super(`Report for job ${jobId} is not available while the job is ${status}`, 'not_ready');
  }
}

export class ConfigError extends AnalysisError {
  constructor(message: string) {
    super(message, 'config');
  }
}

export class PollingError extends AnalysisError {
  constructor(message: string, readonly attempts: number, readonly lastError?: unknown) {
    super(message, 'polling');
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  return String(error);
}
