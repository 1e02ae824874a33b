/**
 * Error classes for draft-room.
 *
 * Only initialization failures (config, storage location) and authentication
 * failures are thrown past the pipeline boundary. Everything that happens
 * inside a role's turn is reported as data.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class StorageError extends AppError {
  constructor(
    message: string,
    public readonly location: string,
  ) {
    super(message, 'STORAGE_ERROR');
    this.name = 'StorageError';
  }
}

export class ModelAPIError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message, 'MODEL_API_ERROR');
    this.name = 'ModelAPIError';
  }

  /** Bad or missing credentials will fail every subsequent call too. */
  get isAuthFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

export class PipelineAbortedError extends AppError {
  constructor(public readonly completedDrafts: number) {
    super(`Pipeline aborted after ${completedDrafts} completed draft(s)`, 'PIPELINE_ABORTED');
    this.name = 'PipelineAbortedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
