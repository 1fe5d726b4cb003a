export type LoadTestErrorCode =
  | 'NETWORK_FAILURE'
  | 'BACKOFF_EXHAUSTED'
  | 'SERIALIZATION_FAILED'
  | 'EMPTY_LATENCY_DATA'
  | 'INVALID_CONFIG';

export class LoadTestError extends Error {
  constructor(
    public readonly code: LoadTestErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LoadTestError';
  }
}

/** A single attempt failed: transport error, timeout or non-2xx status. Retryable. */
export class NetworkFailureError extends LoadTestError {
  constructor(message: string, public readonly status?: number) {
    super('NETWORK_FAILURE', message, status === undefined ? undefined : { status });
    this.name = 'NetworkFailureError';
  }
}

export class BackoffExhaustedError extends LoadTestError {
  constructor(public readonly attempts: number, public readonly lastError: NetworkFailureError) {
    super('BACKOFF_EXHAUSTED', `exponential backoff exceeded after ${attempts} attempts: ${lastError.message}`, {
      attempts,
      lastError: lastError.message
    });
    this.name = 'BackoffExhaustedError';
  }
}

export class SerializationFailedError extends LoadTestError {
  constructor(cause: unknown) {
    super('SERIALIZATION_FAILED', `failed to serialize request body: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'SerializationFailedError';
  }
}

export class EmptyLatencyDataError extends LoadTestError {
  constructor(percentile: number) {
    super('EMPTY_LATENCY_DATA', `no latency samples to compute percentile ${percentile}`, { percentile });
    this.name = 'EmptyLatencyDataError';
  }
}

export class InvalidConfigError extends LoadTestError {
  constructor(field: string, message: string) {
    super('INVALID_CONFIG', `${field}: ${message}`, { field });
    this.name = 'InvalidConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
