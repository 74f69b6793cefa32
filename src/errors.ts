/**
 * Error taxonomy for a sync run.
 *
 * Every fatal condition is a SyncError subclass carrying the process exit
 * status the CLI reports for it. Anything else escaping the run exits with 1.
 */

export const EXIT_OK = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_CONFIGURATION = 2;
export const EXIT_RESOLUTION = 3;
export const EXIT_TRANSPORT = 4;

export abstract class SyncError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings, a missing content folder, or invalid local content. */
export class ConfigurationError extends SyncError {
  readonly exitCode = EXIT_CONFIGURATION;
}

/** The target book could not be matched to exactly one remote book. */
export class ResolutionError extends SyncError {
  readonly exitCode = EXIT_RESOLUTION;
}

/** A remote call failed: network error, timeout, non-2xx status or malformed payload. */
export class TransportError extends SyncError {
  readonly exitCode = EXIT_TRANSPORT;
  readonly operation: string;
  readonly status: number | undefined;
  readonly detail: string;

  constructor(operation: string, detail: string, status?: number) {
    super(`${operation} failed${status !== undefined ? ` [${status}]` : ''}: ${detail}`);
    this.operation = operation;
    this.status = status;
    this.detail = detail;
  }

  /** Re-throw with the entity being processed prefixed to the operation. */
  withContext(context: string): TransportError {
    return new TransportError(`${context}: ${this.operation}`, this.detail, this.status);
  }
}

/** Await a remote call, naming `entity` in any TransportError it raises. */
export async function withEntity<T>(entity: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof TransportError) {
      throw error.withContext(entity);
    }
    throw error;
  }
}

/** Map anything thrown out of a run to the exit status the CLI reports. */
export function exitCodeFor(error: unknown): number {
  return error instanceof SyncError ? error.exitCode : EXIT_UNEXPECTED;
}
