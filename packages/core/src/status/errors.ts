/**
 * Status Errors - Failure taxonomy of a status run
 *
 * NotFoundError is an expected-absence signal raised by collaborators.
 * Everything else that escapes the engine aborts the whole snapshot.
 */

// ============================================================================
// Base
// ============================================================================

/**
 * Base class for errors that abort a status run
 */
export class StatusError extends Error {
  public readonly errorCause: Error | undefined;

  constructor(message: string, errorCause?: Error) {
    super(message);
    this.name = 'StatusError';
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Expected Absence
// ============================================================================

/**
 * Raised by a collaborator when a record or attribute does not exist (yet)
 */
export class NotFoundError extends Error {
  constructor(public readonly what: string) {
    super(`${what} not found`);
    this.name = 'NotFoundError';
  }
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

// ============================================================================
// Inconsistency
// ============================================================================

/**
 * The store records an instance id the provider does not know about
 */
export class InstanceNotFoundError extends StatusError {
  constructor(
    public readonly machineId: number,
    public readonly instanceId: string
  ) {
    super(`instance ${instanceId} for machine ${machineId} not found`);
    this.name = 'InstanceNotFoundError';
  }
}

/**
 * A unit is assigned to a machine that was not part of the machine listing
 */
export class UnknownMachineError extends StatusError {
  constructor(
    public readonly unitName: string,
    public readonly machineId: number
  ) {
    super(`machine ${machineId} for unit ${unitName} not found`);
    this.name = 'UnknownMachineError';
  }
}

// ============================================================================
// Collaborator Failures
// ============================================================================

/**
 * Any other failure of a store, provider or heartbeat call
 */
export class CollaboratorError extends StatusError {
  constructor(
    public readonly operation: string,
    public readonly entity: string | undefined,
    errorCause: Error
  ) {
    super(
      `cannot ${operation}${entity ? ` of ${entity}` : ''}: ${errorCause.message}`,
      errorCause
    );
    this.name = 'CollaboratorError';
  }
}

/**
 * The caller aborted the run
 */
export class StatusCancelledError extends StatusError {
  constructor() {
    super('status run cancelled');
    this.name = 'StatusCancelledError';
  }
}

/**
 * Normalize an unknown rejection value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Throw StatusCancelledError once the run's signal has been aborted
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new StatusCancelledError();
  }
}

/**
 * Await a collaborator call, wrapping failures with what was being done.
 * StatusErrors pass through untouched. No call is made once `signal` is
 * aborted.
 */
export async function collaborate<T>(
  operation: string,
  entity: string | undefined,
  call: () => Promise<T>,
  signal?: AbortSignal | undefined
): Promise<T> {
  throwIfCancelled(signal);
  try {
    return await call();
  } catch (error) {
    if (error instanceof StatusError) {
      throw error;
    }
    throw new CollaboratorError(operation, entity, toError(error));
  }
}
