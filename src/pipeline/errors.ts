/**
 * Error taxonomy for the orchestrator.
 * Collaborator failures travel as typed values (Outcome) and are classified at the loop boundary.
 */

export type ErrorKind = "transient" | "validation" | "integrity" | "recovery" | "internal";

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    /** Critical errors escalate to emergency shutdown when they reach the loop boundary. */
    public readonly critical: boolean = false
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Collaborator call failed (recoverable by restart). */
export class ProviderError extends OrchestratorError {
  constructor(
    public readonly component: string,
    public readonly operation: string,
    cause: unknown
  ) {
    super(`${component}.${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, "transient");
  }
}

export class ProviderTimeoutError extends OrchestratorError {
  constructor(
    public readonly component: string,
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${component}.${operation} timed out after ${timeoutMs}ms`, "transient");
  }
}

/** Context update payload does not fit the context schema; prior state is kept. */
export class SchemaMismatchError extends OrchestratorError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`Schema mismatch at ${path || "<root>"}: ${message}`, "validation");
  }
}

export class CommandValidationError extends OrchestratorError {
  constructor(
    message: string,
    public readonly commandType: string
  ) {
    super(`Invalid ${commandType} command: ${message}`, "validation");
  }
}

export class IntegrityError extends OrchestratorError {
  constructor(message: string) {
    super(message, "integrity", true);
  }
}

export class RecoveryFailedError extends OrchestratorError {
  constructor(public readonly components: string[]) {
    super(`Recovery failed for: ${components.join(", ")}`, "recovery", true);
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: OrchestratorError };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T>(error: OrchestratorError): Outcome<T> {
  return { ok: false, error };
}

export function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}

/**
 * Run a collaborator call with a deadline and fold any failure into a transient ProviderError /
 * ProviderTimeoutError. Validation errors thrown by the call keep their kind.
 */
export async function callProvider<T>(
  component: string,
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<Outcome<T>> {
  try {
    return ok(await withTimeout(Promise.resolve().then(fn), timeoutMs, `${component}.${operation}`));
  } catch (err) {
    if (err instanceof TimeoutError) return fail(new ProviderTimeoutError(component, operation, timeoutMs));
    if (err instanceof OrchestratorError) return fail(err);
    return fail(new ProviderError(component, operation, err));
  }
}

export interface ErrorPolicy {
  isCritical(err: unknown): boolean;
}

/** Integrity and recovery failures, and errors flagged critical, are fatal; everything else is retried after backoff. */
export const defaultErrorPolicy: ErrorPolicy = {
  isCritical(err: unknown): boolean {
    if (err instanceof OrchestratorError) return err.critical;
    return false;
  },
};
