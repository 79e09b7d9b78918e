/** Base class for every error raised around a filter reactor module. */
export class ReactorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The parameter combination cannot be built into a module. */
export class ConstructionError extends ReactorError {}

/** The I/O kind is not supported by the current top/bottom configuration. */
export class IncompatibilityError extends ReactorError {}

/** A geometric constraint cannot be satisfied. */
export class ConstraintError extends ReactorError {}

/** Auto-placement found overlapping top inlets. */
export class CollisionError extends ConstraintError {}

/** A delete was requested with nothing (deletable) selected. */
export class SelectionError extends ReactorError {}

/** The reserved default output cannot be added, edited or deleted. */
export class ReservedIOError extends ReactorError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
