/**
 * SERVICE-LEVEL ERROR SYSTEM (Effect-TS)
 *
 * Errors are values, not exceptions. They appear in the Effect error
 * channel (Effect<A, E, R>) and carry a recoverable flag that decides
 * whether a stage substitutes a default or the run stops.
 *
 * Only EmptyInputError crosses the pipeline boundary; collaborator
 * failures are absorbed into stage defaults and reported as diagnostics.
 */

import { Data } from "effect";

/**
 * CONFIG VALIDATION ERROR - Lexicon or pipeline config failed to decode
 */
export class ConfigValidationError extends Data.TaggedError("ConfigValidationError")<{
  readonly message: string;
  readonly source: string;
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      source: this.source,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * EMPTY INPUT ERROR - Transcript is empty or whitespace-only
 */
export class EmptyInputError extends Data.TaggedError("EmptyInputError")<{
  readonly message: string;
}> {
  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * COLLABORATOR ERROR - An entity, sentiment, intent or keyword scorer
 * failed or timed out
 *
 * The calling stage substitutes its neutral default.
 */
export class CollaboratorError extends Data.TaggedError("CollaboratorError")<{
  readonly collaborator: string;
  readonly operation: string;
  readonly reason: string;
}> {
  get recoverable(): boolean {
    return true;
  }

  get message(): string {
    return `${this.collaborator}.${this.operation} failed: ${this.reason}`;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      collaborator: this.collaborator,
      operation: this.operation,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Union of all service errors (for type safety)
 */
export type ServiceError = ConfigValidationError | EmptyInputError | CollaboratorError;

/**
 * Describe an unknown thrown value without leaking its payload shape.
 */
export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/**
 * Errors a run absorbed into stage defaults; serialized as its diagnostics.
 */
export class ErrorCollector {
  private readonly errors: ServiceError[] = [];

  add(error: ServiceError): void {
    this.errors.push(error);
  }

  count(): number {
    return this.errors.length;
  }

  toJSON() {
    return this.errors.map((e) => e.toJSON());
  }
}
