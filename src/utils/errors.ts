/**
 * Error taxonomy for graph construction, wiring and differentiation.
 *
 * Structural mistakes (duplicate ids, illegal wiring, nonexistent edges, cycles) throw
 * immediately. A missing loss seed at a terminal node is not an error: it is reported as a
 * {@link StaleGradientWarning} and the node contributes a zero gradient.
 */

/**
 * Error codes for every failure the library reports.
 */
export enum GraphErrorCode {
  DUPLICATE_NAME = 'DUPLICATE_NAME',
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  NOT_AN_INPUT = 'NOT_AN_INPUT',
  NO_INPUTS = 'NO_INPUTS',
  CYCLE_DETECTED = 'CYCLE_DETECTED',
  UNKNOWN_NODE = 'UNKNOWN_NODE',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
}

/**
 * Base class for all errors thrown by the graph engine.
 *
 * @example
 * ```typescript
 * try {
 *   graph.createSum('h1');
 * } catch (err) {
 *   if (isGraphError(err) && err.is(GraphErrorCode.DUPLICATE_NAME)) {
 *     // pick another id
 *   }
 * }
 * ```
 */
export class GraphError extends Error {
  constructor(
    public readonly code: GraphErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GraphError';
    // Restore the prototype chain when compiled down to ES5-style classes.
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: GraphErrorCode): boolean {
    return this.code === code;
  }
}

/** A node id is already registered in the graph. */
export class DuplicateNameError extends GraphError {
  constructor(id: string) {
    super(GraphErrorCode.DUPLICATE_NAME, `A node named '${id}' already exists.`, { id });
    this.name = 'DuplicateNameError';
  }
}

/** Wiring attempted into a node kind that takes no inputs. */
export class UnsupportedOperationError extends GraphError {
  constructor(id: string, kind: string, operation: string) {
    super(
      GraphErrorCode.UNSUPPORTED_OPERATION,
      `${operation} is not supported on ${kind} node '${id}'.`,
      { id, kind, operation }
    );
    this.name = 'UnsupportedOperationError';
  }
}

/** A derivative was requested against an id that is not wired as an input. */
export class NotAnInputError extends GraphError {
  constructor(id: string, inputId: string) {
    super(GraphErrorCode.NOT_AN_INPUT, `'${inputId}' is not an input of '${id}'.`, {
      id,
      inputId,
    });
    this.name = 'NotAnInputError';
  }
}

/** A derivative was requested on a node kind without inputs. */
export class NoInputsError extends GraphError {
  constructor(id: string, kind: string) {
    super(GraphErrorCode.NO_INPUTS, `${kind} node '${id}' has no inputs to differentiate against.`, {
      id,
      kind,
    });
    this.name = 'NoInputsError';
  }
}

/**
 * A traversal re-entered a node it had not finished, or a new edge would close a loop.
 * `path` lists the node ids along the loop when the detecting code knows them.
 */
export class CycleDetectedError extends GraphError {
  constructor(nodeId: string, path: string[] = []) {
    super(
      GraphErrorCode.CYCLE_DETECTED,
      path.length
        ? `Cycle detected at '${nodeId}': ${path.join(' -> ')}`
        : `Cycle detected at '${nodeId}'.`,
      { nodeId, path }
    );
    this.name = 'CycleDetectedError';
  }
}

/** A lookup by id or handle found nothing in this graph. */
export class UnknownNodeError extends GraphError {
  constructor(ref: string | number) {
    super(GraphErrorCode.UNKNOWN_NODE, `No node '${ref}' in this graph.`, { ref });
    this.name = 'UnknownNodeError';
  }
}

export class InvalidArgumentError extends GraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(GraphErrorCode.INVALID_ARGUMENT, message, context);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Non-fatal diagnostic: a terminal node had no seeded loss derivative for the current
 * iteration and was given a zero gradient.
 */
export interface StaleGradientWarning {
  readonly code: 'STALE_GRADIENT';
  readonly nodeId: string;
  readonly iteration: number;
  readonly message: string;
}

export function staleGradientWarning(nodeId: string, iteration: number): StaleGradientWarning {
  return {
    code: 'STALE_GRADIENT',
    nodeId,
    iteration,
    message: `Terminal node '${nodeId}' has no loss derivative for iteration ${iteration}; using 0.`,
  };
}

/**
 * Type guard to check if an error is a GraphError
 */
export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError;
}
