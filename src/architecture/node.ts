import Connection from './connection';
import type { ConnectionJSON } from './connection';
import Activation from '../methods/activation';
import {
  CycleDetectedError,
  NoInputsError,
  NotAnInputError,
  UnsupportedOperationError,
} from '../utils/errors';

/** Integer index of a node inside its graph's node table. */
export type NodeHandle = number;

/** The closed set of node variants. Algorithms switch over these; callers cannot add more. */
export type NodeKind = 'input' | 'constant' | 'sum' | 'sigmoid';

/** Anything that can turn a handle back into a node (the owning graph). */
export interface NodeResolver {
  node(handle: NodeHandle): Node;
}

/**
 * Per-node backward pass bookkeeping.
 */
export interface TrainingState {
  /** Iteration token of the backward pass that last visited this node (-1: never). */
  lastDerivativeIteration: number;
  /** d(loss) / d(activation) as of that pass. */
  dloss: number;
}

export interface NodeJSON {
  id: string;
  kind: NodeKind;
  index: NodeHandle;
  value?: number;
  inputs?: ConnectionJSON[];
}

/**
 * Represents a scalar unit in a computational graph.
 *
 * Source nodes ({@link InputNode}, {@link ConstantNode}) emit a stored value. Weighted nodes
 * ({@link SumNode}, {@link SigmoidNode}) take the weighted sum of their producers'
 * activations and pass it through a transfer function.
 *
 * Nodes are created by a `Graph` and refer to each other by handle only; the graph owns them.
 */
export default abstract class Node {
  /** Unique name within the owning graph. */
  readonly id: string;
  /** Position in the owning graph's node table. */
  readonly index: NodeHandle;
  abstract readonly kind: NodeKind;
  /**
   * Producer id -> incoming edge. Always empty for source nodes.
   */
  readonly inputs: Map<string, Connection> = new Map();
  /**
   * Consumer back-links. Only the backward pass walks these.
   */
  readonly outputs: NodeHandle[] = [];
  /**
   * Output of the most recent `activate()` call.
   */
  activation: number;
  trainingState: TrainingState;

  protected readonly graph: NodeResolver;

  constructor(graph: NodeResolver, id: string, index: NodeHandle, activation: number = 0) {
    this.graph = graph;
    this.id = id;
    this.index = index;
    this.activation = activation;
    this.trainingState = { lastDerivativeIteration: -1, dloss: 0 };
  }

  /**
   * Recompute this node's output from its producers, cache it and return it.
   */
  abstract activate(): number;

  /**
   * Local partial derivative d(this activation) / d(input activation) for one wired input.
   *
   * @throws {NotAnInputError} if `inputId` is not wired into this node.
   * @throws {NoInputsError} on source nodes.
   */
  abstract derivativeAgainst(inputId: string): number;

  /**
   * Register (or overwrite the weight of) the edge `producer -> this`.
   *
   * @throws {UnsupportedOperationError} on source nodes.
   */
  abstract addInput(producer: Node, weight: number): Connection;

  /** Whether `addInput` is legal on this node kind. */
  abstract get acceptsInputs(): boolean;

  /** Cached value from the last `activate()`; no recomputation. */
  lastActivation(): number {
    return this.activation;
  }

  /**
   * Append a consumer back-link. Never fails and never deduplicates; wiring through
   * `Graph.connect` only calls this for new edges.
   */
  addOutput(consumer: Node): void {
    this.outputs.push(consumer.index);
  }

  hasInput(inputId: string): boolean {
    return this.inputs.has(inputId);
  }

  /** True when no consumer reads this node, i.e. it is an output of the graph. */
  isTerminal(): boolean {
    return this.outputs.length === 0;
  }

  /**
   * Reset the backward pass bookkeeping. Weighted nodes also forget their activation.
   */
  clear(): void {
    this.trainingState = { lastDerivativeIteration: -1, dloss: 0 };
  }

  toJSON(): NodeJSON {
    return { id: this.id, kind: this.kind, index: this.index };
  }
}

/**
 * Shared behaviour of nodes that only emit a stored value.
 */
export abstract class SourceNode extends Node {
  protected value: number;

  constructor(graph: NodeResolver, id: string, index: NodeHandle, value: number) {
    super(graph, id, index, value);
    this.value = value;
  }

  get acceptsInputs(): boolean {
    return false;
  }

  activate(): number {
    this.activation = this.value;
    return this.activation;
  }

  derivativeAgainst(_inputId: string): number {
    throw new NoInputsError(this.id, this.kind);
  }

  addInput(_producer: Node, _weight: number): Connection {
    throw new UnsupportedOperationError(this.id, this.kind, 'addInput');
  }

  toJSON(): NodeJSON {
    return { ...super.toJSON(), value: this.value };
  }
}

/**
 * A graph input. The training driver (or the caller) sets its value before each forward pass.
 */
export class InputNode extends SourceNode {
  readonly kind = 'input' as const;

  /** Value emitted by the next `activate()`. */
  setValue(value: number): void {
    this.value = value;
  }

  getValue(): number {
    return this.value;
  }
}

/**
 * A fixed value, typically 1, wired into weighted nodes that need a bias term.
 */
export class ConstantNode extends SourceNode {
  readonly kind = 'constant' as const;

  getValue(): number {
    return this.value;
  }
}

/**
 * Shared behaviour of nodes computing transfer(Σ producer.activation * weight).
 */
export abstract class WeightedNode extends Node {
  /** Internal flag to detect cycles during activation */
  private isActivating = false;

  get acceptsInputs(): boolean {
    return true;
  }

  /** Transfer function applied to the weighted input sum. */
  protected abstract squash(x: number): number;

  /**
   * d(activation) / d(weighted sum), evaluated at the cached activation.
   */
  abstract localGain(): number;

  activate(): number {
    if (this.isActivating) throw new CycleDetectedError(this.id);
    this.isActivating = true;
    try {
      let sum = 0;
      for (const connection of this.inputs.values()) {
        sum += this.graph.node(connection.from).activate() * connection.weight;
      }
      this.activation = this.squash(sum);
    } finally {
      this.isActivating = false;
    }
    return this.activation;
  }

  derivativeAgainst(inputId: string): number {
    const connection = this.inputs.get(inputId);
    if (!connection) throw new NotAnInputError(this.id, inputId);
    return this.localGain() * connection.weight;
  }

  addInput(producer: Node, weight: number): Connection {
    const existing = this.inputs.get(producer.id);
    if (existing) {
      existing.weight = weight;
      return existing;
    }
    const connection = new Connection(producer.index, this.index, weight);
    this.inputs.set(producer.id, connection);
    return connection;
  }

  clear(): void {
    super.clear();
    this.activation = 0;
  }

  toJSON(): NodeJSON {
    return {
      ...super.toJSON(),
      inputs: Array.from(this.inputs.values(), (connection) => connection.toJSON()),
    };
  }
}

/**
 * Linear node: activation = Σ producer.activation * weight.
 */
export class SumNode extends WeightedNode {
  readonly kind = 'sum' as const;

  protected squash(x: number): number {
    return Activation.identity(x);
  }

  localGain(): number {
    return Activation.identity(this.activation, true);
  }
}

/**
 * Logistic node: activation = 1 / (1 + e^-(Σ producer.activation * weight)).
 */
export class SigmoidNode extends WeightedNode {
  readonly kind = 'sigmoid' as const;

  protected squash(x: number): number {
    return Activation.logistic(x);
  }

  localGain(): number {
    return Activation.logisticGradientFromOutput(this.activation);
  }
}

/** Narrow a node to the variants that carry weighted inputs. */
export function isWeighted(node: Node): node is WeightedNode {
  return node instanceof WeightedNode;
}
