import Node, {
  ConstantNode,
  InputNode,
  SigmoidNode,
  SumNode,
  WeightedNode,
  isWeighted,
} from './node';
import type { NodeHandle, NodeJSON, NodeResolver } from './node';
import type Connection from './connection';
import { config } from '../config';
import { createRandom, uniform } from '../utils/random';
import type { RandomFn } from '../utils/random';
import { DuplicateNameError, InvalidArgumentError, UnknownNodeError } from '../utils/errors';
import { connect as _connect } from './graph/graph.connect';
import { evaluate as _evaluate } from './graph/graph.activate';
import {
  propagate as _propagate,
  propagateAll as _propagateAll,
} from './graph/graph.propagate';
import type { BackwardPassReport, DerivativeSeed } from './graph/graph.propagate';
import { applyUpdates as _applyUpdates } from './graph/graph.update';
import {
  topologicalOrder as _topologicalOrder,
  findPath as _findPath,
} from './graph/graph.topology';

/**
 * Per-graph settings. Anything omitted falls back to the global {@link config}.
 */
export interface GraphOptions {
  /** Default step size for {@link Graph.applyUpdates}. */
  learningRate?: number;
  /** Seed for the weight initializer used when `connect` receives no weight. */
  seed?: string | number;
  /** Explicit [0, 1) generator for weight initialization; wins over `seed`. */
  rng?: RandomFn;
  /**
   * Reject edges that would close a cycle at `connect` time (default true). When disabled,
   * cycles are still reported by the forward and backward traversals.
   */
  enforceAcyclic?: boolean;
}

export interface GraphJSON {
  learningRate: number;
  nodes: NodeJSON[];
}

/**
 * A scalar computational graph.
 *
 * The graph is an append-only arena: it owns every node in `nodes`, indexed by
 * {@link NodeHandle}, plus the id -> handle directory used for name lookups. Nodes refer to
 * each other only through handles, so there is no shared ownership to untangle.
 *
 * Typical iteration:
 * ```ts
 * const graph = new Graph({ learningRate: 0.01 });
 * const x = graph.createInput('x', 0);
 * const bias = graph.createConstant('bias', 1);
 * const y = graph.createSigmoid('y');
 * graph.connect(x, y);
 * graph.connect(bias, y);
 *
 * x.setValue(0.5);
 * const [out] = graph.evaluate([y]);
 * graph.propagateAll({ iteration: graph.nextIteration(), lossDerivative: { y: out - 1 } });
 * graph.applyUpdates();
 * ```
 */
export default class Graph implements NodeResolver {
  /** Node table; a node's handle is its index here. */
  readonly nodes: Node[] = [];
  learningRate: number;
  readonly enforceAcyclic: boolean;
  private readonly byId: Map<string, NodeHandle> = new Map();
  private readonly rng: RandomFn;
  private iteration: number = -1;

  constructor(options: GraphOptions = {}) {
    this.learningRate = options.learningRate ?? config.defaultLearningRate;
    this.enforceAcyclic = options.enforceAcyclic ?? true;
    this.rng = options.rng ?? createRandom(options.seed ?? config.defaultSeed);
  }

  createInput(id: string, value: number = 0): InputNode {
    return this.register(id, (handle) => new InputNode(this, id, handle, value));
  }

  createConstant(id: string, value: number): ConstantNode {
    return this.register(id, (handle) => new ConstantNode(this, id, handle, value));
  }

  createSum(id: string): SumNode {
    return this.register(id, (handle) => new SumNode(this, id, handle));
  }

  createSigmoid(id: string): SigmoidNode {
    return this.register(id, (handle) => new SigmoidNode(this, id, handle));
  }

  /** Resolve a handle. */
  node(handle: NodeHandle): Node {
    const node = this.nodes[handle];
    if (node === undefined) throw new UnknownNodeError(handle);
    return node;
  }

  /** Resolve a node by id. */
  lookup(id: string): Node {
    const handle = this.byId.get(id);
    if (handle === undefined) throw new UnknownNodeError(id);
    return this.nodes[handle];
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Whether `node` is the instance stored in this graph under its handle. */
  owns(node: Node): boolean {
    return this.nodes[node.index] === node;
  }

  get size(): number {
    return this.nodes.length;
  }

  inputNodes(): InputNode[] {
    return this.nodes.filter((node): node is InputNode => node instanceof InputNode);
  }

  /** Input and Constant nodes: where every backward pass starts by default. */
  sources(): Node[] {
    return this.nodes.filter((node) => !node.acceptsInputs);
  }

  /** Weighted nodes nothing consumes: the nodes a loss is defined on. */
  terminals(): WeightedNode[] {
    return this.nodes.filter(
      (node): node is WeightedNode => isWeighted(node) && node.isTerminal()
    );
  }

  /**
   * Wire `producer -> consumer`. Omitting `weight` draws one uniformly from
   * `config.weightInitRange` with this graph's generator.
   */
  connect(producer: Node, consumer: Node, weight?: number): Connection {
    return _connect.call(this, producer, consumer, weight);
  }

  /** Force a forward pass through each node and return their activations in order. */
  evaluate(nodes: readonly Node[]): number[] {
    return _evaluate.call(this, nodes);
  }

  /** d(loss) / d(activation) of one node for the seed's iteration. */
  propagate(node: Node, seed: DerivativeSeed): number {
    return _propagate.call(this, node, seed);
  }

  /** Backward pass over everything reachable from `sources` (default: all source nodes). */
  propagateAll(seed: DerivativeSeed, sources?: readonly Node[]): BackwardPassReport {
    return _propagateAll.call(this, seed, sources);
  }

  /** Gradient-descent step on the input weights of `nodes` (default: every node). */
  applyUpdates(nodes?: readonly Node[], learningRate?: number): number {
    return _applyUpdates.call(this, nodes, learningRate);
  }

  topologicalOrder(): Node[] {
    return _topologicalOrder.call(this);
  }

  hasPath(from: Node, to: Node): boolean {
    return _findPath.call(this, from, to) !== null;
  }

  /** Node ids along a path `from -> ... -> to`, or null when `to` is unreachable. */
  findPath(from: Node, to: Node): string[] | null {
    const path = _findPath.call(this, from, to);
    return path ? path.map((node) => node.id) : null;
  }

  /** Hand out a fresh backward pass token, strictly greater than any issued before. */
  nextIteration(): number {
    this.iteration += 1;
    return this.iteration;
  }

  /** The last token handed out by {@link nextIteration} (-1 before the first). */
  get currentIteration(): number {
    return this.iteration;
  }

  /** Draw an initial weight from this graph's generator. */
  randomWeight(): number {
    return uniform(this.rng);
  }

  /** Reset activations and backward pass state on every node. Weights are kept. */
  clear(): void {
    for (const node of this.nodes) node.clear();
  }

  toJSON(): GraphJSON {
    return { learningRate: this.learningRate, nodes: this.nodes.map((node) => node.toJSON()) };
  }

  private register<T extends Node>(id: string, create: (handle: NodeHandle) => T): T {
    if (typeof id !== 'string' || id.length === 0) {
      throw new InvalidArgumentError('Node id must be a non-empty string.', { id });
    }
    if (this.byId.has(id)) throw new DuplicateNameError(id);
    const node = create(this.nodes.length);
    this.nodes.push(node);
    this.byId.set(id, node.index);
    return node;
  }
}
