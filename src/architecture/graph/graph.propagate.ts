import type Graph from '../graph';
import type Node from '../node';
import type { NodeHandle } from '../node';
import {
  CycleDetectedError,
  InvalidArgumentError,
  UnknownNodeError,
  staleGradientWarning,
} from '../../utils/errors';
import type { StaleGradientWarning } from '../../utils/errors';
import { warn } from '../../utils/warn';

/**
 * Reverse-mode differentiation.
 *
 * For every node reachable from the sources, computes
 *
 *   d(loss)/d(node) = Σ_c d(loss)/d(c) * d(c)/d(node)      over consumers c in node.outputs
 *
 * and, for terminal nodes (no consumers), takes d(loss)/d(node) from the seed.
 *
 * Each node memoizes its result in `trainingState` under the pass's iteration token: the
 * first visit in a pass marks the node and accumulates over its consumers; any later visit
 * in the same pass returns the cached `dloss`. A node shared by many paths is therefore
 * accumulated once, and one pass costs O(edges) rather than O(paths).
 *
 * The traversal uses an explicit stack rather than recursion, so graph depth is not bounded
 * by the call stack, and a consumer reached again before its own accumulation finished is
 * reported as a {@link CycleDetectedError}.
 */

/** Loss-derivative strategy: d(loss)/d(activation) for a terminal node, or undefined if none. */
export type LossDerivativeFn = (nodeId: string, graph: Graph) => number | undefined;

/** Seed values keyed by terminal node id, or a strategy computing them on demand. */
export type LossDerivativeSource =
  | LossDerivativeFn
  | Map<string, number>
  | Readonly<Record<string, number>>;

/** Boundary condition of one backward pass. */
export interface DerivativeSeed {
  /** Token identifying this pass; use {@link Graph.nextIteration} for a fresh one. */
  iteration: number;
  lossDerivative: LossDerivativeSource;
}

/** Summary of one {@link propagateAll} call. */
export interface BackwardPassReport {
  iteration: number;
  /** Nodes whose `dloss` was (re)computed by this call. */
  visited: number;
  /** Terminals that had no seed and were given a zero gradient. */
  staleTerminals: StaleGradientWarning[];
}

/** Work item: a node whose consumers are being accumulated. */
interface Frame {
  node: Node;
  /** Position in `node.outputs` of the next consumer to fold in. */
  next: number;
  sum: number;
  /** Token the node carried before this pass stamped it; restored if the pass throws. */
  previousIteration: number;
}

interface PassContext {
  visited: number;
  staleTerminals: StaleGradientWarning[];
}

function resolveSeed(graph: Graph, source: LossDerivativeSource, nodeId: string): number | undefined {
  if (typeof source === 'function') return source(nodeId, graph);
  if (source instanceof Map) return source.get(nodeId);
  return Object.prototype.hasOwnProperty.call(source, nodeId) ? source[nodeId] : undefined;
}

function assertSeed(seed: DerivativeSeed): void {
  if (!Number.isInteger(seed.iteration) || seed.iteration < 0) {
    throw new InvalidArgumentError('Iteration token must be a non-negative integer.', {
      iteration: seed.iteration,
    });
  }
}

/** Seeded d(loss)/d(activation) for a terminal, or 0 plus a warning when none is supplied. */
function terminalDerivative(
  graph: Graph,
  node: Node,
  seed: DerivativeSeed,
  ctx: PassContext
): number {
  const seeded = resolveSeed(graph, seed.lossDerivative, node.id);
  if (seeded !== undefined) return seeded;
  const stale = staleGradientWarning(node.id, seed.iteration);
  ctx.staleTerminals.push(stale);
  warn(stale.message, { nodeId: node.id, iteration: seed.iteration });
  return 0;
}

function propagateFrom(graph: Graph, start: Node, seed: DerivativeSeed, ctx: PassContext): number {
  const { iteration } = seed;
  if (start.trainingState.lastDerivativeIteration === iteration) {
    return start.trainingState.dloss;
  }

  /** Handles entered but not yet finalized; meeting one again means a loop. */
  const open = new Set<NodeHandle>();
  const stack: Frame[] = [];
  const enter = (node: Node) => {
    const previousIteration = node.trainingState.lastDerivativeIteration;
    stack.push({ node, next: 0, sum: 0, previousIteration });
    node.trainingState.lastDerivativeIteration = iteration;
    open.add(node.index);
  };
  enter(start);

  try {
    while (stack.length) {
      const frame = stack[stack.length - 1];
      const { node } = frame;

      if (frame.next < node.outputs.length) {
        const consumer = graph.node(node.outputs[frame.next]);
        if (open.has(consumer.index)) {
          const loopStart = stack.findIndex((f) => f.node.index === consumer.index);
          const path = stack.slice(loopStart).map((f) => f.node.id);
          throw new CycleDetectedError(consumer.id, [...path, consumer.id]);
        }
        if (consumer.trainingState.lastDerivativeIteration === iteration) {
          // Consumer finished (now or earlier in this pass): fold its contribution in.
          frame.sum += consumer.trainingState.dloss * consumer.derivativeAgainst(node.id);
          frame.next += 1;
        } else {
          // Descend; this consumer is revisited as a memo hit once it is finalized.
          enter(consumer);
        }
        continue;
      }

      node.trainingState.dloss = node.isTerminal()
        ? terminalDerivative(graph, node, seed, ctx)
        : frame.sum;
      open.delete(node.index);
      stack.pop();
      ctx.visited += 1;
    }
  } catch (err) {
    // Unfinished nodes must not look memoized to a retry with the same token.
    for (const frame of stack) {
      frame.node.trainingState.lastDerivativeIteration = frame.previousIteration;
    }
    throw err;
  }

  return start.trainingState.dloss;
}

/**
 * d(loss)/d(activation) of `node` for the seed's iteration, computing (and caching) it and
 * everything downstream of it on first request.
 *
 * @param this - Bound {@link Graph} instance.
 */
export function propagate(this: Graph, node: Node, seed: DerivativeSeed): number {
  assertSeed(seed);
  if (!this.owns(node)) throw new UnknownNodeError(node.id);
  return propagateFrom(this, node, seed, { visited: 0, staleTerminals: [] });
}

/**
 * Backward pass entry point: propagate from every source so the whole reachable subgraph
 * receives `dloss` for this iteration.
 *
 * Sources default to every Input and Constant node; a weighted node fed only by a constant
 * (a bias-only unit) is thereby reached too.
 *
 * @param this - Bound {@link Graph} instance.
 * @param seed - Iteration token and terminal loss derivatives.
 * @param sources - Start nodes; defaults to {@link Graph.sources}.
 */
export function propagateAll(
  this: Graph,
  seed: DerivativeSeed,
  sources: readonly Node[] = this.sources()
): BackwardPassReport {
  assertSeed(seed);
  const ctx: PassContext = { visited: 0, staleTerminals: [] };
  for (const source of sources) {
    if (!this.owns(source)) throw new UnknownNodeError(source.id);
    propagateFrom(this, source, seed, ctx);
  }
  return { iteration: seed.iteration, visited: ctx.visited, staleTerminals: ctx.staleTerminals };
}
