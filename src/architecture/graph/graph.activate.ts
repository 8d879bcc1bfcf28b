import type Graph from '../graph';
import type Node from '../node';
import { UnknownNodeError } from '../../utils/errors';

/**
 * Forward evaluation.
 *
 * Evaluation is pull-based: `node.activate()` recursively activates every producer and
 * caches its own result in `node.activation`. Nothing is memoized between or within calls,
 * so shared ancestors are recomputed once per path; results depend only on current input
 * values and weights, so repeated calls on an unchanged graph return identical numbers.
 *
 * After this returns, every ancestor of the evaluated nodes holds an up-to-date
 * `lastActivation()`, which the backward pass and the weight updater rely on.
 *
 * @param this - Bound {@link Graph} instance.
 * @param nodes - Nodes to evaluate, typically the graph's outputs.
 * @returns Activations in the same order as `nodes`.
 * @throws {CycleDetectedError} if a node is reached again while it is still being activated.
 */
export function evaluate(this: Graph, nodes: readonly Node[]): number[] {
  return nodes.map((node) => {
    if (!this.owns(node)) throw new UnknownNodeError(node.id);
    return node.activate();
  });
}
