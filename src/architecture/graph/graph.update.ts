import type Graph from '../graph';
import type Node from '../node';
import { isWeighted } from '../node';
import { InvalidArgumentError, UnknownNodeError } from '../../utils/errors';

/**
 * Gradient-descent weight update.
 *
 * For a weighted node with cached `dloss` = d(loss)/d(activation) and each input edge
 * `(producer, weight)`:
 *
 *   gradient = dloss * localGain * producer.lastActivation()
 *   weight  ← weight - learningRate * gradient
 *
 * where `localGain` = d(activation)/d(weighted sum): 1 for Sum nodes and a * (1 - a) for
 * Sigmoid nodes (a = the node's cached activation). Source nodes carry no weights and are
 * skipped.
 *
 * Must run after a backward pass for the same iteration; stale `dloss` values are not
 * detected here.
 *
 * @param this - Bound {@link Graph} instance.
 * @param nodes - Nodes whose input weights to update (default: every node in the graph).
 * @param learningRate - Step size (default: the graph's `learningRate`).
 * @returns Number of edges updated.
 * @throws {InvalidArgumentError} if the learning rate is not a positive finite number.
 */
export function applyUpdates(
  this: Graph,
  nodes: readonly Node[] = this.nodes,
  learningRate: number = this.learningRate
): number {
  if (!Number.isFinite(learningRate) || learningRate <= 0) {
    throw new InvalidArgumentError('Learning rate must be a positive finite number.', {
      learningRate,
    });
  }
  let updated = 0;
  for (const node of nodes) {
    if (!this.owns(node)) throw new UnknownNodeError(node.id);
    if (!isWeighted(node)) continue;
    const { dloss } = node.trainingState;
    const gain = node.localGain();
    for (const connection of node.inputs.values()) {
      const gradient = dloss * gain * this.node(connection.from).lastActivation();
      connection.gradient = gradient;
      connection.weight -= learningRate * gradient;
      updated++;
    }
  }
  return updated;
}
