import type Graph from '../graph';
import type Node from '../node';
import type Connection from '../connection';
import {
  CycleDetectedError,
  InvalidArgumentError,
  UnknownNodeError,
  UnsupportedOperationError,
} from '../../utils/errors';

/**
 * Wiring protocol.
 *
 * An edge lives in two places: the consumer's `inputs` map (weight + producer handle) and
 * the producer's `outputs` back-links. Neither node can register itself with the other, so
 * this function performs both halves. Every check runs before the first mutation; a rejected
 * call leaves the graph exactly as it was.
 *
 * Re-wiring an existing producer/consumer pair only overwrites the weight.
 *
 * @param this - Bound {@link Graph} instance.
 * @param producer - Node whose activation feeds the edge.
 * @param consumer - Weighted node receiving the edge.
 * @param weight - Initial weight; drawn from the graph's uniform generator when omitted.
 * @returns The (new or updated) connection stored in `consumer.inputs`.
 * @throws {UnsupportedOperationError} when `consumer` is an Input or Constant node.
 * @throws {CycleDetectedError} when acyclicity is enforced and the edge would close a loop.
 */
export function connect(
  this: Graph,
  producer: Node,
  consumer: Node,
  weight?: number
): Connection {
  if (!this.owns(producer)) throw new UnknownNodeError(producer.id);
  if (!this.owns(consumer)) throw new UnknownNodeError(consumer.id);
  if (!consumer.acceptsInputs) {
    throw new UnsupportedOperationError(consumer.id, consumer.kind, 'connect');
  }
  if (weight !== undefined && !Number.isFinite(weight)) {
    throw new InvalidArgumentError(`Weight for ${producer.id} -> ${consumer.id} must be finite.`, {
      weight,
    });
  }

  const isNewEdge = !consumer.hasInput(producer.id);
  if (isNewEdge && this.enforceAcyclic) {
    // The new edge closes a loop iff producer is already reachable from consumer.
    const back = this.findPath(consumer, producer);
    if (back) throw new CycleDetectedError(producer.id, [producer.id, ...back]);
  }

  const edgeWeight = weight ?? this.randomWeight();
  if (isNewEdge) producer.addOutput(consumer);
  return consumer.addInput(producer, edgeWeight);
}
