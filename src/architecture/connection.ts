/**
 * Connection (aka edge / weight)
 * ==============================
 * A `Connection` is the directed, weighted edge from a producer node's activation into a
 * consumer node's weighted sum. It is stored once, in the consumer's `inputs` map under the
 * producer's id; the producer keeps only the consumer's handle in its `outputs`.
 *
 * Endpoints are arena handles (indices into the owning graph's node table), never node
 * references, so a connection never keeps a node alive on its own.
 */
import type { NodeHandle } from './node';

export default class Connection {
  /** Handle of the producer (source) node. */
  readonly from: NodeHandle;
  /** Handle of the consumer (target) node. */
  readonly to: NodeHandle;
  /** Scalar multiplier applied to the producer activation. */
  weight: number;
  /** d(loss) / d(weight) computed by the last weight update (0 until then). */
  gradient: number;

  /**
   * @example
   * const link = new Connection(0, 3, 0.42);
   * link.weight; // 0.42
   */
  constructor(from: NodeHandle, to: NodeHandle, weight: number) {
    this.from = from;
    this.to = to;
    this.weight = weight;
    this.gradient = 0;
  }

  /**
   * Serialize to a minimal JSON-friendly shape.
   * @example
   * connection.toJSON(); // => { from: 0, to: 3, weight: 0.12 }
   */
  toJSON(): ConnectionJSON {
    return { from: this.from, to: this.to, weight: this.weight };
  }
}

export interface ConnectionJSON {
  from: NodeHandle;
  to: NodeHandle;
  weight: number;
}
