import type Graph from '../graph';
import type Node from '../node';
import { CycleDetectedError } from '../../utils/errors';

/**
 * Topology utilities.
 *
 * Provides:
 *  - topologicalOrder: Kahn-style ordering producers-before-consumers.
 *  - findPath: depth-first reachability along `outputs` (used by `connect` to refuse edges
 *    that would introduce a cycle).
 *
 * Self loops count toward in-degree, so a node wired into itself never becomes ready and
 * is reported as a cycle like any longer loop.
 */

/**
 * Order every node so that each producer precedes all of its consumers.
 *
 * @param this - Bound {@link Graph} instance.
 * @throws {CycleDetectedError} naming a node left unordered when the graph has a cycle.
 */
export function topologicalOrder(this: Graph): Node[] {
  /** Remaining unprocessed producers per node. */
  const inDegree = this.nodes.map((node) => node.inputs.size);
  /** Processing queue for Kahn's algorithm (handles with satisfied dependencies). */
  const ready: number[] = [];
  inDegree.forEach((degree, handle) => {
    if (degree === 0) ready.push(handle);
  });
  const order: Node[] = [];
  for (let head = 0; head < ready.length; head++) {
    const node = this.node(ready[head]);
    order.push(node);
    for (const consumer of node.outputs) {
      inDegree[consumer] -= 1;
      if (inDegree[consumer] === 0) ready.push(consumer);
    }
  }
  if (order.length !== this.nodes.length) {
    const stuck = inDegree.findIndex((degree) => degree > 0);
    throw new CycleDetectedError(this.node(stuck).id);
  }
  return order;
}

/**
 * Depth-first search for a path `from -> ... -> to` following consumer links.
 *
 * @param this - Bound {@link Graph} instance.
 * @returns The nodes along the path (both ends included; `[from]` when `from === to`), or
 *   null when `to` is unreachable.
 */
export function findPath(this: Graph, from: Node, to: Node): Node[] | null {
  if (from === to) return [from];
  /** Predecessor on the discovered path, by handle; doubles as the visited set. */
  const parent = new Map<number, number>([[from.index, -1]]);
  /** Stack for explicit depth-first search (iterative to avoid recursion limits). */
  const dfsStack: number[] = [from.index];
  for (let handle = dfsStack.pop(); handle !== undefined; handle = dfsStack.pop()) {
    const current = this.node(handle);
    for (const next of current.outputs) {
      if (parent.has(next)) continue;
      parent.set(next, current.index);
      if (next === to.index) {
        const path: Node[] = [];
        for (let at = next; at !== -1; at = parent.get(at) ?? -1) path.push(this.node(at));
        return path.reverse();
      }
      dfsStack.push(next);
    }
  }
  return null;
}
