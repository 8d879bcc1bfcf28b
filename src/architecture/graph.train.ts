/**
 * File: graph.train.ts
 * ----------------------------------------------------
 * Single-sample gradient-descent driver for a {@link Graph}.
 *
 * One training iteration:
 *  1. Assign the iteration's input row to the input nodes.
 *  2. Evaluate the output nodes and score them against the ground-truth row with the cost.
 *  3. Seed a backward pass (fresh iteration token) with d(cost)/d(output) per output node,
 *     looked up by name through the graph.
 *  4. Apply the weight update.
 *
 * Rows are ring-indexed, so iteration numbers may run past the end of the dataset.
 */
import type Graph from './graph';
import type Node from './node';
import type { InputNode } from './node';
import type { BackwardPassReport, LossDerivativeFn } from './graph/graph.propagate';
import { RowTable } from './dataset';
import Cost from '../methods/cost';
import type { CostFunction } from '../methods/cost';
import { InvalidArgumentError } from '../utils/errors';
import { onceWarn } from '../utils/warn';

export interface TrainerOptions {
  graph: Graph;
  /** Input nodes, in the column order of `inputValues` rows. */
  inputs: readonly InputNode[];
  /** Output nodes, in the column order of `groundTruths` rows. */
  outputs: readonly Node[];
  /** Flat input rows: `inputs.length` values per row. */
  inputValues: readonly number[];
  /** Flat expected-output rows: `outputs.length` values per row. */
  groundTruths: readonly number[];
  /** Loss scored per sample (default: {@link Cost.mse}). */
  cost?: CostFunction;
  /** Step size (default: the graph's learning rate). */
  learningRate?: number;
}

/** Outcome of one {@link Trainer.step}. */
export interface StepResult {
  iteration: number;
  /** Loss before the update. */
  loss: number;
  report: BackwardPassReport;
}

export class Trainer {
  readonly graph: Graph;
  readonly inputs: readonly InputNode[];
  readonly outputs: readonly Node[];
  readonly cost: CostFunction;
  readonly learningRate: number;
  private readonly inputRows: RowTable;
  private readonly truthRows: RowTable;

  /**
   * @throws {InvalidArgumentError} when node lists are empty or the flat arrays do not split
   *   into whole rows.
   */
  constructor(options: TrainerOptions) {
    if (options.inputs.length === 0 || options.outputs.length === 0) {
      throw new InvalidArgumentError('Trainer needs at least one input and one output node.');
    }
    this.graph = options.graph;
    this.inputs = options.inputs;
    this.outputs = options.outputs;
    this.cost = options.cost ?? Cost.mse;
    this.learningRate = options.learningRate ?? options.graph.learningRate;
    this.inputRows = RowTable.fromFlat(options.inputValues, options.inputs.length);
    this.truthRows = RowTable.fromFlat(options.groundTruths, options.outputs.length);
    if (this.inputRows.length !== this.truthRows.length) {
      onceWarn(
        `trainer-row-mismatch:${this.inputRows.length}:${this.truthRows.length}`,
        `Trainer has ${this.inputRows.length} input rows but ${this.truthRows.length} ground-truth rows; both are ring-indexed independently.`
      );
    }
  }

  /** Number of samples in one epoch. */
  get rowCount(): number {
    return this.inputRows.length;
  }

  /** Assign the ring-indexed input row for `iteration` to the input nodes. */
  setIteration(iteration: number): void {
    const row = this.inputRows.row(iteration);
    this.inputs.forEach((node, column) => node.setValue(row[column]));
  }

  /** Output id -> expected activation for `iteration`. */
  groundTruths(iteration: number): Map<string, number> {
    const row = this.truthRows.row(iteration);
    return new Map(this.outputs.map((node, column) => [node.id, row[column]]));
  }

  /** Set the inputs for `iteration`, run the forward pass and return the cost. */
  iterationLoss(iteration: number): number {
    this.setIteration(iteration);
    const activations = this.graph.evaluate(this.outputs);
    return this.cost.fn([...this.truthRows.row(iteration)], activations);
  }

  /** One forward, backward and update cycle on the sample for `iteration`. */
  step(iteration: number): StepResult {
    const loss = this.iterationLoss(iteration);
    const truths = this.groundTruths(iteration);
    const count = this.outputs.length;
    const lossDerivative: LossDerivativeFn = (nodeId, graph) => {
      const target = truths.get(nodeId);
      if (target === undefined) return undefined;
      return this.cost.derivative(target, graph.lookup(nodeId).lastActivation(), count);
    };
    const report = this.graph.propagateAll({
      iteration: this.graph.nextIteration(),
      lossDerivative,
    });
    this.graph.applyUpdates(undefined, this.learningRate);
    return { iteration, loss, report };
  }

  /** Train once on every row; returns the mean pre-update loss. */
  trainEpoch(): number {
    let total = 0;
    for (let iteration = 0; iteration < this.rowCount; iteration++) {
      total += this.step(iteration).loss;
    }
    return total / this.rowCount;
  }

  /** Mean loss over the dataset with the current weights; nothing is updated. */
  averageLoss(): number {
    let total = 0;
    for (let iteration = 0; iteration < this.rowCount; iteration++) {
      total += this.iterationLoss(iteration);
    }
    return total / this.rowCount;
  }
}
