/**
 * Cost (loss) functions used by the training driver.
 *
 * Every cost pairs the scalar loss over one sample (`fn`) with the partial derivative of
 * that loss with respect to a single output activation (`derivative`). The derivative is
 * what seeds the backward pass at each output node.
 *
 * @see {@link https://en.wikipedia.org/wiki/Loss_function}
 */
import { InvalidArgumentError } from '../utils/errors';

/** Small constant keeping logarithms and divisions finite. */
export const PROB_EPSILON = 1e-15;

export interface CostFunction {
  /** Name used in logs and serialized training options. */
  readonly name: string;
  /** Loss over one sample: parallel arrays of expected and produced values. */
  fn(targets: number[], outputs: number[]): number;
  /**
   * d(loss) / d(output) for one output, given the number of outputs the loss averages over.
   */
  derivative(target: number, output: number, count: number): number;
}

function assertSameLength(targets: number[], outputs: number[]): void {
  if (targets.length !== outputs.length) {
    throw new InvalidArgumentError('Target and output arrays must have the same length.', {
      targets: targets.length,
      outputs: outputs.length,
    });
  }
}

export default class Cost {
  /**
   * Mean Squared Error: the average of (target - output)^2.
   * Derivative per output: 2 * (output - target) / count.
   *
   * @see {@link https://en.wikipedia.org/wiki/Mean_squared_error}
   */
  static readonly mse: CostFunction = {
    name: 'mse',
    fn(targets: number[], outputs: number[]): number {
      assertSameLength(targets, outputs);
      let error = 0;
      outputs.forEach((output, outputIndex) => {
        error += Math.pow(targets[outputIndex] - output, 2);
      });
      return error / outputs.length;
    },
    derivative(target: number, output: number, count: number): number {
      return (2 * (output - target)) / count;
    },
  };

  /**
   * Binary cross entropy averaged over outputs. Outputs are clamped to
   * [PROB_EPSILON, 1 - PROB_EPSILON] to avoid log(0).
   * Derivative per output: (output - target) / (output * (1 - output)) / count.
   *
   * @see {@link https://en.wikipedia.org/wiki/Cross_entropy}
   */
  static readonly crossEntropy: CostFunction = {
    name: 'crossEntropy',
    fn(targets: number[], outputs: number[]): number {
      assertSameLength(targets, outputs);
      let error = 0;
      for (let i = 0; i < outputs.length; i++) {
        const target = targets[i];
        const output = Math.max(PROB_EPSILON, Math.min(1 - PROB_EPSILON, outputs[i]));
        error -= target * Math.log(output) + (1 - target) * Math.log(1 - output);
      }
      return error / outputs.length;
    },
    derivative(target: number, output: number, count: number): number {
      const clamped = Math.max(PROB_EPSILON, Math.min(1 - PROB_EPSILON, output));
      return (clamped - target) / (clamped * (1 - clamped)) / count;
    },
  };
}
