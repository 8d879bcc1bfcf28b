/**
 * Transfer functions applied by weighted nodes to their input sum.
 *
 * Each method accepts the weighted sum `x` and an optional boolean `derivate`.
 * If `derivate` is true, the method returns d f(x) / d x instead of f(x).
 *
 * @see {@link https://en.wikipedia.org/wiki/Activation_function}
 */
export class Activation {
  /**
   * Logistic (Sigmoid) activation function: 1 / (1 + e^-x).
   * Outputs values between 0 and 1.
   * @param {number} x - The input value.
   * @param {boolean} [derivate=false] - Whether to compute the derivative.
   * @returns {number} The result of the logistic function or its derivative.
   */
  static logistic(x: number, derivate: boolean = false): number {
    const fx = 1 / (1 + Math.exp(-x));
    return !derivate ? fx : fx * (1 - fx);
  }

  /**
   * Derivative of the logistic function expressed through its output `fx`, i.e. fx * (1 - fx).
   * Backward passes use this form because nodes cache activations, not sums.
   */
  static logisticGradientFromOutput(fx: number): number {
    return fx * (1 - fx);
  }

  /**
   * Identity activation function (Linear): f(x) = x.
   * Used by sum nodes, which pass their weighted sum through untouched.
   * @param {number} x - The input value.
   * @param {boolean} [derivate=false] - Whether to compute the derivative.
   * @returns {number} The result of the identity function (x) or its derivative (1).
   */
  static identity(x: number, derivate: boolean = false): number {
    return derivate ? 1 : x;
  }
}

export default Activation;
