/**
 * Global gradgraph configuration contract & default instance.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'gradgraph';
 *   config.warnings = true;            // print stale-gradient and other runtime warnings
 *   config.defaultLearningRate = 0.01; // used by graphs created afterwards
 *
 * Adjust BEFORE constructing graphs so that new instances pick up the intended defaults.
 * Values already captured by a `Graph` (its learning rate, its random generator) are not
 * re-read later.
 */
export interface GradGraphConfig {
  /**
   * Emit runtime warnings (missing loss seeds, suspicious training input) to stderr.
   * Default: false
   */
  warnings: boolean;

  /**
   * Gradient-descent step size used when neither the graph options nor the update call
   * specify one.
   * Default: 0.0001
   */
  defaultLearningRate: number;

  /**
   * Seed for the uniform generator that initializes weights omitted at `connect` time.
   */
  defaultSeed: string;

  /**
   * Range [min, max) that random initial weights are drawn from.
   * Default: [-1, 1)
   */
  weightInitRange: readonly [number, number];
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: GradGraphConfig = {
  warnings: false, // emit runtime guidance
  defaultLearningRate: 0.0001,
  defaultSeed: 'gradgraph',
  weightInitRange: [-1, 1],
};
