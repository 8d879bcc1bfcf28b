export { default as Activation } from './activation';
export { default as Cost } from './cost';
export type { CostFunction } from './cost';
