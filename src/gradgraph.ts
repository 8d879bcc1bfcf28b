import Graph from './architecture/graph';
import Node, {
  ConstantNode,
  InputNode,
  SigmoidNode,
  SourceNode,
  SumNode,
  WeightedNode,
  isWeighted,
} from './architecture/node';
import Connection from './architecture/connection';
import { RowTable } from './architecture/dataset';
import { Trainer } from './architecture/graph.train';
import * as methods from './methods/methods';
import { config } from './config';
import { createRandom, uniform } from './utils/random';
import {
  CycleDetectedError,
  DuplicateNameError,
  GraphError,
  GraphErrorCode,
  InvalidArgumentError,
  NoInputsError,
  NotAnInputError,
  UnknownNodeError,
  UnsupportedOperationError,
  isGraphError,
} from './utils/errors';

export type { GraphOptions, GraphJSON } from './architecture/graph';
export type {
  NodeHandle,
  NodeKind,
  NodeJSON,
  NodeResolver,
  TrainingState,
} from './architecture/node';
export type { ConnectionJSON } from './architecture/connection';
export type {
  BackwardPassReport,
  DerivativeSeed,
  LossDerivativeFn,
  LossDerivativeSource,
} from './architecture/graph/graph.propagate';
export type { TrainerOptions, StepResult } from './architecture/graph.train';
export type { CostFunction } from './methods/cost';
export type { GradGraphConfig } from './config';
export type { RandomFn } from './utils/random';
export type { StaleGradientWarning } from './utils/errors';

export {
  Graph,
  Node,
  SourceNode,
  WeightedNode,
  InputNode,
  ConstantNode,
  SumNode,
  SigmoidNode,
  isWeighted,
  Connection,
  RowTable,
  Trainer,
  methods,
  config,
  createRandom,
  uniform,
  GraphError,
  GraphErrorCode,
  DuplicateNameError,
  UnsupportedOperationError,
  NotAnInputError,
  NoInputsError,
  CycleDetectedError,
  UnknownNodeError,
  InvalidArgumentError,
  isGraphError,
};
