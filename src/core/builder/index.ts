export { createSmootherBuilder } from './builder';
export { createFilter } from './filter-factory';
export { buildSmoother } from './declarative';
export type {
  FilterSpec,
  PipelineDescription,
  AnySmoother,
  SmootherBuilder,
  DimensionedSmootherBuilder,
  ContinuousSmootherBuilder
} from './types';
