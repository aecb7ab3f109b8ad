export { createSmoother1D, createSmoother2D } from './smoother';
export type { Smoother, Smoother1D, Smoother2D, PipelineStage } from './types';
