export { createAxisPairFilter } from './axis-pair';
export {
  MOVING_AVERAGE_TYPES,
  isMovingAverageType,
  requireWindowSize,
  requireAlpha,
  resolveStdDev,
  requireThreshold,
  requireOffset,
  requirePasses,
  resolveMovingAverageType
} from './helpers';
export type * from './types';
