export {
  createSimpleMovingAverageFilter,
  createWeightedMovingAverageFilter,
  createGaussianAverageFilter,
  createMedianAverageFilter,
  createMovingAverageFilter,
  createSimpleMovingAverageFilter2D,
  createWeightedMovingAverageFilter2D,
  createGaussianAverageFilter2D,
  createMedianAverageFilter2D
} from './moving-average';
