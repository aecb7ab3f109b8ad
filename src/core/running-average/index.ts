export {
  createExponentialAverageFilter,
  createCumulativeAverageFilter,
  createExponentialAverageFilter2D,
  createCumulativeAverageFilter2D
} from './running-average';
