export { createOffsetFilter, createOffsetFilter2D } from './offset';
