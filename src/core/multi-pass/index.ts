export { createMultiPassFilter, createMultiPassFilter2D } from './multi-pass';
