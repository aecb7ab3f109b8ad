export { createFixationFilter, createFixationFilter2D } from './fixation';
