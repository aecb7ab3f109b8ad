export { default as CONFIG, DEFAULTS, RECOMMENDED_RANGES, LOG_LEVELS } from './config';
