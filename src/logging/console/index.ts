export { createConsoleSink } from './console-sink';
