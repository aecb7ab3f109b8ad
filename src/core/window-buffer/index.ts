export { createWindowBuffer } from './window-buffer';
export type { WindowBuffer } from './types';
