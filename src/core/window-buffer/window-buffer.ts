/**
 * Rolling window buffer
 *
 * Ring storage bounded by the capacity. Once full, a push overwrites
 * the oldest slot; reading the contents re-fills a single reused view
 * instead of allocating a copy.
 */

import type { WindowBuffer } from './types';
import { ConfigurationError } from '$types/errors';
import { isInteger, isPositiveInteger } from '@utils/number';

/**
 * Create an empty window buffer
 *
 * @param capacity - Maximum number of samples kept (integer >= 1)
 * @returns Window buffer instance
 * @throws {ConfigurationError} If capacity is not an integer >= 1
 *
 * @example
 * ```typescript
 * const buffer = createWindowBuffer<number>(3);
 * buffer.push(1);
 * buffer.push(2);
 * buffer.push(3);
 * buffer.push(4); // returns 1
 * buffer.contents(); // [2, 3, 4]
 * ```
 */
export function createWindowBuffer<T>(capacity: number): WindowBuffer<T> {
  if (!isPositiveInteger(capacity)) {
    throw new ConfigurationError('window capacity must be an integer >= 1, got ' + capacity);
  }

  const slots: T[] = [];
  const view: T[] = [];
  let head = 0;
  let size = 0;
  let viewDirty = false;

  function slotIndex(index: number): number {
    return (head + index) % capacity;
  }

  function push(sample: T): T | undefined {
    viewDirty = true;

    if (size < capacity) {
      slots[slotIndex(size)] = sample;
      size++;
      return undefined;
    }

    // Full: overwrite the oldest slot and advance head
    const evicted = slots[head];
    slots[head] = sample;
    head = (head + 1) % capacity;
    return evicted;
  }

  function at(index: number): T {
    if (!isInteger(index) || index < 0 || index >= size) {
      throw new RangeError('index ' + index + ' out of range for ' + size + ' buffered samples');
    }
    return slots[slotIndex(index)];
  }

  function contents(): readonly T[] {
    if (viewDirty) {
      view.length = size;
      for (let i = 0; i < size; i++) {
        view[i] = slots[slotIndex(i)];
      }
      viewDirty = false;
    }
    return view;
  }

  function newest(): T | undefined {
    return size === 0 ? undefined : slots[slotIndex(size - 1)];
  }

  function clear(): void {
    slots.length = 0;
    view.length = 0;
    head = 0;
    size = 0;
    viewDirty = false;
  }

  return {
    push: push,
    contents: contents,
    at: at,
    newest: newest,
    count: function () { return size; },
    capacity: function () { return capacity; },
    isFull: function () { return size === capacity; },
    clear: clear
  };
}
