/**
 * Window buffer type definitions
 *
 * A window buffer holds the most recent samples a windowed filter
 * computes its statistic over. It is the only state of such a filter.
 */

/**
 * Fixed-capacity FIFO of recent samples
 */
export interface WindowBuffer<T> {
  /** Append a sample; returns the evicted oldest sample when the buffer was full */
  push(sample: T): T | undefined;

  /**
   * Buffered samples, oldest first.
   * The returned array is owned by the buffer and reused between calls;
   * it is only valid until the next push.
   */
  contents(): readonly T[];

  /** Sample at position `index`, oldest first (0 <= index < count) */
  at(index: number): T;

  /** Most recent sample, undefined when empty */
  newest(): T | undefined;

  /** Number of buffered samples */
  count(): number;

  /** Configured capacity */
  capacity(): number;

  /** Whether count has reached capacity */
  isFull(): boolean;

  /** Drop all samples */
  clear(): void;
}
