/**
 * Console output sink
 *
 * Writes each message straight to the console API and remembers the
 * most recent `bufferSize` lines, so a caller can show what was logged
 * while a smoother was being built.
 */

import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI } from '../types';
import { createWindowBuffer } from '@core/window-buffer';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize)
 * @returns Console sink instance
 * @throws {ConfigurationError} If bufferSize is not an integer >= 1
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { bufferSize: 50 });
 * consoleSink.write("Hello world");
 * consoleSink.getRecent(); // ["Hello world"]
 * ```
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): ConsoleSink {
  const recent = createWindowBuffer<string>(config.bufferSize);

  function write(formattedMessage: string): void {
    recent.push(formattedMessage);
    consoleApi.log(formattedMessage);
  }

  return {
    write: write,
    getRecent: function (): readonly string[] { return recent.contents().slice(); },
    getBufferSize: function (): number { return recent.count(); }
  };
}
