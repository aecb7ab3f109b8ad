/**
 * Declarative smoother construction
 *
 * Builds a smoother from a PipelineDescription such as one parsed from
 * JSON. The description is validated as a whole first, so every problem
 * is reported together.
 */

import type { Logger } from '@logging';
import { createNullLogger } from '@logging';
import { validatePipelineDescription } from '@validation';
import { ConfigurationError } from '$types/errors';
import type { AnySmoother } from './types';
import { createSmootherBuilder } from './builder';
import { createFilter } from './filter-factory';

/**
 * Build a smoother from a pipeline description
 *
 * @param description - Typed or untyped (e.g. parsed JSON) description
 * @param logger - Optional logger; validation warnings go out at WARNING
 * @returns Smoother of the described dimensionality
 * @throws {ConfigurationError} Listing every validation error in `issues`
 *
 * @example
 * ```typescript
 * const smoother = buildSmoother({
 *   dimension: 1,
 *   filters: [
 *     { type: 'median', windowSize: 5 },
 *     { type: 'exponential', alpha: 0.3 }
 *   ]
 * });
 * if (smoother.dimension === 1) smoother.addAndGet(3.2);
 * ```
 */
export function buildSmoother(description: unknown, logger: Logger = createNullLogger()): AnySmoother {
  const result = validatePipelineDescription(description);

  for (const warning of result.warnings) {
    logger.warning(warning.message);
  }

  if (!result.valid || result.description === undefined) {
    const issues = result.errors.map(function (error) {
      return { field: error.field, message: error.message };
    });
    const summary = issues.map(function (issue) { return issue.message; }).join('; ');
    throw new ConfigurationError('Invalid pipeline description: ' + summary, issues);
  }

  const typed = result.description;

  if (typed.dimension === 1) {
    const builder = createSmootherBuilder(logger).oneDimensional().continuous();
    for (const spec of typed.filters) {
      builder.attachFilter(createFilter(spec, 1));
    }
    return builder.build();
  }

  const builder = createSmootherBuilder(logger).twoDimensional().continuous();
  for (const spec of typed.filters) {
    builder.attachFilter(createFilter(spec, 2));
  }
  return builder.build();
}
