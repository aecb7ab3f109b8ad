/**
 * Core smoothing - filters, pipeline and construction
 *
 * - window-buffer: rolling sample storage for windowed filters
 * - filter: filter contract, parameter guards and axis pairs
 * - offset, moving-average, running-average, fixation, multi-pass: the filter catalog
 * - smoother: ordered filter pipeline
 * - builder: fluent and declarative smoother construction
 */

export * from './window-buffer';
export * from './filter';
export * from './offset';
export * from './moving-average';
export * from './running-average';
export * from './fixation';
export * from './multi-pass';
export * from './smoother';
export * from './builder';
