/**
 * Common type definitions used throughout the project
 */

/**
 * Dimensionality of a filter or smoother
 */
export type Dimension = 1 | 2;

/**
 * One-dimensional sample (a single scalar reading)
 */
export type Sample1D = number;

/**
 * Two-dimensional sample as an ordered [x, y] pair
 */
export type Sample2D = readonly [number, number];

/**
 * Sample type for a given dimensionality
 */
export type SampleOf<D extends Dimension> = D extends 1 ? Sample1D : Sample2D;
