/**
 * @fileoverview Vector Reductions
 *
 * Reducers used along a table axis. NaN propagates through all of them
 * except `nanMaximum`.
 *
 * @module domain/inflammation/reductions
 */

import type { Vector } from './inflammation-table.js';

export function mean(values: Vector): number {
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i] ?? Number.NaN;
  }
  return sum / values.length;
}

export function maximum(values: Vector): number {
  let best = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < values.length; i++) {
    const value = values[i] ?? Number.NaN;
    if (Number.isNaN(value)) return Number.NaN;
    if (value > best) best = value;
  }
  return best;
}

export function minimum(values: Vector): number {
  let best = Number.POSITIVE_INFINITY;
  for (let i = 0; i < values.length; i++) {
    const value = values[i] ?? Number.NaN;
    if (Number.isNaN(value)) return Number.NaN;
    if (value < best) best = value;
  }
  return best;
}

/**
 * Maximum ignoring NaN entries; NaN when every entry is NaN
 */
export function nanMaximum(values: Vector): number {
  let best = Number.NaN;
  for (let i = 0; i < values.length; i++) {
    const value = values[i] ?? Number.NaN;
    if (Number.isNaN(value)) continue;
    if (Number.isNaN(best) || value > best) best = value;
  }
  return best;
}

/**
 * Population standard deviation (divides by n, not n - 1)
 */
export function populationStd(values: Vector): number {
  const centre = mean(values);
  let squares = 0;
  for (let i = 0; i < values.length; i++) {
    const delta = (values[i] ?? Number.NaN) - centre;
    squares += delta * delta;
  }
  return Math.sqrt(squares / values.length);
}

export function countAbove(values: Vector, threshold: number): number {
  let count = 0;
  for (let i = 0; i < values.length; i++) {
    // strictly greater; NaN never counts
    if ((values[i] ?? Number.NaN) > threshold) count++;
  }
  return count;
}
