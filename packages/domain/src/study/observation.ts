/**
 * @fileoverview Observation
 *
 * A single (day, value) inflammation measurement. Frozen on creation.
 *
 * @module domain/study/observation
 */

import { ValidationError } from '@inflammation/core';
import { ObservationSchema } from '@inflammation/types';

export interface Observation {
  /** Study day, 0-based */
  readonly day: number;
  readonly value: number;
  toString(): string;
}

/**
 * @throws {ValidationError} when the day is not a non-negative integer
 */
export function createObservation(day: number, value: number): Observation {
  const parsed = ObservationSchema.safeParse({ day, value });
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues[0]?.message ?? 'Invalid observation',
      parsed.error.flatten().fieldErrors
    );
  }

  return Object.freeze({
    day: parsed.data.day,
    value: parsed.data.value,
    toString: () => String(parsed.data.value),
  });
}
