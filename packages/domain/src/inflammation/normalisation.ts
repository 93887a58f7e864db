/**
 * @fileoverview Patient Normalisation
 *
 * Scales every patient row into [0, 1] relative to that row's maximum.
 *
 * @module domain/inflammation/normalisation
 */

import {
  createLogger,
  isInflammationError,
  NegativeValueError,
  type InflammationError,
} from '@inflammation/core';

import { err, ok, type Result } from '../shared/types.js';
import { InflammationTable } from './inflammation-table.js';
import { nanMaximum } from './reductions.js';

const logger = createLogger({ name: 'inflammation-normalisation' });

/**
 * Normalise each patient row by its NaN-ignoring maximum.
 *
 * 0/0 and x/NaN cells become 0, then any remaining negative cell becomes 0,
 * in that order. A row of zeros therefore maps to zeros.
 *
 * @throws {InvalidTableTypeError} input is not a numeric table
 * @throws {TableShapeError} input is not exactly 2-dimensional
 * @throws {NegativeValueError} input holds a negative value
 */
export function patientNormalise(data: unknown): InflammationTable {
  const table = InflammationTable.from(data);

  const negative = table.find((value) => value < 0);
  if (negative) {
    throw new NegativeValueError(negative.row, negative.col);
  }

  const rowMax = table.reduceRows(nanMaximum);

  return table.map((value, row) => {
    const scaled = value / (rowMax[row] ?? Number.NaN);
    const cleaned = Number.isNaN(scaled) ? 0 : scaled;
    return cleaned < 0 ? 0 : cleaned;
  });
}

/**
 * Same as `patientNormalise`, reporting rejected input as a failure value
 */
export function tryPatientNormalise(data: unknown): Result<InflammationTable, InflammationError> {
  try {
    return ok(patientNormalise(data));
  } catch (error) {
    if (isInflammationError(error)) {
      logger.debug({ code: error.code }, 'Normalisation input rejected');
      return err(error);
    }
    throw error;
  }
}
