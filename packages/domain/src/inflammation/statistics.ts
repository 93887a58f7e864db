/**
 * @fileoverview Inflammation Statistics
 *
 * Daily aggregates reduce down the patient axis (one value per day);
 * patient aggregates reduce across the day axis (one value per patient).
 * All functions are pure and leave their input untouched.
 *
 * @module domain/inflammation/statistics
 */

import { createLogger } from '@inflammation/core';
import type { DailySummary } from '@inflammation/types';

import { toTable, type TableInput } from './inflammation-table.js';
import { countAbove, maximum, mean, minimum, populationStd } from './reductions.js';

const logger = createLogger({ name: 'inflammation-stats' });

/** Mean inflammation of each day across all patients */
export function dailyMean(data: TableInput): number[] {
  return toTable(data).reduceColumns(mean);
}

/** Highest inflammation of each day across all patients */
export function dailyMax(data: TableInput): number[] {
  return toTable(data).reduceColumns(maximum);
}

/** Lowest inflammation of each day across all patients */
export function dailyMin(data: TableInput): number[] {
  return toTable(data).reduceColumns(minimum);
}

/** Population standard deviation of each day across all patients */
export function dailyStd(data: TableInput): number[] {
  return toTable(data).reduceColumns(populationStd);
}

/** Population standard deviation of each patient across all days */
export function patientStdDev(data: TableInput): number[] {
  return toTable(data).reduceRows(populationStd);
}

/**
 * Number of days on which a patient's inflammation is strictly above the threshold.
 *
 * @throws {IndexOutOfRangeError} when `patientNum` is not an integer in `[0, rows)`;
 *   negative indices do not count from the end
 */
export function dailyAboveThreshold(patientNum: number, data: TableInput, threshold: number): number {
  return countAbove(toTable(data).row(patientNum), threshold);
}

/**
 * All four daily aggregates in one pass over the table
 */
export function summariseDaily(data: TableInput): DailySummary {
  const table = toTable(data);
  logger.debug({ patients: table.rows, days: table.cols }, 'Summarising daily inflammation');

  return {
    mean: table.reduceColumns(mean),
    max: table.reduceColumns(maximum),
    min: table.reduceColumns(minimum),
    std: table.reduceColumns(populationStd),
  };
}
