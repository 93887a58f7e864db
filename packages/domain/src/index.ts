/**
 * @fileoverview Domain Package Exports
 *
 * @module @inflammation/domain
 *
 * - **Inflammation statistics**: daily and per-patient aggregates,
 *   normalisation and threshold counting over an InflammationTable
 * - **Study entities**: Observation, Patient, Doctor
 *
 * @example
 * ```typescript
 * import { loadInflammationCSV } from '@inflammation/core';
 * import { dailyMean, patientNormalise, Patient } from '@inflammation/domain';
 *
 * const rows = await loadInflammationCSV('inflammation-01.csv');
 * const means = dailyMean(rows);
 * const normalised = patientNormalise(rows);
 *
 * const patient = new Patient('Alice');
 * patient.addObservation(3);
 * ```
 */

export * from './shared/index.js';
export * from './inflammation/index.js';
export * from './study/index.js';
