/**
 * @fileoverview Inflammation Statistics Exports
 *
 * @module domain/inflammation
 */

export {
  InflammationTable,
  toTable,
  type TableInput,
  type TableRows,
  type Vector,
} from './inflammation-table.js';

export {
  dailyMean,
  dailyMax,
  dailyMin,
  dailyStd,
  patientStdDev,
  dailyAboveThreshold,
  summariseDaily,
} from './statistics.js';

export { patientNormalise, tryPatientNormalise } from './normalisation.js';

export {
  mean,
  maximum,
  minimum,
  nanMaximum,
  populationStd,
  countAbove,
} from './reductions.js';
