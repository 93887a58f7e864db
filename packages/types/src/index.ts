/**
 * @module @inflammation/types
 * @description Shared Zod schemas and TypeScript types
 */

export {
  ObservationDaySchema,
  ObservationValueSchema,
  ObservationSchema,
  PersonNameSchema,
  PatientRecordSchema,
  DoctorRecordSchema,
  TableShapeSchema,
  DailySummarySchema,
  type ObservationRecord,
  type PatientRecord,
  type PatientRecordInput,
  type DoctorRecord,
  type TableShape,
  type DailySummary,
} from './inflammation.schema.js';
