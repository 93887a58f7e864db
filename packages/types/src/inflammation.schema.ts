import { z } from 'zod';

/**
 * Inflammation Study Schemas
 *
 * Shared shapes for study records (observations, patients, doctors) and
 * for the outputs of the inflammation statistics.
 */

// Zi de studiu: 0 = prima zi de masurare
export const ObservationDaySchema = z
  .number()
  .int('Observation day must be an integer')
  .nonnegative('Observation day must not be negative');

// Missing measurements are carried as NaN, so the value accepts it
export const ObservationValueSchema = z.union([z.number(), z.nan()]);

export const ObservationSchema = z.object({
  day: ObservationDaySchema,
  value: ObservationValueSchema,
});

export const PersonNameSchema = z.string();

export const PatientRecordSchema = z.object({
  name: PersonNameSchema,
  observations: z.array(ObservationSchema).default([]),
});

export const DoctorRecordSchema = z.object({
  name: PersonNameSchema,
  patients: z.array(PatientRecordSchema).default([]),
});

export const TableShapeSchema = z.object({
  rows: z.number().int().nonnegative(),
  cols: z.number().int().nonnegative(),
});

export const DailySummarySchema = z.object({
  mean: z.array(z.number()),
  max: z.array(z.number()),
  min: z.array(z.number()),
  std: z.array(z.number()),
});

// Inferred TypeScript types
export type ObservationRecord = z.infer<typeof ObservationSchema>;
export type PatientRecord = z.infer<typeof PatientRecordSchema>;
export type PatientRecordInput = z.input<typeof PatientRecordSchema>;
export type DoctorRecord = z.infer<typeof DoctorRecordSchema>;
export type TableShape = z.infer<typeof TableShapeSchema>;
export type DailySummary = z.infer<typeof DailySummarySchema>;
