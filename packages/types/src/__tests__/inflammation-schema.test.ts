import { describe, it, expect } from 'vitest';
import {
  ObservationSchema,
  ObservationDaySchema,
  PatientRecordSchema,
  DoctorRecordSchema,
  TableShapeSchema,
} from '../inflammation.schema.js';

describe('ObservationDaySchema', () => {
  it('should accept zero and positive integers', () => {
    expect(ObservationDaySchema.safeParse(0).success).toBe(true);
    expect(ObservationDaySchema.safeParse(41).success).toBe(true);
  });

  it('should reject negative days', () => {
    const result = ObservationDaySchema.safeParse(-1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Observation day must not be negative');
    }
  });

  it('should reject fractional days', () => {
    const result = ObservationDaySchema.safeParse(1.5);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Observation day must be an integer');
    }
  });
});

describe('ObservationSchema', () => {
  it('should accept a missing (NaN) measurement', () => {
    const result = ObservationSchema.safeParse({ day: 3, value: Number.NaN });
    expect(result.success).toBe(true);
  });

  it('should reject a non-numeric value', () => {
    expect(ObservationSchema.safeParse({ day: 3, value: '7' }).success).toBe(false);
  });
});

describe('PatientRecordSchema', () => {
  it('should default observations to an empty list', () => {
    const record = PatientRecordSchema.parse({ name: 'Alice' });
    expect(record).toEqual({ name: 'Alice', observations: [] });
  });
});

describe('DoctorRecordSchema', () => {
  it('should parse nested patient records', () => {
    const record = DoctorRecordSchema.parse({
      name: 'Dr. Who',
      patients: [{ name: 'Bob', observations: [{ day: 0, value: 2 }] }],
    });
    expect(record.patients[0]?.observations).toEqual([{ day: 0, value: 2 }]);
  });
});

describe('TableShapeSchema', () => {
  it('should reject negative dimensions', () => {
    expect(TableShapeSchema.safeParse({ rows: -1, cols: 2 }).success).toBe(false);
  });
});
