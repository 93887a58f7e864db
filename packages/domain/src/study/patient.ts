/**
 * @fileoverview Patient
 *
 * A patient in an inflammation study. Observations are append-only and
 * kept in the order they were added.
 *
 * @module domain/study/patient
 */

import { IndexOutOfRangeError, ValidationError } from '@inflammation/core';
import {
  PatientRecordSchema,
  type PatientRecord,
} from '@inflammation/types';

import { createObservation, type Observation } from './observation.js';
import type { Person } from './person.js';

export class Patient implements Person {
  readonly name: string;

  private readonly entries: Observation[];

  constructor(name: string, observations: readonly Observation[] = []) {
    this.name = name;
    this.entries = [...observations];
  }

  /**
   * Rebuild a patient from its plain record form.
   *
   * @throws {ValidationError} when the record does not match PatientRecordSchema
   */
  static fromRecord(record: unknown): Patient {
    const parsed = PatientRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ValidationError('Invalid patient record', parsed.error.flatten());
    }
    return new Patient(
      parsed.data.name,
      parsed.data.observations.map((o) => createObservation(o.day, o.value))
    );
  }

  /** Snapshot of the observations; changing it does not affect the patient */
  get observations(): readonly Observation[] {
    return [...this.entries];
  }

  /**
   * Record a measurement. Without a day it goes on the day after the last
   * observation, or day 0 for the first one.
   */
  addObservation(value: number, day?: number): Observation {
    const observation = createObservation(day ?? this.nextDay(), value);
    this.entries.push(observation);
    return observation;
  }

  /**
   * @throws {IndexOutOfRangeError} when no observation has been recorded yet
   */
  get lastObservation(): Observation {
    const last = this.entries[this.entries.length - 1];
    if (last === undefined) {
      throw new IndexOutOfRangeError('patient has no observations', -1, 0);
    }
    return last;
  }

  toRecord(): PatientRecord {
    return {
      name: this.name,
      observations: this.entries.map(({ day, value }) => ({ day, value })),
    };
  }

  toString(): string {
    return this.name;
  }

  private nextDay(): number {
    const last = this.entries[this.entries.length - 1];
    return last === undefined ? 0 : last.day + 1;
  }
}
