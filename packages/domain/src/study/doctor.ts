/**
 * @fileoverview Doctor
 *
 * A doctor in an inflammation study, responsible for a set of patients
 * unique by name.
 *
 * @module domain/study/doctor
 */

import { createLogger, ValidationError } from '@inflammation/core';
import { DoctorRecordSchema, type DoctorRecord } from '@inflammation/types';

import { Patient } from './patient.js';
import { isSamePerson, type Person } from './person.js';

const logger = createLogger({ name: 'study-doctor' });

export class Doctor implements Person {
  readonly name: string;

  private readonly roster: Patient[] = [];

  constructor(name: string) {
    this.name = name;
  }

  /**
   * @throws {ValidationError} when the record does not match DoctorRecordSchema
   */
  static fromRecord(record: unknown): Doctor {
    const parsed = DoctorRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ValidationError('Invalid doctor record', parsed.error.flatten());
    }
    const doctor = new Doctor(parsed.data.name);
    for (const patient of parsed.data.patients) {
      doctor.addPatient(Patient.fromRecord(patient));
    }
    return doctor;
  }

  /** Patients in the order they were first added */
  get patients(): readonly Patient[] {
    return [...this.roster];
  }

  /**
   * Add a patient unless one with the same name is already on the roster.
   */
  addPatient(patient: Patient): void {
    if (this.roster.some((existing) => isSamePerson(existing, patient))) {
      logger.debug({ rosterSize: this.roster.length }, 'Patient already on roster, skipping');
      return;
    }
    this.roster.push(patient);
  }

  getPatient(name: string): Patient | undefined {
    return this.roster.find((patient) => patient.name === name);
  }

  toRecord(): DoctorRecord {
    return {
      name: this.name,
      patients: this.roster.map((patient) => patient.toRecord()),
    };
  }

  toString(): string {
    return this.name;
  }
}
