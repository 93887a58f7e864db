/**
 * @fileoverview Study Entities Exports
 *
 * @module domain/study
 */

export { createPerson, isSamePerson, type Person } from './person.js';
export { createObservation, type Observation } from './observation.js';
export { Patient } from './patient.js';
export { Doctor } from './doctor.js';
