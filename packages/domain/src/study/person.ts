/**
 * @fileoverview Person
 *
 * Named-entity capability shared by patients and doctors.
 *
 * @module domain/study/person
 */

export interface Person {
  readonly name: string;
  toString(): string;
}

export function createPerson(name: string): Person {
  return Object.freeze({
    name,
    toString: () => name,
  });
}

/** Case-sensitive exact name match */
export function isSamePerson(a: Person, b: Person): boolean {
  return a.name === b.name;
}
