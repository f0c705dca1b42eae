// engine/facilityDirectory.ts
// Registry of receiving facilities (ModtageranlægID → name + address).
// Built once, frozen, and passed by reference to the validator and assembler.

import facilitySeed from '../data/facilities.json';
import type { FacilityEntry } from './types';

export interface FacilityDirectory {
  has(id: number): boolean;
  get(id: number): FacilityEntry | undefined;
  ids(): number[];
  entries(): FacilityEntry[];
}

export function createFacilityDirectory(
  entries: ReadonlyArray<FacilityEntry>
): FacilityDirectory {
  const byId = new Map<number, FacilityEntry>();

  for (const entry of entries) {
    if (!Number.isInteger(entry.id)) {
      throw new Error(`Facility ID must be an integer, got ${entry.id}.`);
    }
    if (byId.has(entry.id)) {
      throw new Error(`Duplicate facility ID ${entry.id} in directory.`);
    }
    byId.set(
      entry.id,
      Object.freeze({
        id: entry.id,
        name: entry.name.trim(),
        address: entry.address.trim()
      })
    );
  }

  return Object.freeze({
    has: (id: number) => byId.has(id),
    get: (id: number) => byId.get(id),
    ids: () => Array.from(byId.keys()),
    entries: () => Array.from(byId.values())
  });
}

/** Directory shipped with this version of the schema. */
export const DEFAULT_FACILITY_DIRECTORY: FacilityDirectory =
  createFacilityDirectory(facilitySeed);
