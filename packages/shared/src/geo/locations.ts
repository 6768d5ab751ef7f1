// ─── Location Table ──────────────────────────────────────
// Read-only lookup of short location keys (e.g. "sjc") to coordinates.
// Built-in entries ship in data/locations.json; hosts may layer custom
// entries on top, which win on key conflicts.

import locationData from '../../data/locations.json';
import { LocationFileSchema } from '../schemas/inputs';
import type { LatLng } from '../types/map';

export interface LocationEntry {
  key: string;
  name: string;
  coordinates: LatLng;
  /** True when the key is a fixed-coordinate alias rather than a real location. */
  alias: boolean;
}

export interface LocationTable {
  lookup(key: string): LocationEntry | undefined;
  keys(): string[];
}

export interface LocationDefinition {
  name: string;
  lat: number;
  lng: number;
}

export interface LocationTableOptions {
  custom?: Record<string, LocationDefinition>;
}

const builtin = LocationFileSchema.parse(locationData);

function toEntry(key: string, def: LocationDefinition, alias: boolean): LocationEntry {
  return { key, name: def.name, coordinates: { lat: def.lat, lng: def.lng }, alias };
}

export function createLocationTable(options: LocationTableOptions = {}): LocationTable {
  const entries = new Map<string, LocationEntry>();

  for (const [key, def] of Object.entries(builtin.locations)) {
    entries.set(key, toEntry(key, def, false));
  }
  for (const [key, def] of Object.entries(builtin.aliases)) {
    entries.set(key, toEntry(key, def, true));
  }
  for (const [key, def] of Object.entries(options.custom ?? {})) {
    entries.set(key, toEntry(key, def, false));
  }

  return {
    lookup: (key) => entries.get(key),
    keys: () => [...entries.keys()].filter((k) => !entries.get(k)?.alias),
  };
}

/** Table with the built-in locations only. */
export const defaultLocationTable: LocationTable = createLocationTable();
