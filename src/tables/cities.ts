import { z } from 'zod';

import { CityTarget } from '../types.js';

import { getLanguageForCountry } from './countries.js';
import { deepFreeze, loadDataFile } from './dataFile.js';

const cityFileSchema = z.record(
  z.string().length(2),
  z.array(
    z.object({
      city: z.string().min(1),
      region: z.string().optional(),
      tier: z.number().int().min(1)
    })
  )
);

export interface CityEntry {
  city: string;
  region?: string;
  tier: number;
}

let table: Readonly<Record<string, readonly CityEntry[]>> | null = null;

function getTable() {
  if (!table) {
    table = deepFreeze(loadDataFile('cities.json', cityFileSchema));
  }
  return table;
}

export interface CityQuery {
  tier?: number;
  limit?: number;
}

/** Cities of a country in table order, optionally filtered by tier and truncated. */
export function getCities(countryCode: string, query: CityQuery = {}): CityEntry[] {
  let cities = [...(getTable()[countryCode.toUpperCase()] ?? [])];
  if (query.tier !== undefined) {
    cities = cities.filter((entry) => entry.tier === query.tier);
  }
  if (query.limit !== undefined) {
    cities = cities.slice(0, Math.max(0, query.limit));
  }
  return cities;
}

export function hasCityTable(countryCode: string): boolean {
  return getCities(countryCode).length > 0;
}

export function toCityTarget(countryCode: string, entry: CityEntry): CityTarget {
  const code = countryCode.toUpperCase();
  const locale = getLanguageForCountry(code);
  return {
    countryCode: code,
    city: entry.city,
    ...(locale ? { locale } : {})
  };
}

/** Location tag used in queries, exports and coverage reports: "Chicago, US". */
export function formatCity(target: CityTarget): string {
  return `${target.city}, ${target.countryCode}`;
}
