import { z } from 'zod';

import { deepFreeze, loadDataFile } from './dataFile.js';

const countrySchema = z.object({
  name: z.string().min(1),
  language: z.string().min(2),
  currency: z.string().min(3)
});

const countryFileSchema = z.object({
  countries: z.record(z.string().length(2), countrySchema),
  regions: z.record(z.string(), z.array(z.string().length(2)))
});

export interface Country {
  code: string;
  name: string;
  language: string;
  currency: string;
}

interface CountryTable {
  byCode: ReadonlyMap<string, Country>;
  regions: Readonly<Record<string, readonly string[]>>;
}

let table: CountryTable | null = null;

function getTable(): CountryTable {
  if (!table) {
    const file = loadDataFile('countries.json', countryFileSchema);
    const byCode = new Map<string, Country>();
    for (const [code, entry] of Object.entries(file.countries)) {
      byCode.set(code.toUpperCase(), deepFreeze({ code: code.toUpperCase(), ...entry }));
    }
    table = { byCode, regions: deepFreeze(file.regions) };
  }
  return table;
}

export function getCountry(code: string): Country | undefined {
  return getTable().byCode.get(code.trim().toUpperCase());
}

/** Primary language of a country, or `undefined` when the code is unknown. */
export function getLanguageForCountry(code: string): string | undefined {
  return getCountry(code)?.language;
}

export function getCountriesByRegion(): Readonly<Record<string, readonly string[]>> {
  return getTable().regions;
}
