import { formatCity } from '../tables/cities.js';
import { CityTarget, SearchResult } from '../types.js';

export interface CityCoverage {
  city: CityTarget;
  count: number;
}

export function countByCity(records: readonly SearchResult[], cities: readonly CityTarget[]): CityCoverage[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.city, (counts.get(record.city) ?? 0) + 1);
  }
  return cities.map((city) => ({ city, count: counts.get(formatCity(city)) ?? 0 }));
}

/**
 * Cities whose web result count is below `ratio` times the per-city average.
 * Every planned city counts towards the average, including empty ones.
 */
export function findUnderrepresentedCities(
  records: readonly SearchResult[],
  cities: readonly CityTarget[],
  ratio = 0.5
): CityTarget[] {
  if (cities.length === 0) {
    return [];
  }
  const coverage = countByCity(records, cities);
  const average = coverage.reduce((sum, entry) => sum + entry.count, 0) / coverage.length;
  return coverage.filter((entry) => entry.count < ratio * average).map((entry) => entry.city);
}
