import { CityTarget, PRIORITY_TIERS, QueryCandidate } from '../types.js';

export interface CountryCities {
  countryCode: string;
  cities: CityTarget[];
}

export interface BudgetResult {
  queries: QueryCandidate[];
  citiesByCountry: CountryCities[];
  combinations: number;
  droppedQueries: QueryCandidate[];
  droppedCities: CityTarget[];
}

/** Stable sort by tier: HIGH, then MEDIUM, then LOW. */
export function sortByPriority(queries: readonly QueryCandidate[]): QueryCandidate[] {
  return queries
    .map((query, index) => ({ query, index }))
    .sort((a, b) => {
      const tier = PRIORITY_TIERS.indexOf(a.query.priority) - PRIORITY_TIERS.indexOf(b.query.priority);
      return tier !== 0 ? tier : a.index - b.index;
    })
    .map((entry) => entry.query);
}

function countCities(groups: readonly CountryCities[]): number {
  return groups.reduce((sum, group) => sum + group.cities.length, 0);
}

function largestGroup(groups: readonly CountryCities[]): CountryCities | undefined {
  let largest: CountryCities | undefined;
  for (const group of groups) {
    // `>=` so the later country loses a city on ties
    if (group.cities.length > 1 && (!largest || group.cities.length >= largest.cities.length)) {
      largest = group;
    }
  }
  return largest;
}

/**
 * Caps query x city combinations at `maxTotalQueries`. Queries of the best
 * tier present are kept across every requested country before breadth within
 * one country: cities are trimmed from the largest country first, and queries
 * are cut from the lowest tier.
 */
export function enforceBudget(
  queries: readonly QueryCandidate[],
  citiesByCountry: readonly CountryCities[],
  maxTotalQueries: number
): BudgetResult {
  const ordered = sortByPriority(queries);
  const groups = citiesByCountry.map((group) => ({ countryCode: group.countryCode, cities: [...group.cities] }));
  const droppedCities: CityTarget[] = [];
  const budget = Math.max(0, Math.floor(maxTotalQueries));

  let cityCount = countCities(groups);
  if (ordered.length * cityCount <= budget) {
    return {
      queries: ordered,
      citiesByCountry: groups,
      combinations: ordered.length * cityCount,
      droppedQueries: [],
      droppedCities
    };
  }

  // the best tier present is the one every country should keep
  const topTier = ordered[0]?.priority;
  const topCount = Math.max(1, ordered.filter((query) => query.priority === topTier).length);
  while (topCount * cityCount > budget) {
    const group = largestGroup(groups);
    if (!group) break;
    const removed = group.cities.pop();
    if (removed) droppedCities.push(removed);
    cityCount -= 1;
  }

  while (cityCount > budget && groups.length > 0) {
    const group = groups.pop();
    if (group) {
      droppedCities.push(...group.cities);
      cityCount -= group.cities.length;
    }
  }

  const keep = cityCount === 0 ? 0 : Math.min(ordered.length, Math.floor(budget / cityCount));
  return {
    queries: ordered.slice(0, keep),
    citiesByCountry: groups,
    combinations: keep * cityCount,
    droppedQueries: ordered.slice(keep),
    droppedCities
  };
}
