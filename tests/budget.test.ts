import { describe, expect, it } from 'vitest';

import { enforceBudget, sortByPriority } from '../src/planner/budget.js';
import { PriorityTier } from '../src/types.js';

import { candidate, city } from './helpers.js';

function batch(prefix: string, count: number, priority: PriorityTier) {
  return Array.from({ length: count }, (_, index) => candidate(`${prefix} ${index + 1}`, priority));
}

describe('sortByPriority', () => {
  it('orders by tier and keeps the original order inside a tier', () => {
    const sorted = sortByPriority([
      candidate('low a', 'LOW'),
      candidate('high a', 'HIGH'),
      candidate('medium a', 'MEDIUM'),
      candidate('high b', 'HIGH')
    ]);
    expect(sorted.map((query) => query.text)).toEqual(['high a', 'high b', 'medium a', 'low a']);
  });
});

describe('enforceBudget', () => {
  it('keeps everything when the plan fits', () => {
    const queries = [candidate('b', 'LOW'), candidate('a', 'HIGH')];
    const result = enforceBudget(queries, [{ countryCode: 'US', cities: [city('Chicago'), city('Houston')] }], 4);

    expect(result.queries.map((query) => query.text)).toEqual(['a', 'b']);
    expect(result.combinations).toBe(4);
    expect(result.droppedQueries).toEqual([]);
    expect(result.droppedCities).toEqual([]);
  });

  it('caps 30 candidates over 5 cities at 10 combinations, keeping HIGH queries', () => {
    const queries = [...batch('low', 10, 'LOW'), ...batch('medium', 10, 'MEDIUM'), ...batch('high', 10, 'HIGH')];
    const cities = ['New York', 'Los Angeles', 'Chicago', 'Houston', 'Dallas'].map((name) => city(name));

    const result = enforceBudget(queries, [{ countryCode: 'US', cities }], 10);

    expect(result.combinations).toBe(10);
    expect(result.queries.map((query) => query.text)).toEqual(batch('high', 10, 'HIGH').map((query) => query.text));
    expect(result.citiesByCountry).toEqual([{ countryCode: 'US', cities: [city('New York')] }]);
    expect(result.droppedCities.map((target) => target.city)).toEqual(['Dallas', 'Houston', 'Chicago', 'Los Angeles']);
    expect(result.droppedQueries).toHaveLength(20);
  });

  it('trims the largest country first and the later one on ties', () => {
    const groups = [
      { countryCode: 'US', cities: [city('Chicago'), city('Houston'), city('Dallas')] },
      { countryCode: 'DE', cities: [city('Berlin', 'DE', 'de'), city('Hamburg', 'DE', 'de'), city('Munich', 'DE', 'de')] }
    ];
    const queries = [candidate('h1'), candidate('h2'), candidate('l1', 'LOW'), candidate('l2', 'LOW')];

    const result = enforceBudget(queries, groups, 8);

    expect(result.droppedCities.map((target) => target.city)).toEqual(['Munich', 'Dallas']);
    expect(result.citiesByCountry.map((group) => group.cities.map((target) => target.city))).toEqual([
      ['Chicago', 'Houston'],
      ['Berlin', 'Hamburg']
    ]);
    expect(result.queries.map((query) => query.text)).toEqual(['h1', 'h2']);
    expect(result.combinations).toBe(8);
  });

  it('drops trailing countries when the budget is below the country count', () => {
    const groups = [
      { countryCode: 'US', cities: [city('Chicago')] },
      { countryCode: 'DE', cities: [city('Berlin', 'DE', 'de')] },
      { countryCode: 'FR', cities: [city('Paris', 'FR', 'fr')] }
    ];

    const result = enforceBudget([candidate('h1')], groups, 2);

    expect(result.citiesByCountry.map((group) => group.countryCode)).toEqual(['US', 'DE']);
    expect(result.droppedCities.map((target) => target.city)).toEqual(['Paris']);
    expect(result.combinations).toBe(2);
  });

  it('trims cities by the best tier present when there are no HIGH queries', () => {
    const cities = ['New York', 'Los Angeles', 'Chicago', 'Houston', 'Dallas'].map((name) => city(name));

    const result = enforceBudget(batch('medium', 2, 'MEDIUM'), [{ countryCode: 'US', cities }], 3);

    expect(result.queries.map((query) => query.text)).toEqual(['medium 1', 'medium 2']);
    expect(result.citiesByCountry).toEqual([{ countryCode: 'US', cities: [city('New York')] }]);
    expect(result.combinations).toBe(2);
  });

  it('keeps every country when only lower tiers are planned', () => {
    const groups = [
      { countryCode: 'US', cities: ['A', 'B', 'C', 'D', 'E'].map((name) => city(name)) },
      { countryCode: 'DE', cities: ['F', 'G', 'H', 'I', 'J'].map((name) => city(name, 'DE', 'de')) }
    ];

    const result = enforceBudget(batch('medium', 2, 'MEDIUM'), groups, 5);

    expect(result.citiesByCountry.map((group) => [group.countryCode, group.cities.map((target) => target.city)])).toEqual([
      ['US', ['A']],
      ['DE', ['F']]
    ]);
    expect(result.queries).toHaveLength(2);
    expect(result.combinations).toBe(4);
  });

  it('never exceeds the budget', () => {
    const groups = [
      { countryCode: 'US', cities: [city('A'), city('B'), city('C'), city('D')] },
      { countryCode: 'DE', cities: [city('E', 'DE'), city('F', 'DE')] }
    ];
    const batches = [
      [...batch('high', 7, 'HIGH'), ...batch('medium', 5, 'MEDIUM')],
      [...batch('low', 4, 'LOW'), ...batch('medium', 6, 'MEDIUM')]
    ];
    for (const queries of batches) {
      for (const budget of [1, 2, 3, 5, 8, 13, 21, 40, 72, 100]) {
        const result = enforceBudget(queries, groups, budget);
        const cityCount = result.citiesByCountry.reduce((sum, group) => sum + group.cities.length, 0);
        expect(result.queries.length * cityCount).toBe(result.combinations);
        expect(result.combinations).toBeLessThanOrEqual(budget);
        expect(result.queries.length).toBeGreaterThan(0);
        expect(result.citiesByCountry).toHaveLength(budget >= 2 ? 2 : 1);
      }
    }
  });
});
