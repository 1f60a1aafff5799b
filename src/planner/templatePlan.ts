import { v4 as uuid } from 'uuid';

import { ConfigurationError } from '../errors.js';
import {
  expandTemplate,
  getMapsTemplates,
  getQueryTemplates,
  TemplatePriority,
  toCandidate
} from '../tables/queryTemplates.js';
import { CityTarget, QueryCandidate, QueryPlan } from '../types.js';

import { CountryCities, enforceBudget } from './budget.js';

export interface TemplatePlanRequest {
  keywords: string[];
  priority?: TemplatePriority;
  cities: CityTarget[];
  maxTotalQueries: number;
  pagesPerQuery?: number;
  includeMaps?: boolean;
  now?: Date;
}

function uniqueByText(candidates: QueryCandidate[]): QueryCandidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    const key = candidate.text.toLowerCase();
    if (!candidate.text || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function groupByCountry(cities: readonly CityTarget[]): CountryCities[] {
  const groups: CountryCities[] = [];
  for (const city of cities) {
    let group = groups.find((entry) => entry.countryCode === city.countryCode);
    if (!group) {
      group = { countryCode: city.countryCode, cities: [] };
      groups.push(group);
    }
    if (!group.cities.some((existing) => existing.city.toLowerCase() === city.city.toLowerCase())) {
      group.cities.push(city);
    }
  }
  return groups;
}

/**
 * Model-free plan built from the query template library: every template of
 * the selected tier(s) for every keyword, budgeted like a generated plan.
 */
export function planFromTemplates(request: TemplatePlanRequest): QueryPlan {
  const keywords = request.keywords.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
  if (keywords.length === 0) {
    throw new ConfigurationError('At least one keyword is required for a template plan.');
  }
  if (request.cities.length === 0) {
    throw new ConfigurationError('At least one city is required for a template plan.');
  }
  if (!Number.isInteger(request.maxTotalQueries) || request.maxTotalQueries <= 0) {
    throw new ConfigurationError(`maxTotalQueries must be a positive integer, got ${request.maxTotalQueries}.`);
  }
  const pagesPerQuery = request.pagesPerQuery ?? 1;
  if (!Number.isInteger(pagesPerQuery) || pagesPerQuery < 1 || pagesPerQuery > 10) {
    throw new ConfigurationError(`pagesPerQuery must be an integer between 1 and 10, got ${pagesPerQuery}.`);
  }
  const includeMaps = request.includeMaps ?? true;
  const priority = request.priority ?? 'all';

  const templates = getQueryTemplates(priority);
  const candidates = uniqueByText(
    keywords.flatMap((keyword) => templates.map((template) => toCandidate(template, keyword)))
  );
  const budget = enforceBudget(candidates, groupByCountry(request.cities), request.maxTotalQueries);
  if (budget.combinations === 0) {
    throw new ConfigurationError(`No template query fits a budget of ${request.maxTotalQueries} across the selected cities.`);
  }
  const cities = budget.citiesByCountry.flatMap((group) => group.cities);

  const mapsCandidates = uniqueByText(
    keywords.flatMap((keyword) =>
      getMapsTemplates().map((template) => ({
        text: expandTemplate(template, keyword),
        priority: 'HIGH' as const,
        category: 'maps',
        reasoning: `Maps template "${template}" for keyword "${keyword}"`,
        translations: {}
      }))
    )
  );
  const mapsKeep = cities.length === 0 ? 0 : Math.min(mapsCandidates.length, Math.floor(request.maxTotalQueries / cities.length));
  const mapsQueries = mapsCandidates.slice(0, mapsKeep);

  const countries = budget.citiesByCountry.map((group) => group.countryCode);
  const citiesPerCountry = Math.max(1, ...budget.citiesByCountry.map((group) => group.cities.length));
  const estimatedCalls = budget.combinations * pagesPerQuery + (includeMaps ? mapsQueries.length * cities.length : 0);

  return {
    id: uuid(),
    revision: 1,
    createdAt: (request.now ?? new Date()).toISOString(),
    context: {
      description: `Template plan for ${keywords.join(', ')}`,
      mustHave: [],
      excluded: []
    },
    constraints: {
      countries,
      citiesPerCountry,
      maxTotalQueries: request.maxTotalQueries,
      useNativeLanguage: false,
      pagesPerQuery,
      includeMaps
    },
    queries: budget.queries,
    mapsQueries,
    cities,
    combinations: budget.combinations,
    estimatedCalls,
    rationale: `${budget.queries.length} "${priority}" template queries across ${cities.length} cities.`
  };
}
