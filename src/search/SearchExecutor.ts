import { RequestError } from '../errors.js';
import { normalizeDomain } from '../pipeline/Deduplicator.js';
import { ExecutionSession } from '../pipeline/ExecutionSession.js';
import { formatCity } from '../tables/cities.js';
import { getLanguageForCountry } from '../tables/countries.js';
import { buildExclusionSuffix, getExclusionList, isExcludedDomain } from '../tables/exclusions.js';
import { CityTarget, QueryCandidate, QueryPlan, ResultKind, SearchResult } from '../types.js';
import { logger } from '../utils/logger.js';

import { SerperClient } from './SerperClient.js';
import { autocompleteResponseSchema, SearchResponse, searchResponseSchema } from './serperSchemas.js';

const MAX_PAGES = 10;

export interface SearchExecutorOptions {
  pageSize?: number;
  excludedHosts?: readonly string[];
}

export interface SearchRunOptions {
  resultsPerQuery?: number;
  captureAutocomplete?: boolean;
  onCombinationComplete?: (progress: CombinationProgress) => void | Promise<void>;
}

export interface CombinationProgress {
  query: string;
  city: CityTarget;
  completed: number;
  total: number;
  newResults: number;
}

type LinkItem = { link?: string | undefined; title?: string | undefined; snippet?: string | undefined; position?: number | undefined };

/**
 * Query text for a city: the planned translation for the city's country when
 * native language is requested, otherwise the query itself.
 */
export function localizeQuery(candidate: QueryCandidate, city: CityTarget, useNativeLanguage: boolean): string {
  if (useNativeLanguage) {
    const translated = candidate.translations[city.countryCode];
    if (translated && translated.trim()) {
      return translated.trim();
    }
  }
  return candidate.text;
}

export function resolveLanguage(city: CityTarget, useNativeLanguage: boolean): string {
  if (!useNativeLanguage) {
    return 'en';
  }
  return city.locale ?? getLanguageForCountry(city.countryCode) ?? 'en';
}

/**
 * Web phase. Issues one request per (query, city, page), appending the
 * exclusion suffix to every query, and stores organic, ads and shopping
 * records plus related searches on the session.
 */
export class SearchExecutor {
  private client: SerperClient;
  private pageSize: number;
  private excludedHosts: readonly string[];
  private exclusionSuffix: string;

  constructor(client: SerperClient, options: SearchExecutorOptions = {}) {
    this.client = client;
    this.pageSize = options.pageSize ?? 10;
    this.excludedHosts = options.excludedHosts ?? getExclusionList({ includeB2bDirectories: true });
    this.exclusionSuffix = buildExclusionSuffix(this.excludedHosts);
  }

  buildQuery(queryText: string, city: CityTarget): string {
    return [queryText, city.city, this.exclusionSuffix].filter((part) => part.length > 0).join(' ');
  }

  async execute(plan: QueryPlan, session: ExecutionSession, options: SearchRunOptions = {}): Promise<number> {
    const resultsPerQuery = Math.max(1, options.resultsPerQuery ?? this.pageSize * plan.constraints.pagesPerQuery);
    const maxPages = Math.min(Math.ceil(resultsPerQuery / this.pageSize), plan.constraints.pagesPerQuery, MAX_PAGES);
    const total = plan.cities.length * plan.queries.length;
    const autocompleted = new Set<string>();
    const before = session.webResults.length;
    let completed = 0;

    logger.info(`Web search: ${plan.queries.length} queries x ${plan.cities.length} cities, up to ${maxPages} page(s) each.`);

    for (const city of plan.cities) {
      for (const candidate of plan.queries) {
        const queryText = localizeQuery(candidate, city, plan.constraints.useNativeLanguage);
        const found = await this.searchCombination(queryText, city, plan, session, resultsPerQuery, maxPages);

        if (options.captureAutocomplete && !autocompleted.has(queryText)) {
          autocompleted.add(queryText);
          await this.captureAutocomplete(queryText, city, session);
        }

        completed += 1;
        logger.debug(`[${completed}/${total}] "${queryText}" in ${formatCity(city)}: ${found} results.`);
        if (options.onCombinationComplete) {
          await options.onCombinationComplete({ query: queryText, city, completed, total, newResults: found });
        }
      }
    }

    const added = session.webResults.length - before;
    logger.info(`Web search collected ${added} results (${session.failureCount} failed requests so far).`);
    return added;
  }

  private async searchCombination(
    queryText: string,
    city: CityTarget,
    plan: QueryPlan,
    session: ExecutionSession,
    resultsPerQuery: number,
    maxPages: number
  ): Promise<number> {
    const fullQuery = this.buildQuery(queryText, city);
    const language = resolveLanguage(city, plan.constraints.useNativeLanguage);
    let organicCount = 0;
    let stored = 0;

    for (let page = 1; page <= maxPages; page += 1) {
      let response: SearchResponse;
      try {
        response = await this.client.post({
          endpoint: 'search',
          payload: {
            q: fullQuery,
            gl: city.countryCode.toLowerCase(),
            hl: language,
            num: this.pageSize,
            page
          },
          schema: searchResponseSchema,
          session,
          phase: 'web',
          query: queryText
        });
      } catch (error) {
        this.recordFailure(error, session, queryText, city, page);
        break;
      }

      if (response.relatedSearches.length > 0) {
        session.addRelatedSearches(
          queryText,
          response.relatedSearches.map((item) => item.query),
          'related'
        );
      }

      const organic = response.organic.slice(0, resultsPerQuery - organicCount);
      organicCount += organic.length;
      const records = this.toResults(organic, 'organic', queryText, city);
      if (page === 1) {
        records.push(...this.toResults(response.ads, 'ads', queryText, city));
        records.push(...this.toResults(response.shopping, 'shopping', queryText, city));
      }
      session.addWebResults(records);
      stored += records.length;

      if (response.organic.length === 0 || response.organic.length < this.pageSize || organicCount >= resultsPerQuery) {
        break;
      }
    }

    return stored;
  }

  private async captureAutocomplete(queryText: string, city: CityTarget, session: ExecutionSession) {
    try {
      const response = await this.client.post({
        endpoint: 'autocomplete',
        payload: { q: queryText, gl: city.countryCode.toLowerCase() },
        schema: autocompleteResponseSchema,
        session,
        phase: 'autocomplete',
        query: queryText
      });
      const suggestions = response.suggestions.map((item) => (typeof item === 'string' ? item : item.value));
      session.addRelatedSearches(queryText, suggestions, 'autocomplete');
    } catch (error) {
      this.recordFailure(error, session, queryText, city);
    }
  }

  private toResults(items: LinkItem[], kind: ResultKind, queryText: string, city: CityTarget): SearchResult[] {
    const results: SearchResult[] = [];
    items.forEach((item, index) => {
      const url = item.link?.trim() ?? '';
      if (!url) return;
      const domain = normalizeDomain(url);
      if (isExcludedDomain(domain, this.excludedHosts)) {
        logger.debug(`Dropping excluded host ${domain}.`);
        return;
      }
      results.push({
        domain,
        url,
        title: item.title ?? '',
        description: item.snippet ?? '',
        sourceType: 'web',
        resultKind: kind,
        query: queryText,
        city: formatCity(city),
        countryCode: city.countryCode,
        position: item.position ?? index + 1
      });
    });
    return results;
  }

  private recordFailure(error: unknown, session: ExecutionSession, query: string, city: CityTarget, page?: number) {
    const failure =
      error instanceof RequestError
        ? error.withContext({ city: formatCity(city), ...(page !== undefined ? { page } : {}) })
        : new RequestError(error instanceof Error ? error.message : String(error), {
            phase: 'web',
            query,
            city: formatCity(city),
            ...(page !== undefined ? { page } : {}),
            attempts: 1,
            cause: error
          });
    session.recordFailure(failure);
    logger.warn(`Request failed for "${query}" in ${formatCity(city)}: ${failure.message}`);
  }
}
