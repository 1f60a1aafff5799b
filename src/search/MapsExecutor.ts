import { RequestError } from '../errors.js';
import { normalizeDomain } from '../pipeline/Deduplicator.js';
import { ExecutionSession } from '../pipeline/ExecutionSession.js';
import { formatCity } from '../tables/cities.js';
import { CityTarget, QueryPlan, SearchResult } from '../types.js';
import { logger } from '../utils/logger.js';

import { localizeQuery, resolveLanguage } from './SearchExecutor.js';
import { SerperClient } from './SerperClient.js';
import { MapsPlace, MapsResponse, mapsResponseSchema } from './serperSchemas.js';

export function buildMapsQuery(queryText: string, city: CityTarget): string {
  return `${queryText} in ${formatCity(city)}`;
}

export function placeToResult(place: MapsPlace, index: number, queryText: string, city: CityTarget): SearchResult {
  const website = place.website.trim();
  return {
    domain: website ? normalizeDomain(website) : '',
    url: website,
    title: place.title,
    description: place.address,
    sourceType: 'maps',
    resultKind: 'place',
    query: queryText,
    city: formatCity(city),
    countryCode: city.countryCode,
    position: place.position ?? index + 1,
    place: {
      businessName: place.title,
      address: place.address,
      phone: place.phoneNumber,
      website,
      rating: place.rating ?? null,
      reviewCount: place.reviews ?? place.ratingCount ?? null,
      category: place.category ?? place.type ?? '',
      placeId: place.placeId ?? place.cid ?? ''
    }
  };
}

/**
 * Maps phase: one request per (maps query, city), no pagination and no
 * exclusion suffix. Businesses without a website are kept.
 */
export class MapsExecutor {
  private client: SerperClient;

  constructor(client: SerperClient) {
    this.client = client;
  }

  async execute(plan: QueryPlan, session: ExecutionSession, cities: CityTarget[] = plan.cities): Promise<number> {
    const queries = plan.mapsQueries ?? plan.queries;
    const before = session.mapsResults.length;
    logger.info(`Maps search: ${queries.length} queries x ${cities.length} cities.`);

    for (const city of cities) {
      for (const candidate of queries) {
        const queryText = localizeQuery(candidate, city, plan.constraints.useNativeLanguage);
        let response: MapsResponse;
        try {
          response = await this.client.post({
            endpoint: 'maps',
            payload: {
              q: buildMapsQuery(queryText, city),
              gl: city.countryCode.toLowerCase(),
              hl: resolveLanguage(city, plan.constraints.useNativeLanguage)
            },
            schema: mapsResponseSchema,
            session,
            phase: 'maps',
            query: queryText
          });
        } catch (error) {
          const failure =
            error instanceof RequestError
              ? error.withContext({ city: formatCity(city) })
              : new RequestError(error instanceof Error ? error.message : String(error), {
                  phase: 'maps',
                  query: queryText,
                  city: formatCity(city),
                  attempts: 1,
                  cause: error
                });
          session.recordFailure(failure);
          logger.warn(`Maps request failed for "${queryText}" in ${formatCity(city)}: ${failure.message}`);
          continue;
        }

        const records = response.places.map((place, index) => placeToResult(place, index, queryText, city));
        session.addMapsResults(records);
        logger.debug(`Maps "${queryText}" in ${formatCity(city)}: ${records.length} places.`);
      }
    }

    const added = session.mapsResults.length - before;
    logger.info(`Maps search collected ${added} places.`);
    return added;
  }
}
