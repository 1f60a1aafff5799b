import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { RequestInit, Response } from 'node-fetch';
import { vi } from 'vitest';
import { z } from 'zod';

import { SerperClient } from '../src/search/SerperClient.js';
import { CityTarget, PriorityTier, QueryCandidate, QueryPlan, SearchResult } from '../src/types.js';

export const FIXED_NOW = new Date(2026, 0, 2, 3, 4, 5);
export const FIXED_STAMP = '20260102_030405';

export function tempDir(prefix = 'leadgen-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function candidate(text: string, priority: PriorityTier = 'HIGH', translations: Record<string, string> = {}): QueryCandidate {
  return { text, priority, category: 'general', reasoning: '', translations };
}

export function city(name: string, countryCode = 'US', locale = 'en'): CityTarget {
  return { countryCode, city: name, locale };
}

export function makePlan(overrides: Partial<QueryPlan> = {}): QueryPlan {
  return {
    id: 'plan-1',
    revision: 1,
    createdAt: FIXED_NOW.toISOString(),
    context: { description: 'We sell software to lanyard printers', mustHave: [], excluded: [] },
    constraints: {
      countries: ['US'],
      citiesPerCountry: 2,
      maxTotalQueries: 10,
      useNativeLanguage: false,
      pagesPerQuery: 1,
      includeMaps: true
    },
    queries: [candidate('custom lanyards')],
    cities: [city('Chicago')],
    combinations: 1,
    estimatedCalls: 2,
    rationale: '',
    ...overrides
  };
}

export function webResult(url: string, overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    domain: url,
    url,
    title: url,
    description: '',
    sourceType: 'web',
    resultKind: 'organic',
    query: 'custom lanyards',
    city: 'Chicago, US',
    countryCode: 'US',
    position: 1,
    ...overrides
  };
}

export function mapsResult(
  place: { businessName: string; address: string; website?: string; placeId?: string },
  overrides: Partial<SearchResult> = {}
): SearchResult {
  const website = place.website ?? '';
  return {
    domain: website,
    url: website,
    title: place.businessName,
    description: place.address,
    sourceType: 'maps',
    resultKind: 'place',
    query: 'custom lanyards',
    city: 'Chicago, US',
    countryCode: 'US',
    position: 1,
    place: {
      businessName: place.businessName,
      address: place.address,
      phone: '',
      website,
      rating: null,
      reviewCount: null,
      category: '',
      placeId: place.placeId ?? ''
    },
    ...overrides
  };
}

const payloadSchema = z.record(z.string(), z.union([z.string(), z.number()]));

export type Payload = z.output<typeof payloadSchema>;

export interface RecordedRequest {
  url: string;
  endpoint: string;
  payload: Payload;
  init: RequestInit;
}

export type FakeReply = { status?: number; body: unknown };

/**
 * In-process stand-in for the search API. The handler sees the endpoint and
 * decoded JSON payload; throwing from it simulates a network failure.
 */
export function createFakeSerper(handler: (endpoint: string, payload: Payload) => FakeReply) {
  const requests: RecordedRequest[] = [];
  const fetchImpl = vi.fn(async (url: string, init: RequestInit) => {
    const endpoint = url.split('/').pop() ?? '';
    const payload = payloadSchema.parse(JSON.parse(String(init.body)));
    requests.push({ url, endpoint, payload, init });
    const reply = handler(endpoint, payload);
    const status = reply.status ?? 200;
    const body = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(body, { status });
  });
  const client = new SerperClient({
    apiKey: 'test-secret',
    retryLimit: 0,
    retryDelayMs: 0,
    timeoutMs: 1_000,
    fetchImpl
  });
  return { client, fetchImpl, requests };
}

export function organic(...links: string[]) {
  return links.map((link, index) => ({ link, title: `Result ${index + 1}`, snippet: `Snippet ${index + 1}` }));
}
