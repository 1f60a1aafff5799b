import { describe, expect, it } from 'vitest';

import { ExecutionSession } from '../src/pipeline/ExecutionSession.js';
import { MapsExecutor } from '../src/search/MapsExecutor.js';

import { candidate, city, createFakeSerper, makePlan } from './helpers.js';

describe('MapsExecutor', () => {
  it('issues one request per query and city and keeps place metadata', async () => {
    const { client, requests } = createFakeSerper(() => ({
      body: {
        places: [
          {
            title: 'Windy City Lanyards',
            address: '100 W Lake St, Chicago, IL',
            phoneNumber: '+1 312-555-0100',
            website: 'https://www.windycitylanyards.com/',
            rating: 4.6,
            ratingCount: 87,
            category: 'Screen printer',
            placeId: 'place-1'
          },
          {
            title: 'Loop Badges',
            address: '5 S State St, Chicago, IL',
            reviews: 12,
            type: 'Badge supplier',
            cid: '998877',
            position: 7
          }
        ]
      }
    }));
    const session = new ExecutionSession();

    const added = await new MapsExecutor(client).execute(makePlan(), session);

    expect(added).toBe(2);
    expect(requests.map((request) => [request.endpoint, request.payload])).toEqual([
      ['maps', { q: 'custom lanyards in Chicago, US', gl: 'us', hl: 'en' }]
    ]);
    expect(session.mapsResults).toEqual([
      {
        domain: 'windycitylanyards.com',
        url: 'https://www.windycitylanyards.com/',
        title: 'Windy City Lanyards',
        description: '100 W Lake St, Chicago, IL',
        sourceType: 'maps',
        resultKind: 'place',
        query: 'custom lanyards',
        city: 'Chicago, US',
        countryCode: 'US',
        position: 1,
        place: {
          businessName: 'Windy City Lanyards',
          address: '100 W Lake St, Chicago, IL',
          phone: '+1 312-555-0100',
          website: 'https://www.windycitylanyards.com/',
          rating: 4.6,
          reviewCount: 87,
          category: 'Screen printer',
          placeId: 'place-1'
        }
      },
      {
        domain: '',
        url: '',
        title: 'Loop Badges',
        description: '5 S State St, Chicago, IL',
        sourceType: 'maps',
        resultKind: 'place',
        query: 'custom lanyards',
        city: 'Chicago, US',
        countryCode: 'US',
        position: 7,
        place: {
          businessName: 'Loop Badges',
          address: '5 S State St, Chicago, IL',
          phone: '',
          website: '',
          rating: null,
          reviewCount: 12,
          category: 'Badge supplier',
          placeId: '998877'
        }
      }
    ]);
  });

  it('prefers maps queries and honours a city override', async () => {
    const { client, requests } = createFakeSerper(() => ({ body: { places: [] } }));
    const plan = makePlan({
      queries: [candidate('custom lanyards')],
      mapsQueries: [candidate('lanyard printing'), candidate('badge maker')],
      cities: [city('Chicago'), city('Houston')]
    });

    await new MapsExecutor(client).execute(plan, new ExecutionSession(), [city('Houston')]);

    expect(requests.map((request) => request.payload.q)).toEqual([
      'lanyard printing in Houston, US',
      'badge maker in Houston, US'
    ]);
  });

  it('records failures and continues', async () => {
    const { client } = createFakeSerper((_, payload) =>
      String(payload.q).startsWith('custom') ? { status: 403, body: 'forbidden' } : { body: { places: [{ title: 'Ace' }] } }
    );
    const plan = makePlan({ queries: [candidate('custom lanyards'), candidate('badge maker')] });
    const session = new ExecutionSession();

    await new MapsExecutor(client).execute(plan, session);

    expect(session.failures.map((failure) => [failure.phase, failure.query, failure.city])).toEqual([
      ['maps', 'custom lanyards', 'Chicago, US']
    ]);
    expect(session.mapsResults.map((record) => record.title)).toEqual(['Ace']);
  });
});
