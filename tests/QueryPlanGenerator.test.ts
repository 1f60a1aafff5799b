import { describe, expect, it } from 'vitest';

import { ConfigurationError, PlanGenerationError } from '../src/errors.js';
import { QueryPlanGenerator } from '../src/planner/QueryPlanGenerator.js';
import { CompletionRequest, TextGenerator } from '../src/planner/TextGenerator.js';
import { BusinessContext } from '../src/types.js';

import { FIXED_NOW } from './helpers.js';

class FakeTextGenerator implements TextGenerator {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('no reply queued');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

const context: BusinessContext = {
  description: 'We sell production software to custom lanyard manufacturers.',
  mustHave: ['in-house printing'],
  excluded: ['resellers']
};

function reply(queries: Array<{ query: string; priority: string }>, cities: Record<string, string[]> = {}) {
  const recommendations: Record<string, { cities: string[] }> = {};
  for (const [code, names] of Object.entries(cities)) {
    recommendations[code] = { cities: names };
  }
  return JSON.stringify({ query_variations: queries, city_recommendations: recommendations, rationale: 'test plan' });
}

function numbered(prefix: string, count: number, priority: string) {
  return Array.from({ length: count }, (_, index) => ({ query: `${prefix} ${index + 1}`, priority }));
}

describe('QueryPlanGenerator.generate', () => {
  it('budgets 30 candidates over 5 cities down to 10 HIGH combinations', async () => {
    const generator = new FakeTextGenerator([
      reply([...numbered('medium', 10, 'MEDIUM'), ...numbered('low', 10, 'LOW'), ...numbered('high', 10, 'HIGH')], {
        US: ['Chicago', 'Houston', 'Dallas', 'Phoenix', 'Denver']
      })
    ]);
    const planner = new QueryPlanGenerator(generator, { now: () => FIXED_NOW });

    const plan = await planner.generate(context, {
      countries: ['us'],
      citiesPerCountry: 5,
      maxTotalQueries: 10,
      useNativeLanguage: false
    });

    expect(plan.queries.length * plan.cities.length).toBeLessThanOrEqual(10);
    expect(plan.combinations).toBe(10);
    expect(plan.queries.every((query) => query.priority === 'HIGH')).toBe(true);
    expect(plan.cities).toEqual([{ countryCode: 'US', city: 'Chicago', locale: 'en' }]);
    expect(plan.estimatedCalls).toBe(20);
    expect(plan.revision).toBe(1);
    expect(plan.createdAt).toBe(FIXED_NOW.toISOString());
    expect(plan.constraints.countries).toEqual(['US']);
  });

  it('keeps a usable plan when the model returns no HIGH queries', async () => {
    const generator = new FakeTextGenerator([
      reply([...numbered('medium', 2, 'MEDIUM'), ...numbered('low', 2, 'LOW')], {
        US: ['Chicago', 'Houston', 'Dallas', 'Phoenix', 'Denver']
      })
    ]);
    const planner = new QueryPlanGenerator(generator);

    const plan = await planner.generate(context, {
      countries: ['US'],
      citiesPerCountry: 5,
      maxTotalQueries: 3,
      useNativeLanguage: false
    });

    expect(plan.queries.map((query) => query.text)).toEqual(['medium 1', 'medium 2', 'low 1']);
    expect(plan.cities.map((target) => target.city)).toEqual(['Chicago']);
    expect(plan.combinations).toBe(3);
    expect(plan.estimatedCalls).toBe(6);
  });

  it('puts the context, constraints and output contract in the prompt', async () => {
    const generator = new FakeTextGenerator([reply([{ query: 'lanyard manufacturer', priority: 'HIGH' }], { DE: ['Berlin'] })]);
    const planner = new QueryPlanGenerator(generator);

    await planner.generate(context, { countries: ['DE'], citiesPerCountry: 1, maxTotalQueries: 5, useNativeLanguage: true });

    const prompt = generator.requests[0]?.prompt ?? '';
    expect(prompt).toContain(context.description);
    expect(prompt).toContain('Target customers must have: in-house printing');
    expect(prompt).toContain('Exclude: resellers');
    expect(prompt).toContain('DE (Germany, language: de)');
    expect(prompt).toContain('"query_variations"');
    expect(generator.requests[0]?.temperature).toBe(0.7);
  });

  it('drops duplicate queries and falls back to the city table', async () => {
    const generator = new FakeTextGenerator([
      reply([
        { query: ' Lanyard Supplier ', priority: 'HIGH' },
        { query: 'lanyard supplier', priority: 'LOW' },
        { query: '   ', priority: 'LOW' }
      ])
    ]);
    const planner = new QueryPlanGenerator(generator);

    const plan = await planner.generate(context, {
      countries: ['US'],
      citiesPerCountry: 2,
      maxTotalQueries: 10,
      useNativeLanguage: false,
      includeMaps: false
    });

    expect(plan.queries.map((query) => query.text)).toEqual(['Lanyard Supplier']);
    expect(plan.cities.map((target) => target.city)).toEqual(['New York', 'Los Angeles']);
    expect(plan.estimatedCalls).toBe(2);
  });

  it('validates constraints before calling the model', async () => {
    const generator = new FakeTextGenerator([]);
    const planner = new QueryPlanGenerator(generator);
    const base = { countries: ['US'], citiesPerCountry: 2, maxTotalQueries: 10, useNativeLanguage: false };

    await expect(planner.generate(context, { ...base, maxTotalQueries: 0 })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(planner.generate(context, { ...base, maxTotalQueries: 2.5 })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(planner.generate(context, { ...base, countries: [] })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(planner.generate(context, { ...base, countries: ['USA'] })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(planner.generate(context, { ...base, countries: ['XX'], useNativeLanguage: true })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(planner.generate({ ...context, description: '  ' }, base)).rejects.toBeInstanceOf(ConfigurationError);
    expect(generator.requests).toHaveLength(0);
  });

  it('wraps model failures and unparsable output in PlanGenerationError', async () => {
    const base = { countries: ['US'], citiesPerCountry: 1, maxTotalQueries: 10, useNativeLanguage: false };

    const failing = new QueryPlanGenerator(new FakeTextGenerator([new Error('rate limited')]));
    await expect(failing.generate(context, base)).rejects.toThrow('Text generation failed: rate limited');

    const garbled = new QueryPlanGenerator(new FakeTextGenerator(['not json at all']));
    const error = await garbled.generate(context, base).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(PlanGenerationError);
    expect(error instanceof PlanGenerationError && error.rawResponse).toBe('not json at all');
  });

  it('fails when a country has neither recommendations nor a city table', async () => {
    const planner = new QueryPlanGenerator(new FakeTextGenerator([reply([{ query: 'lanyard supplier', priority: 'HIGH' }])]));

    await expect(
      planner.generate(context, { countries: ['DE'], citiesPerCountry: 2, maxTotalQueries: 10, useNativeLanguage: false })
    ).rejects.toBeInstanceOf(PlanGenerationError);
  });
});

describe('QueryPlanGenerator.regenerate', () => {
  it('replaces the previous plan instead of merging with it', async () => {
    const generator = new FakeTextGenerator([
      reply(
        [
          { query: 'lanyard manufacturer', priority: 'HIGH' },
          { query: 'promotional products', priority: 'MEDIUM' },
          { query: 'badge printing', priority: 'LOW' }
        ],
        { US: ['Chicago'] }
      ),
      reply(
        [
          { query: 'lanyard manufacturer', priority: 'HIGH' },
          { query: 'badge printing', priority: 'LOW' }
        ],
        { US: ['Houston'] }
      )
    ]);
    const planner = new QueryPlanGenerator(generator);
    const first = await planner.generate(context, {
      countries: ['US'],
      citiesPerCountry: 1,
      maxTotalQueries: 10,
      useNativeLanguage: false
    });

    const revised = await planner.regenerate(first, 'drop query promotional products');

    expect(revised.queries.map((query) => query.text)).toEqual(['lanyard manufacturer', 'badge printing']);
    expect(revised.cities.map((target) => target.city)).toEqual(['Houston']);
    expect(revised.revision).toBe(2);
    expect(revised.previousPlanId).toBe(first.id);
    expect(revised.id).not.toBe(first.id);
    expect(first.queries).toHaveLength(3);

    const prompt = generator.requests[1]?.prompt ?? '';
    expect(prompt).toContain('drop query promotional products');
    expect(prompt).toContain('"query": "promotional products"');
  });

  it('requires feedback', async () => {
    const generator = new FakeTextGenerator([reply([{ query: 'lanyard manufacturer', priority: 'HIGH' }], { US: ['Chicago'] })]);
    const planner = new QueryPlanGenerator(generator);
    const plan = await planner.generate(context, {
      countries: ['US'],
      citiesPerCountry: 1,
      maxTotalQueries: 10,
      useNativeLanguage: false
    });

    await expect(planner.regenerate(plan, '   ')).rejects.toBeInstanceOf(ConfigurationError);
    expect(generator.requests).toHaveLength(1);
  });
});
