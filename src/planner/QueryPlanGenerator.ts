import { v4 as uuid } from 'uuid';

import { ConfigurationError, PlanGenerationError, describeError } from '../errors.js';
import { getCities } from '../tables/cities.js';
import { getCountry, getLanguageForCountry } from '../tables/countries.js';
import { BusinessContext, CityTarget, PlanConstraints, QueryCandidate, QueryPlan } from '../types.js';
import { logger } from '../utils/logger.js';

import { CountryCities, enforceBudget } from './budget.js';
import { ParsedPlan, parsePlanResponse } from './planSchema.js';
import { TextGenerator } from './TextGenerator.js';

export type PlanConstraintsInput = Omit<PlanConstraints, 'pagesPerQuery' | 'includeMaps'> &
  Partial<Pick<PlanConstraints, 'pagesPerQuery' | 'includeMaps'>>;

export interface QueryPlanGeneratorOptions {
  temperature?: number;
  now?: () => Date;
}

const SYSTEM_PROMPT =
  'You are a B2B lead generation strategist. You design web search queries that find the customers described ' +
  'in a business context, never the seller itself. Always respond with a single valid JSON object.';

const REVISION_SYSTEM_PROMPT =
  'You are a B2B lead generation strategist revising a search plan. Apply the user feedback, keep the plan ' +
  'coherent with the business context and respond with a single valid JSON object.';

const OUTPUT_CONTRACT = `{
  "context_analysis": {
    "user_business": "what the user sells",
    "target_customer_profile": "who we are trying to find",
    "key_customer_signals": ["signal"]
  },
  "query_variations": [
    {
      "query": "custom lanyard manufacturer",
      "priority": "HIGH | MEDIUM | LOW",
      "category": "short label",
      "reasoning": "why this query finds the target customer",
      "translations": { "DE": "query in the country's language" }
    }
  ],
  "city_recommendations": {
    "US": { "cities": ["Chicago"], "reasoning": "why these cities" }
  },
  "rationale": "how the plan uses the budget"
}`;

const COUNTRY_CODE = /^[A-Z]{2}$/;

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function cleanList(values: readonly string[]): string[] {
  return values.map((value) => value.trim()).filter((value) => value.length > 0);
}

export function validateRequest(
  context: BusinessContext,
  constraints: PlanConstraintsInput
): { context: BusinessContext; constraints: PlanConstraints } {
  const description = context.description.trim();
  if (!description) {
    throw new ConfigurationError('Business context description must not be empty.');
  }
  if (!isPositiveInteger(constraints.maxTotalQueries)) {
    throw new ConfigurationError(`maxTotalQueries must be a positive integer, got ${constraints.maxTotalQueries}.`);
  }
  if (!isPositiveInteger(constraints.citiesPerCountry)) {
    throw new ConfigurationError(`citiesPerCountry must be a positive integer, got ${constraints.citiesPerCountry}.`);
  }
  const pagesPerQuery = constraints.pagesPerQuery ?? 1;
  if (!Number.isInteger(pagesPerQuery) || pagesPerQuery < 1 || pagesPerQuery > 10) {
    throw new ConfigurationError(`pagesPerQuery must be an integer between 1 and 10, got ${pagesPerQuery}.`);
  }

  const countries: string[] = [];
  for (const raw of constraints.countries) {
    const code = raw.trim().toUpperCase();
    if (!COUNTRY_CODE.test(code)) {
      throw new ConfigurationError(`Invalid country code "${raw}". Use two-letter codes such as US or DE.`);
    }
    if (!countries.includes(code)) {
      countries.push(code);
    }
  }
  if (countries.length === 0) {
    throw new ConfigurationError('At least one target country is required.');
  }
  if (constraints.useNativeLanguage) {
    const unresolved = countries.filter((code) => !getLanguageForCountry(code));
    if (unresolved.length > 0) {
      throw new ConfigurationError(`No language is known for ${unresolved.join(', ')}; disable native language or pick other countries.`);
    }
  }

  return {
    context: {
      description,
      mustHave: cleanList(context.mustHave),
      excluded: cleanList(context.excluded),
      ...(context.sector?.trim() ? { sector: context.sector.trim() } : {})
    },
    constraints: {
      countries,
      citiesPerCountry: constraints.citiesPerCountry,
      maxTotalQueries: constraints.maxTotalQueries,
      useNativeLanguage: constraints.useNativeLanguage,
      pagesPerQuery,
      includeMaps: constraints.includeMaps ?? true
    }
  };
}

function describeCountries(constraints: PlanConstraints): string {
  return constraints.countries
    .map((code) => {
      const country = getCountry(code);
      return country ? `${code} (${country.name}, language: ${country.language})` : code;
    })
    .join(', ');
}

function describeContext(context: BusinessContext): string {
  const lines = [context.description];
  if (context.sector) lines.push(`Sector: ${context.sector}`);
  if (context.mustHave.length > 0) lines.push(`Target customers must have: ${context.mustHave.join('; ')}`);
  if (context.excluded.length > 0) lines.push(`Exclude: ${context.excluded.join('; ')}`);
  return lines.join('\n');
}

function describeBudget(constraints: PlanConstraints): string {
  return [
    `- Target countries: ${describeCountries(constraints)}`,
    `- Cities per country: ${constraints.citiesPerCountry}`,
    `- Max total query x city combinations: ${constraints.maxTotalQueries}`,
    `- Native language queries: ${constraints.useNativeLanguage ? 'yes, translate every query for each country' : 'no, English only'}`
  ].join('\n');
}

export function buildPlanPrompt(context: BusinessContext, constraints: PlanConstraints): string {
  return `BUSINESS CONTEXT:
${describeContext(context)}

SEARCH PARAMETERS:
${describeBudget(constraints)}

TASK:
1. Work out what the user sells and who their target customer is.
2. Write 15-25 search queries that find the TARGET CUSTOMER, using the terms those businesses use about themselves.
3. Give each query a priority: HIGH for the strongest buyer signals, MEDIUM for relevant, LOW for exploratory.
4. Recommend up to ${constraints.citiesPerCountry} cities per country where these businesses cluster.
5. Explain in "rationale" how the plan fits the budget.

Respond with JSON in exactly this shape:
${OUTPUT_CONTRACT}`;
}

/** The previous plan in the shape the model is asked to produce. */
export function planToResponseShape(plan: QueryPlan): Record<string, unknown> {
  const cityRecommendations: Record<string, { cities: string[] }> = {};
  for (const city of plan.cities) {
    const entry = cityRecommendations[city.countryCode] ?? { cities: [] };
    entry.cities.push(city.city);
    cityRecommendations[city.countryCode] = entry;
  }
  return {
    ...(plan.analysis
      ? {
          context_analysis: {
            user_business: plan.analysis.userBusiness,
            target_customer_profile: plan.analysis.targetCustomerProfile,
            key_customer_signals: plan.analysis.keyCustomerSignals
          }
        }
      : {}),
    query_variations: plan.queries.map((query) => ({
      query: query.text,
      priority: query.priority,
      category: query.category,
      reasoning: query.reasoning,
      translations: query.translations
    })),
    city_recommendations: cityRecommendations,
    rationale: plan.rationale
  };
}

export function buildRevisionPrompt(previous: QueryPlan, feedback: string): string {
  return `You previously produced this search plan:
${JSON.stringify(planToResponseShape(previous), null, 2)}

ORIGINAL BUSINESS CONTEXT:
${describeContext(previous.context)}

SEARCH PARAMETERS:
${describeBudget(previous.constraints)}

USER FEEDBACK:
${feedback}

Revise the plan so it addresses every point of the feedback. Return the complete revised plan, not a diff:
queries the feedback asks to remove must not appear. Use exactly the same JSON shape:
${OUTPUT_CONTRACT}`;
}

function normalizeQueries(parsed: ParsedPlan, countries: readonly string[]): QueryCandidate[] {
  const seen = new Set<string>();
  const queries: QueryCandidate[] = [];
  for (const entry of parsed.queries) {
    const text = entry.query.trim();
    const key = text.toLowerCase();
    if (!text || seen.has(key)) continue;
    seen.add(key);

    const translations: Record<string, string> = {};
    for (const code of countries) {
      const translated = entry.translations[code]?.trim();
      if (translated) translations[code] = translated;
    }
    queries.push({
      text,
      priority: entry.priority,
      category: entry.category,
      reasoning: entry.reasoning.trim(),
      translations
    });
  }
  return queries;
}

function resolveCities(parsed: ParsedPlan, constraints: PlanConstraints): CountryCities[] {
  return constraints.countries.map((code) => {
    const locale = getLanguageForCountry(code);
    const toTarget = (city: string): CityTarget => ({ countryCode: code, city, ...(locale ? { locale } : {}) });

    const seen = new Set<string>();
    const recommended: string[] = [];
    for (const name of parsed.cityRecommendations[code]?.cities ?? []) {
      const city = name.trim();
      if (!city || seen.has(city.toLowerCase())) continue;
      seen.add(city.toLowerCase());
      recommended.push(city);
    }

    if (recommended.length > 0) {
      return { countryCode: code, cities: recommended.slice(0, constraints.citiesPerCountry).map(toTarget) };
    }

    const fallback = getCities(code, { limit: constraints.citiesPerCountry }).map((entry) => entry.city);
    if (fallback.length === 0) {
      throw new PlanGenerationError(`No cities were recommended for ${code} and no city table exists for it.`);
    }
    logger.warn(`No city recommendations for ${code}; using the ${fallback.length} largest cities from the city table.`);
    return { countryCode: code, cities: fallback.map(toTarget) };
  });
}

/**
 * Turns a business context into a budgeted query plan via a hosted text
 * generator. Failures surface as `PlanGenerationError`; there is no retry and
 * no locally synthesized fallback. Callers that want one can use
 * `planFromTemplates`.
 */
export class QueryPlanGenerator {
  private generator: TextGenerator;
  private temperature: number;
  private now: () => Date;

  constructor(generator: TextGenerator, options: QueryPlanGeneratorOptions = {}) {
    this.generator = generator;
    this.temperature = options.temperature ?? 0.7;
    this.now = options.now ?? (() => new Date());
  }

  async generate(context: BusinessContext, constraints: PlanConstraintsInput): Promise<QueryPlan> {
    const request = validateRequest(context, constraints);
    logger.info(`Generating query plan for ${request.constraints.countries.join(', ')}.`);
    const raw = await this.complete(SYSTEM_PROMPT, buildPlanPrompt(request.context, request.constraints));
    return this.assemble(raw, request.context, request.constraints, { revision: 1 });
  }

  async regenerate(previous: QueryPlan, feedback: string): Promise<QueryPlan> {
    const trimmed = feedback.trim();
    if (!trimmed) {
      throw new ConfigurationError('Feedback must not be empty when revising a plan.');
    }
    const request = validateRequest(previous.context, previous.constraints);
    logger.info(`Revising plan ${previous.id} (revision ${previous.revision}).`);
    const raw = await this.complete(REVISION_SYSTEM_PROMPT, buildRevisionPrompt(previous, trimmed));
    return this.assemble(raw, request.context, request.constraints, {
      revision: previous.revision + 1,
      previousPlanId: previous.id
    });
  }

  private async complete(system: string, prompt: string): Promise<string> {
    try {
      return await this.generator.complete({ system, prompt, temperature: this.temperature });
    } catch (error) {
      throw new PlanGenerationError(`Text generation failed: ${describeError(error)}`, { cause: error });
    }
  }

  private assemble(
    raw: string,
    context: BusinessContext,
    constraints: PlanConstraints,
    lineage: { revision: number; previousPlanId?: string }
  ): QueryPlan {
    const parsed = parsePlanResponse(raw);
    if (!parsed.ok) {
      throw new PlanGenerationError(`Model response is not a valid plan: ${parsed.issues.join('; ')}`, {
        rawResponse: parsed.raw
      });
    }

    const candidates = normalizeQueries(parsed.value, constraints.countries);
    if (candidates.length === 0) {
      throw new PlanGenerationError('Model response contained no usable queries.', { rawResponse: raw });
    }

    const budget = enforceBudget(candidates, resolveCities(parsed.value, constraints), constraints.maxTotalQueries);
    if (budget.queries.length === 0 || budget.combinations === 0) {
      throw new PlanGenerationError(
        `No query x city combination fits a budget of ${constraints.maxTotalQueries}.`,
        { rawResponse: raw }
      );
    }
    if (budget.droppedQueries.length > 0 || budget.droppedCities.length > 0) {
      logger.info(
        `Budget of ${constraints.maxTotalQueries} combinations: dropped ${budget.droppedQueries.length} queries and ${budget.droppedCities.length} cities.`
      );
    }

    const cities = budget.citiesByCountry.flatMap((group) => group.cities);
    const estimatedCalls = budget.combinations * constraints.pagesPerQuery + (constraints.includeMaps ? budget.combinations : 0);

    return {
      id: uuid(),
      revision: lineage.revision,
      ...(lineage.previousPlanId ? { previousPlanId: lineage.previousPlanId } : {}),
      createdAt: this.now().toISOString(),
      context,
      constraints,
      queries: budget.queries,
      cities,
      combinations: budget.combinations,
      estimatedCalls,
      rationale: parsed.value.rationale,
      ...(parsed.value.analysis ? { analysis: parsed.value.analysis } : {})
    };
  }
}
