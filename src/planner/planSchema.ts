import { z } from 'zod';

import { PriorityTier } from '../types.js';

const prioritySchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(['HIGH', 'MEDIUM', 'LOW']));

const queryVariationSchema = z
  .object({
    query: z.string().optional(),
    query_template: z.string().optional(),
    priority: prioritySchema,
    category: z.string().optional(),
    reasoning: z.string().optional(),
    translations: z.record(z.string(), z.string()).optional()
  })
  .refine((entry) => Boolean(entry.query ?? entry.query_template), {
    message: 'query is required'
  });

const cityRecommendationSchema = z.object({
  cities: z.array(z.string()),
  reasoning: z.string().optional()
});

export const planResponseSchema = z.object({
  context_analysis: z
    .object({
      user_business: z.string().optional(),
      target_customer_profile: z.string().optional(),
      key_customer_signals: z.array(z.string()).optional()
    })
    .optional(),
  query_variations: z.array(queryVariationSchema).min(1),
  city_recommendations: z.record(z.string(), cityRecommendationSchema).default({}),
  rationale: z.string().default('')
});

export interface ParsedQuery {
  query: string;
  priority: PriorityTier;
  category: string;
  reasoning: string;
  translations: Record<string, string>;
}

export interface ParsedPlan {
  queries: ParsedQuery[];
  cityRecommendations: Record<string, { cities: string[]; reasoning: string }>;
  rationale: string;
  analysis?: {
    userBusiness?: string;
    targetCustomerProfile?: string;
    keyCustomerSignals?: string[];
  };
}

export type PlanParseResult =
  | { ok: true; value: ParsedPlan }
  | { ok: false; error: 'ParseError'; raw: string; issues: string[] };

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

function upperKeys<T>(record: Record<string, T>): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key.trim().toUpperCase()] = value;
  }
  return result;
}

/**
 * Validates a model response field by field. Never throws: anything that is
 * not a usable plan comes back as a `ParseError` with the raw text attached.
 */
export function parsePlanResponse(raw: string): PlanParseResult {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    return {
      ok: false,
      error: 'ParseError',
      raw,
      issues: [`Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]
    };
  }

  const parsed = planResponseSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      error: 'ParseError',
      raw,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    };
  }

  const data = parsed.data;
  const cityRecommendations: ParsedPlan['cityRecommendations'] = {};
  for (const [code, entry] of Object.entries(upperKeys(data.city_recommendations))) {
    cityRecommendations[code] = { cities: entry.cities, reasoning: entry.reasoning ?? '' };
  }

  const value: ParsedPlan = {
    queries: data.query_variations.map((entry) => ({
      query: entry.query ?? entry.query_template ?? '',
      priority: entry.priority,
      category: entry.category?.trim() || 'general',
      reasoning: entry.reasoning ?? '',
      translations: upperKeys(entry.translations ?? {})
    })),
    cityRecommendations,
    rationale: data.rationale
  };

  if (data.context_analysis) {
    const analysis = data.context_analysis;
    value.analysis = {
      ...(analysis.user_business !== undefined ? { userBusiness: analysis.user_business } : {}),
      ...(analysis.target_customer_profile !== undefined
        ? { targetCustomerProfile: analysis.target_customer_profile }
        : {}),
      ...(analysis.key_customer_signals !== undefined ? { keyCustomerSignals: analysis.key_customer_signals } : {})
    };
  }

  return { ok: true, value };
}
