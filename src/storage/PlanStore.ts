import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { z } from 'zod';

import { appConfig } from '../config.js';
import { ConfigurationError, ExportError, describeError } from '../errors.js';
import { QueryPlan } from '../types.js';
import { logger } from '../utils/logger.js';

import { formatStamp } from './ResultStore.js';

const candidateSchema = z.object({
  text: z.string().min(1),
  priority: z.enum(['HIGH', 'MEDIUM', 'LOW']),
  category: z.string(),
  reasoning: z.string(),
  translations: z.record(z.string(), z.string())
});

export const savedPlanSchema = z.object({
  id: z.string().min(1),
  revision: z.number().int().min(1),
  previousPlanId: z.string().optional(),
  createdAt: z.string(),
  context: z.object({
    description: z.string(),
    mustHave: z.array(z.string()),
    excluded: z.array(z.string()),
    sector: z.string().optional()
  }),
  constraints: z.object({
    countries: z.array(z.string().length(2)).min(1),
    citiesPerCountry: z.number().int().positive(),
    maxTotalQueries: z.number().int().positive(),
    useNativeLanguage: z.boolean(),
    pagesPerQuery: z.number().int().min(1).max(10),
    includeMaps: z.boolean()
  }),
  queries: z.array(candidateSchema),
  mapsQueries: z.array(candidateSchema).optional(),
  cities: z.array(
    z.object({
      countryCode: z.string().length(2),
      city: z.string().min(1),
      locale: z.string().optional()
    })
  ),
  combinations: z.number().int().min(0),
  estimatedCalls: z.number().int().min(0),
  rationale: z.string(),
  analysis: z
    .object({
      userBusiness: z.string().optional(),
      targetCustomerProfile: z.string().optional(),
      keyCustomerSignals: z.array(z.string()).optional()
    })
    .optional()
});

export interface PlanStoreOptions {
  plansDir?: string;
  now?: () => Date;
}

export function slugify(value: string, maxLength = 40): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, maxLength)
    .replace(/_+$/, '');
  return slug || 'plan';
}

/** Saved plans as JSON files named `<stamp>_<slug>.json`. */
export class PlanStore {
  private plansDir: string;
  private now: () => Date;

  constructor(options: PlanStoreOptions = {}) {
    this.plansDir = options.plansDir ?? appConfig.plansDir;
    this.now = options.now ?? (() => new Date());
  }

  save(plan: QueryPlan): string {
    const slug = slugify(plan.context.sector ?? plan.context.description);
    const path = join(this.plansDir, `${formatStamp(this.now())}_${slug}.json`);
    try {
      mkdirSync(this.plansDir, { recursive: true });
      writeFileSync(path, `${JSON.stringify(plan, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw new ExportError(`Failed to save plan to ${path}: ${describeError(error)}`, path, { cause: error });
    }
    logger.success(`Saved plan ${plan.id} to ${path}`);
    return path;
  }

  /** File names of saved plans, newest first. */
  list(): string[] {
    if (!existsSync(this.plansDir)) {
      return [];
    }
    return readdirSync(this.plansDir)
      .filter((name) => name.endsWith('.json'))
      .sort((a, b) => b.localeCompare(a));
  }

  /** Loads a plan by file name inside the plans directory, or by path. */
  load(name: string): QueryPlan {
    const candidates = [join(this.plansDir, name), name];
    const path = candidates.find((candidate) => existsSync(candidate));
    if (!path) {
      throw new ConfigurationError(`Saved plan not found: ${name}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Saved plan ${path} is not valid JSON.`, { cause: error });
    }
    const parsed = savedPlanSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Saved plan ${path} is invalid: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }
    return parsed.data;
  }
}
