import { config as loadDotenv } from 'dotenv';

import { ConfigurationError } from './errors.js';

loadDotenv();

export interface AppConfig {
  readonly serperApiKey: string | undefined;
  readonly openaiApiKey: string | undefined;
  readonly openaiModel: string;
  readonly outputDir: string;
  readonly plansDir: string;
  readonly requestTimeoutMs: number;
  readonly retryLimit: number;
  readonly retryDelayMs: number;
}

function readInteger(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return parsed;
}

/** Read on access, so a malformed variable surfaces where the command runs. */
export const appConfig: AppConfig = {
  get serperApiKey() {
    return process.env.SERPER_API_KEY;
  },
  get openaiApiKey() {
    return process.env.OPENAI_API_KEY;
  },
  get openaiModel() {
    return process.env.OPENAI_MODEL ?? 'gpt-4.1-mini';
  },
  get outputDir() {
    return process.env.LEADGEN_OUTPUT_DIR ?? 'results';
  },
  get plansDir() {
    return process.env.LEADGEN_PLANS_DIR ?? 'saved_plans';
  },
  get requestTimeoutMs() {
    return readInteger('SERPER_TIMEOUT_MS', 30_000);
  },
  get retryLimit() {
    return readInteger('SERPER_RETRY_LIMIT', 2);
  },
  get retryDelayMs() {
    return readInteger('SERPER_RETRY_DELAY_MS', 1_000);
  }
};

export function requireConfigValue<K extends keyof AppConfig>(key: K): NonNullable<AppConfig[K]> {
  const value = appConfig[key];
  if (value === undefined || value === null || value === '') {
    throw new ConfigurationError(`Missing required configuration value for ${key}. Check your environment.`);
  }
  return value;
}
