export type SearchPhase = 'web' | 'maps' | 'autocomplete';

export class LeadgenError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing input; raised before any network call is made. */
export class ConfigurationError extends LeadgenError {}

/** The text-generation call failed or returned something that is not a plan. */
export class PlanGenerationError extends LeadgenError {
  readonly rawResponse: string | undefined;

  constructor(message: string, options: { cause?: unknown; rawResponse?: string } = {}) {
    super(message, { cause: options.cause });
    this.rawResponse = options.rawResponse;
  }
}

export interface RequestErrorDetails {
  phase: SearchPhase;
  query: string;
  city?: string;
  page?: number;
  status?: number;
  attempts: number;
  cause?: unknown;
}

/**
 * A single search or maps request that could not be completed. These are
 * collected on the execution session rather than thrown out of a run.
 */
export class RequestError extends LeadgenError {
  readonly phase: SearchPhase;
  readonly query: string;
  readonly city: string | undefined;
  readonly page: number | undefined;
  readonly status: number | undefined;
  readonly attempts: number;

  constructor(message: string, details: RequestErrorDetails) {
    super(message, { cause: details.cause });
    this.phase = details.phase;
    this.query = details.query;
    this.city = details.city;
    this.page = details.page;
    this.status = details.status;
    this.attempts = details.attempts;
  }

  withContext(context: { city?: string; page?: number }): RequestError {
    return new RequestError(this.message, {
      phase: this.phase,
      query: this.query,
      city: context.city ?? this.city,
      page: context.page ?? this.page,
      status: this.status,
      attempts: this.attempts,
      cause: this.cause
    });
  }
}

export class ExportError extends LeadgenError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
