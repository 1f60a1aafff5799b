import { v4 as uuid } from 'uuid';

import { RequestError } from '../errors.js';
import { RelatedSearch, SearchResult } from '../types.js';

/**
 * Everything one execution run accumulates. The caller creates it and hands
 * it to the executors; nothing here is shared between runs.
 */
export class ExecutionSession {
  readonly id: string;
  readonly startedAt: Date;
  readonly webResults: SearchResult[] = [];
  readonly mapsResults: SearchResult[] = [];
  readonly failures: RequestError[] = [];
  private related = new Map<string, Map<string, RelatedSearch>>();
  private calls = 0;

  constructor(id: string = uuid(), startedAt: Date = new Date()) {
    this.id = id;
    this.startedAt = startedAt;
  }

  get apiCalls(): number {
    return this.calls;
  }

  get failureCount(): number {
    return this.failures.length;
  }

  recordCall(): void {
    this.calls += 1;
  }

  recordFailure(error: RequestError): void {
    this.failures.push(error);
  }

  addWebResults(records: SearchResult[]): void {
    this.webResults.push(...records);
  }

  addMapsResults(records: SearchResult[]): void {
    this.mapsResults.push(...records);
  }

  /** Stores suggestions for a query; repeated phrases for the same query are kept once. */
  addRelatedSearches(originalQuery: string, phrases: string[], source: RelatedSearch['source']): void {
    let entries = this.related.get(originalQuery);
    if (!entries) {
      entries = new Map();
      this.related.set(originalQuery, entries);
    }
    for (const phrase of phrases) {
      const value = phrase.trim();
      if (!value || entries.has(value)) continue;
      entries.set(value, { originalQuery, relatedSearch: value, source });
    }
  }

  get relatedSearches(): RelatedSearch[] {
    return Array.from(this.related.values()).flatMap((entries) => Array.from(entries.values()));
  }
}
