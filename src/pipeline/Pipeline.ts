import { ConfigurationError } from '../errors.js';
import { MapsExecutor } from '../search/MapsExecutor.js';
import { SearchExecutor } from '../search/SearchExecutor.js';
import { createSerperClient, SerperClient } from '../search/SerperClient.js';
import { ExportedFiles, ResultStore } from '../storage/ResultStore.js';
import { formatCity } from '../tables/cities.js';
import { CityTarget, PipelineOptions, QueryPlan, ResultSet, SourceType } from '../types.js';
import { logger } from '../utils/logger.js';

import { findUnderrepresentedCities } from './coverage.js';
import { deduplicate } from './Deduplicator.js';
import { ExecutionSession } from './ExecutionSession.js';

export interface LeadGenerationPipelineDependencies {
  client?: SerperClient;
  searchExecutor?: SearchExecutor;
  mapsExecutor?: MapsExecutor;
  resultStore?: ResultStore;
}

export interface PipelineSummary {
  sessionId: string;
  resultSet: ResultSet;
  files: ExportedFiles | null;
  apiCalls: number;
  failures: number;
}

export interface MergeSummary {
  resultSet: ResultSet;
  files: ExportedFiles;
}

type ResolvedOptions = Required<Omit<PipelineOptions, 'resultsPerQuery'>> & Pick<PipelineOptions, 'resultsPerQuery'>;

const DEFAULT_OPTIONS: ResolvedOptions = {
  phases: ['web', 'maps'],
  mapsCoverage: 'all',
  captureAutocomplete: false,
  checkpointInterval: 50,
  exportXlsx: false,
  dryRun: false
};

export class LeadGenerationPipeline {
  private client: SerperClient;
  private searchExecutor: SearchExecutor;
  private mapsExecutor: MapsExecutor;
  private resultStore: ResultStore;
  private options: ResolvedOptions;

  constructor(options: PipelineOptions = {}, dependencies: LeadGenerationPipelineDependencies = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.client = dependencies.client ?? createSerperClient();
    this.searchExecutor = dependencies.searchExecutor ?? new SearchExecutor(this.client);
    this.mapsExecutor = dependencies.mapsExecutor ?? new MapsExecutor(this.client);
    this.resultStore = dependencies.resultStore ?? new ResultStore();
  }

  private runs(phase: SourceType): boolean {
    return this.options.phases.includes(phase);
  }

  async run(plan: QueryPlan, session: ExecutionSession = new ExecutionSession()): Promise<PipelineSummary> {
    if (!this.client.isConfigured()) {
      throw new ConfigurationError('SERPER_API_KEY is not set. Add it to your environment or .env file.');
    }
    if (plan.queries.length === 0 || plan.cities.length === 0) {
      throw new ConfigurationError('The plan has no queries or no cities to search.');
    }

    logger.banner(`LEAD GENERATION RUN ${session.id}`);
    logger.info(
      `Plan ${plan.id} (revision ${plan.revision}): ${plan.queries.length} queries, ${plan.cities.length} cities, ~${plan.estimatedCalls} API calls.`
    );

    if (this.runs('web')) {
      logger.banner('PHASE 1: WEB SEARCH');
      await this.runWebPhase(plan, session);
    }

    if (this.runs('maps') && plan.constraints.includeMaps) {
      const cities = this.selectMapsCities(plan, session);
      if (cities.length > 0) {
        logger.banner('PHASE 2: MAPS SEARCH');
        await this.mapsExecutor.execute(plan, session, cities);
      } else {
        logger.info('Every city is well covered by the web phase; skipping maps search.');
      }
    }

    const resultSet = deduplicate(session.webResults, session.mapsResults);
    logger.info(
      `Deduplicated ${resultSet.stats.input} records into ${resultSet.stats.unique} leads ` +
        `(${resultSet.stats.duplicates} duplicates, ${resultSet.stats.withoutKey} without domain).`
    );

    let files: ExportedFiles | null = null;
    if (this.options.dryRun) {
      logger.info('Dry run: skipping export.');
    } else {
      files = await this.resultStore.exportResults(resultSet, session.relatedSearches, {
        xlsx: this.options.exportXlsx
      });
    }

    if (session.failureCount > 0) {
      logger.warn(`${session.failureCount} requests failed and were skipped.`);
    }
    logger.success(`Run complete: ${resultSet.stats.unique} leads from ${session.apiCalls} API calls.`);

    return {
      sessionId: session.id,
      resultSet,
      files,
      apiCalls: session.apiCalls,
      failures: session.failureCount
    };
  }

  /** Imports primary CSV exports and writes one merged, deduplicated file. */
  async mergeFiles(paths: string[]): Promise<MergeSummary> {
    if (paths.length === 0) {
      throw new ConfigurationError('At least one results file is required to merge.');
    }
    const sequences = paths.map((path) => {
      const records = this.resultStore.readResults(path);
      logger.info(`Loaded ${records.length} records from ${path}`);
      return records;
    });
    const resultSet = deduplicate(...sequences);
    const files = await this.resultStore.exportResults(resultSet, [], { prefix: 'merged' });
    logger.success(
      `Merged ${resultSet.stats.input} records into ${resultSet.stats.unique} leads (${resultSet.stats.duplicates} duplicates removed).`
    );
    return { resultSet, files };
  }

  private async runWebPhase(plan: QueryPlan, session: ExecutionSession) {
    const interval = this.options.dryRun ? 0 : this.options.checkpointInterval;
    const checkpointPath = this.resultStore.pathFor('checkpoint_search', 'csv');
    let flushed = session.webResults.length;

    const flush = async () => {
      const pending = session.webResults.slice(flushed);
      if (pending.length === 0) return;
      await this.resultStore.appendCheckpoint(checkpointPath, pending);
      flushed += pending.length;
    };

    await this.searchExecutor.execute(plan, session, {
      ...(this.options.resultsPerQuery !== undefined ? { resultsPerQuery: this.options.resultsPerQuery } : {}),
      captureAutocomplete: this.options.captureAutocomplete,
      onCombinationComplete: async (progress) => {
        logger.info(
          `[${progress.completed}/${progress.total}] "${progress.query}" in ${formatCity(progress.city)}: ${progress.newResults} results`
        );
        if (interval > 0 && session.webResults.length - flushed >= interval) {
          await flush();
        }
      }
    });

    if (interval > 0) {
      await flush();
    }
  }

  private selectMapsCities(plan: QueryPlan, session: ExecutionSession): CityTarget[] {
    if (this.options.mapsCoverage === 'all' || !this.runs('web')) {
      return plan.cities;
    }
    const cities = findUnderrepresentedCities(session.webResults, plan.cities);
    logger.info(
      `Maps phase targets ${cities.length} underrepresented cities${cities.length > 0 ? `: ${cities.map(formatCity).join('; ')}` : ''}.`
    );
    return cities;
  }
}
