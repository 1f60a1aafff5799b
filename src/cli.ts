import { existsSync, readFileSync } from 'node:fs';

import { ConfigurationError, LeadgenError } from './errors.js';
import { LeadGenerationPipeline } from './pipeline/Pipeline.js';
import { QueryPlanGenerator } from './planner/QueryPlanGenerator.js';
import { planFromTemplates } from './planner/templatePlan.js';
import { OpenAITextGenerator, TextGenerator } from './planner/TextGenerator.js';
import { PlanStore } from './storage/PlanStore.js';
import { formatCity, getCities, hasCityTable, toCityTarget } from './tables/cities.js';
import { getCountriesByRegion } from './tables/countries.js';
import { TemplatePriority } from './tables/queryTemplates.js';
import { PipelineOptions, QueryPlan, SourceType } from './types.js';
import { logger } from './utils/logger.js';

export interface PlanCommand {
  command: 'plan';
  context?: string;
  contextFile?: string;
  countries: string[];
  cities: number;
  maxQueries: number;
  native: boolean;
  mustHave: string[];
  exclude: string[];
  sector?: string;
  pages: number;
  maps: boolean;
}

export interface ReviseCommand {
  command: 'revise';
  plan: string;
  feedback: string;
}

export interface RunCommand {
  command: 'run';
  plan?: string;
  keywords: string[];
  priority: TemplatePriority;
  country: string;
  cityLimit: number;
  tier?: number;
  maxQueries: number;
  pages: number;
  results?: number;
  phases: SourceType[];
  mapsCoverage: 'all' | 'underrepresented';
  autocomplete: boolean;
  xlsx: boolean;
  dryRun: boolean;
}

export type CliCommand =
  | PlanCommand
  | ReviseCommand
  | { command: 'plans' }
  | RunCommand
  | { command: 'merge'; files: string[] }
  | { command: 'help' };

export const USAGE = `Usage:
  leadgen plan --context <text> | --context-file <path> --countries US,DE | --region <name> [--cities 5] [--max-queries 100]
               [--no-native] [--must-have a,b] [--exclude x,y] [--sector s] [--pages n] [--no-maps]
  leadgen revise --plan <file> --feedback <text>
  leadgen plans
  leadgen run --plan <file> | --keyword <k> [--keyword ...] [--priority high|medium|industry|all]
              [--country US] [--city-limit n] [--tier n]
              [--max-queries n] [--pages n] [--results n] [--phases web,maps]
              [--maps-coverage all|underrepresented] [--autocomplete] [--xlsx] [--dry-run]
  leadgen merge <file.csv> [<file.csv> ...]`;

const PRIORITIES: readonly TemplatePriority[] = ['high', 'medium', 'industry', 'all'];
const PHASES: readonly SourceType[] = ['web', 'maps'];

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositive(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${flag} expects a positive integer, got "${value}".`);
  }
  return parsed;
}

function countriesInRegion(name: string): string[] {
  const regions = getCountriesByRegion();
  const region = Object.keys(regions).find((entry) => entry.toLowerCase() === name.trim().toLowerCase());
  if (!region) {
    throw new ConfigurationError(`Unknown region "${name}". Known regions: ${Object.keys(regions).join(', ')}.`);
  }
  return [...(regions[region] ?? [])];
}

class ArgReader {
  private index = 0;

  constructor(private readonly args: string[]) {}

  next(): string | undefined {
    const value = this.args[this.index];
    this.index += 1;
    return value;
  }

  value(flag: string): string {
    const value = this.next();
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Missing value for ${flag}.`);
    }
    return value;
  }
}

function parsePlan(reader: ArgReader): PlanCommand {
  const command: PlanCommand = {
    command: 'plan',
    countries: [],
    cities: 5,
    maxQueries: 100,
    native: true,
    mustHave: [],
    exclude: [],
    pages: 1,
    maps: true
  };
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    if (arg === '--context') {
      command.context = reader.value(arg);
    } else if (arg === '--context-file') {
      command.contextFile = reader.value(arg);
    } else if (arg === '--countries') {
      command.countries.push(...splitList(reader.value(arg)));
    } else if (arg === '--region') {
      command.countries.push(...countriesInRegion(reader.value(arg)));
    } else if (arg === '--cities') {
      command.cities = parsePositive(arg, reader.value(arg));
    } else if (arg === '--max-queries') {
      command.maxQueries = parsePositive(arg, reader.value(arg));
    } else if (arg === '--no-native') {
      command.native = false;
    } else if (arg === '--must-have') {
      command.mustHave = splitList(reader.value(arg));
    } else if (arg === '--exclude') {
      command.exclude = splitList(reader.value(arg));
    } else if (arg === '--sector') {
      command.sector = reader.value(arg);
    } else if (arg === '--pages') {
      command.pages = parsePositive(arg, reader.value(arg));
    } else if (arg === '--no-maps') {
      command.maps = false;
    } else {
      throw new ConfigurationError(`Unknown option for plan: ${arg}`);
    }
  }
  if (!command.context && !command.contextFile) {
    throw new ConfigurationError('plan needs --context or --context-file.');
  }
  return command;
}

function parseRevise(reader: ArgReader): ReviseCommand {
  let plan: string | undefined;
  let feedback: string | undefined;
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    if (arg === '--plan') {
      plan = reader.value(arg);
    } else if (arg === '--feedback') {
      feedback = reader.value(arg);
    } else {
      throw new ConfigurationError(`Unknown option for revise: ${arg}`);
    }
  }
  if (!plan || !feedback) {
    throw new ConfigurationError('revise needs --plan and --feedback.');
  }
  return { command: 'revise', plan, feedback };
}

function parseRun(reader: ArgReader): RunCommand {
  const command: RunCommand = {
    command: 'run',
    keywords: [],
    priority: 'all',
    country: 'US',
    cityLimit: 5,
    maxQueries: 100,
    pages: 1,
    phases: ['web', 'maps'],
    mapsCoverage: 'all',
    autocomplete: false,
    xlsx: false,
    dryRun: false
  };
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    if (arg === '--plan') {
      command.plan = reader.value(arg);
    } else if (arg === '--keyword') {
      command.keywords.push(reader.value(arg));
    } else if (arg === '--priority') {
      const value = reader.value(arg);
      const priority = PRIORITIES.find((entry) => entry === value);
      if (!priority) {
        throw new ConfigurationError(`--priority must be one of ${PRIORITIES.join(', ')}.`);
      }
      command.priority = priority;
    } else if (arg === '--country') {
      command.country = reader.value(arg).toUpperCase();
    } else if (arg === '--city-limit') {
      command.cityLimit = parsePositive(arg, reader.value(arg));
    } else if (arg === '--tier') {
      command.tier = parsePositive(arg, reader.value(arg));
    } else if (arg === '--max-queries') {
      command.maxQueries = parsePositive(arg, reader.value(arg));
    } else if (arg === '--pages') {
      command.pages = parsePositive(arg, reader.value(arg));
    } else if (arg === '--results') {
      command.results = parsePositive(arg, reader.value(arg));
    } else if (arg === '--phases') {
      const phases: SourceType[] = [];
      for (const value of splitList(reader.value(arg))) {
        const phase = PHASES.find((entry) => entry === value);
        if (!phase) {
          throw new ConfigurationError(`Unknown phase "${value}"; use web and/or maps.`);
        }
        if (!phases.includes(phase)) phases.push(phase);
      }
      command.phases = phases;
    } else if (arg === '--maps-coverage') {
      const value = reader.value(arg);
      if (value !== 'all' && value !== 'underrepresented') {
        throw new ConfigurationError('--maps-coverage must be all or underrepresented.');
      }
      command.mapsCoverage = value;
    } else if (arg === '--autocomplete') {
      command.autocomplete = true;
    } else if (arg === '--xlsx') {
      command.xlsx = true;
    } else if (arg === '--dry-run') {
      command.dryRun = true;
    } else {
      throw new ConfigurationError(`Unknown option for run: ${arg}`);
    }
  }
  if (!command.plan && command.keywords.length === 0) {
    throw new ConfigurationError('run needs --plan or at least one --keyword.');
  }
  if (command.plan && command.keywords.length > 0) {
    throw new ConfigurationError('Use either --plan or --keyword, not both.');
  }
  return command;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  const reader = new ArgReader(rest);
  switch (command) {
    case 'plan':
      return parsePlan(reader);
    case 'revise':
      return parseRevise(reader);
    case 'plans':
      return { command: 'plans' };
    case 'run':
      return parseRun(reader);
    case 'merge':
      if (rest.length === 0) {
        throw new ConfigurationError('merge needs at least one CSV file.');
      }
      return { command: 'merge', files: rest };
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    default:
      throw new ConfigurationError(`Unknown command "${command}".\n${USAGE}`);
  }
}

export interface CliDependencies {
  textGenerator?: TextGenerator;
  planStore?: PlanStore;
  pipeline?: (options: PipelineOptions) => LeadGenerationPipeline;
}

function printPlan(plan: QueryPlan) {
  logger.banner(`QUERY PLAN ${plan.id}`);
  logger.info(`Revision ${plan.revision}${plan.previousPlanId ? ` (revises ${plan.previousPlanId})` : ''}`);
  logger.info(`Cities: ${plan.cities.map(formatCity).join('; ')}`);
  for (const query of plan.queries) {
    logger.info(`  [${query.priority}] ${query.text}${query.category ? ` (${query.category})` : ''}`);
  }
  logger.info(`Combinations: ${plan.combinations}, estimated API calls: ${plan.estimatedCalls}`);
  if (plan.rationale) {
    logger.info(`Rationale: ${plan.rationale}`);
  }
}

function readContext(command: PlanCommand): string {
  if (command.context) {
    return command.context;
  }
  const file = command.contextFile ?? '';
  if (!existsSync(file)) {
    throw new ConfigurationError(`Context file not found: ${file}`);
  }
  return readFileSync(file, 'utf8');
}

function templatePlanFor(command: RunCommand): QueryPlan {
  if (!hasCityTable(command.country)) {
    throw new ConfigurationError(`No city table exists for ${command.country}; build a plan with "leadgen plan" instead.`);
  }
  const cities = getCities(command.country, {
    ...(command.tier !== undefined ? { tier: command.tier } : {}),
    limit: command.cityLimit
  }).map((entry) => toCityTarget(command.country, entry));
  if (cities.length === 0) {
    throw new ConfigurationError(`No cities available for ${command.country}${command.tier ? ` tier ${command.tier}` : ''}.`);
  }
  return planFromTemplates({
    keywords: command.keywords,
    priority: command.priority,
    cities,
    maxTotalQueries: command.maxQueries,
    pagesPerQuery: command.pages,
    includeMaps: command.phases.includes('maps')
  });
}

export async function runCommand(command: CliCommand, dependencies: CliDependencies = {}): Promise<void> {
  const planStore = dependencies.planStore ?? new PlanStore();
  const createPipeline = dependencies.pipeline ?? ((options: PipelineOptions) => new LeadGenerationPipeline(options));

  switch (command.command) {
    case 'help':
      console.log(USAGE);
      return;
    case 'plans': {
      const names = planStore.list();
      if (names.length === 0) {
        logger.info('No saved plans yet.');
      }
      names.forEach((name) => console.log(name));
      return;
    }
    case 'plan': {
      const generator = new QueryPlanGenerator(dependencies.textGenerator ?? new OpenAITextGenerator());
      const plan = await generator.generate(
        {
          description: readContext(command),
          mustHave: command.mustHave,
          excluded: command.exclude,
          ...(command.sector ? { sector: command.sector } : {})
        },
        {
          countries: command.countries,
          citiesPerCountry: command.cities,
          maxTotalQueries: command.maxQueries,
          useNativeLanguage: command.native,
          pagesPerQuery: command.pages,
          includeMaps: command.maps
        }
      );
      printPlan(plan);
      planStore.save(plan);
      return;
    }
    case 'revise': {
      const previous = planStore.load(command.plan);
      const generator = new QueryPlanGenerator(dependencies.textGenerator ?? new OpenAITextGenerator());
      const plan = await generator.regenerate(previous, command.feedback);
      printPlan(plan);
      planStore.save(plan);
      return;
    }
    case 'run': {
      const plan = command.plan ? planStore.load(command.plan) : templatePlanFor(command);
      if (!command.plan) {
        printPlan(plan);
      }
      const pipeline = createPipeline({
        phases: command.phases,
        mapsCoverage: command.mapsCoverage,
        captureAutocomplete: command.autocomplete,
        exportXlsx: command.xlsx,
        dryRun: command.dryRun,
        ...(command.results !== undefined ? { resultsPerQuery: command.results } : {})
      });
      await pipeline.run(plan);
      return;
    }
    case 'merge': {
      await createPipeline({}).mergeFiles(command.files);
      return;
    }
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    await runCommand(parseCliArgs(argv));
    return 0;
  } catch (error) {
    if (error instanceof LeadgenError) {
      logger.error(error.message);
    } else {
      logger.error('Unexpected failure.', error);
    }
    return 1;
  }
}
