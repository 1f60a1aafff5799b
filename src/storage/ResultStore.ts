import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { parse } from 'csv-parse/sync';
import { createArrayCsvWriter } from 'csv-writer';
import ExcelJS from 'exceljs';
import { z } from 'zod';

import { appConfig } from '../config.js';
import { ConfigurationError, ExportError, describeError } from '../errors.js';
import { RelatedSearch, ResultKind, ResultSet, SearchResult } from '../types.js';
import { logger } from '../utils/logger.js';

export interface ResultStoreOptions {
  outputDir?: string;
  now?: () => Date;
}

export interface ExportOptions {
  xlsx?: boolean;
  prefix?: string;
}

export interface ExportedFiles {
  leads: string;
  related?: string;
  xlsx?: string;
}

export const PRIMARY_COLUMNS = [
  'domain',
  'url',
  'title',
  'description',
  'source_type',
  'result_kind',
  'query',
  'city',
  'country',
  'position'
] as const;

export const MAPS_COLUMNS = [
  'business_name',
  'address',
  'phone',
  'rating',
  'review_count',
  'category',
  'place_id'
] as const;

export const RELATED_COLUMNS = ['original_query', 'related_search'] as const;

const RESULT_KINDS: readonly ResultKind[] = ['organic', 'ads', 'shopping', 'place'];

const csvRowsSchema = z.array(z.record(z.string(), z.string()));

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYYMMDD_HHmmss`. */
export function formatStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function hasMapsMetadata(records: readonly SearchResult[]): boolean {
  return records.some((record) => record.place !== undefined);
}

function toRow(record: SearchResult, withMaps: boolean): string[] {
  const row = [
    record.domain,
    record.url,
    record.title,
    record.description,
    record.sourceType,
    record.resultKind,
    record.query,
    record.city,
    record.countryCode,
    record.position === null ? '' : String(record.position)
  ];
  if (withMaps) {
    const place = record.place;
    if (place) {
      row.push(
        place.businessName,
        place.address,
        place.phone,
        place.rating === null ? '' : String(place.rating),
        place.reviewCount === null ? '' : String(place.reviewCount),
        place.category,
        place.placeId
      );
    } else {
      row.push(...MAPS_COLUMNS.map(() => ''));
    }
  }
  return row;
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function fromRow(row: Record<string, string>): SearchResult {
  const sourceType = row.source_type === 'maps' ? 'maps' : 'web';
  const kind = RESULT_KINDS.find((entry) => entry === row.result_kind) ?? (sourceType === 'maps' ? 'place' : 'organic');
  const record: SearchResult = {
    domain: row.domain ?? '',
    url: row.url ?? '',
    title: row.title ?? '',
    description: row.description ?? '',
    sourceType,
    resultKind: kind,
    query: row.query ?? '',
    city: row.city ?? '',
    countryCode: row.country ?? '',
    position: parseNumber(row.position)
  };
  if (sourceType === 'maps' && row.business_name !== undefined) {
    record.place = {
      businessName: row.business_name,
      address: row.address ?? '',
      phone: row.phone ?? '',
      website: row.url ?? '',
      rating: parseNumber(row.rating),
      reviewCount: parseNumber(row.review_count),
      category: row.category ?? '',
      placeId: row.place_id ?? ''
    };
  }
  return record;
}

/**
 * Flat-file output: timestamped CSV exports, an optional workbook, the
 * append-only checkpoint file and CSV import for merges.
 */
export class ResultStore {
  private outputDir: string;
  private now: () => Date;

  constructor(options: ResultStoreOptions = {}) {
    this.outputDir = options.outputDir ?? appConfig.outputDir;
    this.now = options.now ?? (() => new Date());
  }

  get directory(): string {
    return this.outputDir;
  }

  pathFor(prefix: string, extension: 'csv' | 'xlsx'): string {
    return join(this.outputDir, `${prefix}_${formatStamp(this.now())}.${extension}`);
  }

  async exportResults(
    resultSet: ResultSet,
    related: readonly RelatedSearch[],
    options: ExportOptions = {}
  ): Promise<ExportedFiles> {
    const records = Array.from(resultSet.records.values());
    const prefix = options.prefix ?? 'leads';
    const files: ExportedFiles = { leads: this.pathFor(prefix, 'csv') };

    await this.writeLeads(files.leads, records);
    logger.success(`Saved ${records.length} leads to ${files.leads}`);

    if (related.length > 0) {
      files.related = this.pathFor('related_searches', 'csv');
      await this.writeCsv(
        files.related,
        [...RELATED_COLUMNS],
        related.map((entry) => [entry.originalQuery, entry.relatedSearch])
      );
      logger.success(`Saved ${related.length} related searches to ${files.related}`);
    }

    if (options.xlsx) {
      files.xlsx = this.pathFor(prefix, 'xlsx');
      await this.writeWorkbook(files.xlsx, records);
      logger.success(`Saved Excel results to ${files.xlsx}`);
    }

    return files;
  }

  async writeLeads(path: string, records: readonly SearchResult[]): Promise<void> {
    const withMaps = hasMapsMetadata(records);
    const header: string[] = withMaps ? [...PRIMARY_COLUMNS, ...MAPS_COLUMNS] : [...PRIMARY_COLUMNS];
    await this.writeCsv(
      path,
      header,
      records.map((record) => toRow(record, withMaps))
    );
  }

  /** Appends web records to a checkpoint CSV, writing the header on first use. */
  async appendCheckpoint(path: string, records: readonly SearchResult[]): Promise<void> {
    const append = existsSync(path);
    await this.writeCsv(
      path,
      [...PRIMARY_COLUMNS],
      records.map((record) => toRow(record, false)),
      append
    );
    logger.debug(`Checkpoint: ${records.length} records appended to ${path}`);
  }

  readResults(path: string): SearchResult[] {
    if (!existsSync(path)) {
      throw new ConfigurationError(`Results file not found: ${path}`);
    }
    let rows: z.output<typeof csvRowsSchema>;
    try {
      const parsed: unknown = parse(readFileSync(path, 'utf8'), {
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true
      });
      rows = csvRowsSchema.parse(parsed);
    } catch (error) {
      throw new ConfigurationError(`Unable to read results file ${path}: ${describeError(error)}`, { cause: error });
    }
    return rows.map(fromRow);
  }

  private async writeCsv(path: string, header: string[], rows: string[][], append = false): Promise<void> {
    try {
      mkdirSync(dirname(path), { recursive: true });
      const csvWriter = createArrayCsvWriter({
        path,
        ...(append ? {} : { header }),
        append
      });
      await csvWriter.writeRecords(rows);
    } catch (error) {
      throw new ExportError(`Failed to write ${path}: ${describeError(error)}`, path, { cause: error });
    }
  }

  private async writeWorkbook(path: string, records: readonly SearchResult[]): Promise<void> {
    const withMaps = hasMapsMetadata(records);
    const header: string[] = withMaps ? [...PRIMARY_COLUMNS, ...MAPS_COLUMNS] : [...PRIMARY_COLUMNS];
    try {
      mkdirSync(dirname(path), { recursive: true });
      // eslint-disable-next-line import/no-named-as-default-member
      const workbook = new ExcelJS.Workbook();
      const sheet = workbook.addWorksheet('Leads');
      sheet.columns = header.map((column) => ({
        header: column,
        key: column,
        width: column === 'description' || column === 'url' ? 40 : 20
      }));
      for (const record of records) {
        const row = toRow(record, withMaps);
        sheet.addRow(Object.fromEntries(header.map((column, index) => [column, row[index] ?? ''])));
      }
      await workbook.xlsx.writeFile(path);
    } catch (error) {
      throw new ExportError(`Failed to write ${path}: ${describeError(error)}`, path, { cause: error });
    }
  }
}
