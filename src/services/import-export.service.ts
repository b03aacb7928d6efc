import * as fs from 'fs';
import { readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { IPackageStore } from '../store/package-store.interface';
import { PackageWithEvents } from '../types/domain.types';
import {
  DuplicateError,
  formatIssues,
  isTrackingError,
  NotFoundError,
  ValidationError
} from '../types/error.types';
import { ExportResult, ImportRecordError, ImportResult } from '../types/result.types';
import { Logger } from '../utils/logger';
import { IImportExportService } from './import-export.interface';

// JSON numbers past 2^53 have already lost digits by the time they reach us
const TrackingNumberField = z
  .union([z.string(), z.number()])
  .superRefine((value, ctx) => {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'numeric tracking numbers must be safe integers; quote the number as a string'
      });
    }
  })
  .transform(value => String(value).trim())
  .optional();

// `number` is the documented column; `trackingNumber` and `tracking_number` are aliases
const ImportRecordSchema = z
  .object({
    number: TrackingNumberField,
    trackingNumber: TrackingNumberField,
    tracking_number: TrackingNumberField,
    carrier: z.string().nullish()
  })
  .transform((record, ctx) => {
    const trackingNumber = record.number || record.trackingNumber || record.tracking_number;
    if (!trackingNumber) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['number'],
        message: 'tracking number is required'
      });
      return z.NEVER;
    }
    return { trackingNumber, carrier: record.carrier?.trim() || null };
  });

const EXPORT_CSV_COLUMNS = [
  'tracking_number',
  'carrier',
  'status',
  'last_update',
  'created_at',
  'event_timestamp',
  'event_location',
  'event_description'
];

@injectable()
export class ImportExportService implements IImportExportService {
  private readonly logger: Logger;

  constructor(
    @inject('IPackageStore') private readonly store: IPackageStore,
    @inject('Logger') logger: Logger
  ) {
    this.logger = logger.child({ component: 'import-export' });
  }

  async importRecords(records: unknown[]): Promise<ImportResult> {
    let imported = 0;
    let skipped = 0;
    const errors: ImportRecordError[] = [];

    for (const [index, record] of records.entries()) {
      const parsed = ImportRecordSchema.safeParse(record);
      if (!parsed.success) {
        errors.push({
          index,
          errorType: 'ValidationError',
          message: formatIssues(parsed.error.issues).join(', ')
        });
        continue;
      }

      const { trackingNumber, carrier } = parsed.data;
      try {
        await this.store.add(trackingNumber, carrier);
        imported++;
      } catch (error) {
        if (error instanceof DuplicateError) {
          skipped++;
        }
        errors.push({
          index,
          trackingNumber,
          errorType: isTrackingError(error) ? error.errorType : 'UnexpectedError',
          message: error instanceof Error ? error.message : String(error)
        });
      }
    }

    this.logger.info(
      { total: records.length, imported, skipped, failed: errors.length - skipped },
      'Import finished'
    );

    return { success: true, imported, skipped, errors };
  }

  async importFile(filePath: string): Promise<ImportResult> {
    const records = await this.readRecords(filePath);
    return this.importRecords(records);
  }

  async exportPackages(): Promise<PackageWithEvents[]> {
    const packages = await this.store.list();
    const snapshot: PackageWithEvents[] = [];

    for (const pkg of packages) {
      try {
        snapshot.push(await this.store.get(pkg.trackingNumber));
      } catch (error) {
        // Deleted between listing and read
        if (error instanceof NotFoundError) {
          continue;
        }
        throw error;
      }
    }

    return snapshot;
  }

  async exportToFile(outputPath?: string): Promise<ExportResult> {
    const packages = await this.exportPackages();

    if (outputPath) {
      const content = path.extname(outputPath).toLowerCase() === '.csv'
        ? await this.toCsv(packages)
        : JSON.stringify(packages, null, 2);
      await writeFile(outputPath, content, 'utf-8');
      this.logger.info({ outputPath, count: packages.length }, 'Export written');
    }

    return { success: true, count: packages.length, outputPath, packages };
  }

  private async readRecords(filePath: string): Promise<unknown[]> {
    const extension = path.extname(filePath).toLowerCase();

    if (extension === '.json') {
      let content: string;
      try {
        content = await readFile(filePath, 'utf-8');
      } catch (error) {
        throw new ValidationError(`Cannot read import file ${filePath}: ${this.reason(error)}`);
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new ValidationError(`Import file ${filePath} is not valid JSON: ${this.reason(error)}`);
      }

      if (!Array.isArray(parsed)) {
        throw new ValidationError(`Import file ${filePath} must contain a JSON array of records`);
      }
      return parsed;
    }

    if (extension === '.csv') {
      try {
        return await this.readCsv(filePath);
      } catch (error) {
        throw new ValidationError(`Cannot read import file ${filePath}: ${this.reason(error)}`);
      }
    }

    throw new ValidationError(`Unsupported import file type "${extension || filePath}" (expected .json or .csv)`);
  }

  private readCsv(filePath: string): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      const rows: unknown[] = [];

      fs.createReadStream(filePath)
        .on('error', error => reject(error))
        .pipe(parse({ columns: true, skip_empty_lines: true, trim: true, bom: true }))
        .on('data', (row: Record<string, string>) => rows.push(row))
        .on('end', () => resolve(rows))
        .on('error', error => reject(error));
    });
  }

  private toCsv(packages: PackageWithEvents[]): Promise<string> {
    const rows = packages.flatMap(pkg => {
      const base = {
        tracking_number: pkg.trackingNumber,
        carrier: pkg.carrier ?? '',
        status: pkg.status,
        last_update: pkg.lastUpdate ?? '',
        created_at: pkg.createdAt
      };

      if (pkg.events.length === 0) {
        return [{ ...base, event_timestamp: '', event_location: '', event_description: '' }];
      }

      return pkg.events.map(event => ({
        ...base,
        event_timestamp: event.timestamp ?? '',
        event_location: event.location ?? '',
        event_description: event.description
      }));
    });

    return new Promise((resolve, reject) => {
      stringify(rows, { header: true, columns: EXPORT_CSV_COLUMNS }, (err, output) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(output);
      });
    });
  }

  private reason(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
