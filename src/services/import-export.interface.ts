import { PackageWithEvents } from '../types/domain.types';
import { ExportResult, ImportResult } from '../types/result.types';

export interface IImportExportService {
  /**
   * Adds every valid, not-yet-tracked record. Bad records and duplicates are
   * reported per record and never abort the batch.
   */
  importRecords(records: unknown[]): Promise<ImportResult>;

  /**
   * Reads a `.json` array or a `.csv` file with a header row, then imports it.
   * @throws ValidationError when the file itself cannot be read or parsed
   */
  importFile(filePath: string): Promise<ImportResult>;

  exportPackages(): Promise<PackageWithEvents[]>;

  /**
   * Writes the snapshot as CSV (one row per event) for `.csv` paths, JSON otherwise.
   */
  exportToFile(outputPath?: string): Promise<ExportResult>;
}
