import 'reflect-metadata';
import Database from 'better-sqlite3';
import { container, DependencyContainer } from 'tsyringe';
import { ICarrierApiClient } from '../adapters/carrier/carrier-client.interface';
import { Track17ApiAdapter } from '../adapters/carrier/track17-api.adapter';
import { IImportExportService } from '../services/import-export.interface';
import { ImportExportService } from '../services/import-export.service';
import { SyncScheduler } from '../services/sync-scheduler.service';
import { ISyncService } from '../services/sync.interface';
import { SyncService } from '../services/sync.service';
import { IWebhookIngestor } from '../services/webhook-ingestor.interface';
import { WebhookIngestorService } from '../services/webhook-ingestor.service';
import { openDatabase } from '../store/database';
import { IPackageStore } from '../store/package-store.interface';
import { SqlitePackageStore } from '../store/sqlite-package.store';
import { Clock, systemClock } from '../types/domain.types';
import { createLogger, Logger } from '../utils/logger';
import { AppConfig } from './app.config';

export interface DIOverrides {
  logger?: Logger;
  database?: Database.Database;
  clock?: Clock;
}

export function setupDI(
  config: AppConfig,
  overrides: DIOverrides = {},
  target: DependencyContainer = container
): DependencyContainer {
  const logger = overrides.logger ?? createLogger({ level: config.logging.level });

  // Register configuration values
  target.register('AppConfig', { useValue: config });
  target.register<Logger>('Logger', { useValue: logger });
  target.register<Clock>('Clock', { useValue: overrides.clock ?? systemClock });
  target.register<Database.Database>('Database', {
    useValue: overrides.database ?? openDatabase(config.storage.dbPath, logger)
  });

  // The store owns the per-package locks, so every consumer must share one instance
  target.registerSingleton<IPackageStore>('IPackageStore', SqlitePackageStore);

  // Register adapters
  target.register<ICarrierApiClient>('ICarrierApiClient', {
    useClass: Track17ApiAdapter
  });

  // Register services
  target.register<ISyncService>('ISyncService', {
    useClass: SyncService
  });

  target.register<IWebhookIngestor>('IWebhookIngestor', {
    useClass: WebhookIngestorService
  });

  target.register<IImportExportService>('IImportExportService', {
    useClass: ImportExportService
  });

  target.registerSingleton(SyncScheduler);

  return target;
}
