/**
 * Initialization Module
 *
 * Opens the configuration database and starts the fiscal service.
 */

import Database from 'better-sqlite3';
import type { EnvironmentConfig } from '../../config/environment';
import {
  FiscalServiceController,
  type FiscalServiceControllerOptions,
} from '../fiscal/services/FiscalServiceController';
import { debugLogger, LogLevel } from '../../shared/utils/debug-logger';

/**
 * Open the SQLite database holding the service configuration
 */
export function initializeDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  return db;
}

/**
 * Construct and initialize the service controller from the environment.
 * `provider` replaces the connection factory settings (channels, port listing).
 */
export async function initializeFiscalService(
  config: EnvironmentConfig,
  provider?: FiscalServiceControllerOptions['provider']
): Promise<{ db: Database.Database; controller: FiscalServiceController }> {
  if (config.DEBUG_LOGGING) {
    debugLogger.setLogLevel(LogLevel.DEBUG);
  }

  const db = initializeDatabase(config.FP_DATABASE_PATH);
  const controller = new FiscalServiceController(db, {
    autoDetect: config.FP_AUTO_DETECT,
    defaultAsyncTimeout: config.FP_DEFAULT_ASYNC_TIMEOUT,
    taskRetention: config.FP_TASK_RETENTION,
    provider: { commandTimeout: config.FP_DEVICE_READ_TIMEOUT, ...provider },
  });

  try {
    await controller.initialize();
  } catch (error) {
    debugLogger.error('Failed to initialize fiscal service', error, 'Initialization');
    db.close();
    throw error;
  }

  return { db, controller };
}
