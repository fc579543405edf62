/**
 * Shutdown Module
 *
 * Graceful shutdown of the fiscal service.
 */

import type Database from 'better-sqlite3';
import type { FiscalServiceController } from '../fiscal/services/FiscalServiceController';
import { debugLogger } from '../../shared/utils/debug-logger';

/**
 * Let queued jobs finish, close the printers, then the database
 */
export async function gracefulShutdown(controller: FiscalServiceController, db: Database.Database): Promise<void> {
  debugLogger.info('Performing graceful shutdown...', undefined, 'Shutdown');

  try {
    await controller.shutdown();
  } catch (error) {
    debugLogger.error('Error during service shutdown', error, 'Shutdown');
  } finally {
    db.close();
  }

  debugLogger.info('Shutdown complete', undefined, 'Shutdown');
}
