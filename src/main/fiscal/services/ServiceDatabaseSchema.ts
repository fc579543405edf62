/**
 * Service Database Schema
 *
 * SQL schema definitions for the fiscal service configuration:
 * - service_settings: key/value settings (server id, auto-detect, operator defaults)
 * - configured_printers: printer id → device URI
 * - payment_type_remaps: per serial number payment type token overrides
 *
 * @module fiscal/services/ServiceDatabaseSchema
 */

import type Database from 'better-sqlite3';
import { PaymentType } from '../../../shared/types/fiscal';
import { debugLogger } from '../../../shared/utils/debug-logger';

export const CREATE_SERVICE_SETTINGS_TABLE = `
  CREATE TABLE IF NOT EXISTS service_settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

export const CREATE_CONFIGURED_PRINTERS_TABLE = `
  CREATE TABLE IF NOT EXISTS configured_printers (
    id TEXT PRIMARY KEY,
    uri TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

const PAYMENT_TYPE_VALUES = Object.values(PaymentType)
  .map((value) => `'${value}'`)
  .join(', ');

/**
 * A NULL token disables the payment type on that device
 */
export const CREATE_PAYMENT_TYPE_REMAPS_TABLE = `
  CREATE TABLE IF NOT EXISTS payment_type_remaps (
    serial_number TEXT NOT NULL,
    payment_type TEXT NOT NULL CHECK (payment_type IN (${PAYMENT_TYPE_VALUES})),
    token TEXT,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (serial_number, payment_type)
  )
`;

export const CREATE_SERVICE_INDEXES = `
  CREATE INDEX IF NOT EXISTS idx_configured_printers_uri ON configured_printers(uri);
`;

export const ALL_SERVICE_SCHEMA = [
  CREATE_SERVICE_SETTINGS_TABLE,
  CREATE_CONFIGURED_PRINTERS_TABLE,
  CREATE_PAYMENT_TYPE_REMAPS_TABLE,
  CREATE_SERVICE_INDEXES,
];

export function initializeServiceTables(db: Database.Database): void {
  debugLogger.info('Initializing service tables', undefined, 'ServiceDatabaseSchema');

  for (const sql of ALL_SERVICE_SCHEMA) {
    try {
      db.exec(sql);
    } catch (error) {
      debugLogger.error('Failed to execute schema', error, 'ServiceDatabaseSchema');
      throw error;
    }
  }
}

export function checkServiceTablesExist(db: Database.Database): {
  serviceSettings: boolean;
  configuredPrinters: boolean;
  paymentTypeRemaps: boolean;
} {
  const checkTable = (tableName: string): boolean => {
    const result = db
      .prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' AND name=?`)
      .get(tableName);
    return result !== undefined;
  };

  return {
    serviceSettings: checkTable('service_settings'),
    configuredPrinters: checkTable('configured_printers'),
    paymentTypeRemaps: checkTable('payment_type_remaps'),
  };
}
