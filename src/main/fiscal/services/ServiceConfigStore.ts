/**
 * Service Configuration Store
 *
 * Persists the fiscal service configuration to SQLite: the server id
 * (generated once), the auto-detect flag, operator defaults, the configured
 * printers and the per-device payment type remapping.
 *
 * @module fiscal/services/ServiceConfigStore
 */

import type Database from 'better-sqlite3';
import { PaymentType } from '../../../shared/types/fiscal';
import {
  DEFAULT_DRIVER_SETTINGS,
  type DriverSettings,
  type PaymentTypeRemap,
} from '../drivers/FiscalPrinterDriver';
import { checkServiceTablesExist, initializeServiceTables } from './ServiceDatabaseSchema';
import { generateUrlSafeId } from '../../../shared/utils/id-generator';

export interface PrinterConfig {
  uri: string;
}

export interface PrinterConfigWithId extends PrinterConfig {
  id: string;
}

export type OperatorDefaults = Pick<DriverSettings, 'operatorId' | 'operatorPassword' | 'operatorName'>;

interface SettingRow {
  value: string;
}

interface ConfiguredPrinterRow {
  id: string;
  uri: string;
}

interface PaymentTypeRemapRow {
  payment_type: string;
  token: string | null;
}

const SETTING_KEYS = {
  SERVER_ID: 'server_id',
  AUTO_DETECT: 'auto_detect',
  OPERATOR_ID: 'operator_id',
  OPERATOR_PASSWORD: 'operator_password',
  OPERATOR_NAME: 'operator_name',
} as const;

export class ServiceConfigStore {
  private db: Database.Database;
  private initialized: boolean = false;
  private readonly defaultAutoDetect: boolean;

  constructor(db: Database.Database, defaultAutoDetect: boolean = true) {
    this.db = db;
    this.defaultAutoDetect = defaultAutoDetect;
  }

  initialize(): void {
    if (this.initialized) return;

    const tables = checkServiceTablesExist(this.db);
    if (!tables.serviceSettings || !tables.configuredPrinters || !tables.paymentTypeRemaps) {
      initializeServiceTables(this.db);
    }

    this.initialized = true;
  }

  // --------------------------------------------------------------------------
  // Settings
  // --------------------------------------------------------------------------

  /**
   * Server id, generated and persisted on first use
   */
  getServerId(): string {
    const existing = this.getSetting(SETTING_KEYS.SERVER_ID);
    if (existing) return existing;

    const serverId = generateUrlSafeId();
    this.setSetting(SETTING_KEYS.SERVER_ID, serverId);
    return serverId;
  }

  getAutoDetect(): boolean {
    const value = this.getSetting(SETTING_KEYS.AUTO_DETECT);
    return value === null ? this.defaultAutoDetect : value === '1';
  }

  setAutoDetect(autoDetect: boolean): void {
    this.setSetting(SETTING_KEYS.AUTO_DETECT, autoDetect ? '1' : '0');
  }

  getOperatorDefaults(): OperatorDefaults {
    return {
      operatorId: this.getSetting(SETTING_KEYS.OPERATOR_ID) ?? DEFAULT_DRIVER_SETTINGS.operatorId,
      operatorPassword: this.getSetting(SETTING_KEYS.OPERATOR_PASSWORD) ?? DEFAULT_DRIVER_SETTINGS.operatorPassword,
      operatorName: this.getSetting(SETTING_KEYS.OPERATOR_NAME) ?? DEFAULT_DRIVER_SETTINGS.operatorName,
    };
  }

  setOperatorDefaults(defaults: Partial<OperatorDefaults>): void {
    const apply = this.db.transaction(() => {
      if (defaults.operatorId !== undefined) this.setSetting(SETTING_KEYS.OPERATOR_ID, defaults.operatorId);
      if (defaults.operatorPassword !== undefined) {
        this.setSetting(SETTING_KEYS.OPERATOR_PASSWORD, defaults.operatorPassword);
      }
      if (defaults.operatorName !== undefined) this.setSetting(SETTING_KEYS.OPERATOR_NAME, defaults.operatorName);
    });
    apply();
  }

  // --------------------------------------------------------------------------
  // Configured printers
  // --------------------------------------------------------------------------

  getConfiguredPrinters(): Record<string, PrinterConfig> {
    this.initialize();

    const rows = this.db
      .prepare<[], ConfiguredPrinterRow>(`SELECT id, uri FROM configured_printers ORDER BY created_at, id`)
      .all();

    const printers: Record<string, PrinterConfig> = {};
    for (const row of rows) {
      printers[row.id] = { uri: row.uri };
    }
    return printers;
  }

  /**
   * Insert or replace the URI of a configured printer
   */
  saveConfiguredPrinter(config: PrinterConfigWithId): void {
    this.initialize();

    const now = new Date().toISOString();
    this.db
      .prepare<[string, string, string, string]>(`
        INSERT INTO configured_printers (id, uri, created_at, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET uri = excluded.uri, updated_at = excluded.updated_at
      `)
      .run(config.id, config.uri, now, now);
  }

  /**
   * Replace the whole printer id → URI mapping in one transaction
   */
  replaceConfiguredPrinters(printers: Record<string, PrinterConfig>): void {
    this.initialize();

    const existing = this.getConfiguredPrinters();
    const replace = this.db.transaction(() => {
      for (const id of Object.keys(existing)) {
        if (!(id in printers)) this.deleteConfiguredPrinter(id);
      }
      for (const [id, config] of Object.entries(printers)) {
        if (existing[id]?.uri !== config.uri) this.saveConfiguredPrinter({ id, uri: config.uri });
      }
    });
    replace();
  }

  /**
   * @returns true if deleted, false if not found
   */
  deleteConfiguredPrinter(id: string): boolean {
    this.initialize();

    const result = this.db.prepare<[string]>(`DELETE FROM configured_printers WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  // --------------------------------------------------------------------------
  // Payment type remapping
  // --------------------------------------------------------------------------

  getPaymentTypeRemap(serialNumber: string): PaymentTypeRemap {
    this.initialize();

    const rows = this.db
      .prepare<[string], PaymentTypeRemapRow>(
        `SELECT payment_type, token FROM payment_type_remaps WHERE serial_number = ?`
      )
      .all(serialNumber.toLowerCase());

    const remap: PaymentTypeRemap = {};
    for (const row of rows) {
      const paymentType = Object.values(PaymentType).find((value) => value === row.payment_type);
      if (paymentType) {
        remap[paymentType] = row.token;
      }
    }
    return remap;
  }

  /**
   * Override the token of one payment type on one device; null disables it
   */
  setPaymentTypeRemap(serialNumber: string, paymentType: PaymentType, token: string | null): void {
    this.initialize();

    this.db
      .prepare<[string, string, string | null, string]>(`
        INSERT INTO payment_type_remaps (serial_number, payment_type, token, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(serial_number, payment_type) DO UPDATE SET token = excluded.token, updated_at = excluded.updated_at
      `)
      .run(serialNumber.toLowerCase(), paymentType, token, new Date().toISOString());
  }

  /**
   * Restore the vendor default token
   */
  clearPaymentTypeRemap(serialNumber: string, paymentType: PaymentType): boolean {
    this.initialize();

    const result = this.db
      .prepare<[string, string]>(`DELETE FROM payment_type_remaps WHERE serial_number = ? AND payment_type = ?`)
      .run(serialNumber.toLowerCase(), paymentType);
    return result.changes > 0;
  }

  /**
   * Driver settings for the device with the given serial number
   */
  getDriverSettings(serialNumber: string): DriverSettings {
    return {
      ...this.getOperatorDefaults(),
      paymentTypeRemap: this.getPaymentTypeRemap(serialNumber),
    };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private getSetting(key: string): string | null {
    this.initialize();

    const row = this.db.prepare<[string], SettingRow>(`SELECT value FROM service_settings WHERE key = ?`).get(key);
    return row ? row.value : null;
  }

  private setSetting(key: string, value: string): void {
    this.initialize();

    this.db
      .prepare<[string, string, string]>(`
        INSERT INTO service_settings (key, value, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
      `)
      .run(key, value, new Date().toISOString());
  }
}
