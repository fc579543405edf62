/**
 * Printer Registry
 *
 * Index of the connected fiscal printers by printer id. Auto-detected
 * printers take their lower-cased hardware serial number as id; configured
 * printers keep the id they were configured under.
 *
 * @module fiscal/services/PrinterRegistry
 */

import type { DeviceInfo } from '../../../shared/types/fiscal';
import type { FiscalPrinterDriver } from '../drivers/FiscalPrinterDriver';
import { debugLogger } from '../../../shared/utils/debug-logger';

export class PrinterRegistry {
  private printers: Map<string, FiscalPrinterDriver> = new Map();

  /**
   * Register a discovered printer.
   * @returns the id it is registered under, or null when the same device was
   * already registered
   */
  add(driver: FiscalPrinterDriver): string | null {
    const baseId = driver.info.serialNumber.toLowerCase();

    let printerId = baseId;
    let duplicateNumber = 0;
    for (let existing = this.printers.get(printerId); existing; existing = this.printers.get(printerId)) {
      if (existing.info.uri === driver.info.uri) {
        return null;
      }
      duplicateNumber++;
      printerId = `${baseId}_${duplicateNumber}`;
    }

    this.printers.set(printerId, driver);
    debugLogger.info(`Found ${printerId}: ${driver.info.uri}`, undefined, 'PrinterRegistry');
    return printerId;
  }

  /**
   * Register a printer under an explicit (configured) id, replacing any entry
   */
  set(printerId: string, driver: FiscalPrinterDriver): void {
    this.printers.set(printerId, driver);
  }

  get(printerId: string): FiscalPrinterDriver | undefined {
    return this.printers.get(printerId);
  }

  has(printerId: string): boolean {
    return this.printers.has(printerId);
  }

  /**
   * Registered printer with the given device URI, if any
   */
  findByUri(uri: string): string | undefined {
    for (const [printerId, driver] of this.printers) {
      if (driver.info.uri === uri) return printerId;
    }
    return undefined;
  }

  delete(printerId: string): boolean {
    return this.printers.delete(printerId);
  }

  list(): Array<[string, FiscalPrinterDriver]> {
    return Array.from(this.printers.entries());
  }

  getPrintersInfo(): Record<string, DeviceInfo> {
    const info: Record<string, DeviceInfo> = {};
    for (const [printerId, driver] of this.printers) {
      info[printerId] = driver.info;
    }
    return info;
  }

  get size(): number {
    return this.printers.size;
  }

  clear(): void {
    this.printers.clear();
  }
}
