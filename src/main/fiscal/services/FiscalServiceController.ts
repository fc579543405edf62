/**
 * Fiscal Service Controller
 *
 * The one service context of the process. Owns the configuration store, the
 * provider, the printer registry and the job queue, and is the surface an
 * outer layer (HTTP, IPC, CLI) calls into.
 *
 * Registry-mutating operations (detect, configurePrinter, deletePrinter,
 * shutdown) are serialized by one async lock. Print operations go through the
 * job queue only.
 *
 * @module fiscal/services/FiscalServiceController
 */

import { EventEmitter } from 'events';
import type Database from 'better-sqlite3';
import type { DeviceInfo } from '../../../shared/types/fiscal';
import type { FiscalPrinterDriver } from '../drivers/FiscalPrinterDriver';
import {
  FiscalPrinterProvider,
  formatPrinterUri,
  parsePrinterUri,
  type FiscalPrinterProviderOptions,
} from '../provider/FiscalPrinterProvider';
import { DeviceStatus } from '../status/DeviceStatus';
import { PrinterRegistry } from './PrinterRegistry';
import { DEFAULT_JOB_TIMEOUT, PrintJob, type PrintJobAction } from './PrintJob';
import { PrintJobQueue, type TaskInfoResult } from './PrintJobQueue';
import { ServiceConfigStore, type PrinterConfig, type PrinterConfigWithId } from './ServiceConfigStore';
import { parsePrintJobRequest, PrinterConfigWithIdSchema, safeValidate } from '../../schemas';
import { ErrorFactory, FiscalErrorCode, getErrorMessage } from '../../../shared/utils/error-handler';
import { debugLogger } from '../../../shared/utils/debug-logger';

export interface FiscalServiceControllerOptions {
  /** Used when the store has no auto-detect setting yet */
  autoDetect?: boolean;
  /** Wait applied to runAsync calls that give no timeout (ms) */
  defaultAsyncTimeout?: number;
  taskRetention?: number;
  /** Connection factory settings; settings resolution is wired to the store */
  provider?: Omit<FiscalPrinterProviderOptions, 'resolveSettings'>;
}

export type RunResult =
  | { kind: 'finished'; taskId: string; result: DeviceStatus }
  | { kind: 'pending'; taskId: string }
  | { kind: 'rejected'; result: DeviceStatus };

export enum FiscalServiceEvent {
  READY = 'ready',
  DETECT_COMPLETED = 'detect-completed',
}

export class FiscalServiceController extends EventEmitter {
  readonly configStore: ServiceConfigStore;
  readonly provider: FiscalPrinterProvider;
  private readonly registry: PrinterRegistry = new PrinterRegistry();
  private readonly queue: PrintJobQueue;
  private readonly defaultAsyncTimeout: number;
  private serverId: string = '';
  private ready: boolean = false;
  private lock: Promise<void> = Promise.resolve();

  constructor(db: Database.Database, options: FiscalServiceControllerOptions = {}) {
    super();
    this.defaultAsyncTimeout = options.defaultAsyncTimeout ?? DEFAULT_JOB_TIMEOUT;
    this.configStore = new ServiceConfigStore(db, options.autoDetect ?? true);
    this.provider = new FiscalPrinterProvider({
      ...options.provider,
      resolveSettings: (serialNumber) => this.configStore.getDriverSettings(serialNumber),
    });
    this.queue = new PrintJobQueue({
      taskRetention: options.taskRetention,
      defaultTimeout: this.defaultAsyncTimeout,
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Load the configuration, mark the service ready and run the first detect
   */
  async initialize(): Promise<void> {
    this.configStore.initialize();
    this.serverId = this.configStore.getServerId();
    this.ready = true;
    debugLogger.info(`Fiscal service ${this.serverId} starting`, undefined, 'FiscalServiceController');
    await this.detect();
    this.emit(FiscalServiceEvent.READY, this.serverId);
  }

  get isReady(): boolean {
    return this.ready;
  }

  getServerId(): string {
    return this.serverId;
  }

  /**
   * Wait for queued jobs, then close every printer connection
   */
  async shutdown(): Promise<void> {
    await this.withLock(async () => {
      this.ready = false;
      await this.queue.drain();
      const drivers = new Set(this.registry.list().map(([, driver]) => driver));
      for (const driver of drivers) {
        await this.closeDriver(driver);
      }
      this.registry.clear();
    });
    this.removeAllListeners();
  }

  // ==========================================================================
  // Detection
  // ==========================================================================

  /**
   * Rebuild the registry from auto-detection and the configured printers.
   * Skipped (resolves false) while jobs are queued or the service is not ready.
   */
  detect(forceAutoDetect: boolean = false): Promise<boolean> {
    return this.withLock(async () => {
      if (this.queue.hasPendingJobs() || !this.ready) {
        return false;
      }

      this.ready = false;
      try {
        if (forceAutoDetect || this.configStore.getAutoDetect()) {
          debugLogger.detectOperation('Autodetecting local printers');
          const detected = await this.provider.detectAvailablePrinters(this.addressesInUse());
          for (const driver of detected) {
            if (this.registry.add(driver) === null) {
              await this.closeDriver(driver);
            }
          }
        }

        debugLogger.detectOperation('Detecting configured printers');
        for (const [printerId, config] of Object.entries(this.configStore.getConfiguredPrinters())) {
          await this.connectConfiguredPrinter(printerId, config);
        }

        // Remember every listed printer so it is found again without auto-detection
        for (const [printerId, driver] of this.registry.list()) {
          this.configStore.saveConfiguredPrinter({ id: printerId, uri: driver.info.uri });
        }

        debugLogger.detectOperation(`Detecting done. Found ${this.registry.size} available printer(s)`);
        this.emit(FiscalServiceEvent.DETECT_COMPLETED, Object.keys(this.registry.getPrintersInfo()));
        return true;
      } finally {
        this.ready = true;
      }
    });
  }

  private async connectConfiguredPrinter(printerId: string, config: PrinterConfig): Promise<void> {
    if (!config.uri) return;

    const logString = `Trying ${printerId}: ${config.uri}`;
    let uri: string;
    try {
      uri = formatPrinterUri(parsePrinterUri(config.uri));
    } catch (error) {
      debugLogger.warn(`${logString}, ${getErrorMessage(error)}`, undefined, 'FiscalServiceController');
      return;
    }

    // A port opens once; aliases share the connected driver
    const connectedId = this.registry.findByUri(uri);
    const connected = connectedId !== undefined ? this.registry.get(connectedId) : undefined;
    if (connected) {
      this.registry.set(printerId, connected);
      debugLogger.detectOperation(`${logString}, already connected`);
      return;
    }

    try {
      const driver = await this.provider.connect(uri);
      this.registry.set(printerId, driver);
      debugLogger.detectOperation(`${logString}, OK`);
    } catch (error) {
      debugLogger.warn(`${logString}, failed`, getErrorMessage(error), 'FiscalServiceController');
    }
  }

  // ==========================================================================
  // Print jobs
  // ==========================================================================

  /**
   * Submit an action against a printer.
   * `asyncTimeout` 0 returns the task id at once; a negative value waits the
   * default time. A job still running when the wait ends keeps running and
   * comes back as 'pending' with its task id.
   */
  async runAsync(
    printerId: string,
    action: PrintJobAction,
    document: unknown,
    asyncTimeout: number = this.defaultAsyncTimeout
  ): Promise<RunResult> {
    const printer = this.registry.get(printerId);
    if (!printer) {
      return {
        kind: 'rejected',
        result: DeviceStatus.fromError(
          ErrorFactory.invalidArgument(`Printer ${printerId} not found`, FiscalErrorCode.UNKNOWN_PRINTER)
        ),
      };
    }

    const request = parsePrintJobRequest(action, document);
    if (!request.success) {
      return { kind: 'rejected', result: DeviceStatus.fromError(ErrorFactory.invalidArgument(request.error)) };
    }

    const outcome = await this.queue.runSync(new PrintJob(printerId, printer, request.data), asyncTimeout);
    return outcome.finished
      ? { kind: 'finished', taskId: outcome.taskId, result: outcome.result }
      : { kind: 'pending', taskId: outcome.taskId };
  }

  getTaskInfo(taskId: string): TaskInfoResult {
    return this.queue.getTaskInfo(taskId);
  }

  // ==========================================================================
  // Printers
  // ==========================================================================

  getPrinters(): Record<string, DeviceInfo> {
    return this.registry.getPrintersInfo();
  }

  getPrinterInfo(printerId: string): DeviceInfo | undefined {
    return this.registry.get(printerId)?.info;
  }

  getConfiguredPrinters(): Record<string, PrinterConfig> {
    return this.configStore.getConfiguredPrinters();
  }

  /**
   * Persist a printer id → URI mapping. The printer is connected by the next
   * detect.
   * @returns false when the id or URI is missing or malformed
   */
  async configurePrinter(config: PrinterConfigWithId): Promise<boolean> {
    const validated = safeValidate(PrinterConfigWithIdSchema, config);
    if (!validated.success) {
      debugLogger.warn('Rejected printer configuration', validated.error, 'FiscalServiceController');
      return false;
    }

    return this.withLock(async () => {
      this.configStore.saveConfiguredPrinter(validated.data);
      return true;
    });
  }

  /**
   * Forget a configured printer and drop it from the registry
   * @returns false when no printer is configured under that id
   */
  async deletePrinter(printerId: string): Promise<boolean> {
    if (!printerId) return false;

    return this.withLock(async () => {
      if (!this.configStore.deleteConfiguredPrinter(printerId)) {
        return false;
      }

      const driver = this.registry.get(printerId);
      this.registry.delete(printerId);
      if (driver && this.registry.findByUri(driver.info.uri) === undefined) {
        await this.closeDriver(driver);
      }
      return true;
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private withLock<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.lock.then(operation);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private addressesInUse(): Set<string> {
    const addresses = new Set<string>();
    for (const [, driver] of this.registry.list()) {
      addresses.add(parsePrinterUri(driver.info.uri).address);
    }
    return addresses;
  }

  private async closeDriver(driver: FiscalPrinterDriver): Promise<void> {
    try {
      await driver.close();
    } catch (error) {
      debugLogger.warn(`Failed to close ${driver.info.uri}`, getErrorMessage(error), 'FiscalServiceController');
    }
  }
}
