/**
 * Print Job
 *
 * One fiscal operation bound to a printer. A job is created by the service
 * controller, owned by the PrintJobQueue and run exactly once by its worker.
 *
 * @module fiscal/services/PrintJob
 */

import type {
  Credentials,
  CurrentDateTime,
  FiscalReport,
  Receipt,
  ReversalReceipt,
  TransferAmount,
} from '../../../shared/types/fiscal';
import type { FiscalPrinterDriver } from '../drivers/FiscalPrinterDriver';
import { DeviceStatus, DeviceStatusWithDateTime } from '../status/DeviceStatus';

export enum PrintJobAction {
  GET_STATUS = 'status',
  CHECK_STATUS = 'check-status',
  GET_DATE_TIME = 'get-date-time',
  SET_DATE_TIME = 'set-date-time',
  RECEIPT = 'receipt',
  REVERSAL_RECEIPT = 'reversal-receipt',
  DEPOSIT = 'deposit',
  WITHDRAW = 'withdraw',
  X_REPORT = 'x-report',
  Z_REPORT = 'z-report',
  DUPLICATE = 'duplicate',
  FISCAL_REPORT = 'fiscal-report',
  CASH = 'cash',
  RESET = 'reset',
}

export enum TaskStatus {
  UNKNOWN = 'unknown',
  ENQUEUED = 'enqueued',
  RUNNING = 'running',
  FINISHED = 'finished',
}

/**
 * Action tag together with the document that action consumes
 */
export type PrintJobRequest =
  | { action: PrintJobAction.GET_STATUS }
  | { action: PrintJobAction.CHECK_STATUS }
  | { action: PrintJobAction.GET_DATE_TIME }
  | { action: PrintJobAction.SET_DATE_TIME; document: CurrentDateTime }
  | { action: PrintJobAction.RECEIPT; document: Receipt }
  | { action: PrintJobAction.REVERSAL_RECEIPT; document: ReversalReceipt }
  | { action: PrintJobAction.DEPOSIT; document: TransferAmount }
  | { action: PrintJobAction.WITHDRAW; document: TransferAmount }
  | { action: PrintJobAction.X_REPORT; document: Credentials }
  | { action: PrintJobAction.Z_REPORT; document: Credentials }
  | { action: PrintJobAction.DUPLICATE; document: Credentials }
  | { action: PrintJobAction.FISCAL_REPORT; document: FiscalReport }
  | { action: PrintJobAction.CASH; document: Credentials }
  | { action: PrintJobAction.RESET; document: Credentials };

/** Milliseconds a synchronous caller waits when it gives a negative timeout */
export const DEFAULT_JOB_TIMEOUT = 29000;

export class PrintJob {
  readonly printerId: string;
  readonly printer: FiscalPrinterDriver;
  readonly request: PrintJobRequest;
  readonly enqueuedAt: Date;
  status: TaskStatus = TaskStatus.ENQUEUED;
  result?: DeviceStatus;
  startedAt?: Date;
  finishedAt?: Date;

  constructor(printerId: string, printer: FiscalPrinterDriver, request: PrintJobRequest) {
    this.printerId = printerId;
    this.printer = printer;
    this.request = request;
    this.enqueuedAt = new Date();
  }

  get action(): PrintJobAction {
    return this.request.action;
  }

  get finished(): boolean {
    return this.status === TaskStatus.FINISHED;
  }

  /**
   * Run the action on the bound printer. Never rejects.
   */
  async run(): Promise<DeviceStatus> {
    this.status = TaskStatus.RUNNING;
    this.startedAt = new Date();
    try {
      this.result = await dispatch(this.printer, this.request);
    } catch (error) {
      this.result = DeviceStatus.fromError(error);
    }
    this.finishedAt = new Date();
    this.status = TaskStatus.FINISHED;
    return this.result;
  }
}

async function dispatch(printer: FiscalPrinterDriver, request: PrintJobRequest): Promise<DeviceStatus> {
  switch (request.action) {
    case PrintJobAction.GET_STATUS:
      return printer.getStatus();
    case PrintJobAction.CHECK_STATUS:
      return printer.checkStatus();
    case PrintJobAction.GET_DATE_TIME: {
      const { dateTime, status } = await printer.getDateTime();
      return new DeviceStatusWithDateTime(status, dateTime ?? undefined);
    }
    case PrintJobAction.SET_DATE_TIME:
      return printer.setDateTime(request.document);
    case PrintJobAction.RECEIPT:
      return printer.printReceipt(request.document);
    case PrintJobAction.REVERSAL_RECEIPT:
      return printer.printReversalReceipt(request.document);
    case PrintJobAction.DEPOSIT:
      return printer.printMoneyDeposit(request.document);
    case PrintJobAction.WITHDRAW:
      return printer.printMoneyWithdraw(request.document);
    case PrintJobAction.X_REPORT:
      return printer.printXReport(request.document);
    case PrintJobAction.Z_REPORT:
      return printer.printZReport(request.document);
    case PrintJobAction.DUPLICATE:
      return printer.printDuplicate(request.document);
    case PrintJobAction.FISCAL_REPORT:
      return printer.printFiscalReport(request.document);
    case PrintJobAction.CASH:
      return printer.cash(request.document);
    case PrintJobAction.RESET:
      return printer.reset(request.document);
  }
}
