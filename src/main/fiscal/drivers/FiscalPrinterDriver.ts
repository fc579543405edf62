/**
 * Fiscal Printer Driver
 *
 * Interface shared by every vendor variant plus the base class that runs the
 * receipt life-cycle once over the vendor primitives.
 *
 * Receipt states: Idle → Opened → Selling → Paying → Closed, with Aborted
 * reachable from any state after Idle. The device holds the real receipt; the
 * tracked state decides how a failed receipt is wound down.
 *
 * @module fiscal/drivers/FiscalPrinterDriver
 */

import {
  ItemType,
  PaymentType,
  PriceModifierType,
  StatusMessageType,
  TaxGroup,
  type Credentials,
  type CurrentDateTime,
  type DeviceInfo,
  type FiscalReport,
  type Item,
  type Receipt,
  type ReceiptInfo,
  type ReportType,
  type ReversalReason,
  type ReversalReceipt,
  type StatusMessage,
  type TransferAmount,
} from '../../../shared/types/fiscal';
import {
  DeviceStatus,
  DeviceStatusWithCashAmount,
  DeviceStatusWithDateTime,
  DeviceStatusWithReceiptInfo,
} from '../status/DeviceStatus';
import type { CommandResult } from '../protocols/FrameCodec';
import { formatQuantity, parseDate, parseDecimal } from '../protocols/formatting';
import {
  ErrorFactory,
  FiscalErrorCode,
  type FiscalError,
} from '../../../shared/utils/error-handler';
import { debugLogger } from '../../../shared/utils/debug-logger';

// ============================================================================
// Types
// ============================================================================

export enum ReceiptState {
  IDLE = 'idle',
  OPENED = 'opened',
  SELLING = 'selling',
  PAYING = 'paying',
  CLOSED = 'closed',
  ABORTED = 'aborted',
}

/**
 * Explicit result of an enum-to-token mapping
 */
export type Lookup<T> = { ok: true; value: T } | { ok: false; error: FiscalError };

export const found = <T>(value: T): Lookup<T> => ({ ok: true, value });
export const notFound = <T>(error: FiscalError): Lookup<T> => ({ ok: false, error });

/**
 * Per-device token overrides. `null` disables the payment type on the device.
 */
export type PaymentTypeRemap = Partial<Record<PaymentType, string | null>>;

export interface DriverSettings {
  operatorId: string;
  operatorPassword: string;
  operatorName: string;
  paymentTypeRemap: PaymentTypeRemap;
}

export const DEFAULT_DRIVER_SETTINGS: DriverSettings = {
  operatorId: '1',
  operatorPassword: '0000',
  operatorName: 'Operator',
  paymentTypeRemap: {},
};

export interface DateTimeResult {
  dateTime: Date | null;
  status: DeviceStatus;
}

export interface FiscalPrinterDriver {
  readonly info: DeviceInfo;
  getStatus(): Promise<DeviceStatus>;
  checkStatus(): Promise<DeviceStatusWithDateTime>;
  getDateTime(): Promise<DateTimeResult>;
  setDateTime(currentDateTime: CurrentDateTime): Promise<DeviceStatus>;
  printReceipt(receipt: Receipt): Promise<DeviceStatusWithReceiptInfo>;
  printReversalReceipt(reversalReceipt: ReversalReceipt): Promise<DeviceStatusWithReceiptInfo>;
  printMoneyDeposit(transferAmount: TransferAmount): Promise<DeviceStatus>;
  printMoneyWithdraw(transferAmount: TransferAmount): Promise<DeviceStatus>;
  printXReport(credentials: Credentials): Promise<DeviceStatus>;
  printZReport(credentials: Credentials): Promise<DeviceStatus>;
  printDuplicate(credentials: Credentials): Promise<DeviceStatus>;
  printFiscalReport(fiscalReport: FiscalReport): Promise<DeviceStatus>;
  cash(credentials: Credentials): Promise<DeviceStatusWithCashAmount>;
  reset(credentials: Credentials): Promise<DeviceStatusWithDateTime>;
  close(): Promise<void>;
}

const TAX_GROUP_LETTERS: Record<TaxGroup, string> = {
  [TaxGroup.A]: 'А',
  [TaxGroup.B]: 'Б',
  [TaxGroup.C]: 'В',
  [TaxGroup.D]: 'Г',
  [TaxGroup.E]: 'Д',
  [TaxGroup.F]: 'Е',
  [TaxGroup.G]: 'Ж',
  [TaxGroup.H]: 'З',
};

/** QR payload: FM*number*yyyy-MM-dd*HH:mm:ss*amount */
const QR_FIELD_COUNT = 5;

// ============================================================================
// Base driver
// ============================================================================

export abstract class BaseFiscalPrinterDriver implements FiscalPrinterDriver {
  readonly info: DeviceInfo;
  protected readonly settings: DriverSettings;
  private receiptState: ReceiptState = ReceiptState.IDLE;

  protected constructor(info: DeviceInfo, settings: Partial<DriverSettings> = {}) {
    this.info = info;
    this.settings = { ...DEFAULT_DRIVER_SETTINGS, ...settings };
  }

  // --------------------------------------------------------------------------
  // Vendor primitives
  // --------------------------------------------------------------------------

  abstract getStatus(): Promise<DeviceStatus>;
  abstract getDateTime(): Promise<DateTimeResult>;
  abstract setDateTime(currentDateTime: CurrentDateTime): Promise<DeviceStatus>;
  abstract openReceipt(uniqueSaleNumber: string, operatorId: string, operatorPassword: string): Promise<CommandResult>;
  abstract openReversalReceipt(
    reason: ReversalReason,
    receiptNumber: string,
    receiptDateTime: Date,
    fiscalMemorySerialNumber: string,
    uniqueSaleNumber: string,
    operatorId: string,
    operatorPassword: string
  ): Promise<CommandResult>;
  abstract addItem(
    department: number,
    text: string,
    unitPrice: number,
    taxGroup: TaxGroup,
    quantity: number,
    priceModifierValue: number,
    priceModifierType: PriceModifierType
  ): Promise<CommandResult>;
  abstract addComment(text: string): Promise<CommandResult>;
  abstract addPayment(amount: number, paymentType: PaymentType): Promise<CommandResult>;
  abstract subtotalChangeAmount(amount: number): Promise<CommandResult>;
  abstract closeReceipt(): Promise<CommandResult>;
  abstract abortReceipt(): Promise<CommandResult>;
  abstract fullPaymentAndCloseReceipt(): Promise<CommandResult>;
  abstract readLastReceiptQrCode(): Promise<CommandResult>;
  abstract moneyTransfer(amount: number, credentials: Credentials): Promise<CommandResult>;
  abstract printDailyReport(zeroing: boolean): Promise<CommandResult>;
  abstract printReportForDate(startDate: Date, endDate: Date, type: ReportType): Promise<CommandResult>;
  abstract printLastReceiptDuplicate(): Promise<CommandResult>;
  abstract readCashAmount(): Promise<CommandResult>;
  abstract close(): Promise<void>;

  /** Vendor payment tokens before per-device remapping */
  protected abstract getDefaultPaymentTypeMappings(): Partial<Record<PaymentType, string>>;

  // --------------------------------------------------------------------------
  // Enum mappings
  // --------------------------------------------------------------------------

  getTaxGroupText(taxGroup: TaxGroup): Lookup<string> {
    const letter: string | undefined = TAX_GROUP_LETTERS[taxGroup];
    return letter
      ? found(letter)
      : notFound(ErrorFactory.unsupportedValue(`Tax group ${taxGroup} unsupported`, FiscalErrorCode.TAX_GROUP));
  }

  getPaymentTypeMappings(): Partial<Record<PaymentType, string>> {
    const mappings: Partial<Record<PaymentType, string>> = { ...this.getDefaultPaymentTypeMappings() };
    for (const [type, token] of Object.entries(this.settings.paymentTypeRemap)) {
      const paymentType = Object.values(PaymentType).find((value) => value === type);
      if (!paymentType || token === undefined) continue;
      if (token === null) {
        delete mappings[paymentType];
      } else {
        mappings[paymentType] = token;
      }
    }
    return mappings;
  }

  getPaymentTypeText(paymentType: PaymentType): Lookup<string> {
    const token = this.getPaymentTypeMappings()[paymentType];
    return token !== undefined
      ? found(token)
      : notFound(
          ErrorFactory.unsupportedValue(`Payment type ${paymentType} unsupported`, FiscalErrorCode.PAYMENT_TYPE)
        );
  }

  abstract getReversalReasonText(reason: ReversalReason): Lookup<string>;

  /** `*quantity` suffix of a sale line; empty when the quantity is omitted */
  getQuantityText(quantity: number): Lookup<string> {
    if (quantity === 0) {
      return found('');
    }
    const text = formatQuantity(quantity);
    // "0" would read as an omitted quantity, i.e. one unit
    return text === '0'
      ? notFound(ErrorFactory.invalidArgument(`Quantity ${quantity} rounds to zero`))
      : found(`*${text}`);
  }

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  async checkStatus(): Promise<DeviceStatusWithDateTime> {
    const { dateTime, status } = await this.getDateTime();
    const result = new DeviceStatusWithDateTime(status);
    if (dateTime) {
      result.deviceDateTime = dateTime;
    } else {
      result.addInfo('Error occurred while reading current status');
      result.addError(FiscalErrorCode.FORMAT, 'Cannot read current date and time');
    }
    return result;
  }

  async printReceipt(receipt: Receipt): Promise<DeviceStatusWithReceiptInfo> {
    return this.runReceipt(
      receipt,
      () =>
        this.openReceipt(
          receipt.uniqueSaleNumber,
          receipt.operator ?? '',
          receipt.operatorPassword ?? ''
        ),
      'Error occurred while opening new fiscal receipt'
    );
  }

  async printReversalReceipt(reversalReceipt: ReversalReceipt): Promise<DeviceStatusWithReceiptInfo> {
    return this.runReceipt(
      reversalReceipt,
      () =>
        this.openReversalReceipt(
          reversalReceipt.reason,
          reversalReceipt.receiptNumber,
          reversalReceipt.receiptDateTime,
          reversalReceipt.fiscalMemorySerialNumber,
          reversalReceipt.uniqueSaleNumber,
          reversalReceipt.operator ?? '',
          reversalReceipt.operatorPassword ?? ''
        ),
      'Error occurred while opening new fiscal reversal receipt'
    );
  }

  async printMoneyDeposit(transferAmount: TransferAmount): Promise<DeviceStatus> {
    const { status } = await this.guard(() => this.moneyTransfer(transferAmount.amount, transferAmount));
    return status;
  }

  async printMoneyWithdraw(transferAmount: TransferAmount): Promise<DeviceStatus> {
    if (transferAmount.amount < 0) {
      return DeviceStatus.fromError(ErrorFactory.invalidArgument('Withdraw amount must be positive number'));
    }
    const { status } = await this.guard(() => this.moneyTransfer(-transferAmount.amount, transferAmount));
    return status;
  }

  async printXReport(_credentials: Credentials): Promise<DeviceStatus> {
    const { status } = await this.guard(() => this.printDailyReport(false));
    return status;
  }

  async printZReport(_credentials: Credentials): Promise<DeviceStatus> {
    const { status } = await this.guard(() => this.printDailyReport(true));
    return status;
  }

  async printDuplicate(_credentials: Credentials): Promise<DeviceStatus> {
    const { status } = await this.guard(() => this.printLastReceiptDuplicate());
    return status;
  }

  async printFiscalReport(fiscalReport: FiscalReport): Promise<DeviceStatus> {
    const { status } = await this.guard(() =>
      this.printReportForDate(fiscalReport.startDate, fiscalReport.endDate, fiscalReport.type)
    );
    if (!status.ok) {
      status.addInfo('Error occurred while printing fiscal report');
    }
    return status;
  }

  async cash(_credentials: Credentials): Promise<DeviceStatusWithCashAmount> {
    const { raw, status } = await this.guard(() => this.readCashAmount());
    const result = new DeviceStatusWithCashAmount(status);
    if (!status.ok) {
      return result;
    }

    const fields = raw.split(this.cashFieldSeparator);
    const amountText = fields.length >= 3 ? fields[1].trim() : '';
    const amount = parseDecimal(amountText);
    if (amount === null) {
      result.addInfo('Error occurred while reading cash amount');
      result.addError(FiscalErrorCode.FORMAT, 'Invalid format');
      return result;
    }
    // Whole numbers are reported in stotinki
    result.amount = amountText.includes('.') ? amount : amount / 100;
    return result;
  }

  async reset(_credentials: Credentials): Promise<DeviceStatusWithDateTime> {
    await this.abortQuietly();
    await this.guard(() => this.fullPaymentAndCloseReceipt());
    this.transition(ReceiptState.IDLE);
    return this.checkStatus();
  }

  getReceiptState(): ReceiptState {
    return this.receiptState;
  }

  // --------------------------------------------------------------------------
  // Receipt life-cycle
  // --------------------------------------------------------------------------

  protected get cashFieldSeparator(): string {
    return ';';
  }

  private async runReceipt(
    receipt: Receipt,
    open: () => Promise<CommandResult>,
    openFailureText: string
  ): Promise<DeviceStatusWithReceiptInfo> {
    // Clears whatever a previous failed sequence left open
    await this.abortQuietly();
    this.transition(ReceiptState.IDLE);

    const opened = await this.guard(open);
    if (!opened.status.ok) {
      await this.abortQuietly();
      opened.status.addInfo(openFailureText);
      return new DeviceStatusWithReceiptInfo(opened.status);
    }
    this.transition(ReceiptState.OPENED);

    const result = await this.printReceiptBody(receipt);
    if (!result.ok && this.receiptState === ReceiptState.ABORTED) {
      result.addInfo('Error occurred while printing receipt items');
    }
    return result;
  }

  private async printReceiptBody(receipt: Receipt): Promise<DeviceStatusWithReceiptInfo> {
    const items = receipt.items;

    for (const [index, item] of items.entries()) {
      if (item.type === ItemType.FOOTER_COMMENT) continue;
      this.transition(ReceiptState.SELLING);
      const { status } = await this.guard(() => this.applyItem(item));
      if (!status.ok) {
        return this.abortWith(status, `Error occurred in Item ${index + 1}`);
      }
    }

    const payments = receipt.payments ?? [];
    if (payments.length === 0) {
      this.transition(ReceiptState.PAYING);
      const { status } = await this.guard(() => this.fullPaymentAndCloseReceipt());
      if (!status.ok) {
        return this.abortWith(status, 'Error occurred while making full payment in cash and closing the receipt');
      }
      this.transition(ReceiptState.CLOSED);
      return this.readLastReceiptInfo();
    }

    for (const [index, payment] of payments.entries()) {
      // Computed change, not a tender
      if (payment.paymentType === PaymentType.CHANGE) continue;
      this.transition(ReceiptState.PAYING);
      const { status } = await this.guard(() => this.addPayment(payment.amount, payment.paymentType));
      if (!status.ok) {
        return this.abortWith(status, `Error occurred in Payment ${index + 1}`);
      }
    }

    for (const [index, item] of items.entries()) {
      if (item.type !== ItemType.FOOTER_COMMENT) continue;
      const { status } = await this.guard(() => this.addComment(item.text ?? ''));
      if (!status.ok) {
        return this.abortWith(status, `Error occurred in Item ${index + 1}`);
      }
    }

    const { status } = await this.guard(() => this.closeReceipt());
    if (!status.ok) {
      return this.abortWith(status, 'Error occurred while closing the receipt');
    }
    this.transition(ReceiptState.CLOSED);
    return this.readLastReceiptInfo();
  }

  private applyItem(item: Item): Promise<CommandResult> {
    switch (item.type ?? ItemType.SALE) {
      case ItemType.COMMENT:
        return this.addComment(item.text ?? '');
      case ItemType.SURCHARGE_AMOUNT:
        return this.subtotalChangeAmount(item.amount ?? 0);
      case ItemType.DISCOUNT_AMOUNT:
        return this.subtotalChangeAmount(-(item.amount ?? 0));
      default:
        if (item.taxGroup === undefined && (item.department ?? 0) <= 0) {
          return Promise.resolve(
            this.failed(ErrorFactory.unsupportedValue('Tax group is required', FiscalErrorCode.TAX_GROUP))
          );
        }
        return this.addItem(
          item.department ?? 0,
          item.text ?? '',
          item.unitPrice ?? 0,
          item.taxGroup ?? TaxGroup.A,
          item.quantity ?? 0,
          item.priceModifierValue ?? 0,
          item.priceModifierType ?? PriceModifierType.NONE
        );
    }
  }

  /**
   * Read back and parse the trailer of the receipt that was just closed.
   * The device is the source of truth for these values.
   */
  protected async readLastReceiptInfo(): Promise<DeviceStatusWithReceiptInfo> {
    const { raw, status } = await this.guard(() => this.readLastReceiptQrCode());
    if (!status.ok) {
      status.addInfo('Error occurred while reading last receipt QR code data');
      return new DeviceStatusWithReceiptInfo(status);
    }

    const fields = raw.trim().split('*');
    const receiptAmount = fields.length === QR_FIELD_COUNT ? parseDecimal(fields[4]) : null;
    const receiptDateTime =
      fields.length === QR_FIELD_COUNT ? parseDate(`${fields[2]} ${fields[3]}`, 'yyyy-MM-dd HH:mm:ss') : null;
    const receiptNumber = fields.length === QR_FIELD_COUNT ? fields[1].trim() : '';

    if (receiptAmount === null || receiptDateTime === null || receiptNumber === '') {
      status.addInfo('Error occurred while parsing last receipt QR code data');
      status.addError(FiscalErrorCode.FORMAT, `Invalid last receipt QR code data: ${raw}`);
      return new DeviceStatusWithReceiptInfo(status);
    }

    const receiptInfo: ReceiptInfo = {
      fiscalMemorySerialNumber: fields[0].trim(),
      receiptNumber,
      receiptDateTime,
      receiptAmount,
    };
    debugLogger.receiptOperation('closed', this.info.serialNumber, receiptInfo);
    return new DeviceStatusWithReceiptInfo(status, receiptInfo);
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /**
   * Run a primitive, converting anything it throws into an error status
   */
  protected async guard(operation: () => Promise<CommandResult>): Promise<CommandResult> {
    try {
      return await operation();
    } catch (error) {
      debugLogger.error('Unexpected driver failure', error, 'FiscalPrinterDriver', {
        printerId: this.info.serialNumber,
      });
      return { raw: '', status: DeviceStatus.fromError(error) };
    }
  }

  protected failed(error: FiscalError): CommandResult {
    return { raw: '', status: DeviceStatus.fromError(error) };
  }

  /**
   * Aborting with no receipt open succeeds. `reply` is the error the vendor
   * answers with in that case.
   */
  protected nothingToAbort(result: CommandResult, reply: readonly StatusMessage[]): CommandResult {
    const errors = result.status.errors;
    const matches =
      errors.length === reply.length &&
      errors.every((e, i) => e.code === reply[i].code && e.text === reply[i].text);
    if (!matches) {
      return result;
    }
    const status = new DeviceStatus(result.status.messages.filter((m) => m.type !== StatusMessageType.ERROR));
    return { raw: result.raw, status: status.addInfo('No open receipt to abort') };
  }

  protected operatorId(operatorId: string | undefined): string {
    return operatorId ? operatorId : this.settings.operatorId;
  }

  protected operatorPassword(operatorPassword: string | undefined): string {
    return operatorPassword ? operatorPassword : this.settings.operatorPassword;
  }

  protected operatorName(operator: string | undefined): string {
    return operator ? operator : this.settings.operatorName;
  }

  /**
   * Best-effort abort. Its own failure never masks the original error.
   * Once payments are registered a device may refuse the abort; the receipt
   * is then settled in cash and closed instead.
   */
  private async abortQuietly(): Promise<void> {
    const { status } = await this.guard(() => this.abortReceipt());
    if (!status.ok) {
      debugLogger.warn('Abort receipt failed', status.toJSON(), 'FiscalPrinterDriver', {
        printerId: this.info.serialNumber,
      });
      if (this.receiptState === ReceiptState.PAYING) {
        const settled = await this.guard(() => this.fullPaymentAndCloseReceipt());
        if (settled.status.ok) {
          this.transition(ReceiptState.CLOSED);
          return;
        }
        debugLogger.warn('Settling unabortable receipt failed', settled.status.toJSON(), 'FiscalPrinterDriver', {
          printerId: this.info.serialNumber,
        });
      }
    }
    if (this.receiptState !== ReceiptState.IDLE && this.receiptState !== ReceiptState.CLOSED) {
      this.transition(ReceiptState.ABORTED);
    }
  }

  private async abortWith(status: DeviceStatus, info: string): Promise<DeviceStatusWithReceiptInfo> {
    await this.abortQuietly();
    status.addInfo(info);
    if (this.receiptState === ReceiptState.CLOSED) {
      status.addInfo('Receipt could not be aborted and was closed with full payment in cash');
    }
    return new DeviceStatusWithReceiptInfo(status);
  }

  private transition(next: ReceiptState): void {
    if (this.receiptState === next) return;
    debugLogger.receiptOperation(`${this.receiptState} -> ${next}`, this.info.serialNumber);
    this.receiptState = next;
  }
}
