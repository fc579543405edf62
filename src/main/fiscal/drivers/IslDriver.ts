/**
 * ISL Driver
 *
 * Eltrade dialect of the ISL protocol. Fields are `,`-delimited, item lines
 * use tab separated segments.
 *
 * @module fiscal/drivers/IslDriver
 */

import {
  PaymentType,
  PriceModifierType,
  ReversalReason,
  type Credentials,
  type CurrentDateTime,
  type DeviceInfo,
  type ReportType,
  type TaxGroup,
} from '../../../shared/types/fiscal';
import {
  BaseFiscalPrinterDriver,
  found,
  notFound,
  type DateTimeResult,
  type DriverSettings,
  type Lookup,
} from './FiscalPrinterDriver';
import type { CommandResult } from '../protocols/FrameCodec';
import type { IslFrameCodec } from '../protocols/IslFrameCodec';
import { DEVICE_LIMITS, ISL } from '../protocols/constants';
import { formatAmount, formatDate, parseDate, withMaxLength } from '../protocols/formatting';
import type { DeviceStatus } from '../status/DeviceStatus';
import { decodeIslStatus } from '../status/StatusDecoder';
import { ErrorFactory, FiscalErrorCode } from '../../../shared/utils/error-handler';

const COMMANDS = ISL.COMMANDS;

/** Not allowed in the current fiscal mode: abort with no receipt open */
const NO_OPEN_RECEIPT_REPLY = decodeIslStatus(Uint8Array.from([0, 0x02, 0, 0, 0, 0])).errors;

const PAYMENT_TYPE_TOKENS: Partial<Record<PaymentType, string>> = {
  [PaymentType.CASH]: 'P',
  [PaymentType.CHECK]: 'N',
  [PaymentType.COUPONS]: 'C',
  [PaymentType.EXT_COUPONS]: 'D',
  [PaymentType.PACKAGING]: 'I',
  [PaymentType.INTERNAL_USAGE]: 'J',
  [PaymentType.DAMAGE]: 'K',
  [PaymentType.CARD]: 'L',
  [PaymentType.BANK]: 'M',
  [PaymentType.RESERVED1]: 'Q',
  [PaymentType.RESERVED2]: 'R',
};

const REVERSAL_REASON_TOKENS: Record<ReversalReason, string> = {
  [ReversalReason.OPERATOR_ERROR]: 'O',
  [ReversalReason.REFUND]: 'R',
  [ReversalReason.TAX_BASE_REDUCTION]: 'T',
};

export const ISL_DATE_TIME_FORMAT = 'dd-MM-yy HH:mm:ss';

export class IslDriver extends BaseFiscalPrinterDriver {
  private readonly codec: IslFrameCodec;

  constructor(codec: IslFrameCodec, info: DeviceInfo, settings?: Partial<DriverSettings>) {
    super(info, settings);
    this.codec = codec;
  }

  /**
   * Diagnostic answer: `<model>,<firmware>,<checksum>,<switches>,<serial>,<fiscal memory serial>`
   */
  static async readDeviceInfo(codec: IslFrameCodec, uri: string): Promise<DeviceInfo> {
    const { raw, status } = await codec.request(COMMANDS.DIAGNOSTIC_INFO, '1');
    if (!status.ok) {
      throw ErrorFactory.device(`Device at ${uri} did not identify itself as ISL`);
    }

    const fields = codec.splitFields(raw).map((f) => f.trim());
    if (fields.length < 6 || !fields[4] || !fields[5]) {
      throw ErrorFactory.protocolSyntax(`Unexpected diagnostic info from ${uri}: ${raw}`);
    }

    return {
      uri,
      serialNumber: fields[4],
      fiscalMemorySerialNumber: fields[5],
      manufacturer: 'Eltrade',
      model: fields[0],
      firmwareVersion: fields[1],
      ...DEVICE_LIMITS.isl,
    };
  }

  protected getDefaultPaymentTypeMappings(): Partial<Record<PaymentType, string>> {
    return PAYMENT_TYPE_TOKENS;
  }

  protected get cashFieldSeparator(): string {
    return ISL.FIELD_SEPARATOR;
  }

  getReversalReasonText(reason: ReversalReason): Lookup<string> {
    const token: string | undefined = REVERSAL_REASON_TOKENS[reason];
    return token !== undefined
      ? found(token)
      : notFound(
          ErrorFactory.unsupportedValue(`Reversal reason ${reason} unsupported`, FiscalErrorCode.REVERSAL_REASON)
        );
  }

  async getStatus(): Promise<DeviceStatus> {
    const { status } = await this.codec.request(COMMANDS.GET_STATUS);
    return status;
  }

  async getDateTime(): Promise<DateTimeResult> {
    const { raw, status } = await this.codec.request(COMMANDS.GET_DATE_TIME);
    if (!status.ok) {
      status.addInfo('Error occurred while reading current date and time');
      return { dateTime: null, status };
    }

    const dateTime = parseDate(raw, ISL_DATE_TIME_FORMAT);
    if (!dateTime) {
      status.addInfo('Error occurred while parsing current date and time');
      status.addError(FiscalErrorCode.FORMAT, 'Wrong format of date and time');
      return { dateTime: null, status };
    }
    return { dateTime, status };
  }

  async setDateTime(currentDateTime: CurrentDateTime): Promise<DeviceStatus> {
    const { status } = await this.codec.request(
      COMMANDS.SET_DATE_TIME,
      formatDate(currentDateTime.deviceDateTime, ISL_DATE_TIME_FORMAT)
    );
    return status;
  }

  openReceipt(uniqueSaleNumber: string, operatorId: string, _operatorPassword: string): Promise<CommandResult> {
    return this.codec.request(
      COMMANDS.ELTRADE_OPEN_FISCAL_RECEIPT,
      [this.operatorName(operatorId), uniqueSaleNumber].join(ISL.FIELD_SEPARATOR)
    );
  }

  async openReversalReceipt(
    reason: ReversalReason,
    receiptNumber: string,
    receiptDateTime: Date,
    fiscalMemorySerialNumber: string,
    uniqueSaleNumber: string,
    operatorId: string,
    _operatorPassword: string
  ): Promise<CommandResult> {
    const reasonText = this.getReversalReasonText(reason);
    if (!reasonText.ok) {
      return this.failed(reasonText.error);
    }

    // <OperName>,<UNP>,S,<FM>,<Reason>,<num>,<time>
    return this.codec.request(
      COMMANDS.ELTRADE_OPEN_FISCAL_RECEIPT,
      [
        this.operatorName(operatorId),
        uniqueSaleNumber,
        'S',
        fiscalMemorySerialNumber,
        reasonText.value,
        receiptNumber,
        formatDate(receiptDateTime, 'yyyy-MM-ddTHH:mm:ss'),
      ].join(ISL.FIELD_SEPARATOR)
    );
  }

  async addItem(
    department: number,
    text: string,
    unitPrice: number,
    taxGroup: TaxGroup,
    quantity: number,
    priceModifierValue: number,
    priceModifierType: PriceModifierType
  ): Promise<CommandResult> {
    const quantityText = this.getQuantityText(quantity);
    if (!quantityText.ok) {
      return this.failed(quantityText.error);
    }
    const name = withMaxLength(text, this.info.itemTextMaxLength);
    let data: string;

    if (department <= 0) {
      const taxGroupText = this.getTaxGroupText(taxGroup);
      if (!taxGroupText.ok) {
        return this.failed(taxGroupText.error);
      }
      data = `${name}\t${taxGroupText.value}${formatAmount(unitPrice)}`;
    } else {
      data = `${name}\t${department}\t${formatAmount(unitPrice)}`;
    }

    data += quantityText.value;
    data += formatPriceModifier(priceModifierValue, priceModifierType);

    return this.codec.request(department <= 0 ? COMMANDS.SALE : COMMANDS.SALE_DEPARTMENT, data);
  }

  addComment(text: string): Promise<CommandResult> {
    return this.codec.request(COMMANDS.FISCAL_TEXT, withMaxLength(text, this.info.commentTextMaxLength));
  }

  async addPayment(amount: number, paymentType: PaymentType): Promise<CommandResult> {
    const paymentTypeText = this.getPaymentTypeText(paymentType);
    if (!paymentTypeText.ok) {
      return this.failed(paymentTypeText.error);
    }
    return this.codec.request(COMMANDS.TOTAL, `\t${paymentTypeText.value}${formatAmount(amount)}`);
  }

  subtotalChangeAmount(amount: number): Promise<CommandResult> {
    // print, no display, absolute correction
    return this.codec.request(COMMANDS.SUBTOTAL, `10;${formatAmount(amount)}`);
  }

  closeReceipt(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.CLOSE_FISCAL_RECEIPT);
  }

  async abortReceipt(): Promise<CommandResult> {
    return this.nothingToAbort(await this.codec.request(COMMANDS.ABORT_FISCAL_RECEIPT), NO_OPEN_RECEIPT_REPLY);
  }

  async fullPaymentAndCloseReceipt(): Promise<CommandResult> {
    // Total without amount settles the rest in cash
    const total = await this.codec.request(COMMANDS.TOTAL, '\t');
    if (!total.status.ok) {
      return total;
    }
    return this.closeReceipt();
  }

  readLastReceiptQrCode(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.LAST_RECEIPT_QR);
  }

  moneyTransfer(amount: number, _credentials: Credentials): Promise<CommandResult> {
    const signed = amount < 0 ? formatAmount(amount) : `+${formatAmount(amount)}`;
    return this.codec.request(COMMANDS.MONEY_TRANSFER, signed);
  }

  printDailyReport(zeroing: boolean): Promise<CommandResult> {
    return this.codec.request(COMMANDS.DAILY_REPORT, zeroing ? '0' : '2');
  }

  printReportForDate(startDate: Date, _endDate: Date, _type: ReportType): Promise<CommandResult> {
    // Eltrade firmware takes the start day and month only
    return this.codec.request(COMMANDS.REPORT_FOR_DATE, formatDate(startDate, 'ddMM'));
  }

  printLastReceiptDuplicate(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.PRINT_DUPLICATE, '1');
  }

  readCashAmount(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.MONEY_TRANSFER);
  }

  close(): Promise<void> {
    return this.codec.close();
  }
}

/**
 * `,` introduces a percent, `;` an absolute amount. Discounts are negative.
 */
export function formatPriceModifier(value: number, type: PriceModifierType): string {
  switch (type) {
    case PriceModifierType.DISCOUNT_PERCENT:
      return `,${formatAmount(-value)}`;
    case PriceModifierType.DISCOUNT_AMOUNT:
      return `;${formatAmount(-value)}`;
    case PriceModifierType.SURCHARGE_PERCENT:
      return `,${formatAmount(value)}`;
    case PriceModifierType.SURCHARGE_AMOUNT:
      return `;${formatAmount(value)}`;
    default:
      return '';
  }
}
