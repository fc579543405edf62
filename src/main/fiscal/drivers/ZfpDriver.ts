/**
 * ZFP Driver
 *
 * Fiscal printers speaking the ZFP protocol (`;`-delimited positional fields).
 *
 * @module fiscal/drivers/ZfpDriver
 */

import {
  PaymentType,
  PriceModifierType,
  ReportType,
  ReversalReason,
  type Credentials,
  type CurrentDateTime,
  type DeviceInfo,
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
import type { ZfpFrameCodec } from '../protocols/ZfpFrameCodec';
import { DEVICE_LIMITS, ZFP } from '../protocols/constants';
import {
  formatAmount,
  formatDate,
  parseDate,
  toFixedWidth,
  withMaxLength,
} from '../protocols/formatting';
import { DeviceStatus } from '../status/DeviceStatus';
import { decodeZfpAcknowledge, decodeZfpStatus, ZFP_STATUS_BYTE_COUNT } from '../status/StatusDecoder';
import { ErrorFactory, FiscalErrorCode } from '../../../shared/utils/error-handler';

const COMMANDS = ZFP.COMMANDS;

/** Command error '2' (illegal command): abort with no receipt open */
const NO_OPEN_RECEIPT_REPLY = decodeZfpAcknowledge(0x30, 0x32).errors;

const PAYMENT_TYPE_TOKENS: Partial<Record<PaymentType, string>> = {
  [PaymentType.CASH]: '0',
  [PaymentType.CHECK]: '1',
  [PaymentType.COUPONS]: '2',
  [PaymentType.EXT_COUPONS]: '3',
  [PaymentType.PACKAGING]: '4',
  [PaymentType.INTERNAL_USAGE]: '5',
  [PaymentType.DAMAGE]: '6',
  [PaymentType.CARD]: '7',
  [PaymentType.BANK]: '8',
  [PaymentType.RESERVED1]: '9',
  [PaymentType.RESERVED2]: '10',
};

const REVERSAL_REASON_TOKENS: Record<ReversalReason, string> = {
  [ReversalReason.OPERATOR_ERROR]: '0',
  [ReversalReason.REFUND]: '1',
  [ReversalReason.TAX_BASE_REDUCTION]: '2',
};

export const ZFP_DATE_TIME_FORMAT = 'dd-MM-yyyy HH:mm';
const ZFP_SET_DATE_TIME_FORMAT = 'dd-MM-yy HH:mm:ss';

export class ZfpDriver extends BaseFiscalPrinterDriver {
  private readonly codec: ZfpFrameCodec;

  constructor(codec: ZfpFrameCodec, info: DeviceInfo, settings?: Partial<DriverSettings>) {
    super(info, settings);
    this.codec = codec;
  }

  /**
   * Identify the device behind a freshly opened codec.
   * Version answer: `<model>;<firmware>`. FD numbers: `<serial>;<fiscal memory serial>`.
   */
  static async readDeviceInfo(codec: ZfpFrameCodec, uri: string): Promise<DeviceInfo> {
    const version = await codec.request(COMMANDS.VERSION);
    const numbers = await codec.request(COMMANDS.READ_FD_NUMBERS);
    if (!version.status.ok || !numbers.status.ok) {
      throw ErrorFactory.device(`Device at ${uri} did not identify itself as ZFP`);
    }

    const [model = '', firmwareVersion = ''] = codec.splitFields(version.raw).map((f) => f.trim());
    const [serialNumber = '', fiscalMemorySerialNumber = ''] = codec.splitFields(numbers.raw).map((f) => f.trim());
    if (!serialNumber || !fiscalMemorySerialNumber) {
      throw ErrorFactory.protocolSyntax(`Unexpected device numbers from ${uri}: ${numbers.raw}`);
    }

    return {
      uri,
      serialNumber,
      fiscalMemorySerialNumber,
      manufacturer: 'Tremol',
      model,
      firmwareVersion,
      ...DEVICE_LIMITS.zfp,
    };
  }

  protected getDefaultPaymentTypeMappings(): Partial<Record<PaymentType, string>> {
    return PAYMENT_TYPE_TOKENS;
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
    const { payload, status } = await this.codec.request(COMMANDS.GET_STATUS);
    if (!status.ok) {
      return status;
    }
    if (payload.length !== ZFP_STATUS_BYTE_COUNT) {
      return status.addError(
        FiscalErrorCode.MALFORMED_FRAME,
        `Expected ${ZFP_STATUS_BYTE_COUNT} status bytes, got ${payload.length}`
      );
    }
    return status.addMessages(decodeZfpStatus(payload));
  }

  async getDateTime(): Promise<DateTimeResult> {
    const { raw, status } = await this.codec.request(COMMANDS.GET_DATE_TIME);
    if (!status.ok) {
      status.addInfo('Error occurred while reading current date and time');
      return { dateTime: null, status };
    }

    const dateTime = parseDate(raw, ZFP_DATE_TIME_FORMAT);
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
      formatDate(currentDateTime.deviceDateTime, ZFP_SET_DATE_TIME_FORMAT)
    );
    return status;
  }

  openReceipt(uniqueSaleNumber: string, operatorId: string, operatorPassword: string): Promise<CommandResult> {
    return this.codec.request(
      COMMANDS.OPEN_RECEIPT,
      [
        this.operatorId(operatorId),
        this.operatorPassword(operatorPassword),
        '1', // detailed
        '1', // VAT included
        `2$${uniqueSaleNumber}`, // postponed printing, then the sale number
      ].join(ZFP.FIELD_SEPARATOR)
    );
  }

  async openReversalReceipt(
    reason: ReversalReason,
    receiptNumber: string,
    receiptDateTime: Date,
    fiscalMemorySerialNumber: string,
    uniqueSaleNumber: string,
    operatorId: string,
    operatorPassword: string
  ): Promise<CommandResult> {
    const reasonText = this.getReversalReasonText(reason);
    if (!reasonText.ok) {
      return this.failed(reasonText.error);
    }

    return this.codec.request(
      COMMANDS.OPEN_RECEIPT,
      [
        this.operatorId(operatorId),
        this.operatorPassword(operatorPassword),
        '1',
        '1',
        'D', // reversal, postponed printing
        reasonText.value,
        receiptNumber,
        formatDate(receiptDateTime, ZFP_SET_DATE_TIME_FORMAT),
        fiscalMemorySerialNumber,
        uniqueSaleNumber,
      ].join(ZFP.FIELD_SEPARATOR)
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
    // The device parses the name positionally: always exactly 36 characters
    const name = toFixedWidth(text, this.info.itemTextMaxLength, ZFP.ITEM_TEXT_WIDTH);
    let classifier: string;

    if (department <= 0) {
      const taxGroupText = this.getTaxGroupText(taxGroup);
      if (!taxGroupText.ok) {
        return this.failed(taxGroupText.error);
      }
      classifier = taxGroupText.value;
    } else {
      classifier = (department + 0x80).toString(16).toUpperCase().padStart(2, '0');
    }

    let data = [name, classifier, formatAmount(unitPrice)].join(ZFP.FIELD_SEPARATOR);
    data += quantityText.value;
    data += formatPriceModifier(priceModifierValue, priceModifierType);

    return this.codec.request(department <= 0 ? COMMANDS.SELL : COMMANDS.SELL_DEPARTMENT, data);
  }

  addComment(text: string): Promise<CommandResult> {
    return this.codec.request(COMMANDS.FREE_TEXT, withMaxLength(text, this.info.commentTextMaxLength));
  }

  async addPayment(amount: number, paymentType: PaymentType): Promise<CommandResult> {
    const paymentTypeText = this.getPaymentTypeText(paymentType);
    if (!paymentTypeText.ok) {
      return this.failed(paymentTypeText.error);
    }
    // '1': no change; '*' closes the amount field
    return this.codec.request(
      COMMANDS.PAYMENT,
      [paymentTypeText.value, '1', `${formatAmount(amount)}*`].join(ZFP.FIELD_SEPARATOR)
    );
  }

  subtotalChangeAmount(amount: number): Promise<CommandResult> {
    return this.codec.request(COMMANDS.SUBTOTAL, `1;0:${formatAmount(amount)}`);
  }

  closeReceipt(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.CLOSE_RECEIPT);
  }

  async abortReceipt(): Promise<CommandResult> {
    return this.nothingToAbort(await this.codec.request(COMMANDS.ABORT_RECEIPT), NO_OPEN_RECEIPT_REPLY);
  }

  fullPaymentAndCloseReceipt(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.FULL_PAYMENT_AND_CLOSE);
  }

  readLastReceiptQrCode(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.LAST_RECEIPT_QR, 'B');
  }

  moneyTransfer(amount: number, credentials: Credentials): Promise<CommandResult> {
    return this.codec.request(
      COMMANDS.MONEY_TRANSFER,
      [
        this.operatorId(credentials.operator),
        this.operatorPassword(credentials.operatorPassword),
        '0',
        formatAmount(amount),
      ].join(ZFP.FIELD_SEPARATOR)
    );
  }

  printDailyReport(zeroing: boolean): Promise<CommandResult> {
    return this.codec.request(COMMANDS.DAILY_REPORT, zeroing ? 'Z' : 'X');
  }

  printReportForDate(startDate: Date, endDate: Date, type: ReportType): Promise<CommandResult> {
    return this.codec.request(
      type === ReportType.BRIEF ? COMMANDS.BRIEF_REPORT_FOR_DATE : COMMANDS.DETAILED_REPORT_FOR_DATE,
      [formatDate(startDate, 'ddMMyy'), formatDate(endDate, 'ddMMyy')].join(ZFP.FIELD_SEPARATOR)
    );
  }

  printLastReceiptDuplicate(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.PRINT_DUPLICATE);
  }

  readCashAmount(): Promise<CommandResult> {
    return this.codec.request(COMMANDS.DAILY_AVAILABLE_AMOUNTS, '0');
  }

  close(): Promise<void> {
    return this.codec.close();
  }
}

/**
 * `,` introduces a percent, `:` an absolute amount. Discounts are negative.
 */
export function formatPriceModifier(value: number, type: PriceModifierType): string {
  switch (type) {
    case PriceModifierType.DISCOUNT_PERCENT:
      return `,${formatAmount(-value)}`;
    case PriceModifierType.DISCOUNT_AMOUNT:
      return `:${formatAmount(-value)}`;
    case PriceModifierType.SURCHARGE_PERCENT:
      return `,${formatAmount(value)}`;
    case PriceModifierType.SURCHARGE_AMOUNT:
      return `:${formatAmount(value)}`;
    default:
      return '';
  }
}
