/**
 * Fiscal Printer Types
 *
 * Shared type definitions for fiscal documents, device information and
 * operation results. Enum values double as the JSON wire values of documents.
 *
 * @module shared/types/fiscal
 */

// ============================================================================
// Enums
// ============================================================================

/**
 * VAT groups. Both Bulgarian protocol families render them as the Cyrillic
 * letters А..З.
 */
export enum TaxGroup {
  A = 'A',
  B = 'B',
  C = 'C',
  D = 'D',
  E = 'E',
  F = 'F',
  G = 'G',
  H = 'H',
}

export enum PaymentType {
  CASH = 'cash',
  CHECK = 'check',
  COUPONS = 'coupons',
  EXT_COUPONS = 'ext-coupons',
  PACKAGING = 'packaging',
  INTERNAL_USAGE = 'internal-usage',
  DAMAGE = 'damage',
  CARD = 'card',
  BANK = 'bank',
  RESERVED1 = 'reserved1',
  RESERVED2 = 'reserved2',
  /** Computed change, never sent to the device as a tender */
  CHANGE = 'change',
}

export enum PriceModifierType {
  NONE = 'none',
  DISCOUNT_PERCENT = 'discount-percent',
  DISCOUNT_AMOUNT = 'discount-amount',
  SURCHARGE_PERCENT = 'surcharge-percent',
  SURCHARGE_AMOUNT = 'surcharge-amount',
}

export enum ItemType {
  SALE = 'sale',
  COMMENT = 'comment',
  FOOTER_COMMENT = 'footer-comment',
  SURCHARGE_AMOUNT = 'surcharge-amount',
  DISCOUNT_AMOUNT = 'discount-amount',
}

export enum ReversalReason {
  OPERATOR_ERROR = 'operator-error',
  REFUND = 'refund',
  TAX_BASE_REDUCTION = 'tax-base-reduction',
}

export enum ReportType {
  BRIEF = 'brief',
  DETAILED = 'detailed',
}

export enum StatusMessageType {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  RESERVED = 'reserved',
}

/**
 * Protocol family a driver speaks
 */
export enum FiscalProtocol {
  ZFP = 'zfp',
  ISL = 'isl',
}

/**
 * Physical link used to reach the device
 */
export enum FiscalTransportType {
  SERIAL = 'com',
  TCP = 'tcp',
}

// ============================================================================
// Input documents
// ============================================================================

export interface Item {
  type?: ItemType;
  text?: string;
  /** 0 or less selects the tax-group sale path */
  department?: number;
  unitPrice?: number;
  taxGroup?: TaxGroup;
  /** 0 omits the quantity from the payload */
  quantity?: number;
  priceModifierValue?: number;
  priceModifierType?: PriceModifierType;
  /** Used by surcharge-amount and discount-amount items */
  amount?: number;
}

export interface Payment {
  amount: number;
  paymentType: PaymentType;
}

export interface Credentials {
  operator?: string;
  operatorPassword?: string;
}

export interface Receipt extends Credentials {
  uniqueSaleNumber: string;
  items: Item[];
  payments?: Payment[];
}

export interface ReversalReceipt extends Receipt {
  reason: ReversalReason;
  receiptNumber: string;
  receiptDateTime: Date;
  fiscalMemorySerialNumber: string;
}

export interface TransferAmount extends Credentials {
  amount: number;
}

export interface CurrentDateTime {
  deviceDateTime: Date;
}

export interface FiscalReport extends Credentials {
  startDate: Date;
  endDate: Date;
  type: ReportType;
}

// ============================================================================
// Device information
// ============================================================================

export interface DeviceInfo {
  uri: string;
  serialNumber: string;
  fiscalMemorySerialNumber: string;
  manufacturer: string;
  model: string;
  firmwareVersion: string;
  itemTextMaxLength: number;
  commentTextMaxLength: number;
  operatorPasswordMaxLength: number;
}

// ============================================================================
// Results
// ============================================================================

export interface StatusMessage {
  type: StatusMessageType;
  code?: string;
  text: string;
}

/**
 * Trailer data of the last closed receipt, read back from the device
 */
export interface ReceiptInfo {
  fiscalMemorySerialNumber: string;
  receiptNumber: string;
  receiptDateTime?: Date;
  receiptAmount: number;
}

export const EMPTY_RECEIPT_INFO: Readonly<ReceiptInfo> = Object.freeze({
  fiscalMemorySerialNumber: '',
  receiptNumber: '',
  receiptAmount: 0,
});

/**
 * JSON shape of a DeviceStatus
 */
export interface DeviceStatusJson {
  ok: boolean;
  messages: StatusMessage[];
}
