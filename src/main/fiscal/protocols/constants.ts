/**
 * Fiscal protocol constants
 *
 * Frame control bytes and command codes of the two supported protocol
 * families.
 *
 * @module fiscal/protocols/constants
 */

export const ZFP = {
  STX: 0x02,
  ACK: 0x06,
  NAK: 0x15,
  ETX: 0x0a,
  LEN_OFFSET: 0x20,
  /** LEN covers NBL, CMD and itself */
  LEN_OVERHEAD: 3,
  SEQ_MIN: 0x20,
  SEQ_MAX: 0xff,
  CHECKSUM_NIBBLE_OFFSET: 0x30,
  ACK_FRAME_LENGTH: 7,
  FIELD_SEPARATOR: ';',
  ITEM_TEXT_WIDTH: 36,
  COMMANDS: {
    GET_STATUS: 0x20,
    VERSION: 0x21,
    OPEN_RECEIPT: 0x30,
    SELL: 0x31,
    SUBTOTAL: 0x33,
    SELL_DEPARTMENT: 0x34,
    PAYMENT: 0x35,
    FULL_PAYMENT_AND_CLOSE: 0x36,
    FREE_TEXT: 0x37,
    CLOSE_RECEIPT: 0x38,
    ABORT_RECEIPT: 0x39,
    PRINT_DUPLICATE: 0x3a,
    MONEY_TRANSFER: 0x3b,
    SET_DATE_TIME: 0x48,
    READ_FD_NUMBERS: 0x60,
    GET_DATE_TIME: 0x68,
    DAILY_AVAILABLE_AMOUNTS: 0x6e,
    LAST_RECEIPT_QR: 0x72,
    DETAILED_REPORT_FOR_DATE: 0x7a,
    BRIEF_REPORT_FOR_DATE: 0x7b,
    DAILY_REPORT: 0x7c,
  },
  TIMEOUTS: {
    /** Upper bound for slow commands such as reports */
    COMMAND: 15000,
  },
  DEFAULT_BAUD_RATE: 115200,
} as const;

export const ISL = {
  PRE: 0x01,
  PST: 0x05,
  EOT: 0x03,
  SEP: 0x04,
  NAK: 0x15,
  SYN: 0x16,
  LEN_OFFSET: 0x20,
  /** LEN covers SEQ, CMD, PST and itself */
  LEN_OVERHEAD: 4,
  SEQ_MIN: 0x20,
  SEQ_MAX: 0x7f,
  NIBBLE_OFFSET: 0x30,
  STATUS_LENGTH: 6,
  FIELD_SEPARATOR: ',',
  COMMANDS: {
    OPEN_FISCAL_RECEIPT: 0x30,
    SALE: 0x31,
    SUBTOTAL: 0x33,
    TOTAL: 0x35,
    FISCAL_TEXT: 0x36,
    CLOSE_FISCAL_RECEIPT: 0x38,
    ABORT_FISCAL_RECEIPT: 0x3c,
    SET_DATE_TIME: 0x3d,
    GET_DATE_TIME: 0x3e,
    DAILY_REPORT: 0x45,
    MONEY_TRANSFER: 0x46,
    GET_STATUS: 0x4a,
    REPORT_FOR_DATE: 0x4f,
    DIAGNOSTIC_INFO: 0x5a,
    PRINT_DUPLICATE: 0x6d,
    LAST_RECEIPT_QR: 0x74,
    SALE_DEPARTMENT: 0x8a,
    /** Eltrade dialect of OPEN_FISCAL_RECEIPT */
    ELTRADE_OPEN_FISCAL_RECEIPT: 0x90,
  },
  TIMEOUTS: {
    COMMAND: 15000,
    /** Extension granted for every SYN byte */
    SYN_EXTENSION: 200,
  },
  DEFAULT_BAUD_RATE: 115200,
} as const;

/**
 * Printable limits reported through DeviceInfo
 */
export const DEVICE_LIMITS = {
  zfp: { itemTextMaxLength: 34, commentTextMaxLength: 46, operatorPasswordMaxLength: 6 },
  isl: { itemTextMaxLength: 30, commentTextMaxLength: 42, operatorPasswordMaxLength: 8 },
} as const;

/** Resends after a NAK before giving up */
export const MAX_FRAME_RESENDS = 3;
