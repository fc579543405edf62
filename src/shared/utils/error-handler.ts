/**
 * Error Handler Utilities
 *
 * Error taxonomy of the fiscal layer. FiscalErrors are raised inside codecs
 * and drivers and converted into DeviceStatus errors before they cross the
 * driver boundary.
 */

export enum FiscalErrorKind {
  PROTOCOL_SYNTAX = 'ProtocolSyntaxError',
  UNSUPPORTED_VALUE = 'UnsupportedValue',
  INVALID_ARGUMENT = 'InvalidArgument',
  DEVICE_ERROR = 'DeviceError',
  TRANSPORT_FAILURE = 'TransportFailure',
}

/**
 * Short status codes carried into DeviceStatus messages
 */
export const FiscalErrorCode = {
  TRANSPORT: 'E101',
  MALFORMED_FRAME: 'E107',
  INVALID_ARGUMENT: 'E403',
  UNKNOWN_PRINTER: 'E404',
  REVERSAL_REASON: 'E405',
  PAYMENT_TYPE: 'E406',
  FORMAT: 'E409',
  TAX_GROUP: 'E411',
} as const;

export type FiscalErrorCode = (typeof FiscalErrorCode)[keyof typeof FiscalErrorCode];

export interface FiscalErrorOptions {
  code?: string;
  retryable?: boolean;
  cause?: unknown;
}

export class FiscalError extends Error {
  readonly kind: FiscalErrorKind;
  readonly code?: string;
  readonly retryable: boolean;
  readonly timestamp: string;

  constructor(kind: FiscalErrorKind, message: string, options: FiscalErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FiscalError';
    this.kind = kind;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.timestamp = new Date().toISOString();
  }
}

export function isFiscalError(error: unknown): error is FiscalError {
  return error instanceof FiscalError;
}

export class ErrorFactory {
  static create(kind: FiscalErrorKind, message: string, options?: FiscalErrorOptions): FiscalError {
    return new FiscalError(kind, message, options);
  }

  static transport(message: string, cause?: unknown): FiscalError {
    return this.create(FiscalErrorKind.TRANSPORT_FAILURE, message, {
      code: FiscalErrorCode.TRANSPORT,
      retryable: true,
      cause,
    });
  }

  static protocolSyntax(message: string, code: string = FiscalErrorCode.MALFORMED_FRAME): FiscalError {
    return this.create(FiscalErrorKind.PROTOCOL_SYNTAX, message, { code });
  }

  static unsupportedValue(message: string, code: string): FiscalError {
    return this.create(FiscalErrorKind.UNSUPPORTED_VALUE, message, { code });
  }

  static invalidArgument(message: string, code: string = FiscalErrorCode.INVALID_ARGUMENT): FiscalError {
    return this.create(FiscalErrorKind.INVALID_ARGUMENT, message, { code });
  }

  static device(message: string, code?: string): FiscalError {
    return this.create(FiscalErrorKind.DEVICE_ERROR, message, { code });
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unexpected error occurred';
}

/**
 * Wrap a promise with a timeout
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage?: string
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(ErrorFactory.transport(errorMessage || `Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
