/**
 * Zod Validation Schemas
 *
 * Every document that reaches the service from outside is validated here
 * before a print job is created. Dates arrive as ISO strings and are coerced.
 */

import { z } from 'zod';
import {
  ItemType,
  PaymentType,
  PriceModifierType,
  ReportType,
  ReversalReason,
  TaxGroup,
} from '../../shared/types/fiscal';
import { PrintJobAction, type PrintJobRequest } from '../fiscal/services/PrintJob';

// ==================================================================
// DOCUMENT SCHEMAS
// ==================================================================

const amount = z.number().finite('Amount must be a finite number');

export const CredentialsSchema = z.object({
  operator: z.string().max(32, 'Operator too long').optional(),
  operatorPassword: z.string().max(32, 'Operator password too long').optional(),
});

export const ItemSchema = z.object({
  type: z.nativeEnum(ItemType).optional(),
  text: z.string().max(256, 'Item text too long').optional(),
  department: z.number().int('Department must be integer').min(0).max(127).optional(),
  unitPrice: amount.optional(),
  taxGroup: z.nativeEnum(TaxGroup).optional(),
  quantity: z.number().finite().nonnegative('Quantity must not be negative').optional(),
  priceModifierValue: amount.optional(),
  priceModifierType: z.nativeEnum(PriceModifierType).optional(),
  amount: amount.optional(),
});

export const PaymentSchema = z.object({
  amount,
  paymentType: z.nativeEnum(PaymentType).default(PaymentType.CASH),
});

export const ReceiptSchema = CredentialsSchema.extend({
  uniqueSaleNumber: z.string().min(1, 'Unique sale number required').max(32, 'Unique sale number too long'),
  items: z.array(ItemSchema).min(1, 'At least one item required'),
  payments: z.array(PaymentSchema).optional(),
});

export const ReversalReceiptSchema = ReceiptSchema.extend({
  reason: z.nativeEnum(ReversalReason),
  receiptNumber: z.string().min(1, 'Receipt number required'),
  receiptDateTime: z.coerce.date(),
  fiscalMemorySerialNumber: z.string().min(1, 'Fiscal memory serial number required'),
});

export const TransferAmountSchema = CredentialsSchema.extend({
  amount,
});

export const CurrentDateTimeSchema = z.object({
  deviceDateTime: z.coerce.date(),
});

export const FiscalReportSchema = CredentialsSchema.extend({
  startDate: z.coerce.date(),
  endDate: z.coerce.date(),
  type: z.nativeEnum(ReportType).default(ReportType.BRIEF),
}).refine((report) => report.startDate.getTime() <= report.endDate.getTime(), {
  message: 'Start date must not be after end date',
  path: ['endDate'],
});

// ==================================================================
// SERVICE SCHEMAS
// ==================================================================

export const PrinterConfigWithIdSchema = z.object({
  id: z.string().trim().min(1, 'Printer id required').max(64, 'Printer id too long'),
  uri: z
    .string()
    .trim()
    .min(1, 'Printer URI required')
    .regex(/^(zfp|isl)\.(com|tcp):\/\/[^?]+(\?.*)?$/, 'Unsupported printer URI'),
});

// ==================================================================
// VALIDATION HELPERS
// ==================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * Validate data and return safe result (doesn't throw)
 */
export function safeValidate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): { success: true; data: z.output<S> } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: `Validation failed: ${formatIssues(result.error)}` };
}

/**
 * Validate the document of an action and pair it with its action tag
 */
export function parsePrintJobRequest(
  action: PrintJobAction,
  document: unknown
): { success: true; data: PrintJobRequest } | { success: false; error: string } {
  switch (action) {
    case PrintJobAction.GET_STATUS:
    case PrintJobAction.CHECK_STATUS:
    case PrintJobAction.GET_DATE_TIME:
      return { success: true, data: { action } };
    case PrintJobAction.SET_DATE_TIME: {
      const result = safeValidate(CurrentDateTimeSchema, document);
      return result.success ? { success: true, data: { action, document: result.data } } : result;
    }
    case PrintJobAction.RECEIPT: {
      const result = safeValidate(ReceiptSchema, document);
      return result.success ? { success: true, data: { action, document: result.data } } : result;
    }
    case PrintJobAction.REVERSAL_RECEIPT: {
      const result = safeValidate(ReversalReceiptSchema, document);
      return result.success ? { success: true, data: { action, document: result.data } } : result;
    }
    case PrintJobAction.DEPOSIT:
    case PrintJobAction.WITHDRAW: {
      const result = safeValidate(TransferAmountSchema, document);
      return result.success ? { success: true, data: { action, document: result.data } } : result;
    }
    case PrintJobAction.FISCAL_REPORT: {
      const result = safeValidate(FiscalReportSchema, document);
      return result.success ? { success: true, data: { action, document: result.data } } : result;
    }
    case PrintJobAction.X_REPORT:
    case PrintJobAction.Z_REPORT:
    case PrintJobAction.DUPLICATE:
    case PrintJobAction.CASH:
    case PrintJobAction.RESET: {
      const result = safeValidate(CredentialsSchema, document ?? {});
      return result.success ? { success: true, data: { action, document: result.data } } : result;
    }
  }
}
