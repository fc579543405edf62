/**
 * Property-Based Tests for the Receipt Life-cycle
 *
 * **Feature: fiscal-printer-drivers, Property 3: Fail-Fast Receipt Sequence**
 *
 * For a receipt with N items where item k is the first the device rejects,
 * exactly k items are sent, the receipt is aborted and the returned status
 * names item k. A receipt always starts with an abort, payments of type
 * change are never sent, and the receipt data is read back from the device
 * after a successful close.
 */

import * as fc from 'fast-check';
import './propertyTestConfig';
import {
  ItemType,
  PaymentType,
  ReversalReason,
  StatusMessageType,
  TaxGroup,
  type Item,
} from '../shared/types/fiscal';
import { ISL, ZFP } from '../main/fiscal/protocols/constants';
import { ReceiptState } from '../main/fiscal/drivers/FiscalPrinterDriver';
import { connectFakeIsl, connectFakeZfp } from './support/fake-devices';

const C = ZFP.COMMANDS;
const ASYNC_RUNS = { numRuns: 25 };

const bread: Item = { text: 'Bread', unitPrice: 1.5, taxGroup: TaxGroup.B, quantity: 2 };

function saleItems(count: number): Item[] {
  return Array.from({ length: count }, (_, i) => ({ text: `Item ${i + 1}`, unitPrice: 1, taxGroup: TaxGroup.A }));
}

// ============================================================================
// Property Tests
// ============================================================================

describe('Receipt Life-cycle Property Tests', () => {
  it('fail-fast: the first failing item k stops the receipt after k items', async () => {
    const scenarioArb = fc
      .integer({ min: 1, max: 6 })
      .chain((count) => fc.tuple(fc.constant(count), fc.integer({ min: 1, max: count })));

    await fc.assert(
      fc.asyncProperty(scenarioArb, async ([count, failing]) => {
        const { device, driver } = await connectFakeZfp();
        const replies = Array.from({ length: failing }, (_, i) =>
          i === failing - 1 ? { kind: 'ack' as const, commandError: '4' } : { kind: 'ack' as const }
        );
        device.script(C.SELL, ...replies);

        const result = await driver.printReceipt({ uniqueSaleNumber: '0001', items: saleItems(count) });

        expect(device.commands()).toEqual([
          C.ABORT_RECEIPT,
          C.OPEN_RECEIPT,
          ...Array.from({ length: failing }, () => C.SELL),
          C.ABORT_RECEIPT,
        ]);
        expect(result.ok).toBe(false);
        expect(result.messages).toEqual([
          { type: StatusMessageType.ERROR, code: 'E401', text: 'Syntax error' },
          { type: StatusMessageType.INFO, text: `Error occurred in Item ${failing}` },
          { type: StatusMessageType.INFO, text: 'Error occurred while printing receipt items' },
        ]);
        expect(result.receiptInfo).toEqual({ fiscalMemorySerialNumber: '', receiptNumber: '', receiptAmount: 0 });
        expect(driver.getReceiptState()).toBe(ReceiptState.ABORTED);
        await device.close();
      }),
      ASYNC_RUNS
    );
  });

  it('change payments are never sent to the device', async () => {
    const paymentArb = fc.record({
      amount: fc.integer({ min: 1, max: 10000 }).map((cents) => cents / 100),
      paymentType: fc.constantFrom(PaymentType.CASH, PaymentType.CARD, PaymentType.CHANGE),
    });

    await fc.assert(
      fc.asyncProperty(fc.array(paymentArb, { minLength: 1, maxLength: 5 }), async (payments) => {
        const { device, driver } = await connectFakeZfp();
        const result = await driver.printReceipt({ uniqueSaleNumber: '0001', items: [bread], payments });

        const tenders = payments.filter((p) => p.paymentType !== PaymentType.CHANGE);
        expect(result.ok).toBe(true);
        expect(device.requestsFor(C.PAYMENT)).toHaveLength(tenders.length);
        expect(device.requestsFor(C.FULL_PAYMENT_AND_CLOSE)).toHaveLength(0);
        await device.close();
      }),
      ASYNC_RUNS
    );
  });
});

// ============================================================================
// ZFP scenarios
// ============================================================================

describe('ZFP receipt scenarios', () => {
  it('sells bread with implicit full cash payment and reads the receipt back', async () => {
    const { device, driver } = await connectFakeZfp();
    device.lastReceiptQr = '50000001*0000042*2026-10-18*10:30:15*3.00';

    const result = await driver.printReceipt({ uniqueSaleNumber: '0001', items: [bread] });

    expect(device.commands()).toEqual([
      C.ABORT_RECEIPT,
      C.OPEN_RECEIPT,
      C.SELL,
      C.FULL_PAYMENT_AND_CLOSE,
      C.LAST_RECEIPT_QR,
    ]);
    expect(device.requestsFor(C.SELL)[0].text).toBe(`${'Bread'.padEnd(36, ' ')};Б;1.50*2`);
    expect(result.ok).toBe(true);
    expect(result.receiptInfo).toEqual({
      fiscalMemorySerialNumber: '50000001',
      receiptNumber: '0000042',
      receiptDateTime: new Date(2026, 9, 18, 10, 30, 15),
      receiptAmount: 3,
    });
    expect(driver.getReceiptState()).toBe(ReceiptState.CLOSED);
    await device.close();
  });

  it('applies comments, discounts and footer comments in their phases', async () => {
    const { device, driver } = await connectFakeZfp();
    const result = await driver.printReceipt({
      uniqueSaleNumber: '0002',
      items: [
        { type: ItemType.COMMENT, text: 'Table 4' },
        bread,
        { type: ItemType.FOOTER_COMMENT, text: 'Thank you' },
        { type: ItemType.DISCOUNT_AMOUNT, amount: 0.5 },
      ],
      payments: [{ amount: 2.5, paymentType: PaymentType.CARD }],
    });

    expect(result.ok).toBe(true);
    expect(device.requests.map((r) => [r.command, r.text])).toEqual([
      [C.ABORT_RECEIPT, ''],
      [C.OPEN_RECEIPT, '1;0000;1;1;2$0002'],
      [C.FREE_TEXT, 'Table 4'],
      [C.SELL, `${'Bread'.padEnd(36, ' ')};Б;1.50*2`],
      [C.SUBTOTAL, '1;0:-0.50'],
      [C.PAYMENT, '7;1;2.50*'],
      [C.FREE_TEXT, 'Thank you'],
      [C.CLOSE_RECEIPT, ''],
      [C.LAST_RECEIPT_QR, 'B'],
    ]);
    await device.close();
  });

  it('ignores footer comments when the receipt is paid implicitly', async () => {
    const { device, driver } = await connectFakeZfp();
    await driver.printReceipt({
      uniqueSaleNumber: '0003',
      items: [bread, { type: ItemType.FOOTER_COMMENT, text: 'Thank you' }],
    });

    expect(device.requestsFor(C.FREE_TEXT)).toHaveLength(0);
    await device.close();
  });

  it('aborts again and stops when the receipt cannot be opened', async () => {
    const { device, driver } = await connectFakeZfp();
    device.script(C.OPEN_RECEIPT, { kind: 'ack', printerError: '4' });

    const result = await driver.printReceipt({ uniqueSaleNumber: '0004', items: [bread] });

    expect(device.commands()).toEqual([C.ABORT_RECEIPT, C.OPEN_RECEIPT, C.ABORT_RECEIPT]);
    expect(result.messages).toEqual([
      { type: StatusMessageType.ERROR, code: 'E404', text: 'Opened fiscal receipt' },
      { type: StatusMessageType.INFO, text: 'Error occurred while opening new fiscal receipt' },
    ]);
  });

  it('a failing abort never masks the original error', async () => {
    const { device, driver } = await connectFakeZfp();
    device.script(C.ABORT_RECEIPT, { kind: 'ack', commandError: '1' }, { kind: 'ack', commandError: '1' });
    device.script(C.SELL, { kind: 'ack', commandError: '6' });

    const result = await driver.printReceipt({ uniqueSaleNumber: '0005', items: [bread] });

    expect(device.commands()).toEqual([C.ABORT_RECEIPT, C.OPEN_RECEIPT, C.SELL, C.ABORT_RECEIPT]);
    expect(result.messages).toEqual([
      { type: StatusMessageType.ERROR, code: 'E403', text: 'Zero input registers' },
      { type: StatusMessageType.INFO, text: 'Error occurred in Item 1' },
      { type: StatusMessageType.INFO, text: 'Error occurred while printing receipt items' },
    ]);
  });

  it('a receipt that refuses the abort after payment is closed in cash', async () => {
    const { device, driver } = await connectFakeZfp();
    device.script(C.CLOSE_RECEIPT, { kind: 'ack', printerError: '7' });
    device.script(C.ABORT_RECEIPT, { kind: 'ack' }, { kind: 'ack', printerError: '7' });

    const result = await driver.printReceipt({
      uniqueSaleNumber: '0011',
      items: [bread],
      payments: [{ amount: 3, paymentType: PaymentType.CASH }],
    });

    expect(device.commands()).toEqual([
      C.ABORT_RECEIPT,
      C.OPEN_RECEIPT,
      C.SELL,
      C.PAYMENT,
      C.CLOSE_RECEIPT,
      C.ABORT_RECEIPT,
      C.FULL_PAYMENT_AND_CLOSE,
    ]);
    expect(driver.getReceiptState()).toBe(ReceiptState.CLOSED);
    expect(result.ok).toBe(false);
    expect(result.messages.map((m) => m.text)).toEqual([
      'Registered payment but receipt is not closed',
      'Error occurred while closing the receipt',
      'Receipt could not be aborted and was closed with full payment in cash',
    ]);
    await device.close();
  });

  it('aborting with no receipt open is not an error', async () => {
    const { device, driver } = await connectFakeZfp();
    device.script(C.ABORT_RECEIPT, { kind: 'ack', commandError: '2' }, { kind: 'ack', commandError: '1' });

    const idle = await driver.abortReceipt();
    const failed = await driver.abortReceipt();

    expect(idle.status.ok).toBe(true);
    expect(idle.status.messages).toEqual([{ type: StatusMessageType.INFO, text: 'No open receipt to abort' }]);
    expect(failed.status.errors).toEqual([{ type: StatusMessageType.ERROR, code: 'E402', text: 'Invalid command' }]);
    await device.close();
  });

  it('a sale without tax group or department fails before reaching the device', async () => {
    const { device, driver } = await connectFakeZfp();
    const result = await driver.printReceipt({ uniqueSaleNumber: '0006', items: [{ text: 'Loose', unitPrice: 1 }] });

    expect(device.commands()).toEqual([C.ABORT_RECEIPT, C.OPEN_RECEIPT, C.ABORT_RECEIPT]);
    expect(result.errors).toEqual([{ type: StatusMessageType.ERROR, code: 'E411', text: 'Tax group is required' }]);
  });

  it('a payment type disabled for the device fails the payment phase', async () => {
    const { device, driver } = await connectFakeZfp({ paymentTypeRemap: { [PaymentType.CARD]: null } });
    const result = await driver.printReceipt({
      uniqueSaleNumber: '0007',
      items: [bread],
      payments: [{ amount: 3, paymentType: PaymentType.CARD }],
    });

    expect(device.commands()).toEqual([C.ABORT_RECEIPT, C.OPEN_RECEIPT, C.SELL, C.ABORT_RECEIPT]);
    expect(result.messages).toEqual([
      { type: StatusMessageType.ERROR, code: 'E406', text: 'Payment type card unsupported' },
      { type: StatusMessageType.INFO, text: 'Error occurred in Payment 1' },
      { type: StatusMessageType.INFO, text: 'Error occurred while printing receipt items' },
    ]);
  });

  it('a closing failure aborts the receipt', async () => {
    const { device, driver } = await connectFakeZfp();
    device.script(C.CLOSE_RECEIPT, { kind: 'ack', printerError: '7' });
    const result = await driver.printReceipt({
      uniqueSaleNumber: '0008',
      items: [bread],
      payments: [{ amount: 3, paymentType: PaymentType.CASH }],
    });

    expect(device.commands().slice(-2)).toEqual([C.CLOSE_RECEIPT, C.ABORT_RECEIPT]);
    expect(result.messages.map((m) => m.text)).toEqual([
      'Registered payment but receipt is not closed',
      'Error occurred while closing the receipt',
      'Error occurred while printing receipt items',
    ]);
  });

  it('a rejected footer comment aborts instead of closing', async () => {
    const { device, driver } = await connectFakeZfp();
    device.script(C.FREE_TEXT, { kind: 'ack', commandError: '4' });
    const result = await driver.printReceipt({
      uniqueSaleNumber: '0012',
      items: [bread, { type: ItemType.FOOTER_COMMENT, text: 'Thank you' }],
      payments: [{ amount: 3, paymentType: PaymentType.CASH }],
    });

    expect(device.commands()).toEqual([
      C.ABORT_RECEIPT,
      C.OPEN_RECEIPT,
      C.SELL,
      C.PAYMENT,
      C.FREE_TEXT,
      C.ABORT_RECEIPT,
    ]);
    expect(result.messages).toEqual([
      { type: StatusMessageType.ERROR, code: 'E401', text: 'Syntax error' },
      { type: StatusMessageType.INFO, text: 'Error occurred in Item 2' },
      { type: StatusMessageType.INFO, text: 'Error occurred while printing receipt items' },
    ]);
    await device.close();
  });

  it('an unreadable receipt trailer is an error even though the receipt closed', async () => {
    const { device, driver } = await connectFakeZfp();
    device.lastReceiptQr = 'garbage';

    const result = await driver.printReceipt({ uniqueSaleNumber: '0009', items: [bread] });

    expect(driver.getReceiptState()).toBe(ReceiptState.CLOSED);
    expect(result.messages).toEqual([
      { type: StatusMessageType.INFO, text: 'Error occurred while parsing last receipt QR code data' },
      { type: StatusMessageType.ERROR, code: 'E409', text: 'Invalid last receipt QR code data: garbage' },
    ]);
    expect(result.receiptInfo).toEqual({ fiscalMemorySerialNumber: '', receiptNumber: '', receiptAmount: 0 });
  });

  it('reversal receipts run the same sequence after their own open command', async () => {
    const { device, driver } = await connectFakeZfp();
    const result = await driver.printReversalReceipt({
      uniqueSaleNumber: '0010',
      items: [bread],
      reason: ReversalReason.OPERATOR_ERROR,
      receiptNumber: '0000042',
      receiptDateTime: new Date(2026, 9, 18, 10, 30, 15),
      fiscalMemorySerialNumber: '50000001',
    });

    expect(result.ok).toBe(true);
    expect(device.requestsFor(C.OPEN_RECEIPT)[0].text).toBe(
      '1;0000;1;1;D;0;0000042;18-10-26 10:30:15;50000001;0010'
    );
    expect(device.commands().slice(-2)).toEqual([C.FULL_PAYMENT_AND_CLOSE, C.LAST_RECEIPT_QR]);
  });
});

// ============================================================================
// Other operations
// ============================================================================

describe('ZFP operations', () => {
  it('reads the device date and time', async () => {
    const { device, driver } = await connectFakeZfp();
    const status = await driver.checkStatus();

    expect(status.ok).toBe(true);
    expect(status.deviceDateTime).toEqual(new Date(2026, 9, 18, 10, 30));
    await device.close();
  });

  it('an unparsable date and time is a format error', async () => {
    const { device, driver } = await connectFakeZfp();
    device.dateTimeText = '2026-10-18 10:30';

    const { dateTime, status } = await driver.getDateTime();

    expect(dateTime).toBeNull();
    expect(status.ok).toBe(false);
    expect(status.messages).toEqual([
      { type: StatusMessageType.INFO, text: 'Error occurred while parsing current date and time' },
      { type: StatusMessageType.ERROR, code: 'E409', text: 'Wrong format of date and time' },
    ]);
    await device.close();
  });

  it('check status reports an unreadable clock', async () => {
    const { device, driver } = await connectFakeZfp();
    device.dateTimeText = 'not a date';

    const status = await driver.checkStatus();

    expect(status.deviceDateTime).toBeUndefined();
    expect(status.messages.map((m) => m.text)).toEqual([
      'Error occurred while parsing current date and time',
      'Wrong format of date and time',
      'Error occurred while reading current status',
      'Cannot read current date and time',
    ]);
    await device.close();
  });

  it('sets the date and time in the device format', async () => {
    const { device, driver } = await connectFakeZfp();
    await driver.setDateTime({ deviceDateTime: new Date(2026, 9, 18, 9, 5, 7) });

    expect(device.requests[0]).toMatchObject({ command: C.SET_DATE_TIME, text: '18-10-26 09:05:07' });
    await device.close();
  });

  it('withdrawing a negative amount is rejected without a command', async () => {
    const { device, driver } = await connectFakeZfp();
    const status = await driver.printMoneyWithdraw({ amount: -5 });

    expect(device.requests).toHaveLength(0);
    expect(status.messages).toEqual([
      { type: StatusMessageType.ERROR, code: 'E403', text: 'Withdraw amount must be positive number' },
    ]);
    await device.close();
  });

  it('deposits and withdrawals send signed amounts', async () => {
    const { device, driver } = await connectFakeZfp();
    await driver.printMoneyDeposit({ amount: 20 });
    await driver.printMoneyWithdraw({ amount: 5, operator: '2', operatorPassword: '2222' });

    expect(device.requests.map((r) => r.text)).toEqual(['1;0000;0;20.00', '2;2222;0;-5.00']);
    await device.close();
  });

  it('reads the cash amount from the daily amounts', async () => {
    const { device, driver } = await connectFakeZfp();
    const decimal = await driver.cash({});
    device.cashText = '0;12550;0;0';
    const whole = await driver.cash({});

    expect(decimal.amount).toBe(125.5);
    expect(whole.amount).toBe(125.5);
    await device.close();
  });

  it('daily reports pick X or Z', async () => {
    const { device, driver } = await connectFakeZfp();
    await driver.printXReport({});
    await driver.printZReport({});

    expect(device.requests.map((r) => r.text)).toEqual(['X', 'Z']);
    await device.close();
  });

  it('reset aborts, settles any open receipt and reads the clock, and can be repeated', async () => {
    const { device, driver } = await connectFakeZfp();
    const first = await driver.reset({});
    const second = await driver.reset({});

    expect(first.ok).toBe(true);
    expect(second.ok).toBe(true);
    expect(device.commands()).toEqual([
      C.ABORT_RECEIPT,
      C.FULL_PAYMENT_AND_CLOSE,
      C.GET_DATE_TIME,
      C.ABORT_RECEIPT,
      C.FULL_PAYMENT_AND_CLOSE,
      C.GET_DATE_TIME,
    ]);
    expect(driver.getReceiptState()).toBe(ReceiptState.IDLE);
    await device.close();
  });

  it('decodes the status bytes of the status command', async () => {
    const { device, driver } = await connectFakeZfp();
    device.script(C.GET_STATUS, { kind: 'data', payload: Uint8Array.from([0, 0x01, 0, 0, 0, 0, 0]) });

    const status = await driver.getStatus();

    expect(status.messages).toEqual([
      { type: StatusMessageType.ERROR, code: 'E301', text: 'Printer not ready - no paper' },
    ]);
    await device.close();
  });
});

// ============================================================================
// ISL scenarios
// ============================================================================

describe('ISL receipt scenarios', () => {
  it('sells bread, settles in cash with total then close', async () => {
    const { device, driver } = await connectFakeIsl();
    device.lastReceiptQr = '44000001*0000007*2026-10-18*10:31:00*3.00';

    const result = await driver.printReceipt({ uniqueSaleNumber: '0001', items: [bread] });

    expect(device.requests.map((r) => [r.command, r.text])).toEqual([
      [ISL.COMMANDS.ABORT_FISCAL_RECEIPT, ''],
      [ISL.COMMANDS.ELTRADE_OPEN_FISCAL_RECEIPT, 'Operator,0001'],
      [ISL.COMMANDS.SALE, 'Bread\tБ1.50*2'],
      [ISL.COMMANDS.TOTAL, '\t'],
      [ISL.COMMANDS.CLOSE_FISCAL_RECEIPT, ''],
      [ISL.COMMANDS.LAST_RECEIPT_QR, ''],
    ]);
    expect(result.ok).toBe(true);
    expect(result.receiptInfo.receiptAmount).toBe(3);
    expect(result.receiptInfo.receiptNumber).toBe('0000007');
    await device.close();
  });

  it('an error status bit fails the item', async () => {
    const { device, driver } = await connectFakeIsl();
    device.script(ISL.COMMANDS.SALE, { kind: 'data', status: [0, 0, 0x01, 0, 0, 0] });

    const result = await driver.printReceipt({ uniqueSaleNumber: '0002', items: [bread] });

    expect(device.commands().slice(-2)).toEqual([ISL.COMMANDS.SALE, ISL.COMMANDS.ABORT_FISCAL_RECEIPT]);
    expect(result.errors).toEqual([
      { type: StatusMessageType.ERROR, code: 'E301', text: 'No paper' },
    ]);
    expect(result.messages.map((m) => m.text)).toContain('Error occurred in Item 1');
    await device.close();
  });

  it('aborting with no receipt open is not an error', async () => {
    const { device, driver } = await connectFakeIsl();
    device.script(ISL.COMMANDS.ABORT_FISCAL_RECEIPT, { kind: 'data', status: [0, 0x02, 0, 0, 0, 0] });

    const result = await driver.abortReceipt();

    expect(result.status.ok).toBe(true);
    expect(result.status.messages).toEqual([
      { type: StatusMessageType.INFO, text: 'SW7=OFF, SW6=OFF, SW5=OFF, SW4=OFF, SW3=OFF, SW2=OFF, SW1=OFF' },
      { type: StatusMessageType.INFO, text: 'No open receipt to abort' },
    ]);
    await device.close();
  });

  it('reads the cash amount from the money transfer answer', async () => {
    const { device, driver } = await connectFakeIsl();
    const status = await driver.cash({});

    expect(status.amount).toBe(48.2);
    await device.close();
  });
});
