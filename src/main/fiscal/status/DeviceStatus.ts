/**
 * Device Status
 *
 * Severity-tagged messages collected over one operation. `ok` is derived:
 * true while no error message is present.
 *
 * @module fiscal/status/DeviceStatus
 */

import {
  EMPTY_RECEIPT_INFO,
  StatusMessageType,
  type DeviceStatusJson,
  type ReceiptInfo,
  type StatusMessage,
} from '../../../shared/types/fiscal';
import { isFiscalError, getErrorMessage } from '../../../shared/utils/error-handler';

export class DeviceStatus {
  readonly messages: StatusMessage[] = [];

  constructor(messages: readonly StatusMessage[] = []) {
    this.messages.push(...messages);
  }

  get ok(): boolean {
    return !this.messages.some((m) => m.type === StatusMessageType.ERROR);
  }

  get errors(): StatusMessage[] {
    return this.messages.filter((m) => m.type === StatusMessageType.ERROR);
  }

  addMessage(message: StatusMessage): this {
    // Reserved bits never surface
    if (message.type !== StatusMessageType.RESERVED) {
      this.messages.push(message);
    }
    return this;
  }

  addInfo(text: string): this {
    return this.addMessage({ type: StatusMessageType.INFO, text });
  }

  addWarning(code: string, text: string): this {
    return this.addMessage({ type: StatusMessageType.WARNING, code, text });
  }

  addError(code: string, text: string): this {
    return this.addMessage({ type: StatusMessageType.ERROR, code, text });
  }

  addMessages(other: DeviceStatus): this {
    for (const message of other.messages) {
      this.addMessage(message);
    }
    return this;
  }

  toJSON(): DeviceStatusJson {
    return { ok: this.ok, messages: this.messages.map((m) => ({ ...m })) };
  }

  /**
   * Status carrying a single error built from a thrown value
   */
  static fromError(error: unknown, fallbackCode: string = 'E999'): DeviceStatus {
    const code = isFiscalError(error) && error.code ? error.code : fallbackCode;
    return new DeviceStatus().addError(code, getErrorMessage(error));
  }
}

export class DeviceStatusWithDateTime extends DeviceStatus {
  deviceDateTime?: Date;

  constructor(status?: DeviceStatus, deviceDateTime?: Date) {
    super(status?.messages);
    this.deviceDateTime = deviceDateTime;
  }

  toJSON(): DeviceStatusJson & { deviceDateTime?: string } {
    return { ...super.toJSON(), deviceDateTime: this.deviceDateTime?.toISOString() };
  }
}

export class DeviceStatusWithCashAmount extends DeviceStatus {
  amount: number;

  constructor(status?: DeviceStatus, amount: number = 0) {
    super(status?.messages);
    this.amount = amount;
  }

  toJSON(): DeviceStatusJson & { amount: number } {
    return { ...super.toJSON(), amount: this.amount };
  }
}

export class DeviceStatusWithReceiptInfo extends DeviceStatus {
  receiptInfo: ReceiptInfo;

  constructor(status?: DeviceStatus, receiptInfo: ReceiptInfo = { ...EMPTY_RECEIPT_INFO }) {
    super(status?.messages);
    this.receiptInfo = receiptInfo;
  }

  toJSON(): DeviceStatusJson & ReceiptInfo {
    return { ...super.toJSON(), ...this.receiptInfo };
  }
}
