/**
 * Serial Channel Implementation
 *
 * COM port / USB-CDC link to a fiscal device, on top of the serialport package.
 *
 * @module fiscal/transport/SerialChannel
 */

import { SerialPort } from 'serialport';
import { BaseFiscalChannel, FiscalChannelState, type FiscalChannelOptions } from './FiscalChannel';
import { debugLogger } from '../../../shared/utils/debug-logger';

export interface SerialChannelOptions extends FiscalChannelOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'odd' | 'mark' | 'space';
}

const DEFAULT_SERIAL_OPTIONS = {
  baudRate: 115200,
  dataBits: 8,
  stopBits: 1,
  parity: 'none',
} as const satisfies SerialChannelOptions;

export interface SerialPortDescriptor {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  vendorId?: string;
  productId?: string;
}

export class SerialChannel extends BaseFiscalChannel {
  readonly descriptor: string;
  private port: SerialPort | null = null;
  private readonly serialOptions: Required<Pick<SerialChannelOptions, 'baudRate' | 'dataBits' | 'stopBits' | 'parity'>>;

  constructor(portPath: string, options?: SerialChannelOptions) {
    super(options);
    this.descriptor = portPath;
    this.serialOptions = {
      baudRate: options?.baudRate ?? DEFAULT_SERIAL_OPTIONS.baudRate,
      dataBits: options?.dataBits ?? DEFAULT_SERIAL_OPTIONS.dataBits,
      stopBits: options?.stopBits ?? DEFAULT_SERIAL_OPTIONS.stopBits,
      parity: options?.parity ?? DEFAULT_SERIAL_OPTIONS.parity,
    };
  }

  getBaudRate(): number {
    return this.serialOptions.baudRate;
  }

  protected async doConnect(): Promise<void> {
    this.cleanupPort();

    const port = new SerialPort({
      path: this.descriptor,
      baudRate: this.serialOptions.baudRate,
      dataBits: this.serialOptions.dataBits,
      stopBits: this.serialOptions.stopBits,
      parity: this.serialOptions.parity,
      autoOpen: false,
    });
    this.port = port;
    this.setupPortListeners(port);

    await new Promise<void>((resolve, reject) => {
      port.open((error) => {
        if (error) {
          this.cleanupPort();
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  protected async doDisconnect(): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      this.cleanupPort();
      return;
    }

    await new Promise<void>((resolve) => {
      port.close((error) => {
        if (error) {
          debugLogger.warn(`Error closing ${this.descriptor}`, error.message, 'SerialChannel');
        }
        resolve();
      });
    });
    this.cleanupPort();
  }

  protected async doSend(data: Buffer): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      throw new Error('Serial port is not open');
    }

    await new Promise<void>((resolve, reject) => {
      port.write(data, (error) => {
        if (error) {
          reject(error);
          return;
        }
        port.drain((drainError) => (drainError ? reject(drainError) : resolve()));
      });
    });
  }

  private setupPortListeners(port: SerialPort): void {
    port.on('data', (data: Buffer) => this.handleIncomingData(data));

    port.on('close', () => {
      if (this.state === FiscalChannelState.CONNECTED) {
        this.lastError = 'Serial port closed';
        this.handleConnectionLost();
      }
    });

    port.on('error', (error: Error) => this.handleLinkError('SERIAL_ERROR', error));
  }

  private cleanupPort(): void {
    if (!this.port) return;
    this.port.removeAllListeners();
    if (this.port.isOpen) {
      this.port.close((error) => {
        if (error) {
          debugLogger.debug(`Close of ${this.descriptor} failed`, error.message, 'SerialChannel');
        }
      });
    }
    this.port = null;
  }

  destroy(): void {
    this.cleanupPort();
    super.destroy();
  }
}

/**
 * Enumerate serial ports present on this machine
 */
export async function listSerialPorts(): Promise<SerialPortDescriptor[]> {
  try {
    const ports = await SerialPort.list();
    return ports.map((port) => ({
      path: port.path,
      manufacturer: port.manufacturer,
      serialNumber: port.serialNumber,
      vendorId: port.vendorId,
      productId: port.productId,
    }));
  } catch (error) {
    debugLogger.error('Failed to list serial ports', error, 'SerialChannel');
    return [];
  }
}
