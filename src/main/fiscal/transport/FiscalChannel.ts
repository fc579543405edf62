/**
 * Fiscal Channel Base Class
 *
 * Byte transport between the codec and a fiscal device. Handles connection
 * state, retrying connects with exponential backoff, buffering of incoming
 * bytes and event emission. Variants only open, close and write the
 * underlying port or socket.
 *
 * @module fiscal/transport/FiscalChannel
 */

import { EventEmitter } from 'events';
import { ErrorFactory, getErrorMessage, withTimeout } from '../../../shared/utils/error-handler';
import { debugLogger } from '../../../shared/utils/debug-logger';

// ============================================================================
// Enums and Constants
// ============================================================================

export enum FiscalChannelState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  ERROR = 'error',
}

export enum FiscalChannelEvent {
  CONNECTED = 'connected',
  DISCONNECTED = 'disconnected',
  ERROR = 'error',
  DATA = 'data',
  STATE_CHANGE = 'stateChange',
}

export interface FiscalChannelError {
  code: string;
  message: string;
  originalError?: Error;
  recoverable: boolean;
}

export interface FiscalChannelOptions {
  connectionTimeout?: number;
  readTimeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

export interface FiscalChannelStatus {
  connected: boolean;
  lastConnected?: Date;
  lastError?: string;
  bytesReceived: number;
  bytesSent: number;
}

export const DEFAULT_FISCAL_CHANNEL_OPTIONS: Required<FiscalChannelOptions> = {
  connectionTimeout: 5000,
  readTimeout: 800,
  maxRetries: 2,
  retryDelay: 250,
};

/**
 * What the codec needs from a channel
 */
export interface FiscalChannel {
  /** Human readable address, e.g. `/dev/ttyUSB0` or `10.0.0.5:8000` */
  readonly descriptor: string;
  connect(): Promise<void>;
  send(data: Buffer): Promise<void>;
  /** Resolves with the next available chunk of bytes, rejects on timeout */
  receive(timeout?: number): Promise<Buffer>;
  /** Drops bytes left over from a previous exchange */
  flushReceiveBuffer(): void;
  isConnected(): boolean;
  close(): Promise<void>;
}

interface PendingReader {
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

// ============================================================================
// Base Fiscal Channel
// ============================================================================

export abstract class BaseFiscalChannel extends EventEmitter implements FiscalChannel {
  abstract readonly descriptor: string;

  protected state: FiscalChannelState = FiscalChannelState.DISCONNECTED;
  protected options: Required<FiscalChannelOptions>;
  protected lastConnected?: Date;
  protected lastError?: string;
  protected retryCount: number = 0;
  protected bytesReceived: number = 0;
  protected bytesSent: number = 0;
  private receiveBuffer: Buffer = Buffer.alloc(0);
  private pendingReaders: PendingReader[] = [];

  constructor(options?: FiscalChannelOptions) {
    super();
    this.options = { ...DEFAULT_FISCAL_CHANNEL_OPTIONS, ...options };
  }

  protected abstract doConnect(): Promise<void>;

  protected abstract doDisconnect(): Promise<void>;

  protected abstract doSend(data: Buffer): Promise<void>;

  /**
   * Connect to the device with retry logic
   */
  async connect(): Promise<void> {
    if (this.state === FiscalChannelState.CONNECTED) {
      return;
    }

    this.retryCount = 0;
    while (this.retryCount <= this.options.maxRetries) {
      try {
        this.setState(FiscalChannelState.CONNECTING);
        await withTimeout(
          this.doConnect(),
          this.options.connectionTimeout,
          `Connection timeout after ${this.options.connectionTimeout}ms`
        );

        this.setState(FiscalChannelState.CONNECTED);
        this.lastConnected = new Date();
        this.lastError = undefined;
        this.retryCount = 0;
        this.emit(FiscalChannelEvent.CONNECTED);
        return;
      } catch (error) {
        this.retryCount++;
        this.lastError = getErrorMessage(error);

        if (this.retryCount > this.options.maxRetries) {
          this.setState(FiscalChannelState.ERROR);
          const channelError: FiscalChannelError = {
            code: 'CONNECTION_FAILED',
            message: `Failed to connect to ${this.descriptor} after ${this.options.maxRetries} retries: ${this.lastError}`,
            originalError: error instanceof Error ? error : undefined,
            recoverable: true,
          };
          this.emitError(channelError);
          throw ErrorFactory.transport(channelError.message, error);
        }

        const delay = this.options.retryDelay * Math.pow(2, this.retryCount - 1);
        await this.sleep(delay);
      }
    }
  }

  async close(): Promise<void> {
    if (
      this.state === FiscalChannelState.DISCONNECTED ||
      this.state === FiscalChannelState.ERROR
    ) {
      return;
    }

    try {
      await this.doDisconnect();
    } finally {
      this.rejectPendingReaders(new Error('Channel closed'));
      this.receiveBuffer = Buffer.alloc(0);
      this.setState(FiscalChannelState.DISCONNECTED);
      this.emit(FiscalChannelEvent.DISCONNECTED);
    }
  }

  isConnected(): boolean {
    return this.state === FiscalChannelState.CONNECTED;
  }

  async send(data: Buffer): Promise<void> {
    if (!this.isConnected()) {
      throw ErrorFactory.transport(`Channel ${this.descriptor} is not connected`);
    }

    try {
      await this.doSend(data);
      this.bytesSent += data.length;
    } catch (error) {
      this.lastError = getErrorMessage(error);
      this.emitError({
        code: 'SEND_FAILED',
        message: `Send failed: ${this.lastError}`,
        originalError: error instanceof Error ? error : undefined,
        recoverable: true,
      });
      this.handleConnectionLost();
      throw ErrorFactory.transport(`Send to ${this.descriptor} failed: ${this.lastError}`, error);
    }
  }

  async receive(timeout?: number): Promise<Buffer> {
    if (!this.isConnected()) {
      throw ErrorFactory.transport(`Channel ${this.descriptor} is not connected`);
    }

    if (this.receiveBuffer.length > 0) {
      const data = this.receiveBuffer;
      this.receiveBuffer = Buffer.alloc(0);
      return data;
    }

    const readTimeout = timeout ?? this.options.readTimeout;
    return new Promise<Buffer>((resolve, reject) => {
      const reader: PendingReader = {
        resolve,
        reject,
        timeout: setTimeout(() => {
          this.pendingReaders = this.pendingReaders.filter((r) => r !== reader);
          reject(ErrorFactory.transport(`Receive from ${this.descriptor} timed out after ${readTimeout}ms`));
        }, readTimeout),
      };
      this.pendingReaders.push(reader);
    });
  }

  flushReceiveBuffer(): void {
    this.receiveBuffer = Buffer.alloc(0);
  }

  getStatus(): FiscalChannelStatus {
    return {
      connected: this.isConnected(),
      lastConnected: this.lastConnected,
      lastError: this.lastError,
      bytesReceived: this.bytesReceived,
      bytesSent: this.bytesSent,
    };
  }

  getState(): FiscalChannelState {
    return this.state;
  }

  /**
   * Feed bytes read from the port or socket
   */
  protected handleIncomingData(data: Buffer): void {
    this.bytesReceived += data.length;
    this.emit(FiscalChannelEvent.DATA, data);

    const reader = this.pendingReaders.shift();
    if (reader) {
      clearTimeout(reader.timeout);
      reader.resolve(data);
    } else {
      this.receiveBuffer = Buffer.concat([this.receiveBuffer, data]);
    }
  }

  /**
   * Port or socket reported an error after the connection was established
   */
  protected handleLinkError(code: string, error: Error): void {
    this.lastError = error.message;
    this.emitError({
      code,
      message: `${this.descriptor}: ${error.message}`,
      originalError: error,
      recoverable: true,
    });
    this.rejectPendingReaders(error);
  }

  protected handleConnectionLost(): void {
    if (this.state !== FiscalChannelState.CONNECTED) {
      return;
    }

    debugLogger.warn(`Connection to ${this.descriptor} lost`, this.lastError, 'FiscalChannel');
    this.rejectPendingReaders(new Error(this.lastError ?? 'Connection lost'));
    this.setState(FiscalChannelState.DISCONNECTED);
    this.emit(FiscalChannelEvent.DISCONNECTED);
  }

  protected setState(newState: FiscalChannelState): void {
    const oldState = this.state;
    this.state = newState;
    if (oldState !== newState) {
      this.emit(FiscalChannelEvent.STATE_CHANGE, { oldState, newState });
    }
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  // EventEmitter throws on an unobserved 'error'
  private emitError(channelError: FiscalChannelError): void {
    if (this.listenerCount(FiscalChannelEvent.ERROR) > 0) {
      this.emit(FiscalChannelEvent.ERROR, channelError);
    } else {
      debugLogger.debug(channelError.message, channelError.code, 'FiscalChannel');
    }
  }

  private rejectPendingReaders(error: Error): void {
    const readers = this.pendingReaders;
    this.pendingReaders = [];
    for (const reader of readers) {
      clearTimeout(reader.timeout);
      reader.reject(ErrorFactory.transport(error.message, error));
    }
  }

  destroy(): void {
    this.rejectPendingReaders(new Error('Channel destroyed'));
    this.removeAllListeners();
  }
}
