/**
 * Network (TCP) Channel Implementation
 *
 * LAN-attached fiscal devices and serial-to-TCP bridges.
 *
 * @module fiscal/transport/NetworkChannel
 */

import * as net from 'net';
import { BaseFiscalChannel, FiscalChannelState, type FiscalChannelOptions } from './FiscalChannel';

export interface NetworkChannelOptions extends FiscalChannelOptions {
  /** Keep-alive interval in ms (0 to disable) */
  keepAliveInterval?: number;
}

export const DEFAULT_FISCAL_TCP_PORT = 9100;

export class NetworkChannel extends BaseFiscalChannel {
  readonly descriptor: string;
  private socket: net.Socket | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly keepAliveInterval: number;

  constructor(host: string, port: number = DEFAULT_FISCAL_TCP_PORT, options?: NetworkChannelOptions) {
    super(options);
    this.host = host;
    this.port = port;
    this.keepAliveInterval = options?.keepAliveInterval ?? 30000;
    this.descriptor = `${host}:${port}`;
  }

  protected async doConnect(): Promise<void> {
    this.cleanupSocket();

    const socket = new net.Socket();
    this.socket = socket;
    socket.setNoDelay(true);
    if (this.keepAliveInterval > 0) {
      socket.setKeepAlive(true, this.keepAliveInterval);
    }

    await new Promise<void>((resolve, reject) => {
      let connected = false;

      socket.once('connect', () => {
        connected = true;
        resolve();
      });

      socket.on('data', (data: Buffer) => this.handleIncomingData(data));

      socket.on('close', (hadError: boolean) => {
        if (this.state === FiscalChannelState.CONNECTED) {
          this.lastError = hadError ? 'Connection closed with error' : 'Connection closed';
          this.handleConnectionLost();
        }
      });

      socket.on('error', (error: Error) => {
        if (!connected) {
          reject(error);
          return;
        }
        this.handleLinkError('NETWORK_ERROR', error);
      });

      socket.connect(this.port, this.host);
    });
  }

  protected async doDisconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      this.cleanupSocket();
      return;
    }

    await new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        socket.destroy();
        resolve();
      }, 1000);
      socket.once('close', () => {
        clearTimeout(forceTimer);
        resolve();
      });
      socket.end();
    });
    this.cleanupSocket();
  }

  protected async doSend(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      throw new Error('Socket is not connected');
    }

    await new Promise<void>((resolve, reject) => {
      socket.write(data, (error?: Error | null) => (error ? reject(error) : resolve()));
    });
  }

  private cleanupSocket(): void {
    if (!this.socket) return;
    this.socket.removeAllListeners();
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
    this.socket = null;
  }

  destroy(): void {
    this.cleanupSocket();
    super.destroy();
  }
}
