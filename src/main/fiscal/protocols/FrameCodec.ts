/**
 * Frame Codec Base Class
 *
 * Owns the channel of one device and performs request/response exchanges:
 * build a frame, send it, read until one complete response frame is
 * recognised and hand the status bytes to the vendor status decoder.
 *
 * `request()` never throws. Transport and framing failures come back as
 * error statuses.
 *
 * @module fiscal/protocols/FrameCodec
 */

import type { FiscalChannel } from '../transport/FiscalChannel';
import { DeviceStatus } from '../status/DeviceStatus';
import { MAX_FRAME_RESENDS } from './constants';
import { decodeCp1251, encodeCp1251 } from './text-encoding';
import { ErrorFactory, FiscalErrorCode } from '../../../shared/utils/error-handler';
import { debugLogger } from '../../../shared/utils/debug-logger';

/**
 * One decoded response, produced once per request
 */
export interface RawResponse {
  readonly command: number;
  readonly payload: Buffer;
  readonly text: string;
  readonly statusBytes: Uint8Array;
}

export interface CommandResult {
  raw: string;
  status: DeviceStatus;
}

export interface CommandResponse extends CommandResult {
  payload: Buffer;
}

export type FrameParseResult =
  | { kind: 'incomplete'; consumed: number }
  | { kind: 'wait'; consumed: number }
  | { kind: 'nak'; consumed: number }
  | { kind: 'frame'; consumed: number; command: number; payload: Buffer; statusBytes: Uint8Array };

export interface FrameCodecOptions {
  /** Overall time allowed for one command round-trip */
  commandTimeout?: number;
  /** Added to the deadline for every wait byte received */
  waitExtension?: number;
}

export abstract class FrameCodec {
  protected readonly channel: FiscalChannel;
  protected commandTimeout: number;
  protected readonly waitExtension: number;
  protected sequence: number;
  abstract readonly fieldSeparator: string;

  protected constructor(channel: FiscalChannel, firstSequence: number, options: FrameCodecOptions = {}) {
    this.channel = channel;
    this.sequence = firstSequence;
    this.commandTimeout = options.commandTimeout ?? 15000;
    this.waitExtension = options.waitExtension ?? 200;
  }

  protected abstract buildFrame(command: number, data: Buffer, sequence: number): Buffer;

  /**
   * Inspect the head of the receive buffer
   */
  protected abstract parseFrame(buffer: Buffer, sequence: number, command: number): FrameParseResult;

  protected abstract decodeStatus(statusBytes: Uint8Array): DeviceStatus;

  protected abstract nextSequence(current: number): number;

  get descriptor(): string {
    return this.channel.descriptor;
  }

  setCommandTimeout(timeout: number): void {
    this.commandTimeout = timeout;
  }

  /**
   * Exchange one command. Throws FiscalError on transport or framing failure.
   */
  async exchange(command: number, data: string | Buffer = ''): Promise<RawResponse> {
    const body = typeof data === 'string' ? encodeCp1251(data) : data;
    const sequence = this.sequence;
    this.sequence = this.nextSequence(sequence);
    const frame = this.buildFrame(command, body, sequence);

    this.channel.flushReceiveBuffer();
    debugLogger.debug(
      `>> 0x${command.toString(16)} ${body.toString('latin1')}`,
      undefined,
      'FrameCodec'
    );

    for (let attempt = 0; attempt <= MAX_FRAME_RESENDS; attempt++) {
      await this.channel.send(frame);
      const response = await this.readResponse(sequence, command);
      if (response) {
        return response;
      }
      debugLogger.debug(`NAK for 0x${command.toString(16)}, resending`, attempt + 1, 'FrameCodec');
    }

    throw ErrorFactory.transport(
      `Device ${this.descriptor} rejected command 0x${command.toString(16)} ${MAX_FRAME_RESENDS + 1} times`
    );
  }

  /**
   * Exchange one command and decode its status. Never throws.
   */
  async request(command: number, data: string | Buffer = ''): Promise<CommandResponse> {
    try {
      const response = await this.exchange(command, data);
      return {
        raw: response.text,
        payload: response.payload,
        status: this.decodeStatus(response.statusBytes),
      };
    } catch (error) {
      return { raw: '', payload: Buffer.alloc(0), status: DeviceStatus.fromError(error, FiscalErrorCode.TRANSPORT) };
    }
  }

  close(): Promise<void> {
    return this.channel.close();
  }

  /**
   * Split a response text on the vendor delimiter
   */
  splitFields(text: string): string[] {
    return text.split(this.fieldSeparator);
  }

  /**
   * Read until one response frame is complete. Resolves null when the device
   * asked for a resend.
   */
  private async readResponse(sequence: number, command: number): Promise<RawResponse | null> {
    let buffer = Buffer.alloc(0);
    let deadline = Date.now() + this.commandTimeout;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw ErrorFactory.transport(`Timeout waiting for response to 0x${command.toString(16)}`);
      }

      const chunk = await this.channel.receive(remaining);
      buffer = Buffer.concat([buffer, chunk]);

      for (;;) {
        const result = this.parseFrame(buffer, sequence, command);
        buffer = buffer.subarray(result.consumed);

        if (result.kind === 'frame') {
          return {
            command: result.command,
            payload: result.payload,
            text: decodeCp1251(result.payload),
            statusBytes: result.statusBytes,
          };
        }
        if (result.kind === 'nak') {
          return null;
        }
        if (result.kind === 'wait') {
          deadline += this.waitExtension;
          continue;
        }
        if (result.consumed === 0 || buffer.length === 0) {
          break;
        }
      }
    }
  }
}

/**
 * Render a checksum as `count` hex nibbles each offset by `base`, high first
 */
export function encodeNibbles(value: number, count: number, base: number): number[] {
  const nibbles: number[] = [];
  for (let i = count - 1; i >= 0; i--) {
    nibbles.push(((value >> (i * 4)) & 0x0f) + base);
  }
  return nibbles;
}
