/**
 * ZFP Frame Codec
 *
 * Request:      STX LEN NBL CMD DATA CS1 CS2 ETX
 * Data answer:  STX LEN NBL CMD DATA CS1 CS2 ETX
 * Acknowledge:  ACK NBL STE1 STE2 CS1 CS2 ETX
 *
 * LEN is 0x20 + 3 + len(DATA). The checksum is the XOR of every byte from
 * LEN (or NBL for acknowledges) up to the last data byte, sent as two nibbles
 * each offset by 0x30. STE1/STE2 are the printer and command error codes.
 *
 * @module fiscal/protocols/ZfpFrameCodec
 */

import { FrameCodec, encodeNibbles, type FrameCodecOptions, type FrameParseResult } from './FrameCodec';
import { ZFP } from './constants';
import type { FiscalChannel } from '../transport/FiscalChannel';
import { DeviceStatus } from '../status/DeviceStatus';
import { decodeZfpAcknowledge } from '../status/StatusDecoder';
import { ErrorFactory } from '../../../shared/utils/error-handler';

export function zfpChecksum(bytes: Uint8Array): number {
  let checksum = 0;
  for (const byte of bytes) {
    checksum ^= byte;
  }
  return checksum;
}

export function buildZfpFrame(command: number, data: Uint8Array, sequence: number): Buffer {
  const body = Buffer.from([ZFP.LEN_OFFSET + ZFP.LEN_OVERHEAD + data.length, sequence, command, ...data]);
  return Buffer.from([
    ZFP.STX,
    ...body,
    ...encodeNibbles(zfpChecksum(body), 2, ZFP.CHECKSUM_NIBBLE_OFFSET),
    ZFP.ETX,
  ]);
}

export function buildZfpAcknowledge(sequence: number, printerError: number, commandError: number): Buffer {
  const body = Buffer.from([sequence, printerError, commandError]);
  return Buffer.from([
    ZFP.ACK,
    ...body,
    ...encodeNibbles(zfpChecksum(body), 2, ZFP.CHECKSUM_NIBBLE_OFFSET),
    ZFP.ETX,
  ]);
}

function checksumMatches(body: Uint8Array, high: number, low: number): boolean {
  const [expectedHigh, expectedLow] = encodeNibbles(zfpChecksum(body), 2, ZFP.CHECKSUM_NIBBLE_OFFSET);
  return expectedHigh === high && expectedLow === low;
}

export class ZfpFrameCodec extends FrameCodec {
  readonly fieldSeparator = ZFP.FIELD_SEPARATOR;

  constructor(channel: FiscalChannel, options?: FrameCodecOptions) {
    super(channel, ZFP.SEQ_MIN, { commandTimeout: ZFP.TIMEOUTS.COMMAND, ...options });
  }

  protected nextSequence(current: number): number {
    return current >= ZFP.SEQ_MAX ? ZFP.SEQ_MIN : current + 1;
  }

  protected buildFrame(command: number, data: Buffer, sequence: number): Buffer {
    return buildZfpFrame(command, data, sequence);
  }

  protected parseFrame(buffer: Buffer, sequence: number, command: number): FrameParseResult {
    if (buffer.length === 0) {
      return { kind: 'incomplete', consumed: 0 };
    }

    switch (buffer[0]) {
      case ZFP.NAK:
        return { kind: 'nak', consumed: 1 };
      case ZFP.ACK:
        return this.parseAcknowledge(buffer, sequence, command);
      case ZFP.STX:
        return this.parseDataFrame(buffer, sequence, command);
      default: {
        // Line noise before the start of a frame
        const start = buffer.findIndex((b) => b === ZFP.STX || b === ZFP.ACK || b === ZFP.NAK);
        return { kind: 'incomplete', consumed: start === -1 ? buffer.length : start };
      }
    }
  }

  protected decodeStatus(statusBytes: Uint8Array): DeviceStatus {
    if (statusBytes.length === 2) {
      return decodeZfpAcknowledge(statusBytes[0], statusBytes[1]);
    }
    return new DeviceStatus();
  }

  private parseAcknowledge(buffer: Buffer, sequence: number, command: number): FrameParseResult {
    if (buffer.length < ZFP.ACK_FRAME_LENGTH) {
      return { kind: 'incomplete', consumed: 0 };
    }

    const body = buffer.subarray(1, 4);
    if (buffer[6] !== ZFP.ETX || !checksumMatches(body, buffer[4], buffer[5])) {
      throw ErrorFactory.protocolSyntax('Malformed acknowledge frame');
    }
    if (body[0] !== sequence) {
      throw ErrorFactory.protocolSyntax(
        `Acknowledge sequence mismatch: expected 0x${sequence.toString(16)}, got 0x${body[0].toString(16)}`
      );
    }

    return {
      kind: 'frame',
      consumed: ZFP.ACK_FRAME_LENGTH,
      command,
      payload: Buffer.alloc(0),
      statusBytes: Uint8Array.from([body[1], body[2]]),
    };
  }

  private parseDataFrame(buffer: Buffer, sequence: number, command: number): FrameParseResult {
    if (buffer.length < 2) {
      return { kind: 'incomplete', consumed: 0 };
    }

    const length = buffer[1] - ZFP.LEN_OFFSET;
    if (length < ZFP.LEN_OVERHEAD) {
      throw ErrorFactory.protocolSyntax(`Invalid frame length byte 0x${buffer[1].toString(16)}`);
    }
    // STX + LEN..DATA + CS1 CS2 ETX
    const total = 1 + length + 3;
    if (buffer.length < total) {
      return { kind: 'incomplete', consumed: 0 };
    }

    const body = buffer.subarray(1, 1 + length);
    if (buffer[total - 1] !== ZFP.ETX || !checksumMatches(body, buffer[total - 3], buffer[total - 2])) {
      throw ErrorFactory.protocolSyntax('Malformed data frame');
    }
    if (body[1] !== sequence || body[2] !== command) {
      throw ErrorFactory.protocolSyntax(
        `Response does not match request 0x${command.toString(16)} (got 0x${body[2].toString(16)})`
      );
    }

    return {
      kind: 'frame',
      consumed: total,
      command,
      payload: Buffer.from(body.subarray(3)),
      statusBytes: new Uint8Array(0),
    };
  }
}
