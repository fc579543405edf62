/**
 * ISL Frame Codec
 *
 * Request:  01 LEN SEQ CMD DATA 05 BCC(4) 03
 * Response: 01 LEN SEQ CMD DATA 04 STATUS(6) 05 BCC(4) 03
 *
 * LEN is 0x20 plus the byte count from LEN to 05 inclusive. BCC is the 16-bit
 * sum of the same bytes, sent as four nibbles each offset by 0x30. A SYN
 * (0x16) from the device means "still working", NAK asks for a resend.
 *
 * @module fiscal/protocols/IslFrameCodec
 */

import { FrameCodec, encodeNibbles, type FrameCodecOptions, type FrameParseResult } from './FrameCodec';
import { ISL } from './constants';
import type { FiscalChannel } from '../transport/FiscalChannel';
import type { DeviceStatus } from '../status/DeviceStatus';
import { decodeIslStatus } from '../status/StatusDecoder';
import { ErrorFactory } from '../../../shared/utils/error-handler';

// LEN SEQ CMD 04 STATUS(6) 05
const MIN_RESPONSE_LENGTH = 3 + 1 + ISL.STATUS_LENGTH + 1;

export function islChecksum(bytes: Uint8Array): number {
  let sum = 0;
  for (const byte of bytes) {
    sum = (sum + byte) & 0xffff;
  }
  return sum;
}

function withChecksum(body: number[]): Buffer {
  return Buffer.from([
    ISL.PRE,
    ...body,
    ...encodeNibbles(islChecksum(Uint8Array.from(body)), 4, ISL.NIBBLE_OFFSET),
    ISL.EOT,
  ]);
}

export function buildIslFrame(command: number, data: Uint8Array, sequence: number): Buffer {
  const length = ISL.LEN_OFFSET + ISL.LEN_OVERHEAD + data.length;
  return withChecksum([length, sequence, command, ...data, ISL.PST]);
}

export function buildIslResponse(command: number, data: Uint8Array, sequence: number, status: Uint8Array): Buffer {
  const length = ISL.LEN_OFFSET + MIN_RESPONSE_LENGTH + data.length;
  return withChecksum([length, sequence, command, ...data, ISL.SEP, ...status, ISL.PST]);
}

export class IslFrameCodec extends FrameCodec {
  readonly fieldSeparator = ISL.FIELD_SEPARATOR;

  constructor(channel: FiscalChannel, options?: FrameCodecOptions) {
    super(channel, ISL.SEQ_MIN, {
      commandTimeout: ISL.TIMEOUTS.COMMAND,
      waitExtension: ISL.TIMEOUTS.SYN_EXTENSION,
      ...options,
    });
  }

  protected nextSequence(current: number): number {
    return current >= ISL.SEQ_MAX ? ISL.SEQ_MIN : current + 1;
  }

  protected buildFrame(command: number, data: Buffer, sequence: number): Buffer {
    return buildIslFrame(command, data, sequence);
  }

  protected decodeStatus(statusBytes: Uint8Array): DeviceStatus {
    return decodeIslStatus(statusBytes);
  }

  protected parseFrame(buffer: Buffer, sequence: number, command: number): FrameParseResult {
    if (buffer.length === 0) {
      return { kind: 'incomplete', consumed: 0 };
    }
    if (buffer[0] === ISL.SYN) {
      return { kind: 'wait', consumed: 1 };
    }
    if (buffer[0] === ISL.NAK) {
      return { kind: 'nak', consumed: 1 };
    }
    if (buffer[0] !== ISL.PRE) {
      const start = buffer.findIndex((b) => b === ISL.PRE || b === ISL.SYN || b === ISL.NAK);
      return { kind: 'incomplete', consumed: start === -1 ? buffer.length : start };
    }
    if (buffer.length < 2) {
      return { kind: 'incomplete', consumed: 0 };
    }

    const length = buffer[1] - ISL.LEN_OFFSET;
    if (length < MIN_RESPONSE_LENGTH) {
      throw ErrorFactory.protocolSyntax(`Invalid frame length byte 0x${buffer[1].toString(16)}`);
    }
    // PRE + LEN..PST + BCC(4) + EOT
    const total = 1 + length + 4 + 1;
    if (buffer.length < total) {
      return { kind: 'incomplete', consumed: 0 };
    }

    const body = buffer.subarray(1, 1 + length);
    const bcc = encodeNibbles(islChecksum(body), 4, ISL.NIBBLE_OFFSET);
    const receivedBcc = buffer.subarray(1 + length, 1 + length + 4);
    const statusStart = length - ISL.STATUS_LENGTH - 1;

    if (
      buffer[total - 1] !== ISL.EOT ||
      body[length - 1] !== ISL.PST ||
      body[statusStart - 1] !== ISL.SEP ||
      bcc.some((nibble, i) => nibble !== receivedBcc[i])
    ) {
      throw ErrorFactory.protocolSyntax('Malformed response frame');
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
      payload: Buffer.from(body.subarray(3, statusStart - 1)),
      statusBytes: Uint8Array.from(body.subarray(statusStart, statusStart + ISL.STATUS_LENGTH)),
    };
  }
}
