/**
 * Status Decoder
 *
 * Maps a fixed-length status byte vector to a DeviceStatus through a
 * per-vendor bit table. Pure: the same bytes always give the same status.
 *
 * Bits are visited high bit first. The table entry of bit `b` (0 = LSB) of
 * byte `i` sits at index `i * 8 + b`.
 *
 * @module fiscal/status/StatusDecoder
 */

import { z } from 'zod';
import { StatusMessageType } from '../../../shared/types/fiscal';
import { DeviceStatus } from './DeviceStatus';
import zfpStatusBitsJson from './tables/zfp-status-bits.json';
import islStatusBitsJson from './tables/isl-status-bits.json';
import zfpErrorCodesJson from './tables/zfp-error-codes.json';

const statusBitEntrySchema = z.object({
  code: z.string().nullable(),
  text: z.string(),
  type: z.nativeEnum(StatusMessageType),
});

export type StatusBitEntry = z.infer<typeof statusBitEntrySchema>;
export type StatusBitTable = readonly StatusBitEntry[];

const codeEntrySchema = z.object({ code: z.string(), text: z.string() });

const zfpErrorCodesSchema = z.object({
  printer: z.record(codeEntrySchema),
  command: z.record(codeEntrySchema),
});

export type ZfpErrorCodes = z.infer<typeof zfpErrorCodesSchema>;

export interface DecodeOptions {
  /** Byte whose bits 6..0 are DIP switch states SW7..SW1 */
  switchByteIndex?: number;
}

function loadTable(json: unknown, byteCount: number): StatusBitTable {
  const table = z.array(statusBitEntrySchema).length(byteCount * 8).parse(json);
  return Object.freeze(table);
}

export const ZFP_STATUS_BYTE_COUNT = 7;
export const ISL_STATUS_BYTE_COUNT = 6;
export const ISL_SWITCH_BYTE_INDEX = 3;

export const ZFP_STATUS_BITS: StatusBitTable = loadTable(zfpStatusBitsJson, ZFP_STATUS_BYTE_COUNT);
export const ISL_STATUS_BITS: StatusBitTable = loadTable(islStatusBitsJson, ISL_STATUS_BYTE_COUNT);
export const ZFP_ERROR_CODES: ZfpErrorCodes = zfpErrorCodesSchema.parse(zfpErrorCodesJson);

function describeSwitches(value: number): string {
  const states: string[] = [];
  // Bit 7 carries no switch
  for (let bit = 6; bit >= 0; bit--) {
    states.push(`SW${bit + 1}=${value & (1 << bit) ? 'ON' : 'OFF'}`);
  }
  return states.join(', ');
}

export function decodeStatusBits(
  bytes: Uint8Array,
  table: StatusBitTable,
  options: DecodeOptions = {}
): DeviceStatus {
  const status = new DeviceStatus();

  bytes.forEach((value, byteIndex) => {
    if (byteIndex === options.switchByteIndex) {
      status.addInfo(describeSwitches(value));
      return;
    }
    for (let bit = 7; bit >= 0; bit--) {
      if ((value & (1 << bit)) === 0) continue;
      const entry = table[byteIndex * 8 + bit];
      if (!entry || entry.type === StatusMessageType.RESERVED) continue;
      status.addMessage({
        type: entry.type,
        ...(entry.code !== null ? { code: entry.code } : {}),
        text: entry.text,
      });
    }
  });

  return status;
}

export function decodeZfpStatus(bytes: Uint8Array): DeviceStatus {
  return decodeStatusBits(bytes, ZFP_STATUS_BITS);
}

export function decodeIslStatus(bytes: Uint8Array): DeviceStatus {
  return decodeStatusBits(bytes, ISL_STATUS_BITS, { switchByteIndex: ISL_SWITCH_BYTE_INDEX });
}

/**
 * Decode the two ZFP acknowledge bytes (printer error, command error).
 * `'0'` in either position means no error.
 */
export function decodeZfpAcknowledge(printerError: number, commandError: number): DeviceStatus {
  const status = new DeviceStatus();
  const lookups: Array<[number, Record<string, { code: string; text: string }>, string]> = [
    [printerError, ZFP_ERROR_CODES.printer, 'printer'],
    [commandError, ZFP_ERROR_CODES.command, 'command'],
  ];

  for (const [value, codes, source] of lookups) {
    const key = String.fromCharCode(value);
    if (key === '0') continue;
    const entry = codes[key];
    if (entry) {
      status.addError(entry.code, entry.text);
    } else {
      status.addError('E999', `Unknown ${source} error 0x${value.toString(16).padStart(2, '0')}`);
    }
  }

  return status;
}
