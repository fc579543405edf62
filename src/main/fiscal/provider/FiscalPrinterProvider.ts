/**
 * Fiscal Printer Provider
 *
 * Connection factory for fiscal printers. A printer URI names the protocol
 * family, the transport and the address:
 *
 *   zfp.com:///dev/ttyUSB0?baudRate=115200
 *   isl.com://COM3
 *   isl.tcp://10.0.0.5:9100
 *
 * @module fiscal/provider/FiscalPrinterProvider
 */

import { FiscalProtocol, FiscalTransportType, type DeviceInfo } from '../../../shared/types/fiscal';
import type { DriverSettings, FiscalPrinterDriver } from '../drivers/FiscalPrinterDriver';
import { IslDriver } from '../drivers/IslDriver';
import { ZfpDriver } from '../drivers/ZfpDriver';
import { IslFrameCodec } from '../protocols/IslFrameCodec';
import { ZfpFrameCodec } from '../protocols/ZfpFrameCodec';
import { ISL, ZFP } from '../protocols/constants';
import type { FiscalChannel, FiscalChannelOptions } from '../transport/FiscalChannel';
import { DEFAULT_FISCAL_TCP_PORT, NetworkChannel } from '../transport/NetworkChannel';
import { listSerialPorts, SerialChannel, type SerialPortDescriptor } from '../transport/SerialChannel';
import { ErrorFactory, getErrorMessage } from '../../../shared/utils/error-handler';
import { debugLogger } from '../../../shared/utils/debug-logger';

export interface PrinterUri {
  protocol: FiscalProtocol;
  transport: FiscalTransportType;
  /** Serial port path, or `host[:port]` */
  address: string;
  baudRate?: number;
}

export type ChannelFactory = (uri: PrinterUri, options: FiscalChannelOptions) => FiscalChannel;

export interface FiscalPrinterProviderOptions {
  /** Time allowed for one command round-trip on a connected printer (ms) */
  commandTimeout?: number;
  /** Time allowed for one command while probing ports during auto-detection (ms) */
  probeTimeout?: number;
  channelOptions?: FiscalChannelOptions;
  /** Settings for the device with the given serial number */
  resolveSettings?: (serialNumber: string) => Partial<DriverSettings>;
  channelFactory?: ChannelFactory;
  listPorts?: () => Promise<SerialPortDescriptor[]>;
}

const PRINTER_URI_PATTERN = /^(zfp|isl)\.(com|tcp):\/\/([^?]+)(?:\?(.*))?$/;

const DEFAULT_PROBE_TIMEOUT = 1500;

/**
 * @throws FiscalError (InvalidArgument) for a malformed URI
 */
export function parsePrinterUri(uri: string): PrinterUri {
  const match = PRINTER_URI_PATTERN.exec(uri.trim());
  if (!match) {
    throw ErrorFactory.invalidArgument(`Invalid printer URI: ${uri}`);
  }
  const [, protocolText, transportText, address, query] = match;

  const protocol = Object.values(FiscalProtocol).find((value) => value === protocolText);
  const transport = Object.values(FiscalTransportType).find((value) => value === transportText);
  if (!protocol || !transport) {
    throw ErrorFactory.invalidArgument(`Invalid printer URI: ${uri}`);
  }

  const parsed: PrinterUri = { protocol, transport, address };
  if (query) {
    const baudRate = new URLSearchParams(query).get('baudRate');
    if (baudRate !== null) {
      const value = Number(baudRate);
      if (!Number.isInteger(value) || value <= 0) {
        throw ErrorFactory.invalidArgument(`Invalid baud rate in printer URI: ${uri}`);
      }
      parsed.baudRate = value;
    }
  }
  return parsed;
}

export function formatPrinterUri(uri: PrinterUri): string {
  const base = `${uri.protocol}.${uri.transport}://${uri.address}`;
  return uri.baudRate !== undefined ? `${base}?baudRate=${uri.baudRate}` : base;
}

function defaultBaudRate(protocol: FiscalProtocol): number {
  return protocol === FiscalProtocol.ZFP ? ZFP.DEFAULT_BAUD_RATE : ISL.DEFAULT_BAUD_RATE;
}

export const createChannel: ChannelFactory = (uri, options) => {
  if (uri.transport === FiscalTransportType.TCP) {
    const separator = uri.address.lastIndexOf(':');
    const host = separator > 0 ? uri.address.slice(0, separator) : uri.address;
    const port = separator > 0 ? Number(uri.address.slice(separator + 1)) : DEFAULT_FISCAL_TCP_PORT;
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw ErrorFactory.invalidArgument(`Invalid TCP address: ${uri.address}`);
    }
    return new NetworkChannel(host, port, options);
  }
  return new SerialChannel(uri.address, {
    ...options,
    baudRate: uri.baudRate ?? defaultBaudRate(uri.protocol),
  });
};

export class FiscalPrinterProvider {
  private readonly commandTimeout: number;
  private readonly probeTimeout: number;
  private readonly channelOptions: FiscalChannelOptions;
  private readonly resolveSettings: (serialNumber: string) => Partial<DriverSettings>;
  private readonly channelFactory: ChannelFactory;
  private readonly listPorts: () => Promise<SerialPortDescriptor[]>;

  constructor(options: FiscalPrinterProviderOptions = {}) {
    this.commandTimeout = options.commandTimeout ?? ZFP.TIMEOUTS.COMMAND;
    this.probeTimeout = options.probeTimeout ?? DEFAULT_PROBE_TIMEOUT;
    this.channelOptions = options.channelOptions ?? {};
    this.resolveSettings = options.resolveSettings ?? (() => ({}));
    this.channelFactory = options.channelFactory ?? createChannel;
    this.listPorts = options.listPorts ?? listSerialPorts;
  }

  /**
   * Open the channel, identify the device and bind the driver of its
   * protocol family.
   * @throws FiscalError when the URI is malformed, the channel cannot be
   * opened or the device does not answer as expected
   */
  async connect(uri: string, probe: boolean = false): Promise<FiscalPrinterDriver> {
    const parsed = parsePrinterUri(uri);
    const normalizedUri = formatPrinterUri(parsed);
    const channel = this.channelFactory(parsed, this.channelOptions);

    await channel.connect();
    try {
      return await this.bindDriver(parsed.protocol, channel, normalizedUri, probe);
    } catch (error) {
      await channel.close().catch((closeError: unknown) => {
        debugLogger.warn(`Failed to close ${channel.descriptor}`, closeError, 'FiscalPrinterProvider');
      });
      throw error;
    }
  }

  /**
   * Probe every serial port with each protocol family at its default baud
   * rate. Ports that answer to neither are skipped, as are the addresses in
   * `inUse` (ports a connected driver already holds open).
   */
  async detectAvailablePrinters(inUse: ReadonlySet<string> = new Set()): Promise<FiscalPrinterDriver[]> {
    const ports = await this.listPorts();
    const printers: FiscalPrinterDriver[] = [];

    for (const port of ports) {
      if (inUse.has(port.path)) continue;
      for (const protocol of Object.values(FiscalProtocol)) {
        const uri = formatPrinterUri({ protocol, transport: FiscalTransportType.SERIAL, address: port.path });
        try {
          const driver = await this.connect(uri, true);
          printers.push(driver);
          break;
        } catch (error) {
          debugLogger.debug(
            `No ${protocol} printer at ${port.path}: ${getErrorMessage(error)}`,
            undefined,
            'FiscalPrinterProvider'
          );
        }
      }
    }

    return printers;
  }

  /**
   * While probing, the identification commands get the short probe timeout
   */
  private async bindDriver(
    protocol: FiscalProtocol,
    channel: FiscalChannel,
    uri: string,
    probe: boolean
  ): Promise<FiscalPrinterDriver> {
    if (protocol === FiscalProtocol.ZFP) {
      const codec = new ZfpFrameCodec(channel, { commandTimeout: this.commandTimeout });
      if (probe) codec.setCommandTimeout(this.probeTimeout);
      const info = await ZfpDriver.readDeviceInfo(codec, uri);
      codec.setCommandTimeout(this.commandTimeout);
      return new ZfpDriver(codec, info, this.settingsFor(info));
    }

    const codec = new IslFrameCodec(channel, { commandTimeout: this.commandTimeout });
    if (probe) codec.setCommandTimeout(this.probeTimeout);
    const info = await IslDriver.readDeviceInfo(codec, uri);
    codec.setCommandTimeout(this.commandTimeout);
    return new IslDriver(codec, info, this.settingsFor(info));
  }

  private settingsFor(info: DeviceInfo): Partial<DriverSettings> {
    return this.resolveSettings(info.serialNumber);
  }
}
