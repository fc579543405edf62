/**
 * Fiscal Module Index
 *
 * Public surface of the fiscal printer service.
 */

export * from './drivers';
export * from './services';
export * from './transport';
export {
  DeviceStatus,
  DeviceStatusWithCashAmount,
  DeviceStatusWithDateTime,
  DeviceStatusWithReceiptInfo,
} from './status/DeviceStatus';
export { decodeIslStatus, decodeStatusBits, decodeZfpStatus } from './status/StatusDecoder';
export {
  FiscalPrinterProvider,
  createChannel,
  formatPrinterUri,
  parsePrinterUri,
  type ChannelFactory,
  type FiscalPrinterProviderOptions,
  type PrinterUri,
} from './provider/FiscalPrinterProvider';
export { IslFrameCodec } from './protocols/IslFrameCodec';
export { ZfpFrameCodec } from './protocols/ZfpFrameCodec';
