export * from './FiscalPrinterDriver';
export { ZfpDriver, ZFP_DATE_TIME_FORMAT } from './ZfpDriver';
export { IslDriver, ISL_DATE_TIME_FORMAT } from './IslDriver';
