export * from './FiscalChannel';
export * from './SerialChannel';
export * from './NetworkChannel';
