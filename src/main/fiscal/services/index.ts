export * from './FiscalServiceController';
export * from './PrintJob';
export * from './PrintJobQueue';
export * from './PrinterRegistry';
export * from './ServiceConfigStore';
