export * from './fiscal';
export * from '../shared/types/fiscal';
export { gracefulShutdown, initializeDatabase, initializeFiscalService } from './lifecycle';
export { loadEnvironment, type EnvironmentConfig } from '../config/environment';
export { FiscalError, FiscalErrorCode, FiscalErrorKind } from '../shared/utils/error-handler';
