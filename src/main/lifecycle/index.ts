/**
 * Lifecycle Module Index
 *
 * Re-exports all lifecycle-related functions.
 */

export { gracefulShutdown } from './shutdown';

export { initializeDatabase, initializeFiscalService } from './initialization';
