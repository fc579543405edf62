/**
 * Main Entry Point for the Fiscal Printer Service
 *
 * Starts the service from the environment and shuts it down on SIGINT or
 * SIGTERM. An outer surface (HTTP, IPC) attaches to the controller exported
 * from the package index.
 */

import { environment } from '../config/environment';
import { gracefulShutdown, initializeFiscalService } from './lifecycle';
import { debugLogger } from '../shared/utils/debug-logger';

async function main(): Promise<void> {
  const { db, controller } = await initializeFiscalService(environment);

  const printers = controller.getPrinters();
  debugLogger.info(
    `Fiscal service ${controller.getServerId()} ready with ${Object.keys(printers).length} printer(s)`,
    printers,
    'Main'
  );

  let shuttingDown = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    debugLogger.info(`Received ${signal}`, undefined, 'Main');
    gracefulShutdown(controller, db)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        debugLogger.error('Shutdown failed', error, 'Main');
        process.exit(1);
      });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  debugLogger.error('Fiscal service failed to start', error, 'Main');
  process.exit(1);
});
