import type http from 'http';
import { errorMessage } from './errors.js';
import type { Gateway } from './gateway.js';
import { createLogger } from './log.js';

const log = createLogger('shutdown');

/** Stop the gateway on SIGINT/SIGTERM; a second signal exits immediately. */
export function registerShutdown(gateway: Gateway, server?: http.Server): void {
  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      log.warn(`received ${signal} again, exiting now`);
      process.exit(1);
    }
    shuttingDown = true;
    log.info(`received ${signal}, shutting down...`);
    server?.close();
    gateway.stop().then(
      () => log.info('shutdown complete'),
      (e) => {
        log.error(`error during shutdown: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
