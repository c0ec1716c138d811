import { createLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';

const logger = createLogger('graceful-shutdown');

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30000;

interface ClosableServer {
  close: (callback: (error?: Error) => void) => void;
}

function closeServer(server: ClosableServer): Promise<void> {
  return new Promise((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
}

/**
 * On SIGTERM or SIGINT stop accepting connections, let in-flight requests
 * finish, then exit. Exits with 1 if closing fails or outlasts `timeoutMs`.
 */
export function setupGracefulShutdown(server: ClosableServer, timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal, timeoutMs });

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit', { timeoutMs });
      process.exit(1);
    }, timeoutMs);
    timer.unref();

    try {
      await closeServer(server);
      clearTimeout(timer);
      logger.info('HTTP server closed');
      process.exit(0);
    } catch (error) {
      clearTimeout(timer);
      logger.error('Error during shutdown', { error: serializeError(error) });
      process.exit(1);
    }
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => void shutdown(signal));
  }
}
