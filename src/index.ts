import type { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { EngineHandle } from './engine/EngineHandle';
import { PuppeteerDriver } from './engine/PuppeteerDriver';
import { PdfRenderer } from './services/PdfRenderer';
import { RenderLifecycleManager } from './services/RenderLifecycleManager';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('SERVER');

/**
 * Stop accepting connections and wait for open requests, up to `graceMs`
 */
function closeServer(server: Server, graceMs: number): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(() => {
      log.warn(`Grace period of ${graceMs}ms elapsed, dropping remaining connections`);
      server.closeAllConnections();
    }, graceMs);

    server.close(() => {
      clearTimeout(timer);
      resolve();
    });
    server.closeIdleConnections();
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const engine = new EngineHandle(new PuppeteerDriver({ executablePath: config.chromiumPath }), {
    startupTimeoutMs: config.startupTimeoutMs,
  });
  // fail fast: no engine, no service
  await engine.start();

  const manager = new RenderLifecycleManager(engine, new PdfRenderer(), {
    requestTimeoutMs: config.requestTimeoutMs,
    acquireTimeoutMs: config.acquireTimeoutMs,
    maxHtmlBytes: config.maxHtmlBytes,
  });
  const app = createApp({ manager, engine, config });

  const server = app.listen(config.port, () => {
    log.info(`${config.serviceName} listening on port ${config.port}`);
    log.info(`Request timeout: ${config.requestTimeoutMs}ms, log level: ${config.logLevel}`);
    log.info('Available endpoints: POST /pdf, GET /health');
  });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    log.info(`${signal} received, shutting down gracefully`, { inFlight: manager.inFlight });
    await closeServer(server, config.shutdownGraceMs);
    await engine.stop(config.shutdownGraceMs);
    log.info('Shutdown complete');
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error('Shutdown failed', error);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  log.error('Service failed to start', error);
  process.exit(1);
});
