/**
 * Localized Content Server
 *
 * Main entry point. Builds the locale registry, the i18n service and the
 * route table, connects to the database and starts the HTTP server. Any
 * configuration problem stops the process before it listens.
 */

import type { Server } from 'http';
import { loadConfig } from './config';
import { createApp } from './app';
import { ConfigurationError } from './errors/ConfigurationError';
import { i18nService } from './i18n/i18nService';
import { LocaleRegistry } from './i18n/localeRegistry';
import { routeSegments } from './i18n/locales';
import { PathTranslator } from './i18n/pathTranslator';
import { connectWithRetry, createDatabase, disconnect } from './models/db';
import { ensureSchema } from './models/schema';
import { pageRoutes } from './pages';
import { createRepositories } from './repositories';
import { buildRouteTable } from './routing/routeTableBuilder';
import { RouteTable } from './routing/routeTable';
import { createContentService } from './services';
import { createLogger, extractError, getConfiguredLogLevel, setLogLevel } from './utils/logger';

const log = createLogger('SERVER');

// ========================================
// GLOBAL EXCEPTION HANDLERS
// ========================================

process.on('uncaughtException', (error: Error) => {
  log.error('Uncaught exception - process will exit', {
    error: error.message,
    stack: error.stack,
  });
  // Give time for logs to flush
  setTimeout(() => process.exit(1), 1000);
});

process.on('unhandledRejection', (reason: unknown) => {
  log.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

// ========================================
// SERVER START
// ========================================

async function start(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logging.level);

  const registry = LocaleRegistry.create(config.locales);
  await i18nService.initialize(registry);

  const translator = new PathTranslator(routeSegments);
  const routes = new RouteTable(buildRouteTable(pageRoutes, registry, translator));
  log.info('Route table built', {
    entries: routes.entries.length,
    locales: registry.supportedLocales().length,
  });

  const db = createDatabase(config.database);
  await connectWithRetry(db);
  await ensureSchema(db);

  const content = createContentService(createRepositories(db), registry, config.translationCache);
  const app = createApp({ server: config.server, registry, routes, content, db });

  const server: Server = app.listen(config.server.port, () => {
    log.info(`Server listening on port ${config.server.port}`, {
      environment: config.server.nodeEnv,
      defaultLocale: registry.defaultLocale(),
      logLevel: getConfiguredLogLevel(),
    });
  });

  // ========================================
  // GRACEFUL SHUTDOWN
  // ========================================

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      disconnect(db)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error('Error during shutdown', extractError(error));
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    log.error(`Invalid configuration: ${error.message}`, error.details ?? {});
  } else {
    log.error('Server failed to start', extractError(error));
  }
  process.exit(1);
});
