/**
 * Nudge Server - Main Entry Point
 *
 * Opens the action database and runs the dispatcher until SIGINT/SIGTERM.
 * Triggered actions are logged; other consumers subscribe through the
 * notifier returned by `startServer()`.
 */

import { pathToFileURL } from "url";
import { ConfigError, loadConfig, type ServerConfig } from "./config.js";
import { closeDatabase, initDatabase } from "./db/index.js";
import { createComponentLogger, getServerLogger, initServerLogging } from "./logging.js";
import {
  ActionDispatcher,
  createEventNotifier,
  createSqliteActionStore,
  describeAction,
  type EventNotifier,
} from "./services/actions/index.js";

const log = createComponentLogger("main");

export interface RunningServer {
  dispatcher: ActionDispatcher;
  notifier: EventNotifier;
  shutdown(): Promise<void>;
}

// ============================================
// STARTUP
// ============================================

export function startServer(config: ServerConfig): RunningServer {
  const db = initDatabase(config.dbPath);
  const store = createSqliteActionStore(db, { horizonMs: config.store.horizonMs });
  const notifier = createEventNotifier();

  notifier.onTriggeredAction((action) => {
    log.child({ guildId: action.guildId, channelId: action.channelId })
      .info("Action triggered", describeAction(action));
  });

  const dispatcher = new ActionDispatcher({ store, notifier, ...config.dispatcher });
  dispatcher.start();

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      log.info("Shutting down");
      await dispatcher.stop();
      closeDatabase();
      await getServerLogger().close();
    })();
    return stopping;
  };

  return { dispatcher, notifier, shutdown };
}

async function main(): Promise<void> {
  let config: ServerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      initServerLogging({ file: false });
      log.fatal("Refusing to start", error, { issues: error.issues });
      await getServerLogger().flush();
      process.exit(1);
    }
    throw error;
  }

  initServerLogging({ minLevel: config.logLevel, logDir: config.logDir });

  const server = startServer(config);
  const pending = await server.dispatcher.listActions();
  log.info("Nudge server ready", { env: config.env, pendingActions: pending.length, dbPath: config.dbPath });

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info("Received signal", { signal });
    server.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("Shutdown failed", error);
        process.exit(1);
      },
    );
  };

  // Graceful shutdown
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    log.fatal("Server crashed during startup", error);
    process.exit(1);
  });
}
