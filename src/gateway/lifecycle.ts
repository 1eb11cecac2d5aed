import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import { ConfigStore } from "../config/store.js";
import type { BotConnectionConfig, TidebotConfig } from "../config/types.js";
import { ConsoleAdapter } from "../connection/console.js";
import type { BotConnection } from "../connection/frame.js";
import { ConnectionManager } from "../connection/manager.js";
import type { SocketConnector } from "../connection/socket.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { BotServices, Context } from "../pipeline/context.js";
import type { Pipeline } from "../pipeline/pipeline.js";
import { buildDefaultPipeline } from "../plugins/builtin/index.js";
import { RemoteTransport } from "../remote/transport.js";
import { Correlator } from "../correlation/correlator.js";
import { unknownBot } from "../protocol/event.js";
import { Scheduler } from "../scheduler/scheduler.js";
import { BotDatabase, defaultDatabasePath } from "../storage/db.js";
import { HealthServer } from "./health.js";

export interface BotRuntime {
  readonly config: ConfigStore;
  readonly logger: Logger;
  readonly services: BotServices;
  readonly connections: BotConnection[];
  readonly healthServer: HealthServer | null;
  /** Opens a remote-control transport that is shut down with the bot. */
  openRemoteTransport(url: string): Promise<RemoteTransport>;
  shutdown(): Promise<void>;
}

export interface StartBotOptions {
  readonly configPath?: string;
  readonly stateDir?: string;
  readonly pipeline?: Pipeline;
  readonly connect?: SocketConnector;
  /** Install SIGINT/SIGTERM handlers. */
  readonly handleSignals?: boolean;
  /** Overrides the config file, for embedding and tests. */
  readonly config?: TidebotConfig;
  readonly logger?: Logger;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

function createConnection(
  index: number,
  bot: BotConnectionConfig,
  services: BotServices,
  connect?: SocketConnector,
): BotConnection {
  const id = `${bot.protocol}-${index}`;
  if (bot.protocol === "console") {
    return new ConsoleAdapter({ id, config: bot, services });
  }
  return new ConnectionManager({ id, config: bot, services, connect });
}

export async function startBot(options: StartBotOptions = {}): Promise<BotRuntime> {
  // 1. State dir and config
  const stateDir = ensureDir(options.stateDir ?? getStateDir());
  const initial = options.config ?? loadConfig(options.configPath, stateDir);
  const logger = options.logger ?? createLogger(initial.logging);
  const config = new ConfigStore(initial, logger.child({ component: "config" }), stateDir);

  // 2. Storage and scheduler
  const db = new BotDatabase(initial.database.path ?? defaultDatabasePath(stateDir));
  const scheduler = new Scheduler(logger.child({ component: "scheduler" }));

  // 3. Pipeline, with defaults for plugins the config does not mention
  const pipeline = options.pipeline ?? buildDefaultPipeline();
  config.applyPluginDefaults(pipeline.defaultConfigs());
  const services: BotServices = { config, db, scheduler, pipeline, logger };

  // 4. Connections; init hooks run against the first one's context before any connects
  const connections = initial.bots.map((bot, index) =>
    createConnection(index, bot, services, options.connect),
  );
  const startupContext: Context = connections[0]?.createContext({ kind: "startup" }) ?? {
    ...services,
    event: { kind: "startup" },
    correlator: new Correlator(),
    bot: unknownBot("none", "none"),
    apiTimeoutMs: 0,
  };
  await pipeline.init(startupContext);
  for (const connection of connections) connection.start();

  // 5. Health endpoint
  let healthServer: HealthServer | null = null;
  if (initial.health.enabled) {
    healthServer = new HealthServer(connections, scheduler, initial.health.port, initial.health.hostname);
    await healthServer.start();
    logger.info({ port: initial.health.port }, "Health server started");
  }

  const remoteTransports = new Set<RemoteTransport>();
  const openRemoteTransport = async (url: string): Promise<RemoteTransport> => {
    const transport = await RemoteTransport.connect(
      url,
      logger.child({ component: "remote" }),
      config.snapshot().remote.requestTimeoutMs,
    );
    remoteTransports.add(transport);
    return transport;
  };
  let shutdownPromise: Promise<void> | null = null;

  const shutdown = (): Promise<void> => {
    shutdownPromise ??= (async () => {
      logger.info("Shutting down gracefully...");
      const forceExit = setTimeout(() => {
        logger.warn("Shutdown timeout reached, forcing exit");
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS);
      forceExit.unref();

      scheduler.shutdown();
      await Promise.all(connections.map((connection) => connection.stop()));
      await Promise.all([...remoteTransports].map((transport) => transport.shutdown()));
      await healthServer?.stop();
      db.close();
      clearTimeout(forceExit);
      logger.info("Shutdown complete");
    })();
    return shutdownPromise;
  };

  if (options.handleSignals) {
    const onSignal = (): void => {
      void shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    };
    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
  }

  logger.info({ bots: connections.length, plugins: pipeline.names.length }, "tidebot started");
  return { config, logger, services, connections, healthServer, openRemoteTransport, shutdown };
}
