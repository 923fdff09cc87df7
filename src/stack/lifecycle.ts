import { serve } from "@hono/node-server";
import { loadConfig } from "../config/loader.js";
import type { AnalyticsConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { SERVICE_NAMES, createStack, type ServiceName, type Stack } from "./factory.js";

type Server = ReturnType<typeof serve>;

export interface StackHandle {
  readonly stack: Stack;
  readonly logger: Logger;
  stop(): Promise<void>;
}

export interface StartOptions {
  readonly configPath?: string;
  readonly config?: AnalyticsConfig;
  /** Services to run in this process. Defaults to all four. */
  readonly services?: readonly ServiceName[];
  readonly handleSignals?: boolean;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export async function startStack(options: StartOptions = {}): Promise<StackHandle> {
  const config = options.config ?? loadConfig(options.configPath);
  const logger = createLogger(config.logging);
  logger.info("Starting analytics stack...");

  if (config.identity.users.length === 0) {
    logger.warn("No users configured under identity.users; nobody can log in");
  }

  const stack = createStack(config, { logger });
  const services = options.services ?? SERVICE_NAMES;
  const servers = new Map<ServiceName, Server>();

  for (const name of services) {
    const endpoint = config[name];
    servers.set(
      name,
      serve({ fetch: stack.apps[name].fetch, port: endpoint.port, hostname: endpoint.hostname }),
    );
    logger.info({ service: name, url: stack.urls[name] }, "Service listening");
  }

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (stopping) return stopping;
    stopping = (async () => {
      logger.info("Shutting down...");
      const forceExit = setTimeout(() => {
        logger.warn("Shutdown timeout reached, forcing exit");
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS);
      forceExit.unref();

      for (const [name, server] of servers) {
        try {
          await closeServer(server);
        } catch (err) {
          logger.error({ err, service: name }, "Error stopping service");
        }
      }
      stack.close();
      clearTimeout(forceExit);
      logger.info("Shutdown complete");
    })();
    return stopping;
  };

  if (options.handleSignals) {
    const onSignal = () => {
      stop().then(
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

  logger.info("Analytics stack started");
  return { stack, logger, stop };
}
