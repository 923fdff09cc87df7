import type { AnalyticsConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { createChatSession, createStack } from "../stack/factory.js";
import type { ChatSession } from "../ui/chat-session.js";

export interface Connection {
  readonly session: ChatSession;
  readonly logger: Logger;
  close(): void;
}

/**
 * A ChatSession for CLI use. Remote mode talks to running servers at the
 * configured URLs; otherwise the whole chain runs inside this process.
 */
export function connect(config: AnalyticsConfig, options: { remote: boolean; verbose: boolean }): Connection {
  const logger = createLogger({ ...config.logging, level: options.verbose ? "debug" : "silent" });
  if (options.remote) {
    return { session: createChatSession({ config, logger }), logger, close: () => undefined };
  }
  const stack = createStack(config, { logger, inProcess: true });
  return {
    session: createChatSession({ config, logger, fetchFn: stack.fetchFn }),
    logger,
    close: () => stack.close(),
  };
}
