import { AgentInvocationClient } from "../agent/client.js";
import { GatewayClient } from "../agent/gateway-client.js";
import { IntentReasoner } from "../agent/reasoner.js";
import { createRuntimeApp } from "../agent/runtime.js";
import type { Reasoner } from "../agent/types.js";
import { DEFAULT_REGISTRY_PATH, DEFAULT_SEED_PATH } from "../config/paths.js";
import { serviceUrl } from "../config/schema.js";
import type { AnalyticsConfig, SessionConfig } from "../config/types.js";
import { HttpToolExecutor } from "../executor/client.js";
import { ToolExecutorDispatcher } from "../executor/dispatcher.js";
import type { DataEngine } from "../executor/engine.js";
import { createExecutorApp } from "../executor/server.js";
import { SqliteDataEngine } from "../executor/sqlite-engine.js";
import { ToolGatewayRouter } from "../gateway/router.js";
import { createGatewayApp } from "../gateway/server.js";
import { HttpIdentityProvider } from "../identity/providers/http.js";
import { LocalIdentityProvider } from "../identity/providers/local.js";
import { createIdentityApp } from "../identity/server.js";
import type { TokenManagerOptions } from "../identity/token-manager.js";
import { TokenVerifier } from "../identity/verifier.js";
import type { Logger } from "../logging/logger.js";
import { ToolRegistry } from "../tools/registry.js";
import { ChatSession } from "../ui/chat-session.js";
import type { FetchFn } from "../utils/http.js";

export const SERVICE_NAMES = ["identity", "executor", "gateway", "runtime"] as const;
export type ServiceName = (typeof SERVICE_NAMES)[number];

/** Anything that answers a Request; Hono apps and `@hono/node-server` both fit. */
export interface ServiceApp {
  fetch(request: Request): Response | Promise<Response>;
}

export interface StackOptions {
  readonly logger: Logger;
  /** Route hop-to-hop calls through the apps directly instead of the network. */
  readonly inProcess?: boolean;
  readonly engine?: DataEngine;
  readonly reasoner?: Reasoner;
  readonly registry?: ToolRegistry;
}

export interface Stack {
  readonly config: AnalyticsConfig;
  readonly logger: Logger;
  readonly registry: ToolRegistry;
  readonly identityProvider: LocalIdentityProvider;
  readonly router: ToolGatewayRouter;
  readonly apps: Readonly<Record<ServiceName, ServiceApp>>;
  readonly urls: Readonly<Record<ServiceName, string>>;
  readonly fetchFn: FetchFn;
  close(): void;
}

/** Sends each request to the app registered for its origin. */
export function inProcessFetch(apps: ReadonlyMap<string, ServiceApp>): FetchFn {
  return async (input, init) => {
    const request = new Request(input, init);
    const app = apps.get(new URL(request.url).origin);
    if (!app) throw new TypeError(`No in-process service at ${request.url}`);
    return app.fetch(request);
  };
}

export function tokenManagerOptions(session: SessionConfig): TokenManagerOptions {
  return {
    renewalMarginMs: session.renewalMarginSec * 1000,
    refreshMaxAttempts: session.refreshMaxAttempts,
    refreshBaseDelayMs: session.refreshBaseDelayMs,
    loginTimeoutMs: session.loginTimeoutMs,
    refreshTimeoutMs: session.refreshTimeoutMs,
  };
}

/** Wires every hop of the chain from one config. */
export function createStack(config: AnalyticsConfig, options: StackOptions): Stack {
  const { logger } = options;
  const urls: Record<ServiceName, string> = {
    identity: serviceUrl(config.identity),
    executor: serviceUrl(config.executor),
    gateway: serviceUrl(config.gateway),
    runtime: serviceUrl(config.runtime),
  };

  const routes = new Map<string, ServiceApp>();
  const fetchFn: FetchFn = options.inProcess ? inProcessFetch(routes) : fetch;

  const registry = options.registry ?? ToolRegistry.load(config.registry.path ?? DEFAULT_REGISTRY_PATH);
  const engine =
    options.engine ??
    SqliteDataEngine.open(config.executor.databasePath, config.executor.seedPath ?? DEFAULT_SEED_PATH);

  const identityProvider = new LocalIdentityProvider({
    issuer: config.identity.issuer,
    secret: config.identity.signingSecret,
    accessTokenTtlSec: config.identity.accessTokenTtlSec,
    refreshTokenTtlSec: config.identity.refreshTokenTtlSec,
    users: config.identity.users,
  });
  const verifierOptions = {
    secret: config.identity.signingSecret,
    issuer: config.identity.issuer,
    cacheTtlMs: config.gateway.verificationCacheTtlMs,
  };

  const dispatcher = new ToolExecutorDispatcher(registry, engine, logger.child({ component: "executor" }), {
    timeoutMs: config.executor.timeoutMs,
    retries: config.executor.retries,
  });

  const router = new ToolGatewayRouter(
    registry,
    new TokenVerifier(verifierOptions),
    new HttpToolExecutor(urls.executor, config.executor.internalKey, fetchFn),
    logger.child({ component: "gateway" }),
    { toolTimeoutMs: config.gateway.toolTimeoutMs },
  );

  const apps: Record<ServiceName, ServiceApp> = {
    identity: createIdentityApp(identityProvider, logger.child({ component: "identity" })),
    executor: createExecutorApp(dispatcher, config.executor.internalKey, logger.child({ component: "executor" })),
    gateway: createGatewayApp(router, logger.child({ component: "gateway" })),
    runtime: createRuntimeApp({
      verifier: new TokenVerifier(verifierOptions),
      reasoner: options.reasoner ?? new IntentReasoner(),
      gateway: new GatewayClient(urls.gateway, fetchFn),
      logger: logger.child({ component: "runtime" }),
      maxIterations: config.runtime.maxIterations,
    }),
  };
  for (const name of SERVICE_NAMES) {
    routes.set(new URL(urls[name]).origin, apps[name]);
  }

  return {
    config,
    logger,
    registry,
    identityProvider,
    router,
    apps,
    urls,
    fetchFn,
    close: () => engine.close(),
  };
}

export interface ChatSessionTarget {
  readonly config: AnalyticsConfig;
  readonly logger: Logger;
  readonly fetchFn?: FetchFn;
}

/** A user-side session talking to the identity server and runtime at their configured URLs. */
export function createChatSession({ config, logger, fetchFn = fetch }: ChatSessionTarget): ChatSession {
  const provider = new HttpIdentityProvider(serviceUrl(config.identity), fetchFn);
  const agent = new AgentInvocationClient(serviceUrl(config.runtime), logger.child({ component: "agent-client" }), {
    invokeTimeoutMs: config.runtime.invokeTimeoutMs,
    fetchFn,
  });
  return new ChatSession(provider, agent, logger.child({ component: "ui" }), tokenManagerOptions(config.session));
}
