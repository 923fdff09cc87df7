import type { Role } from "../utils/types.js";

export interface AnalyticsConfig {
  readonly identity: IdentityConfig;
  readonly session: SessionConfig;
  readonly runtime: RuntimeConfig;
  readonly gateway: GatewayConfig;
  readonly executor: ExecutorConfig;
  readonly registry: RegistryConfig;
  readonly logging: LoggingConfig;
}

export interface ServiceEndpointConfig {
  readonly port: number;
  readonly hostname: string;
  /** Base URL of a remote instance. When set, this process acts as a client only. */
  readonly url?: string;
}

export interface DirectoryUserConfig {
  readonly username: string;
  readonly password: string;
  readonly name: string;
  readonly email: string;
  readonly role: Role;
}

export interface IdentityConfig extends ServiceEndpointConfig {
  readonly issuer: string;
  readonly signingSecret: string;
  readonly accessTokenTtlSec: number;
  readonly refreshTokenTtlSec: number;
  readonly users: DirectoryUserConfig[];
}

export interface SessionConfig {
  readonly renewalMarginSec: number;
  readonly refreshMaxAttempts: number;
  readonly refreshBaseDelayMs: number;
  readonly loginTimeoutMs: number;
  readonly refreshTimeoutMs: number;
}

export interface RuntimeConfig extends ServiceEndpointConfig {
  readonly invokeTimeoutMs: number;
  readonly maxIterations: number;
}

export interface GatewayConfig extends ServiceEndpointConfig {
  readonly verificationCacheTtlMs: number;
  readonly toolTimeoutMs: number;
}

export interface ExecutorConfig extends ServiceEndpointConfig {
  readonly internalKey: string;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly databasePath: string;
  readonly seedPath?: string;
}

export interface RegistryConfig {
  readonly path?: string;
}

export interface LoggingConfig {
  readonly level?: "debug" | "info" | "warn" | "error" | "silent";
  readonly file?: string;
  readonly json?: boolean;
}
