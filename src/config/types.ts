export type BotProtocol = "onebot" | "console";

export interface TidebotConfig {
  readonly commandPrefixes: string[];
  readonly bots: BotConnectionConfig[];
  readonly groupFilter: GroupFilterConfig;
  readonly plugins: Record<string, PluginSettings>;
  readonly logging: LoggingConfig;
  readonly database: DatabaseConfig;
  readonly health: HealthConfig;
  readonly remote: RemoteConfig;
}

export interface BotConnectionConfig {
  readonly protocol: BotProtocol;
  readonly url?: string;
  readonly accessToken?: string;
  /** Flat delay between reconnect attempts. */
  readonly reconnectDelayMs: number;
  readonly apiTimeoutMs: number;
}

export interface GroupFilterConfig {
  /** When non-empty, only these groups are served. Takes precedence over the blocklist. */
  readonly allowlist: number[];
  readonly blocklist: number[];
}

/**
 * Per-plugin settings. `enabled` is read on every pipeline run; anything else
 * is plugin-specific and validated by the plugin itself.
 */
export interface PluginSettings {
  readonly enabled: boolean;
  readonly [key: string]: unknown;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface DatabaseConfig {
  readonly path?: string;
}

export interface HealthConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}

export interface RemoteConfig {
  readonly requestTimeoutMs: number;
}
