import type { Writer } from "../connection/writer.js";
import type { PluginSettings, TidebotConfig } from "../config/types.js";
import type { Context, ContextSource } from "./context.js";

/** Continue with the returned context, or stop the chain with null. */
export type PluginResult = Context | null;

export interface PluginDefinition {
  readonly name: string;
  /** Settings used when the config does not mention this plugin. */
  readonly defaultConfig?: PluginSettings;
  /** Defaults to `plugins[name].enabled === true`. */
  isEnabled?(config: TidebotConfig): boolean;
  handle(ctx: Context, writer: Writer): Promise<PluginResult> | PluginResult;
  /** Runs once at startup, before any connection exists. */
  init?(ctx: Context): Promise<void> | void;
  /**
   * Runs each time a connection has fetched the bot identity, so once per
   * reconnect. Work that outlives the hook takes its contexts from `source`.
   */
  onConnected?(ctx: Context, writer: Writer, source: ContextSource): Promise<void> | void;
}
