import type { Writer } from "../connection/writer.js";
import type { PluginSettings, TidebotConfig } from "../config/types.js";
import { encodePacket } from "../protocol/packet.js";
import { PluginError } from "../utils/errors.js";
import type { Context, ContextSource } from "./context.js";
import type { PluginDefinition } from "./types.js";

function enabledByConfig(plugin: PluginDefinition, config: TidebotConfig): boolean {
  if (plugin.isEnabled) return plugin.isEnabled(config);
  return config.plugins[plugin.name]?.enabled === true;
}

export class PipelineBuilder {
  private readonly plugins: PluginDefinition[] = [];

  add(plugin: PluginDefinition): this {
    if (this.plugins.some((p) => p.name === plugin.name)) {
      throw new Error(`Plugin "${plugin.name}" is already registered`);
    }
    this.plugins.push(plugin);
    return this;
  }

  addAll(plugins: Iterable<PluginDefinition>): this {
    for (const plugin of plugins) this.add(plugin);
    return this;
  }

  build(): Pipeline {
    return new Pipeline([...this.plugins]);
  }
}

/**
 * Ordered plugin chain. The order is fixed when the pipeline is built;
 * which plugins take part is decided from the config snapshot on every run.
 */
export class Pipeline {
  constructor(private readonly plugins: readonly PluginDefinition[]) {}

  get names(): string[] {
    return this.plugins.map((p) => p.name);
  }

  defaultConfigs(): Record<string, PluginSettings> {
    const defaults: Record<string, PluginSettings> = {};
    for (const plugin of this.plugins) {
      if (plugin.defaultConfig) defaults[plugin.name] = plugin.defaultConfig;
    }
    return defaults;
  }

  enabledPlugins(config: TidebotConfig): PluginDefinition[] {
    return this.plugins.filter((plugin) => enabledByConfig(plugin, config));
  }

  /**
   * Runs the enabled plugins in order until one stops the chain. A context
   * that is still an outbound packet at the end is written to the socket.
   */
  async run(ctx: Context, writer: Writer): Promise<void> {
    let current = ctx;
    for (const plugin of this.enabledPlugins(ctx.config.snapshot())) {
      let next: Context | null;
      try {
        next = await plugin.handle(current, writer);
      } catch (err) {
        throw new PluginError(plugin.name, err);
      }
      if (next === null) return;
      current = next;
    }

    if (current.event.kind === "outbound") {
      await writer.send(encodePacket(current.event.packet));
    }
  }

  async init(ctx: Context): Promise<void> {
    const enabled = this.enabledPlugins(ctx.config.snapshot());
    let failed = 0;
    for (const plugin of enabled) {
      if (!plugin.init) continue;
      try {
        await plugin.init(ctx);
        ctx.logger.debug({ plugin: plugin.name }, "Plugin initialized");
      } catch (err) {
        failed++;
        ctx.logger.error({ err, plugin: plugin.name }, "Plugin init failed");
      }
    }
    ctx.logger.info(
      { enabled: enabled.length, registered: this.plugins.length, failed },
      "Plugins initialized",
    );
  }

  async connected(ctx: Context, writer: Writer, source: ContextSource): Promise<void> {
    for (const plugin of this.enabledPlugins(ctx.config.snapshot())) {
      if (!plugin.onConnected) continue;
      try {
        await plugin.onConnected(ctx, writer, source);
      } catch (err) {
        ctx.logger.error({ err, plugin: plugin.name }, "Plugin connect hook failed");
      }
    }
  }
}
