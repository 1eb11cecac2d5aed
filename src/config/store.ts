import { writeFile } from "node:fs/promises";
import type { Logger } from "../logging/logger.js";
import { withFileLock } from "../utils/file-lock.js";
import { ensureDir, getPluginOverlayPath } from "./paths.js";
import type { PluginSettings, TidebotConfig } from "./types.js";

export type ConfigMutator = (current: TidebotConfig) => TidebotConfig;

/**
 * Holds the live configuration as an immutable snapshot.
 *
 * Readers call {@link ConfigStore.snapshot} and keep the object they got for as
 * long as they need a consistent view. Writers swap in a new snapshot
 * synchronously, then the plugin settings are written to the overlay file
 * under a per-file lock; the snapshot written is re-read inside the lock, so
 * the last writer's state is what lands on disk.
 */
export class ConfigStore {
  private current: TidebotConfig;
  private readonly overlayPath: string | null;

  constructor(
    initial: TidebotConfig,
    private readonly logger: Logger,
    stateDir?: string,
  ) {
    this.current = initial;
    this.overlayPath = stateDir ? getPluginOverlayPath(ensureDir(stateDir)) : null;
  }

  snapshot(): TidebotConfig {
    return this.current;
  }

  pluginSettings(name: string): PluginSettings | undefined {
    return this.current.plugins[name];
  }

  isPluginEnabled(name: string): boolean {
    return this.current.plugins[name]?.enabled === true;
  }

  /** Fills in settings for plugins the config does not mention. Not persisted. */
  applyPluginDefaults(defaults: Record<string, PluginSettings>): void {
    const plugins = { ...this.current.plugins };
    let changed = false;
    for (const [name, settings] of Object.entries(defaults)) {
      if (plugins[name] === undefined) {
        plugins[name] = settings;
        changed = true;
      }
    }
    if (changed) this.current = { ...this.current, plugins };
  }

  /** Returns false when the new state could not be written; the in-memory swap stands either way. */
  async update(mutator: ConfigMutator): Promise<boolean> {
    this.current = mutator(this.current);
    return this.persist();
  }

  async setPluginEnabled(name: string, enabled: boolean): Promise<boolean> {
    return this.updatePluginConfig(name, (settings) => ({ ...settings, enabled }));
  }

  async updatePluginConfig(
    name: string,
    fn: (settings: PluginSettings) => PluginSettings,
  ): Promise<boolean> {
    return this.update((config) => {
      const existing = config.plugins[name] ?? { enabled: false };
      return { ...config, plugins: { ...config.plugins, [name]: fn(existing) } };
    });
  }

  private async persist(): Promise<boolean> {
    const path = this.overlayPath;
    if (!path) return true;
    try {
      await withFileLock(path, async () => {
        const latest = this.current.plugins;
        await writeFile(path, JSON.stringify(latest, null, 2));
      });
      return true;
    } catch (err) {
      this.logger.error({ err, path }, "Failed to persist plugin settings");
      return false;
    }
  }
}
