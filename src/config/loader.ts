import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import type { PluginSettings, TidebotConfig } from "./types.js";
import { getConfigPath, getPluginOverlayPath } from "./paths.js";
import { parseConfig, pluginSettingsSchema } from "./schema.js";
import { isRecord } from "../utils/json.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

const overlaySchema = z.record(z.string(), pluginSettingsSchema);

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function readOptionalFile(path: string): string | undefined {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

export function readPluginOverlay(path: string): Record<string, PluginSettings> {
  const content = readOptionalFile(path);
  if (content === undefined) return {};
  const parsed = overlaySchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`Invalid plugin settings in ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Runtime plugin settings win over the config file, key by key. */
export function mergePluginOverlay(
  raw: unknown,
  overlay: Record<string, PluginSettings>,
): unknown {
  if (!isRecord(raw) || Object.keys(overlay).length === 0) return raw;
  const base = isRecord(raw["plugins"]) ? raw["plugins"] : {};
  const plugins: Record<string, unknown> = { ...base };
  for (const [name, settings] of Object.entries(overlay)) {
    const existing = base[name];
    plugins[name] = isRecord(existing) ? { ...existing, ...settings } : settings;
  }
  return { ...raw, plugins };
}

export function loadConfig(path?: string, stateDir?: string): TidebotConfig {
  const configPath = resolve(path ?? getConfigPath());
  const content = readOptionalFile(configPath);
  const raw = content === undefined ? {} : (JSON.parse(substituteEnv(content)) as unknown);
  const overlay = stateDir ? readPluginOverlay(getPluginOverlayPath(stateDir)) : {};
  return parseConfig(mergePluginOverlay(raw, overlay));
}
