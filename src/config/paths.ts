import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["TIDEBOT_STATE_DIR"] ?? join(homedir(), ".tidebot");
}

export function getConfigPath(): string {
  return process.env["TIDEBOT_CONFIG_PATH"] ?? "tidebot.config.json";
}

/** Plugin settings written at runtime are kept apart from the hand-edited config file. */
export function getPluginOverlayPath(stateDir: string): string {
  return join(stateDir, "plugins.json");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
