/**
 * Optional YAML settings for quagga-reload.
 *
 * ```yaml
 * vtysh: /usr/bin/vtysh
 * logFile: /var/log/quagga/quagga-reload.log
 * bannerLines: 3
 * ```
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { SettingsError } from "./errors.js";
import { DEFAULT_LOG_FILE } from "./reload-log.js";
import { DEFAULT_BANNER_LINES, DEFAULT_VTYSH } from "./quagga/vtysh.js";

export const DEFAULT_SETTINGS_PATH = "/etc/quagga/reload.yaml";

export interface Settings {
  vtysh: string;
  logFile: string;
  bannerLines: number;
}

export const DEFAULT_SETTINGS: Settings = {
  vtysh: DEFAULT_VTYSH,
  logFile: DEFAULT_LOG_FILE,
  bannerLines: DEFAULT_BANNER_LINES,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Validate a parsed YAML document and merge it over the defaults.
 */
export function parseSettings(content: string, path: string): Settings {
  let doc: unknown;
  try {
    doc = parse(content);
  } catch (err) {
    throw new SettingsError(`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`, path);
  }

  // An empty file parses to null
  if (doc === null || doc === undefined) {
    return { ...DEFAULT_SETTINGS };
  }
  if (!isRecord(doc)) {
    throw new SettingsError(`${path} must contain a mapping`, path);
  }

  const settings = { ...DEFAULT_SETTINGS };

  for (const [key, value] of Object.entries(doc)) {
    switch (key) {
      case "vtysh":
      case "logFile":
        if (typeof value !== "string" || !value.trim()) {
          throw new SettingsError(`${key} in ${path} must be a non-empty string`, path);
        }
        settings[key] = value;
        break;
      case "bannerLines":
        if (!isNonNegativeInteger(value)) {
          throw new SettingsError(`bannerLines in ${path} must be a non-negative integer`, path);
        }
        settings.bannerLines = value;
        break;
      default:
        throw new SettingsError(`Unknown setting "${key}" in ${path}`, path);
    }
  }

  return settings;
}

/**
 * Load settings from `path`. Without an explicit path a missing default file
 * means defaults; an explicit path must exist.
 */
export async function loadSettings(path?: string): Promise<Settings> {
  const target = path ?? DEFAULT_SETTINGS_PATH;

  let content: string;
  try {
    content = await readFile(target, "utf-8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT" && path === undefined) {
      return { ...DEFAULT_SETTINGS };
    }
    throw new SettingsError(`Cannot read settings file ${target}: ${code ?? String(err)}`, target);
  }

  return parseSettings(content, target);
}
