import { buildConfigTree, type ConfigTree, type ParserTrace } from "./context-tree.js";
import { normalizeIpv6Line } from "./ipv6.js";
import type { ConfigCli } from "./vtysh.js";

/** Lines vtysh prints ahead of "show running-config" output */
export const RUNNING_BANNER = ["Building configuration...", "Current configuration:"];

export interface LoadedConfig {
  /** Normalized lines, in the order they were modeled */
  lines: string[];
  tree: ConfigTree;
}

export interface SplitOptions {
  /** Drop the banner vtysh prints in front of "show running-config" */
  skipBanner?: boolean;
}

/**
 * Split raw configuration text into trimmed, non-empty, normalized lines.
 */
export function splitConfigText(text: string, options?: SplitOptions): string[] {
  const lines: string[] = [];

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line) continue;
    if (options?.skipBanner && RUNNING_BANNER.includes(line)) continue;

    lines.push(line.includes(":") ? normalizeIpv6Line(line) : line);
  }

  return lines;
}

/**
 * Load a configuration file through `vtysh -m` so it carries context markers.
 */
export async function loadConfigFile(
  cli: ConfigCli,
  path: string,
  trace?: ParserTrace
): Promise<LoadedConfig> {
  const text = await cli.markFile(path);
  const lines = splitConfigText(text);
  return { lines, tree: buildConfigTree(lines, trace) };
}

/**
 * Load the live running configuration.
 */
export async function loadRunningConfig(cli: ConfigCli, trace?: ParserTrace): Promise<LoadedConfig> {
  const text = await cli.showRunning();
  const lines = splitConfigText(text, { skipBanner: true });
  return { lines, tree: buildConfigTree(lines, trace) };
}
