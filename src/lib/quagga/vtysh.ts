/**
 * vtysh Wrapper
 *
 * Provides a TypeScript interface to the vtysh shell of the routing daemon.
 * Every call is one vtysh process; the session does not survive between calls.
 */

import { spawn } from "node:child_process";
import { ConfigLoadError } from "../errors.js";
import { toVtyshArgs } from "./commands.js";

export const DEFAULT_VTYSH = "vtysh";

/** "show running-config" prints this many lines before the configuration */
export const DEFAULT_BANNER_LINES = 3;

export interface CommandResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * The external configuration CLI, as the reload engine sees it.
 */
export interface ConfigCli {
  /** Program name shown in rendered commands */
  readonly program: string;
  /** Marked text of a configuration file */
  markFile(path: string): Promise<string>;
  /** Marked text of the live running configuration, banner removed */
  showRunning(): Promise<string>;
  /** Submit one directive sequence */
  execute(directives: readonly string[]): Promise<CommandResult>;
}

export interface VtyshOptions {
  command?: string;
  bannerLines?: number;
}

/**
 * Run vtysh with `args`, feeding `input` on stdin when given.
 */
export async function runVtysh(
  command: string,
  args: string[],
  input?: string
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args);

    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data) => {
      stdout += data;
    });
    proc.stderr.on("data", (data) => {
      stderr += data;
    });

    // vtysh may exit before reading its input; the close result reports it
    let stdinError: Error | null = null;
    proc.stdin.on("error", (err) => {
      stdinError = err;
    });

    proc.on("close", (code) => {
      if (stdinError) {
        stderr += `stdin: ${stdinError.message}\n`;
      }
      resolve({ ok: code === 0 && !stdinError, exitCode: code, stdout, stderr });
    });

    proc.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT") {
        reject(new Error(`${command} not found in PATH. Is the routing suite installed?`));
      } else {
        reject(err);
      }
    });

    if (input !== undefined) {
      proc.stdin.write(input);
    }
    proc.stdin.end();
  });
}

/**
 * Drop the first `count` lines of `text` (the equivalent of `tail -n +count+1`).
 */
export function stripBanner(text: string, count: number): string {
  return text.split("\n").slice(count).join("\n");
}

export class Vtysh implements ConfigCli {
  readonly program: string;
  private readonly bannerLines: number;

  constructor(options: VtyshOptions = {}) {
    this.program = options.command ?? DEFAULT_VTYSH;
    this.bannerLines = options.bannerLines ?? DEFAULT_BANNER_LINES;
  }

  async markFile(path: string): Promise<string> {
    const result = await runVtysh(this.program, ["-m", "-f", path]);
    if (!result.ok) {
      throw new ConfigLoadError(
        `vtysh marking of config file ${path} failed with exit code ${result.exitCode}`,
        path,
        result.exitCode,
        result.stderr
      );
    }
    return result.stdout;
  }

  async showRunning(): Promise<string> {
    const shown = await runVtysh(this.program, ["-c", "show running-config"]);
    if (!shown.ok) {
      throw new ConfigLoadError(
        `vtysh show running-config failed with exit code ${shown.exitCode}`,
        "running-config",
        shown.exitCode,
        shown.stderr
      );
    }

    const marked = await runVtysh(this.program, ["-m", "-f", "-"], stripBanner(shown.stdout, this.bannerLines));
    if (!marked.ok) {
      throw new ConfigLoadError(
        `vtysh marking of running config failed with exit code ${marked.exitCode}`,
        "running-config",
        marked.exitCode,
        marked.stderr
      );
    }
    return marked.stdout;
  }

  async execute(directives: readonly string[]): Promise<CommandResult> {
    return runVtysh(this.program, toVtyshArgs(directives));
  }
}
