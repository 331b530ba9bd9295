import { ConfigLoadError, LogFileError, SettingsError } from "./errors.js";
import type { Output } from "./output.js";
import { isEmptyDiff } from "./quagga/differ.js";
import { Vtysh, type ConfigCli } from "./quagga/vtysh.js";
import { ReloadEngine, type PreviewResult, type RunMode } from "./reload-engine.js";
import { ConsoleLog, FileLog, type ReloadLog } from "./reload-log.js";
import { loadSettings, type Settings } from "./settings.js";

export interface ReloadOptions {
  mode: RunMode;
  filename: string;
  input?: string;
  debug: boolean;
  /** Settings file; the default location is tried when absent */
  config?: string;
  logFile?: string;
}

export interface ReloadDeps {
  createCli?: (settings: Settings) => ConfigCli;
}

function defaultCli(settings: Settings): ConfigCli {
  return new Vtysh({ command: settings.vtysh, bannerLines: settings.bannerLines });
}

/**
 * Run one reload or preview and return the process exit code.
 *
 * Settings, log and configuration load failures give 1. Commands the device
 * refuses are reported but still give 0.
 */
export async function runReload(options: ReloadOptions, out: Output, deps: ReloadDeps = {}): Promise<number> {
  let settings: Settings;
  try {
    settings = await loadSettings(options.config);
  } catch (err) {
    if (err instanceof SettingsError) {
      out.error(err.message);
      return 1;
    }
    throw err;
  }

  const logFile = options.logFile ?? settings.logFile;
  const log: ReloadLog =
    options.mode === "reload" ? new FileLog(logFile, options.debug) : new ConsoleLog(options.debug);

  // Nothing is sent to the device unless the log can be written
  try {
    await log.open();
  } catch (err) {
    if (err instanceof LogFileError) {
      out.error(err.message);
      return 1;
    }
    throw err;
  }
  if (options.mode === "reload") {
    out.info(`Logging to ${logFile}`);
  }

  const engine = new ReloadEngine({
    mode: options.mode,
    debug: options.debug,
    log,
    cli: (deps.createCli ?? defaultCli)(settings),
  });

  log.debug(`Called via ${JSON.stringify(options)}`);

  try {
    const result = await engine.run(options.filename, options.input);

    if (result.mode === "test") {
      displayPreview(result.preview, out);
    } else {
      for (const summary of result.passes) {
        out.passSummary(summary);
      }
      const last = result.passes[result.passes.length - 1];
      if (last && (last.deletionsUnrecoverable > 0 || last.additionsFailed > 0)) {
        out.warn(`Some commands could not be applied, see ${logFile}`);
      }
      out.done();
    }
  } catch (err) {
    if (err instanceof ConfigLoadError) {
      log.error(err.message);
      await log.flush();
      out.error(err.message);
      if (err.stderr?.trim()) {
        console.log(err.stderr.trim());
      }
      return 1;
    }
    throw err;
  }

  await log.flush();
  return 0;
}

export function displayPreview(preview: PreviewResult, out: Output): void {
  if (preview.deletions.length > 0) {
    out.header("Lines To Delete");
    for (const command of preview.deletions) {
      out.command(command);
    }
  }

  if (preview.additions.length > 0) {
    out.header("Lines To Add");
    for (const command of preview.additions) {
      out.command(command);
    }
  }

  console.log();
  if (isEmptyDiff(preview.diff)) {
    out.success("Running configuration already matches");
  }
}
