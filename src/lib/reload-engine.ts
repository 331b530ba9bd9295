/**
 * Reload engine: converges the running configuration onto a desired file.
 *
 * Preview mode diffs once and renders commands. Apply mode runs convergence
 * passes; each pass reloads the running configuration, diffs it against the
 * desired tree, applies every deletion and then every addition.
 *
 * More than one pass is needed because some negations take siblings with them.
 * Given
 *
 *   router bgp 10
 *    neighbor 1.1.1.1 remote-as 50
 *    neighbor 1.1.1.1 route-map FOO out
 *
 * and a desired "remote-as 999", "no neighbor 1.1.1.1 remote-as 50" also drops
 * the route-map line. The next pass sees it missing and adds it back.
 */

import {
  buildCommand,
  diffConfigs,
  formatCommand,
  loadConfigFile,
  loadRunningConfig,
  truncateLastDirective,
  type ConfigCli,
  type ConfigDiff,
  type ConfigTree,
  type DiffEntry,
  type LoadedConfig,
  type ParserTrace,
} from "./quagga/index.js";
import type { ReloadLog } from "./reload-log.js";

export type RunMode = "reload" | "test";

export interface RunConfig {
  mode: RunMode;
  debug: boolean;
  log: ReloadLog;
  cli: ConfigCli;
  /** Convergence passes in reload mode; the CLI always runs the default */
  passes?: number;
}

export interface PreviewResult {
  diff: ConfigDiff;
  /** Rendered commands, deletions first */
  deletions: string[];
  additions: string[];
}

export interface DeletionOutcome {
  status: "applied" | "unrecoverable";
  /** The directives of the last attempt */
  directives: string[];
  attempts: number;
}

export type RunResult =
  | { mode: "test"; preview: PreviewResult }
  | { mode: "reload"; passes: PassSummary[] };

export interface PassSummary {
  pass: number;
  deletionsApplied: number;
  deletionsUnrecoverable: number;
  additionsApplied: number;
  additionsFailed: number;
}

export const DEFAULT_PASSES = 2;

export class ReloadEngine {
  private readonly cli: ConfigCli;
  private readonly log: ReloadLog;
  private readonly passes: number;

  constructor(private readonly config: RunConfig) {
    this.cli = config.cli;
    this.log = config.log;
    this.passes = config.passes ?? DEFAULT_PASSES;
  }

  /**
   * Preview or apply, depending on the configured mode. `inputPath` replaces
   * the live query in test mode only.
   */
  async run(desiredPath: string, inputPath?: string): Promise<RunResult> {
    if (this.config.mode === "test") {
      return { mode: "test", preview: await this.preview(desiredPath, inputPath) };
    }
    return { mode: "reload", passes: await this.apply(desiredPath) };
  }

  /**
   * Diff `desiredPath` against the running configuration (or `inputPath`)
   * without executing anything.
   */
  async preview(desiredPath: string, inputPath?: string): Promise<PreviewResult> {
    const desired = await this.loadDesired(desiredPath);

    const running = inputPath
      ? await loadConfigFile(this.cli, inputPath, this.trace())
      : await loadRunningConfig(this.cli, this.trace());
    this.log.debug(`Running config contexts\n${running.tree.describe()}`);

    const diff = diffConfigs(desired, running.tree);
    const render = (entry: DiffEntry, deleting: boolean) =>
      formatCommand(this.cli.program, buildCommand(entry, deleting));

    return {
      diff,
      deletions: diff.toDelete.map((entry) => render(entry, true)),
      additions: diff.toAdd.map((entry) => render(entry, false)),
    };
  }

  /**
   * Apply the desired configuration. Returns one summary per pass.
   */
  async apply(desiredPath: string): Promise<PassSummary[]> {
    const desired = await this.loadDesired(desiredPath);
    const summaries: PassSummary[] = [];

    for (let pass = 1; pass <= this.passes; pass++) {
      const running = await loadRunningConfig(this.cli, this.trace());
      this.log.info(`Running Quagga Config (Pass #${pass})\n${running.lines.join("\n")}`);

      summaries.push(await this.applyDiff(pass, diffConfigs(desired, running.tree)));
    }

    return summaries;
  }

  /**
   * Apply all deletions, then all additions. Failures are logged per entry and
   * never stop the pass.
   */
  async applyDiff(pass: number, diff: ConfigDiff): Promise<PassSummary> {
    const summary: PassSummary = {
      pass,
      deletionsApplied: 0,
      deletionsUnrecoverable: 0,
      additionsApplied: 0,
      additionsFailed: 0,
    };

    for (const entry of diff.toDelete) {
      const outcome = await this.applyDeletion(entry);
      if (outcome.status === "applied") {
        summary.deletionsApplied++;
      } else {
        summary.deletionsUnrecoverable++;
      }
    }

    for (const entry of diff.toAdd) {
      if (await this.applyAddition(entry)) {
        summary.additionsApplied++;
      } else {
        summary.additionsFailed++;
      }
    }

    return summary;
  }

  /**
   * Some negations must name only a prefix of the statement. OSPF, for one,
   * rejects "no ip ospf authentication message-digest 1.1.1.1" and
   * "no ip ospf authentication message-digest" but takes
   * "no ip ospf authentication". On rejection the last word of the final
   * directive is dropped and the command resubmitted, until two words are left.
   */
  async applyDeletion(entry: DiffEntry): Promise<DeletionOutcome> {
    const original = buildCommand(entry, true);
    let directives = original;
    let attempts = 0;

    for (;;) {
      const shown = formatCommand(this.cli.program, directives);
      this.log.info(shown);
      attempts++;

      const result = await this.cli.execute(directives);
      if (result.ok) {
        this.log.info(`${shown} worked`);
        return { status: "applied", directives, attempts };
      }

      this.log.info(`${shown} failed`);
      const shorter = truncateLastDirective(directives);
      if (!shorter) {
        this.log.error(`Could not remove "${formatCommand(this.cli.program, original)}"`);
        return { status: "unrecoverable", directives, attempts };
      }
      directives = shorter;
    }
  }

  async applyAddition(entry: DiffEntry): Promise<boolean> {
    const directives = buildCommand(entry, false);
    const shown = formatCommand(this.cli.program, directives);
    this.log.info(shown);

    const result = await this.cli.execute(directives);
    if (!result.ok) {
      const reason = result.stderr.trim() || `exit code ${result.exitCode}`;
      this.log.error(`${shown} failed: ${reason}`);
      return false;
    }
    this.log.info(`${shown} worked`);
    return true;
  }

  private async loadDesired(path: string): Promise<ConfigTree> {
    this.log.debug(`Loading desired config from file ${path}`);
    const desired: LoadedConfig = await loadConfigFile(this.cli, path, this.trace());
    this.log.info(`New Quagga Config\n${desired.lines.join("\n")}`);
    this.log.debug(`New config contexts\n${desired.tree.describe()}`);
    return desired.tree;
  }

  private trace(): ParserTrace | undefined {
    if (!this.config.debug) return undefined;
    return (line, event, path) => {
      this.log.debug(`LINE ${line.padEnd(50)}: ${event} ${JSON.stringify(path)}`);
    };
  }
}
