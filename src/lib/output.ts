import chalk from "chalk";
import type { PassSummary } from "./reload-engine.js";

export interface OutputOptions {
  verbose: boolean;
}

export class Output {
  private verbose: boolean;
  private startTime: number;

  constructor(options: OutputOptions) {
    this.verbose = options.verbose;
    this.startTime = Date.now();
  }

  // Startup messages
  info(msg: string): void {
    if (this.verbose) {
      console.log(chalk.cyan("●") + " " + chalk.cyan(msg));
    }
  }

  success(msg: string): void {
    console.log(chalk.green("✓") + " " + chalk.green(msg));
  }

  warn(msg: string): void {
    console.log(chalk.yellow("⚠") + " " + chalk.yellow(msg));
  }

  error(msg: string): void {
    console.log(chalk.red("✗") + " " + chalk.red(msg));
  }

  // Section header, underlined the way the diff sections always were
  header(title: string): void {
    console.log();
    console.log(chalk.cyan(title));
    console.log(chalk.cyan("=".repeat(title.length)));
  }

  // One rendered vtysh command
  command(text: string): void {
    console.log(text);
  }

  // Per-pass totals after a reload
  passSummary(summary: PassSummary): void {
    const parts = [
      `${summary.deletionsApplied} deleted`,
      `${summary.additionsApplied} added`,
    ];
    if (summary.deletionsUnrecoverable > 0) {
      parts.push(chalk.red(`${summary.deletionsUnrecoverable} unrecoverable`));
    }
    if (summary.additionsFailed > 0) {
      parts.push(chalk.red(`${summary.additionsFailed} failed`));
    }
    console.log(chalk.blue(`━━━ Pass ${summary.pass} ━━━`) + " " + parts.join(", "));
  }

  // Wall-clock time since construction
  done(): void {
    const seconds = ((Date.now() - this.startTime) / 1000).toFixed(1);
    this.success(`Done in ${seconds}s`);
  }
}
