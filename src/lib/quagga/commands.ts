/**
 * Turns diff entries into the directive sequences vtysh expects.
 *
 * A vtysh session starts at the top level on every invocation, so each
 * sequence enters configuration mode and re-enters every ancestor context
 * before issuing the leaf directive.
 */

import type { DiffEntry } from "./differ.js";

export const CONFIGURE_TERMINAL = "conf t";

const NEGATION = "no ";

/**
 * Negate a directive, stripping an existing "no " rather than doubling it.
 */
export function negate(text: string): string {
  return text.startsWith(NEGATION) ? text.slice(NEGATION.length) : NEGATION + text;
}

/**
 * Directive sequence for one diff entry.
 *
 * With `line: null` the path itself is the target: only its last segment is
 * negated on delete, since the ancestors must already exist.
 */
export function buildCommand(entry: DiffEntry, deleting: boolean): string[] {
  const directives = [CONFIGURE_TERMINAL];

  if (entry.line === null) {
    entry.path.forEach((segment, i) => {
      const last = i === entry.path.length - 1;
      directives.push(deleting && last ? negate(segment) : segment);
    });
    return directives;
  }

  directives.push(...entry.path);
  const line = entry.line.trimStart();
  directives.push(deleting ? negate(line) : line);
  return directives;
}

/**
 * vtysh argument list: one "-c" per directive.
 */
export function toVtyshArgs(directives: readonly string[]): string[] {
  return directives.flatMap((directive) => ["-c", directive]);
}

function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Human-readable command line, e.g. `vtysh -c 'conf t' -c 'no router ospf'`.
 */
export function formatCommand(program: string, directives: readonly string[]): string {
  return [program, ...toVtyshArgs(directives)].map(shellQuote).join(" ");
}

/**
 * Drop the last whitespace-delimited token of the final directive. Returns null
 * once the final directive is down to two tokens or fewer ("no <word>").
 */
export function truncateLastDirective(directives: readonly string[]): string[] | null {
  const last = directives[directives.length - 1];
  if (last === undefined) return null;

  const tokens = last.split(/\s+/).filter(Boolean);
  if (tokens.length <= 2) return null;

  return [...directives.slice(0, -1), tokens.slice(0, -1).join(" ")];
}
