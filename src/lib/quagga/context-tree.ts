/**
 * Configuration model: a flat, marker-annotated list of lines (the output of
 * `vtysh -m`) folded into an ordered collection of contexts keyed by path.
 *
 * The first line of a block becomes its key, so "router bgp 10" keys the
 * non-address-family part of bgp while
 * ["router bgp 10", "address-family ipv6 unicast"] keys the subcontext.
 */

export type ContextPath = readonly string[];

/** Closes a top-level context in marked output */
export const END_MARKER = "end";

/** Pop from an address-family subcontext back to its parent */
export const EXIT_MARKERS: readonly string[] = ["exit-address-family", "exit"];

export const ADDRESS_FAMILY_MARKER = "address-family ";

/** vtysh folds this family into its parent, so it never opens a subcontext */
export const DEFAULT_ADDRESS_FAMILY = "address-family ipv4 unicast";

/**
 * Keywords of top-level statements that never open a multi-line context.
 * "bgp " here is multi-instance enablement, not the router bgp block.
 */
export const SINGLE_LINE_KEYWORDS: readonly string[] = [
  "ip ",
  "ipv6 ",
  "log ",
  "hostname ",
  "zebra ",
  "ptm-enable",
  "debug ",
  "service ",
  "enable ",
  "password ",
  "access-list ",
  "bgp ",
];

export function isSingleLineStatement(line: string): boolean {
  return SINGLE_LINE_KEYWORDS.some((keyword) => line.startsWith(keyword));
}

export function isCommentLine(line: string): boolean {
  return line.startsWith("!") || line.startsWith("#");
}

function canonicalAddressFamily(line: string): string {
  return line === "address-family ipv6" ? "address-family ipv6 unicast" : line;
}

export function pathKey(path: ContextPath): string {
  return JSON.stringify(path);
}

export interface Context {
  readonly path: ContextPath;
  readonly lines: readonly string[];
  /** Set when the context was opened by a single-line statement */
  readonly singleLine: boolean;
  has(line: string): boolean;
}

class MutableContext implements Context {
  readonly lines: string[] = [];
  private readonly lineSet = new Set<string>();

  constructor(
    readonly path: ContextPath,
    readonly singleLine: boolean
  ) {}

  has(line: string): boolean {
    return this.lineSet.has(line);
  }

  append(lines: readonly string[]): void {
    for (const line of lines) {
      this.lines.push(line);
      this.lineSet.add(line);
    }
  }
}

/**
 * Ordered mapping from context path to context. Order is first appearance.
 */
export class ConfigTree {
  private readonly contexts = new Map<string, MutableContext>();

  get size(): number {
    return this.contexts.size;
  }

  get(path: ContextPath): Context | undefined {
    return this.contexts.get(pathKey(path));
  }

  has(path: ContextPath): boolean {
    return this.contexts.has(pathKey(path));
  }

  paths(): ContextPath[] {
    return [...this.contexts.values()].map((ctx) => ctx.path);
  }

  *[Symbol.iterator](): Generator<Context> {
    yield* this.contexts.values();
  }

  /**
   * Register `path` (if new) and append `lines` to it. Re-encountering a path
   * merges into the existing context.
   */
  save(path: ContextPath, lines: readonly string[], singleLine = false): void {
    // The global context only exists once it holds statements
    if (path.length === 0 && lines.length === 0) return;

    const key = pathKey(path);
    let ctx = this.contexts.get(key);
    if (!ctx) {
      ctx = new MutableContext([...path], singleLine);
      this.contexts.set(key, ctx);
    }
    ctx.append(lines);
  }

  /**
   * Render every context, sorted by key, for the debug log.
   */
  describe(): string {
    return [...this.contexts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, ctx]) => [ctx.path.join(" / "), ...ctx.lines.map((l) => `  ${l}`)].join("\n"))
      .join("\n\n");
  }
}

// ============================================================================
// Parser
// ============================================================================

export interface ParserState {
  /** Path of the context lines are currently collected into */
  readonly active: ContextPath;
  /** Parent to return to when an address-family subcontext is popped */
  readonly pendingParent: ContextPath;
  readonly atBoundary: boolean;
  readonly lines: readonly string[];
}

export type ParserEvent =
  | "single-line"
  | "end"
  | "pop-subcontext"
  | "enter-context"
  | "enter-subcontext"
  | "default-address-family"
  | "append";

export type ParserTrace = (line: string, event: ParserEvent, path: ContextPath) => void;

export const initialParserState: ParserState = {
  active: [],
  pendingParent: [],
  atBoundary: true,
  lines: [],
};

function flush(tree: ConfigTree, state: ParserState): void {
  tree.save(state.active, state.lines);
}

/**
 * Apply one line to the parser state, saving finished contexts into `tree`.
 */
export function parseLine(
  tree: ConfigTree,
  state: ParserState,
  line: string,
  trace?: ParserTrace
): ParserState {
  if (!line || isCommentLine(line)) {
    return state;
  }

  if (state.atBoundary && isSingleLineStatement(line)) {
    flush(tree, state);
    const active = [line];
    tree.save(active, [], true);
    trace?.(line, "single-line", active);
    return { active, pendingParent: [], atBoundary: true, lines: [] };
  }

  if (line === END_MARKER) {
    flush(tree, state);
    trace?.(line, "end", state.active);
    return initialParserState;
  }

  if (EXIT_MARKERS.includes(line)) {
    // An exit after address-family ipv4 unicast has nothing to pop
    if (state.pendingParent.length === 0) {
      return state;
    }
    flush(tree, state);
    trace?.(line, "pop-subcontext", state.pendingParent);
    return { ...state, active: state.pendingParent, pendingParent: [], lines: [] };
  }

  if (state.atBoundary) {
    const active = state.pendingParent.length === 0 ? [line] : state.pendingParent;
    trace?.(line, "enter-context", active);
    return { active, pendingParent: [], atBoundary: false, lines: [] };
  }

  if (line.includes(ADDRESS_FAMILY_MARKER)) {
    if (line === DEFAULT_ADDRESS_FAMILY) {
      trace?.(line, "default-address-family", state.active);
      return { ...state, pendingParent: [] };
    }
    flush(tree, state);
    const active = [...state.active, canonicalAddressFamily(line)];
    trace?.(line, "enter-subcontext", active);
    return { active, pendingParent: state.active, atBoundary: false, lines: [] };
  }

  trace?.(line, "append", state.active);
  return { ...state, lines: [...state.lines, line] };
}

/**
 * Build a ConfigTree from marked configuration lines.
 */
export function buildConfigTree(lines: readonly string[], trace?: ParserTrace): ConfigTree {
  const tree = new ConfigTree();
  let state = initialParserState;

  for (const line of lines) {
    state = parseLine(tree, state, line, trace);
  }
  flush(tree, state);

  return tree;
}
