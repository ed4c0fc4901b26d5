/**
 * @fileoverview Command Dispatcher
 *
 * Owns the root of a command tree and exposes registration, parsing,
 * execution, completion and usage over it. Callers supply the source (the
 * identity a command runs for) per call; the dispatcher keeps no
 * per-invocation state.
 */

import type { LiteralArgumentBuilder } from '../builder/literal-builder.js';
import { CommandContextBuilder } from '../context/command-context-builder.js';
import { TrellisLogger, createLogger } from '../logging/logger.js';
import { StringReader } from '../reader/string-reader.js';
import { DEFAULT_SETTINGS } from '../settings/defaults.js';
import type { TrellisSettings } from '../settings/types.js';
import type { Suggestions } from '../suggestion/suggestions.js';
import { findAmbiguities } from '../tree/ambiguity.js';
import type { CommandNode } from '../tree/command-node.js';
import type { LiteralCommandNode } from '../tree/literal-node.js';
import { RootCommandNode } from '../tree/root-node.js';
import type { AmbiguityConsumer, ResultConsumer } from '../tree/types.js';
import { getCompletionSuggestions, type CompletionOptions } from './completion.js';
import { executeParsed, type ExecutionReport } from './executor.js';
import type { ParseResults } from './parse-results.js';
import { parseNodes } from './parser.js';
import { UsageFormatter } from './usage.js';

// =============================================================================
// Types
// =============================================================================

export interface CommandDispatcherOptions<S> {
  /** Existing tree to dispatch over; a fresh root by default */
  root?: RootCommandNode<S>;
  /** Usage tokens, completion timeout and, when no logger is given, log output */
  settings?: TrellisSettings;
  logger?: TrellisLogger;
}

/** Raw input with the source to run it for, or an earlier parse */
export type ExecuteArguments<S> = [input: string | StringReader, source: S] | [parse: ParseResults<S>];

// =============================================================================
// Dispatcher
// =============================================================================

export class CommandDispatcher<S> {
  private readonly root: RootCommandNode<S>;
  private readonly settings: TrellisSettings;
  private readonly logger: TrellisLogger;
  private readonly usage: UsageFormatter<S>;
  private consumer: ResultConsumer<S> = () => {};

  constructor(options: CommandDispatcherOptions<S> = {}) {
    this.root = options.root ?? new RootCommandNode<S>();
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.logger = options.logger ?? dispatcherLogger(options.settings);
    this.usage = new UsageFormatter(this.root, this.settings.usage);
  }

  getRoot(): RootCommandNode<S> {
    return this.root;
  }

  getLogger(): TrellisLogger {
    return this.logger;
  }

  /**
   * Add a top-level command. A command of the same name is merged with
   * the existing one.
   */
  register(command: LiteralArgumentBuilder<S>): LiteralCommandNode<S> {
    const node = command.build();
    this.root.addChild(node);
    this.logger.debug('Registered command', { command: node.getName() });
    return node;
  }

  /**
   * Observe every command completion, successful or not
   */
  setConsumer(consumer: ResultConsumer<S>): void {
    this.consumer = consumer;
  }

  // ---------------------------------------------------------------------------
  // Parsing
  // ---------------------------------------------------------------------------

  parse(command: string | StringReader, source: S): ParseResults<S> {
    const reader = typeof command === 'string' ? new StringReader(command) : command;
    const context = new CommandContextBuilder(source, this.root, reader.getCursor());
    return parseNodes(this.root, reader, context);
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  /**
   * Parse and run a command line. Throws CommandSyntaxError when the input
   * does not form a command, or whatever a non-forked command throws.
   *
   * @returns The summed command results, or the number of successful
   * branches once a fork was crossed
   */
  execute(...args: ExecuteArguments<S>): number {
    return this.runReport(this.toParse(args)).result;
  }

  /**
   * Like execute(), but also returns the branches that failed after a fork
   */
  executeWithReport(...args: ExecuteArguments<S>): ExecutionReport<S> {
    return this.runReport(this.toParse(args));
  }

  private toParse(args: ExecuteArguments<S>): ParseResults<S> {
    if (args.length === 1) {
      return args[0];
    }
    return this.parse(args[0], args[1]);
  }

  private runReport(parse: ParseResults<S>): ExecutionReport<S> {
    const report = executeParsed(parse, this.consumer, this.logger);
    this.logger.debug('Executed command', {
      input: parse.reader.getString(),
      result: report.result,
      successes: report.successes,
      forked: report.forked,
      failures: report.failures.length,
    });
    return report;
  }

  // ---------------------------------------------------------------------------
  // Completion
  // ---------------------------------------------------------------------------

  /**
   * Suggestions for the token at the cursor (end of input by default)
   */
  getCompletionSuggestions(parse: ParseResults<S>, options: CompletionOptions = {}): Promise<Suggestions> {
    const cursor = options.cursor ?? parse.reader.getTotalLength();
    const timeoutMs = this.settings.suggestions.timeoutMs;
    const signal = options.signal ?? (timeoutMs === null ? undefined : AbortSignal.timeout(timeoutMs));
    return getCompletionSuggestions(parse, cursor, this.logger, signal);
  }

  // ---------------------------------------------------------------------------
  // Usage
  // ---------------------------------------------------------------------------

  getAllUsage(node: CommandNode<S>, source: S, restricted: boolean): string[] {
    return this.usage.getAllUsage(node, source, restricted);
  }

  getSmartUsage(node: CommandNode<S>, source: S): Map<CommandNode<S>, string> {
    return this.usage.getSmartUsage(node, source);
  }

  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------

  /**
   * Names from the root down to `target`, or an empty list when it is not
   * in this tree
   */
  getPath(target: CommandNode<S>): string[] {
    const path = this.findPath(this.root, target, []);
    return path ?? [];
  }

  private findPath(node: CommandNode<S>, target: CommandNode<S>, parents: string[]): string[] | null {
    if (node === target) {
      return parents;
    }
    for (const child of node.getChildren()) {
      const found = this.findPath(child, target, [...parents, child.getName()]);
      if (found !== null) {
        return found;
      }
    }
    return null;
  }

  /**
   * Walk child names from the root; null when any step is missing
   */
  findNode(path: readonly string[]): CommandNode<S> | null {
    let node: CommandNode<S> = this.root;
    for (const name of path) {
      const child = node.getChild(name);
      if (child === undefined) {
        return null;
      }
      node = child;
    }
    return node;
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  /**
   * Report siblings that accept each other's examples. Without a consumer
   * each finding is logged at warn level.
   */
  findAmbiguities(consumer?: AmbiguityConsumer<S>): void {
    findAmbiguities(
      this.root,
      consumer ??
        ((parent, child, sibling, inputs) => {
          this.logger.warn('Ambiguous command nodes', {
            parent: parent.getUsageText(),
            child: child.getUsageText(),
            sibling: sibling.getUsageText(),
            inputs: [...inputs],
          });
        })
    );
  }
}

/**
 * Logger configured from explicit settings, else the shared default logger
 */
function dispatcherLogger(settings: TrellisSettings | undefined): TrellisLogger {
  if (settings === undefined) {
    return createLogger('dispatcher');
  }
  return new TrellisLogger(settings.logging).child({ component: 'dispatcher' });
}
