/**
 * @fileoverview Parser
 *
 * Depth-first walk of the tree against a command line. Candidates are tried
 * in relevance order, each on its own copy of the reader and context. The
 * first one that parses is committed and only its subtree is walked; an
 * exact literal comes first, so it shadows any argument sibling.
 */

import { CommandContextBuilder } from '../context/command-context-builder.js';
import { BuiltInErrors } from '../errors/built-in.js';
import { CommandSyntaxError, isCommandSyntaxError } from '../errors/syntax-error.js';
import { StringReader } from '../reader/string-reader.js';
import { ARGUMENT_SEPARATOR, type CommandNode } from '../tree/command-node.js';
import { ParseResults } from './parse-results.js';

export function parseNodes<S>(
  node: CommandNode<S>,
  originalReader: StringReader,
  contextSoFar: CommandContextBuilder<S>
): ParseResults<S> {
  const source = contextSoFar.getSource();
  const errors = new Map<CommandNode<S>, CommandSyntaxError>();
  const cursor = originalReader.getCursor();

  for (const child of node.getRelevantNodes(originalReader)) {
    if (!child.canUse(source)) {
      continue;
    }
    const context = contextSoFar.copy();
    const reader = new StringReader(originalReader);
    if (!child.canUseInContext(context, reader)) {
      continue;
    }

    try {
      parseChild(child, reader, context);
      if (reader.canRead() && reader.peek() !== ARGUMENT_SEPARATOR) {
        throw BuiltInErrors.dispatcherExpectedArgumentSeparator.createWithContext(reader);
      }
    } catch (error) {
      if (!isCommandSyntaxError(error)) {
        throw error;
      }
      errors.set(child, error);
      reader.setCursor(cursor);
      continue;
    }

    context.withCommand(child.getCommand());
    const redirect = child.getRedirect();
    if (!reader.canRead(redirect === null ? 2 : 1)) {
      return new ParseResults(context, reader);
    }
    reader.skip();
    if (redirect !== null) {
      const childContext = new CommandContextBuilder(source, redirect, reader.getCursor());
      const parse = parseNodes(redirect, reader, childContext);
      context.withChild(parse.context);
      return new ParseResults(context, parse.reader, parse.exceptions);
    }
    return parseNodes(child, reader, context);
  }

  return new ParseResults(contextSoFar, originalReader, errors);
}

/**
 * Run a node's own parser. Anything other than a syntax error escaping an
 * argument type is reported as a parse failure at the reader's position.
 */
function parseChild<S>(child: CommandNode<S>, reader: StringReader, context: CommandContextBuilder<S>): void {
  try {
    child.parse(reader, context);
  } catch (error) {
    if (error instanceof CommandSyntaxError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw BuiltInErrors.dispatcherParseException.createWithContext(reader, message);
  }
}
