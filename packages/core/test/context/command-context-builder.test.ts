/**
 * @fileoverview Command Context Builder Tests
 */
import { describe, it, expect } from 'vitest';
import { CommandContextBuilder } from '../../src/context/command-context-builder.js';
import { StringRange } from '../../src/context/string-range.js';
import { ArgumentLookupError, IllegalStateError } from '../../src/errors/command-errors.js';
import { LiteralCommandNode } from '../../src/tree/literal-node.js';
import { RootCommandNode } from '../../src/tree/root-node.js';
import { isNumber, isString, user, type TestSource } from '../fixtures/argument-types.js';

describe('CommandContextBuilder', () => {
  const root = new RootCommandNode<TestSource>();
  const foo = new LiteralCommandNode<TestSource>('foo');
  const bar = new LiteralCommandNode<TestSource>('bar');

  describe('withNode', () => {
    it('should grow the range to cover every node', () => {
      const builder = new CommandContextBuilder(user, root, 0)
        .withNode(foo, StringRange.between(0, 3))
        .withNode(bar, StringRange.between(4, 7));

      expect(builder.getRange()).toEqual(new StringRange(0, 7));
      expect(builder.getNodes().map(({ node }) => node.getName())).toEqual(['foo', 'bar']);
    });
  });

  describe('copy', () => {
    it('should not share bindings with the copy', () => {
      const builder = new CommandContextBuilder(user, root, 0);
      const copy = builder.copy().withArgument('x', { range: StringRange.between(0, 1), result: 1 });

      expect(copy.getArguments().has('x')).toBe(true);
      expect(builder.getArguments().has('x')).toBe(false);
    });
  });

  describe('findSuggestionContext', () => {
    const builder = new CommandContextBuilder(user, root, 0).withNode(foo, StringRange.between(0, 3));

    it('should complete children of the last node past the parsed range', () => {
      expect(builder.findSuggestionContext(5)).toEqual({ parent: foo, startPos: 4 });
    });

    it('should complete siblings of the node under the cursor', () => {
      expect(builder.findSuggestionContext(2)).toEqual({ parent: root, startPos: 0 });
    });

    it('should complete from the root when nothing was parsed', () => {
      const empty = new CommandContextBuilder(user, root, 0);

      expect(empty.findSuggestionContext(1)).toEqual({ parent: root, startPos: 0 });
    });

    it('should follow the redirect child', () => {
      const child = new CommandContextBuilder(user, root, 4);
      const parent = new CommandContextBuilder(user, root, 0)
        .withNode(foo, StringRange.between(0, 3))
        .withChild(child);

      expect(parent.findSuggestionContext(5)).toEqual({ parent: root, startPos: 4 });
    });

    it('should reject a cursor before the context', () => {
      const late = new CommandContextBuilder(user, root, 2);

      expect(() => late.findSuggestionContext(1)).toThrow(IllegalStateError);
    });
  });

  describe('build', () => {
    const context = new CommandContextBuilder(user, root, 0)
      .withNode(foo, StringRange.between(0, 3))
      .withArgument('count', { range: StringRange.between(4, 5), result: 5 })
      .build('foo 5');

    it('should expose bound arguments', () => {
      expect(context.getArgument('count')).toBe(5);
      expect(context.getArgumentAs('count', isNumber, 'number')).toBe(5);
      expect(context.hasArgument('count')).toBe(true);
      expect(context.input).toBe('foo 5');
    });

    it('should reject unknown names', () => {
      expect(() => context.getArgument('missing')).toThrow(
        new ArgumentLookupError("No such argument 'missing' exists on this command")
      );
    });

    it('should reject values of the wrong type', () => {
      expect(() => context.getArgumentAs('count', isString, 'string')).toThrow(
        "Argument 'count' is defined as number, not string"
      );
    });

    it('should reuse itself for the same source', () => {
      expect(context.copyFor(user)).toBe(context);
      expect(context.copyFor({ name: 'other', admin: false }).source.name).toBe('other');
    });
  });
});
