/**
 * @fileoverview Dispatcher Completion Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { literal } from '../../src/builder/literal-builder.js';
import { argument } from '../../src/builder/required-argument-builder.js';
import { StringRange } from '../../src/context/string-range.js';
import { CommandDispatcher } from '../../src/dispatcher/dispatcher.js';
import { abortable } from '../../src/dispatcher/completion.js';
import { BuiltInErrors } from '../../src/errors/built-in.js';
import { SuggestionsAbortedError } from '../../src/errors/command-errors.js';
import { DEFAULT_SETTINGS } from '../../src/settings/defaults.js';
import type { Suggestions } from '../../src/suggestion/suggestions.js';
import type { SuggestionProvider } from '../../src/tree/types.js';
import { admin, intType, user, wordType, type TestSource } from '../fixtures/argument-types.js';
import { silentLogger } from '../fixtures/logger.js';

const texts = (suggestions: Suggestions): string[] => suggestions.list.map((s) => s.text);

const pending = (): Promise<Suggestions> => new Promise<Suggestions>(() => {});

describe('CommandDispatcher completion', () => {
  let dispatcher: CommandDispatcher<TestSource>;

  beforeEach(() => {
    dispatcher = new CommandDispatcher<TestSource>({ logger: silentLogger() });
    dispatcher.register(literal<TestSource>('foo'));
    dispatcher.register(literal<TestSource>('foobar'));
    dispatcher.register(literal<TestSource>('bar'));
    dispatcher.register(literal<TestSource>('baz').requires((source) => source.admin));
  });

  it('should list every usable root command for empty input', async () => {
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('', user));

    expect(texts(result)).toEqual(['bar', 'foo', 'foobar']);
    expect(result.range).toEqual(new StringRange(0, 0));
  });

  it('should include commands only the source may use', async () => {
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('', admin));

    expect(texts(result)).toEqual(['bar', 'baz', 'foo', 'foobar']);
  });

  it('should filter by the typed prefix', async () => {
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('f', user));

    expect(texts(result)).toEqual(['foo', 'foobar']);
    expect(result.range).toEqual(new StringRange(0, 1));
  });

  it('should not repeat a completely typed word', async () => {
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('foo', user));

    expect(texts(result)).toEqual(['foobar']);
  });

  describe('subcommands', () => {
    beforeEach(() => {
      dispatcher.register(
        literal<TestSource>('give')
          .then(literal<TestSource>('bread'))
          .then(literal<TestSource>('bricks'))
          .then(literal<TestSource>('apple'))
      );
    });

    it('should complete the token after a separator', async () => {
      const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('give b', user));

      expect(texts(result)).toEqual(['bread', 'bricks']);
      expect(result.range).toEqual(new StringRange(5, 6));
    });

    it('should complete children of a fully typed command', async () => {
      const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('give ', user));

      expect(texts(result)).toEqual(['apple', 'bread', 'bricks']);
      expect(result.range).toEqual(new StringRange(5, 5));
    });

    it('should complete mid-token from the token start', async () => {
      const parse = dispatcher.parse('give br', user);
      const result = await dispatcher.getCompletionSuggestions(parse, { cursor: 6 });

      expect(texts(result)).toEqual(['bread', 'bricks']);
      expect(result.range).toEqual(new StringRange(5, 6));
    });
  });

  it('should complete through a redirect', async () => {
    dispatcher.register(literal<TestSource>('run').redirect(dispatcher.getRoot()));
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('run f', user));

    expect(texts(result)).toEqual(['foo', 'foobar']);
    expect(result.range).toEqual(new StringRange(4, 5));
  });

  it('should use custom argument suggestions', async () => {
    dispatcher.register(
      literal<TestSource>('count').then(
        argument<TestSource, number>('n', intType).suggests((_context, builder) =>
          builder.suggest(10).suggest(2).buildPromise()
        )
      )
    );
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('count ', user));

    expect(texts(result)).toEqual(['2', '10']);
  });

  it('should drop a provider that rejects the input', async () => {
    dispatcher.register(
      literal<TestSource>('pick')
        .then(literal<TestSource>('one'))
        .then(
          argument<TestSource, number>('n', intType).suggests(() => {
            throw BuiltInErrors.readerExpectedInt.create();
          })
        )
    );
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('pick ', user));

    expect(texts(result)).toEqual(['one']);
  });

  it('should fail when a provider fails otherwise', async () => {
    dispatcher.register(
      literal<TestSource>('pick').then(
        argument<TestSource, number>('n', intType).suggests(() => Promise.reject(new Error('provider down')))
      )
    );

    await expect(dispatcher.getCompletionSuggestions(dispatcher.parse('pick ', user))).rejects.toThrow(
      'provider down'
    );
  });

  describe('concurrent providers', () => {
    interface Run {
      startedBeforeRelease: string[];
      finished: string[];
      texts: string[];
    }

    async function completeReleasing(order: readonly string[]): Promise<Run> {
      const started: string[] = [];
      const finished: string[] = [];
      const release = new Map<string, () => void>();
      const deferred =
        (name: string, text: string): SuggestionProvider<TestSource> =>
        (_context, builder) => {
          started.push(name);
          return new Promise<Suggestions>((resolve) => {
            release.set(name, () => {
              finished.push(name);
              resolve(builder.suggest(text).build());
            });
          });
        };

      const concurrent = new CommandDispatcher<TestSource>({ logger: silentLogger() });
      concurrent.register(
        literal<TestSource>('multi')
          .then(argument<TestSource, number>('a', intType).suggests(deferred('a', 'beta')))
          .then(argument<TestSource, string>('b', wordType).suggests(deferred('b', 'alpha')))
      );

      const pendingResult = concurrent.getCompletionSuggestions(concurrent.parse('multi ', user));
      const startedBeforeRelease = [...started];
      for (const name of order) {
        release.get(name)?.();
      }
      const result = await pendingResult;

      return { startedBeforeRelease, finished, texts: texts(result) };
    }

    it('should ask every provider before any of them answers', async () => {
      const run = await completeReleasing(['a', 'b']);

      expect(run.startedBeforeRelease).toEqual(['a', 'b']);
    });

    it('should merge in the same order whichever provider answers first', async () => {
      const inOrder = await completeReleasing(['a', 'b']);
      const reversed = await completeReleasing(['b', 'a']);

      expect(inOrder.finished).toEqual(['a', 'b']);
      expect(reversed.finished).toEqual(['b', 'a']);
      expect(inOrder.texts).toEqual(['alpha', 'beta']);
      expect(reversed.texts).toEqual(['alpha', 'beta']);
    });
  });

  describe('cancellation', () => {
    beforeEach(() => {
      dispatcher.register(literal<TestSource>('slow').then(argument<TestSource, number>('n', intType).suggests(pending)));
    });

    it('should reject when the signal aborts', async () => {
      const controller = new AbortController();
      const result = dispatcher.getCompletionSuggestions(dispatcher.parse('slow ', user), {
        signal: controller.signal,
      });
      controller.abort();

      await expect(result).rejects.toBeInstanceOf(SuggestionsAbortedError);
    });

    it('should reject at once for an aborted signal', async () => {
      const result = dispatcher.getCompletionSuggestions(dispatcher.parse('slow ', user), {
        signal: AbortSignal.abort(),
      });

      await expect(result).rejects.toBeInstanceOf(SuggestionsAbortedError);
    });

    it('should apply the configured timeout', async () => {
      const timed = new CommandDispatcher<TestSource>({
        logger: silentLogger(),
        settings: { ...DEFAULT_SETTINGS, suggestions: { timeoutMs: 20 } },
      });
      timed.register(literal<TestSource>('slow').then(argument<TestSource, number>('n', intType).suggests(pending)));

      await expect(timed.getCompletionSuggestions(timed.parse('slow ', user))).rejects.toBeInstanceOf(
        SuggestionsAbortedError
      );
    });
  });
});

describe('abortable', () => {
  it('should pass the value through without a signal', async () => {
    await expect(abortable(Promise.resolve(3))).resolves.toBe(3);
  });

  it('should settle with the task before an abort', async () => {
    const controller = new AbortController();

    await expect(abortable(Promise.resolve('done'), controller.signal)).resolves.toBe('done');
  });
});
