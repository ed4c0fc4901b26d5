/**
 * @fileoverview Argument Types in a Dispatcher
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  ArgumentLookupError,
  CommandDispatcher,
  TrellisLogger,
  argument,
  literal,
  type CommandContext,
} from '@trellis/core';
import {
  bool,
  getBool,
  getDouble,
  getInteger,
  getLong,
  getString,
  greedyString,
  integer,
  long,
  double,
  word,
} from '../src/index.js';

interface Player {
  name: string;
}

const player: Player = { name: 'test-player' };

describe('argument types in a dispatcher', () => {
  let dispatcher: CommandDispatcher<Player>;
  let said: string[];

  beforeEach(() => {
    said = [];
    dispatcher = new CommandDispatcher<Player>({ logger: new TrellisLogger({ level: 'silent' }) });
    dispatcher.register(
      literal<Player>('add').then(
        argument<Player, number>('a', integer()).then(
          argument<Player, number>('b', integer()).executes(
            (context) => getInteger(context, 'a') + getInteger(context, 'b')
          )
        )
      )
    );
    dispatcher.register(
      literal<Player>('say').then(
        argument<Player, string>('message', greedyString()).executes((context: CommandContext<Player>) => {
          said.push(`${context.source.name}: ${getString(context, 'message')}`);
          return 1;
        })
      )
    );
  });

  it('should pass typed values to the command', () => {
    expect(dispatcher.execute('add 20 22', player)).toBe(42);
  });

  it('should hand the rest of the line to a greedy argument', () => {
    dispatcher.execute('say hello there', player);

    expect(said).toEqual(['test-player: hello there']);
  });

  it('should read each kind of value', () => {
    const seen: unknown[] = [];
    dispatcher.register(
      literal<Player>('set')
        .then(
          literal<Player>('flag').then(
            argument<Player, boolean>('value', bool()).executes((context) => {
              seen.push(getBool(context, 'value'));
              return 1;
            })
          )
        )
        .then(
          literal<Player>('big').then(
            argument<Player, bigint>('value', long()).executes((context) => {
              seen.push(getLong(context, 'value'));
              return 1;
            })
          )
        )
        .then(
          literal<Player>('ratio').then(
            argument<Player, number>('value', double()).executes((context) => {
              seen.push(getDouble(context, 'value'));
              return 1;
            })
          )
        )
    );

    dispatcher.execute('set flag true', player);
    dispatcher.execute('set big 9007199254740993', player);
    dispatcher.execute('set ratio .25', player);

    expect(seen).toEqual([true, 9007199254740993n, 0.25]);
  });

  it('should reject a lookup with the wrong getter', () => {
    dispatcher.register(
      literal<Player>('echo').then(
        argument<Player, string>('text', word()).executes((context) => getInteger(context, 'text'))
      )
    );

    expect(() => dispatcher.execute('echo abc', player)).toThrow(
      new ArgumentLookupError("Argument 'text' is defined as string, not integer")
    );
  });

  it('should complete boolean values', async () => {
    dispatcher.register(literal<Player>('toggle').then(argument<Player, boolean>('on', bool())));
    const result = await dispatcher.getCompletionSuggestions(dispatcher.parse('toggle f', player));

    expect(result.list.map((s) => s.text)).toEqual(['false']);
  });

  it('should report integer arguments that shadow a literal', () => {
    dispatcher.register(literal<Player>('n').then(literal<Player>('1')).then(argument<Player, number>('count', integer())));
    const found: string[] = [];
    dispatcher.findAmbiguities((_parent, child, sibling, inputs) => {
      found.push(`${child.getName()}~${sibling.getName()}:${[...inputs].join(',')}`);
    });

    expect(found).toEqual(['1~count:1']);
  });

  it('should compare argument nodes by their type settings', () => {
    const bounded = argument<Player, number>('count', integer(0, 10)).build();

    expect(bounded.equals(argument<Player, number>('count', integer(0, 10)).build())).toBe(true);
    expect(bounded.equals(argument<Player, number>('count', integer(0, 5)).build())).toBe(false);
    expect(
      argument<Player, string>('text', word()).build().equals(argument<Player, string>('text', greedyString()).build())
    ).toBe(false);
  });
});
