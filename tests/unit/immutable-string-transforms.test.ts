import { describe, it, expect } from 'vitest';
import { ImmutableString, MAX_STRING_LENGTH } from '../../src/domain/immutable-string.js';
import { createStringContext } from '../../src/di/string-context.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('ImmutableString case and whitespace', () => {
  it('maps ASCII letters only', () => {
    expect(ImmutableString.of('HeLLo 123').toLowerCase().valueOf()).toBe('hello 123');
    expect(ImmutableString.of('HeLLo 123').toUpperCase().valueOf()).toBe('HELLO 123');
    expect(ImmutableString.of('Ärger').toUpperCase().valueOf()).toBe('ÄRGER');
    expect(ImmutableString.of('ÄB').toLowerCase().valueOf()).toBe('Äb');
  });

  it('is idempotent under repeated case mapping', () => {
    const lower = ImmutableString.of('MiXeD').toLowerCase();

    expect(lower.toLowerCase().equals(lower)).toBe(true);
    expect(lower.toUpperCase().toUpperCase().valueOf()).toBe('MIXED');
  });

  it('leaves the receiver unchanged', () => {
    const s = ImmutableString.of('Abc');
    s.toUpperCase();
    s.trim();
    s.concat('d');

    expect(s.valueOf()).toBe('Abc');
  });

  it('trims the default whitespace set', () => {
    expect(ImmutableString.of('  hi \n').trim().valueOf()).toBe('hi');
    expect(ImmutableString.of('\0\x0Bhi\t').trim().valueOf()).toBe('hi');
    expect(ImmutableString.of('  hi  ').trimLeft().valueOf()).toBe('hi  ');
    expect(ImmutableString.of('  hi  ').trimRight().valueOf()).toBe('  hi');
    expect(ImmutableString.of(' \t ').trim().isEmpty()).toBe(true);
  });

  it('trims a custom mask with ranges', () => {
    expect(ImmutableString.of('xxhixx').trim('x').valueOf()).toBe('hi');
    expect(ImmutableString.of('abcHELLOcba').trim('a..c').valueOf()).toBe('HELLO');
    expect(ImmutableString.of('123abc456').trim('0..9').valueOf()).toBe('abc');
    expect(ImmutableString.of('--a--').trimLeft('-').valueOf()).toBe('a--');
  });

  it('is idempotent under repeated trimming', () => {
    const once = ImmutableString.of('  padded\t');

    expect(once.trim().trim().valueOf()).toBe(once.trim().valueOf());
  });

  it('warns about malformed ranges through the context logger', () => {
    const loggers = new FakeLoggerFactory();
    const strings = ImmutableString.withContext(createStringContext({ loggerFactory: loggers }));

    const trimmed = strings.of('zzmazz').trim('z..a');

    expect(trimmed.valueOf()).toBe('m');
    expect(loggers.entriesFor('ImmutableString')).toEqual([
      {
        level: 'warn',
        msg: "Invalid '..'-range, '..'-range needs to be incrementing",
        component: 'ImmutableString',
        fields: { mask: 'z..a', position: 1 },
      },
    ]);
  });
});

describe('ImmutableString conversion', () => {
  it('splits into code units', () => {
    expect(ImmutableString.of('abc').toCharArray()).toEqual(['a', 'b', 'c']);
    expect(ImmutableString.of('').toCharArray()).toEqual([]);
  });

  it('concatenates mixed arguments', () => {
    const joined = ImmutableString.of('a').concat('b', 1, ImmutableString.of('c'));

    expect(joined.valueOf()).toBe('ab1c');
    expect(joined.length).toBe(4);
  });

  it('reverses by code unit', () => {
    const s = ImmutableString.of('abc');

    expect(s.reverse().valueOf()).toBe('cba');
    expect(s.reverse().reverse().equals(s)).toBe(true);
  });

  it('pads to the target length', () => {
    expect(expectOk(ImmutableString.of('7').padLeft(5, '0'), 'padLeft').valueOf()).toBe('00007');
    expect(expectOk(ImmutableString.of('x').padRight(5, 'ab'), 'padRight').valueOf()).toBe('xabab');
    expect(expectOk(ImmutableString.of('xyz').padLeft(6, 'ab'), 'truncated pad').valueOf()).toBe('abaxyz');
    expect(expectOk(ImmutableString.of('a').padRight(3), 'default pad').valueOf()).toBe('a  ');
  });

  it('returns the receiver when already long enough', () => {
    const s = ImmutableString.of('hello');

    expect(expectOk(s.padLeft(2, '0'), 'shorter target')).toBe(s);
    expect(expectOk(s.padRight(5, '0'), 'equal target')).toBe(s);
  });

  it('rejects an empty pad', () => {
    expect(expectErr(ImmutableString.of('a').padLeft(5, ''), 'empty pad')).toEqual({
      _tag: 'InvalidArgument',
      argument: 'pad',
      reason: 'must be a non-empty string',
      message: "Invalid argument 'pad': must be a non-empty string",
    });
  });

  it('rejects a target length that cannot be allocated', () => {
    const s = ImmutableString.of('7');
    const reason = `must be a finite number no greater than ${MAX_STRING_LENGTH}`;

    expect(expectErr(s.padLeft(Infinity, '0'), 'Infinity')).toEqual({
      _tag: 'InvalidArgument',
      argument: 'targetLength',
      reason,
      message: `Invalid argument 'targetLength': ${reason}`,
    });
    expect(expectErr(s.padLeft(2 ** 31, '0'), '2 ** 31').argument).toBe('targetLength');
    expect(expectErr(s.padRight(NaN), 'NaN').argument).toBe('targetLength');
    expect(expectErr(s.padRight(MAX_STRING_LENGTH + 1), 'just over').argument).toBe('targetLength');
  });

  it('converts to a primitive', () => {
    const s = ImmutableString.of('abc');

    expect(s.valueOf()).toBe('abc');
    expect(s.toString()).toBe('abc');
    expect(`${s}!`).toBe('abc!');
  });
});
