import { describe, it, expect } from 'vitest';
import { sprintf } from '../../src/domain/text/sprintf.js';
import type { FormatArg } from '../../src/domain/text/sprintf.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

function format(template: string, ...args: FormatArg[]): string {
  return expectOk(sprintf(template, args), template);
}

describe('sprintf', () => {
  it('substitutes strings in order', () => {
    expect(format('%s-%s', 'a', 'b')).toBe('a-b');
    expect(format('100%%')).toBe('100%');
    expect(format('%5%')).toBe('%');
  });

  it('pads and aligns', () => {
    expect(format('%05d', 42)).toBe('00042');
    expect(format('%5d', 42)).toBe('   42');
    expect(format('%-5d|', 42)).toBe('42   |');
    expect(format("%'*8s", 'abc')).toBe('*****abc');
    expect(format('%-8s|', 'abc')).toBe('abc     |');
    expect(format('%2s', 'abc')).toBe('abc');
  });

  it('keeps the sign in front of zero padding', () => {
    expect(format('%05d', -42)).toBe('-0042');
    expect(format('%+05d', 42)).toBe('+0042');
    expect(format('%08.3f', -3.14159)).toBe('-003.142');
  });

  it('signs positives with +', () => {
    expect(format('%+d', 5)).toBe('+5');
    expect(format('%+d', -5)).toBe('-5');
    expect(format('%+.1f', 2.5)).toBe('+2.5');
  });

  it('truncates strings to the precision', () => {
    expect(format('%.2s', 'abcdef')).toBe('ab');
  });

  it('formats floats', () => {
    expect(format('%.2f', 3.14159)).toBe('3.14');
    expect(format('%f', 1.5)).toBe('1.500000');
    expect(format('%e', 1234.5)).toBe('1.234500e+3');
    expect(format('%.2E', 0.000123)).toBe('1.23E-4');
    expect(format('%g', 0.00001234)).toBe('1.234e-5');
    expect(format('%G', 0.00001234)).toBe('1.234E-5');
    expect(format('%g', 123.456)).toBe('123.456');
    expect(format('%g', 100)).toBe('100');
    expect(format('%f %f %f', NaN, Infinity, -Infinity)).toBe('NAN INF -INF');
  });

  it('keeps fixed notation for magnitudes of 1e21 and above', () => {
    expect(format('%.2f', 1e21)).toBe('1000000000000000000000.00');
    expect(format('%f', -1e21)).toBe('-1000000000000000000000.000000');
    expect(format('%.0F', 1e22)).toBe('10000000000000000000000');
  });

  it('formats integers in other bases as unsigned 64-bit', () => {
    expect(format('%x %X %o %b', 255, 255, 8, 5)).toBe('ff FF 10 101');
    expect(format('%x', -1)).toBe('ffffffffffffffff');
    expect(format('%u', -1)).toBe('18446744073709551615');
  });

  it('converts arguments to numbers by their leading digits', () => {
    expect(format('%d', '12abc')).toBe('12');
    expect(format('%d', 'abc')).toBe('0');
    expect(format('%d', 3.99)).toBe('3');
    expect(format('%d', -3.99)).toBe('-3');
    expect(format('%d', true)).toBe('1');
    expect(format('%d', 9007199254740993n)).toBe('9007199254740993');
  });

  it('renders booleans and nullish values as text', () => {
    expect(format('[%s][%s][%s][%s]', true, false, null, undefined)).toBe('[1][][][]');
  });

  it('renders %c from a character code', () => {
    expect(format('%c%c', 72, 105)).toBe('Hi');
  });

  it('reads positional arguments', () => {
    expect(format('%2$s %1$s', 'world', 'hello')).toBe('hello world');
    expect(format('%1$s %1$s', 'echo')).toBe('echo echo');
  });

  it('reports too few arguments', () => {
    expect(expectErr(sprintf('%s and %s', ['one']), 'too few')).toEqual({
      _tag: 'InvalidFormat',
      format: '%s and %s',
      reason: '2 arguments are required, 1 given',
      message: 'Invalid format string: 2 arguments are required, 1 given',
    });
  });

  it('reports malformed directives', () => {
    expect(expectErr(sprintf('%0$s', ['x']), 'argnum 0').reason).toBe(
      'Argument number specifier must be greater than zero'
    );
    expect(expectErr(sprintf('abc%', ['x']), 'trailing').reason).toBe('Missing format specifier at end of string');
    expect(expectErr(sprintf('%5', ['x']), 'width only').reason).toBe('Missing format specifier at end of string');
    expect(expectErr(sprintf('%k', [1]), 'unknown').reason).toBe('Unknown format specifier "k"');
    expect(expectErr(sprintf("%'", ['x']), 'pad char').reason).toBe('Missing padding character');
  });
});
