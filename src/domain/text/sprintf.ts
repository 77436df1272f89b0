import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { InvalidFormatError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';

export type FormatArg = string | number | bigint | boolean | null | undefined | { toString(): string };

interface Directive {
  readonly argnum: number | null;
  readonly leftAlign: boolean;
  readonly plus: boolean;
  readonly padChar: string;
  readonly width: number;
  readonly precision: number | null;
  readonly specifier: string;
}

const DEFAULT_PRECISION = 6;
const MAX_PRECISION = 53;

const LEADING_NUMBER = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * printf-style formatting.
 *
 * Directive syntax: `%[argnum$][flags][width][.precision]specifier`
 * - flags: `-` left-justify, `+` sign positives, `0` or space pad, `'c` pad with `c`
 * - specifiers: `% b c d e E f F g G o s u x X`
 *
 * Integers are 64-bit; `b o u x X` print negatives as their unsigned two's complement.
 */
export function sprintf(format: string, args: readonly FormatArg[]): Result<string, InvalidFormatError> {
  let out = '';
  let nextArg = 0;
  let i = 0;

  while (i < format.length) {
    const c = format.charAt(i);
    if (c !== '%') {
      out += c;
      i++;
      continue;
    }
    if (format.charAt(i + 1) === '%') {
      out += '%';
      i += 2;
      continue;
    }

    const parsed = parseDirective(format, i + 1);
    if (parsed.isErr()) return err(Err.invalidFormat(format, parsed.error));
    const { directive, end } = parsed.value;
    i = end;

    if (directive.specifier === '%') {
      out += '%';
      continue;
    }

    const position = directive.argnum ?? nextArg++;
    if (position >= args.length) {
      return err(Err.invalidFormat(format, `${position + 1} arguments are required, ${args.length} given`));
    }

    const rendered = render(directive, args[position]);
    if (rendered === null) {
      return err(Err.invalidFormat(format, `Unknown format specifier "${directive.specifier}"`));
    }
    out += rendered;
  }

  return ok(out);
}

function parseDirective(format: string, start: number): Result<{ directive: Directive; end: number }, string> {
  let j = start;
  let argnum: number | null = null;

  const positional = /^(\d+)\$/.exec(format.slice(j));
  if (positional !== null) {
    const n = Number(positional[1]);
    if (n === 0) return err('Argument number specifier must be greater than zero');
    argnum = n - 1;
    j += positional[0].length;
  }

  let leftAlign = false;
  let plus = false;
  let padChar = ' ';
  for (;;) {
    const f = format.charAt(j);
    if (f === '-') {
      leftAlign = true;
      j++;
    } else if (f === '+') {
      plus = true;
      j++;
    } else if (f === '0' || f === ' ') {
      padChar = f;
      j++;
    } else if (f === "'") {
      if (j + 1 >= format.length) return err('Missing padding character');
      padChar = format.charAt(j + 1);
      j += 2;
    } else {
      break;
    }
  }

  const widthDigits = /^\d*/.exec(format.slice(j))?.[0] ?? '';
  const width = widthDigits === '' ? 0 : Number(widthDigits);
  j += widthDigits.length;

  let precision: number | null = null;
  if (format.charAt(j) === '.') {
    const precisionDigits = /^\d*/.exec(format.slice(j + 1))?.[0] ?? '';
    precision = precisionDigits === '' ? 0 : Number(precisionDigits);
    j += 1 + precisionDigits.length;
  }

  if (j >= format.length) return err('Missing format specifier at end of string');

  return ok({
    directive: { argnum, leftAlign, plus, padChar, width, precision, specifier: format.charAt(j) },
    end: j + 1,
  });
}

function render(d: Directive, arg: FormatArg): string | null {
  switch (d.specifier) {
    case 's': {
      const s = toText(arg);
      return pad(d.precision === null ? s : s.slice(0, d.precision), d, false);
    }
    case 'd': {
      const n = toInteger(arg);
      return pad(d.plus && n >= 0n ? `+${n}` : n.toString(), d, true);
    }
    case 'u':
      return pad(BigInt.asUintN(64, toInteger(arg)).toString(), d, false);
    case 'b':
      return pad(BigInt.asUintN(64, toInteger(arg)).toString(2), d, false);
    case 'o':
      return pad(BigInt.asUintN(64, toInteger(arg)).toString(8), d, false);
    case 'x':
      return pad(BigInt.asUintN(64, toInteger(arg)).toString(16), d, false);
    case 'X':
      return pad(BigInt.asUintN(64, toInteger(arg)).toString(16).toUpperCase(), d, false);
    case 'c':
      return String.fromCharCode(Number(BigInt.asUintN(16, toInteger(arg))));
    case 'e':
    case 'E':
    case 'f':
    case 'F':
    case 'g':
    case 'G':
      return pad(signed(formatFloat(d.specifier, toFloat(arg), d.precision), d.plus), d, true);
    default:
      return null;
  }
}

function formatFloat(specifier: string, x: number, precision: number | null): string {
  if (Number.isNaN(x)) return 'NAN';
  if (!Number.isFinite(x)) return x < 0 ? '-INF' : 'INF';

  const p = Math.min(precision ?? DEFAULT_PRECISION, MAX_PRECISION);
  switch (specifier) {
    case 'e':
      return x.toExponential(p);
    case 'E':
      return x.toExponential(p).toUpperCase();
    case 'g':
    case 'G': {
      const significant = Math.max(p, 1);
      const exponent = x === 0 ? 0 : Number(x.toExponential(significant - 1).split('e')[1]);
      const s =
        exponent < -4 || exponent >= significant
          ? x.toExponential(significant - 1).replace(/\.?0+e/, 'e')
          : stripTrailingZeros(toFixedNotation(x, Math.max(significant - 1 - exponent, 0)));
      return specifier === 'G' ? s.toUpperCase() : s;
    }
    default:
      return toFixedNotation(x, p);
  }
}

/** `toFixed` without its switch to exponent notation at 1e21 and above. */
function toFixedNotation(x: number, digits: number): string {
  if (Math.abs(x) < 1e21) return x.toFixed(digits);
  const whole = BigInt(Math.trunc(x)).toString();
  return digits > 0 ? `${whole}.${'0'.repeat(digits)}` : whole;
}

function stripTrailingZeros(fixed: string): string {
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}

function signed(s: string, plus: boolean): string {
  return plus && !s.startsWith('-') ? `+${s}` : s;
}

/**
 * Pad to the directive's width. Numeric values padded with zeros on the left keep
 * their sign in front of the zeros.
 */
function pad(s: string, d: Directive, numeric: boolean): string {
  if (s.length >= d.width) return s;
  if (d.leftAlign) return s.padEnd(d.width, d.padChar);
  if (numeric && d.padChar === '0' && (s.startsWith('-') || s.startsWith('+'))) {
    return s.charAt(0) + s.slice(1).padStart(d.width - 1, '0');
  }
  return s.padStart(d.width, d.padChar);
}

function toText(arg: FormatArg): string {
  if (arg === null || arg === undefined || arg === false) return '';
  if (arg === true) return '1';
  return typeof arg === 'string' ? arg : String(arg);
}

function toFloat(arg: FormatArg): number {
  if (typeof arg === 'number') return arg;
  if (typeof arg === 'bigint') return Number(arg);
  if (typeof arg === 'boolean') return arg ? 1 : 0;
  const leading = LEADING_NUMBER.exec(toText(arg));
  return leading === null ? 0 : Number(leading[0]);
}

function toInteger(arg: FormatArg): bigint {
  if (typeof arg === 'bigint') return BigInt.asIntN(64, arg);
  const x = toFloat(arg);
  return Number.isFinite(x) ? BigInt.asIntN(64, BigInt(Math.trunc(x))) : 0n;
}
