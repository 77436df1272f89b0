import { describe, it, expect } from 'vitest';
import { expandReplacement } from '../../src/runtime/adapters/substitution.js';

function firstMatch(pattern: RegExp, subject: string): RegExpExecArray {
  const match = pattern.exec(subject);
  if (match === null) throw new Error(`no match for ${pattern} in ${subject}`);
  return match;
}

describe('expandReplacement', () => {
  const match = firstMatch(/(b)(?<rest>c+)/, 'abccd');

  it('returns templates without references unchanged', () => {
    expect(expandReplacement('plain', match, 'abccd')).toBe('plain');
  });

  it('expands whole-match, prefix and suffix references', () => {
    expect(expandReplacement('[$&]', match, 'abccd')).toBe('[bcc]');
    expect(expandReplacement('[$`]', match, 'abccd')).toBe('[a]');
    expect(expandReplacement("[$']", match, 'abccd')).toBe('[d]');
    expect(expandReplacement('$$', match, 'abccd')).toBe('$');
  });

  it('expands numbered and named groups', () => {
    expect(expandReplacement('$2$1', match, 'abccd')).toBe('ccb');
    expect(expandReplacement('$<rest>!', match, 'abccd')).toBe('cc!');
    expect(expandReplacement('$<missing>!', match, 'abccd')).toBe('!');
  });

  it('prefers a two-digit group only when it exists', () => {
    expect(expandReplacement('$10', match, 'abccd')).toBe('b0');
  });

  it('copies unknown references through', () => {
    expect(expandReplacement('$3 $x $', match, 'abccd')).toBe('$3 $x $');
    expect(expandReplacement('$<open', match, 'abccd')).toBe('$<open');
  });
});
