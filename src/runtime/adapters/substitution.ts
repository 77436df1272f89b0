/**
 * Expand a JavaScript replacement template for one match.
 *
 * Same syntax as `String.prototype.replace`: `$$`, `$&`, `` $` ``, `$'`,
 * `$n` / `$nn` and `$<name>`. Unknown references are copied through verbatim.
 */
export function expandReplacement(template: string, match: RegExpExecArray, subject: string): string {
  if (!template.includes('$')) return template;

  const groupCount = match.length - 1;
  const matched = match[0];
  const position = match.index;
  let out = '';

  for (let i = 0; i < template.length; i++) {
    const c = template.charAt(i);
    if (c !== '$' || i + 1 >= template.length) {
      out += c;
      continue;
    }

    const next = template.charAt(i + 1);
    if (next === '$') {
      out += '$';
      i++;
    } else if (next === '&') {
      out += matched;
      i++;
    } else if (next === '`') {
      out += subject.slice(0, position);
      i++;
    } else if (next === "'") {
      out += subject.slice(position + matched.length);
      i++;
    } else if (next >= '0' && next <= '9') {
      const twoDigits = template.slice(i + 1, i + 3);
      const two = /^\d\d$/.test(twoDigits) ? Number(twoDigits) : -1;
      const one = Number(next);
      if (two >= 1 && two <= groupCount) {
        out += match[two] ?? '';
        i += 2;
      } else if (one >= 1 && one <= groupCount) {
        out += match[one] ?? '';
        i++;
      } else {
        out += c;
      }
    } else if (next === '<' && match.groups !== undefined) {
      const close = template.indexOf('>', i + 2);
      if (close < 0) {
        out += c;
      } else {
        out += match.groups[template.slice(i + 2, close)] ?? '';
        i = close;
      }
    } else {
      out += c;
    }
  }

  return out;
}
