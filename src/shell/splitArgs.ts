import { ArgumentParseError } from '../errors.js';

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

// Inside double quotes a backslash only escapes these; otherwise it is literal.
const DQ_ESCAPABLE = new Set(['"', '\\', '$', '`']);

const UNTERMINATED_QUOTE = 'EOF found when expecting closing quote';
const DANGLING_ESCAPE = 'EOF found after escape character';

/**
 * Split a string into words the way a POSIX shell would, without running one.
 *
 * Handles single quotes, double quotes, backslash escapes, line continuations
 * and `#` comments at the start of a word. No expansion of any kind is done:
 * `$HOME` stays `$HOME`.
 *
 * Throws {@link ArgumentParseError} on an unterminated quote or a trailing
 * backslash; callers never see a partial result.
 */
export function splitShellArgs(input: string, label?: string): string[] {
  const fail = (reason: string) => new ArgumentParseError(input, reason, label);

  const words: string[] = [];
  // null until the current word has started; '' is a real (empty) word.
  let word: string | null = null;
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);

    if (WHITESPACE.has(ch)) {
      if (word !== null) {
        words.push(word);
        word = null;
      }
      i++;
      continue;
    }

    if (ch === '#' && word === null) {
      const nl = input.indexOf('\n', i);
      if (nl === -1) break;
      i = nl + 1;
      continue;
    }

    if (ch === '\\') {
      if (i + 1 >= input.length) throw fail(DANGLING_ESCAPE);
      const next = input.charAt(i + 1);
      i += 2;
      // line continuation
      if (next === '\n') continue;
      word = (word ?? '') + next;
      continue;
    }

    if (ch === "'") {
      const end = input.indexOf("'", i + 1);
      if (end === -1) throw fail(UNTERMINATED_QUOTE);
      word = (word ?? '') + input.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      let buf = '';
      let j = i + 1;
      let closed = false;
      while (j < input.length) {
        const c = input.charAt(j);
        if (c === '"') {
          closed = true;
          break;
        }
        if (c === '\\' && j + 1 < input.length) {
          const n = input.charAt(j + 1);
          if (n !== '\n') buf += DQ_ESCAPABLE.has(n) ? n : c + n;
          j += 2;
          continue;
        }
        buf += c;
        j++;
      }
      if (!closed) throw fail(UNTERMINATED_QUOTE);
      word = (word ?? '') + buf;
      i = j + 1;
      continue;
    }

    word = (word ?? '') + ch;
    i++;
  }

  if (word !== null) words.push(word);
  return words;
}

/**
 * Whitespace-only splitting. Quotes are ordinary characters here.
 *
 * Used for `--go-build-args`, which has always been split this way.
 */
export function splitFields(input: string): string[] {
  return input.split(/\s+/).filter((f) => f.length > 0);
}
