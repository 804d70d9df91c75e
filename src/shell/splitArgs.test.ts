import { describe, it, expect } from 'vitest';

import { ArgumentParseError } from '../errors.js';
import { splitFields, splitShellArgs } from './splitArgs.js';

describe('splitShellArgs', () => {
  it('returns no words for empty or blank input', () => {
    expect(splitShellArgs('')).toEqual([]);
    expect(splitShellArgs('  \t\n ')).toEqual([]);
  });

  it('honors single and double quotes', () => {
    expect(splitShellArgs(`"a b" c 'd e'`)).toEqual(['a b', 'c', 'd e']);
  });

  it('splits a typical build-arg string', () => {
    expect(splitShellArgs('--build-arg https_proxy=$https_proxy --no-cache')).toEqual([
      '--build-arg',
      'https_proxy=$https_proxy',
      '--no-cache',
    ]);
  });

  it('joins adjacent quoted and bare runs into one word', () => {
    expect(splitShellArgs(`a"b c"d 'e'f`)).toEqual(['ab cd', 'ef']);
  });

  it('keeps empty quoted strings as words', () => {
    expect(splitShellArgs(`--label '' x`)).toEqual(['--label', '', 'x']);
  });

  it('applies backslash escapes outside quotes', () => {
    expect(splitShellArgs('a\\ b c\\"d')).toEqual(['a b', 'c"d']);
  });

  it('only unescapes special characters inside double quotes', () => {
    expect(splitShellArgs('"x\\"y" "p\\q"')).toEqual(['x"y', 'p\\q']);
  });

  it('treats backslashes inside single quotes literally', () => {
    expect(splitShellArgs("'a\\b'")).toEqual(['a\\b']);
  });

  it('drops line continuations', () => {
    expect(splitShellArgs('--pull \\\n--quiet')).toEqual(['--pull', '--quiet']);
  });

  it('ignores comments that start a word', () => {
    expect(splitShellArgs('--pull # trailing note\n--quiet')).toEqual(['--pull', '--quiet']);
    expect(splitShellArgs('tag#1')).toEqual(['tag#1']);
  });

  it('fails on an unterminated double quote', () => {
    expect(() => splitShellArgs('"unterminated')).toThrow(ArgumentParseError);
  });

  it('fails on an unterminated single quote', () => {
    expect(() => splitShellArgs("ok 'open")).toThrow('EOF found when expecting closing quote');
  });

  it('fails on a trailing backslash', () => {
    expect(() => splitShellArgs('abc\\')).toThrow('EOF found after escape character');
  });

  it('reports the original input and label', () => {
    let caught: unknown;
    try {
      splitShellArgs('--x "y', 'image-build-args');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ArgumentParseError);
    if (!(caught instanceof ArgumentParseError)) return;
    expect(caught.input).toBe('--x "y');
    expect(caught.reason).toBe('EOF found when expecting closing quote');
    expect(caught.message).toBe(
      'image-build-args is not parseable: EOF found when expecting closing quote (input: "--x \\"y")',
    );
  });
});

describe('splitFields', () => {
  it('splits on runs of whitespace', () => {
    expect(splitFields('  -ldflags   -X=main.xyz=abc\t-v ')).toEqual(['-ldflags', '-X=main.xyz=abc', '-v']);
  });

  it('does not interpret quotes', () => {
    expect(splitFields(`-tags "a b"`)).toEqual(['-tags', '"a', 'b"']);
  });

  it('returns no fields for blank input', () => {
    expect(splitFields('   ')).toEqual([]);
  });
});
