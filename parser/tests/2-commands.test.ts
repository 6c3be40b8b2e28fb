import { describe, expect, test } from 'vitest';

import { ErrorCode } from '../scanner/errors.js';
import { ParameterFormat, ParameterType, TokenKind, type Parameter } from '../scanner/token-types.js';
import { createParserFromText, type Parser } from '../tokenizer.js';
import { parseToStrings } from './parse-utils.js';

const oneArg: Parameter[] = [[ParameterFormat.Required, ParameterType.ParsedTokens]];

function defineFoo(parser: Parser) {
  parser.defineCommand('foo', oneArg);
}

describe('Command names', () => {
  test('undefined command', () => {
    expect(parseToStrings('\\undefined')).toEqual([
      '1:0 Error undefined-command: Undefined command \\undefined'
    ]);
  });

  test('scanning resumes after an undefined command', () => {
    expect(parseToStrings('x \\nope y')).toEqual([
      '1:0 ParsedText "x "',
      '1:2 Error undefined-command: Undefined command \\nope',
      '1:8 ParsedText "y"'
    ]);
  });

  test('named command takes the whitespace after it', () => {
    expect(parseToStrings('\\foo a', p => p.defineCommand('foo'))).toEqual([
      '1:0 Command foo []',
      '1:5 ParsedText "a"'
    ]);
  });

  test('symbol command leaves whitespace alone', () => {
    expect(parseToStrings('\\% b', p => p.defineCommand('%'))).toEqual([
      '1:0 Command % []',
      '1:2 ParsedText " b"'
    ]);
  });

  test('name stops at a digit', () => {
    expect(parseToStrings('\\foo1', p => p.defineCommand('foo'))).toEqual([
      '1:0 Command foo []',
      '1:4 ParsedText "1"'
    ]);
  });

  test('letters outside ASCII are part of the name', () => {
    expect(parseToStrings('\\café x', p => p.defineCommand('café'))).toEqual([
      '1:0 Command café []',
      '1:6 ParsedText "x"'
    ]);
  });

  test('combining marks are part of the name', () => {
    expect(parseToStrings('\\cafe\u0301 x', p => p.defineCommand('cafe\u0301'))).toEqual([
      '1:0 Command cafe\u0301 []',
      '1:7 ParsedText "x"'
    ]);
  });

  test('backslash at end of line is the command named by a space', () => {
    expect(parseToStrings('a\\\nb', p => p.defineCommand(' '))).toEqual([
      '1:0 ParsedText "a"',
      '1:1 Command   []',
      '2:0 ParsedText "b"'
    ]);
  });
});

describe('Required arguments', () => {
  test('braced argument', () => {
    expect(parseToStrings('\\foo{a}', defineFoo)).toEqual([
      '1:0 Command foo [Tokens [ParsedText "a"]]'
    ]);
  });

  test('argument with nested groups', () => {
    expect(parseToStrings('\\foo{a{b}c}', defineFoo)).toEqual([
      '1:0 Command foo [Tokens [ParsedText "a", Bgroup, ParsedText "b", Egroup, ParsedText "c"]]'
    ]);
  });

  test('argument across lines', () => {
    expect(parseToStrings('\\foo{a\nb}', defineFoo)).toEqual([
      '1:0 Command foo [Tokens [ParsedText "a", ParsedText "b"]]'
    ]);
  });

  test('single line break before the argument', () => {
    expect(parseToStrings('\\foo\n{a}', defineFoo)).toEqual([
      '1:0 Command foo [Tokens [ParsedText "a"]]'
    ]);
  });

  test('comment before the argument', () => {
    expect(parseToStrings('\\foo % note\n  {a}', defineFoo)).toEqual([
      '1:0 Command foo [Tokens [ParsedText "a"]]'
    ]);
  });

  test('braced, single-token and command arguments', () => {
    expect(parseToStrings('\\foo{a} \\foo b \\foo\\foo{c}', defineFoo)).toEqual([
      '1:0 Command foo [Tokens [ParsedText "a"]]',
      '1:7 ParsedText " "',
      '1:8 Command foo [ParsedText "b"]',
      '1:14 ParsedText " "',
      '1:15 Command foo [Command foo [Tokens [ParsedText "c"]]]'
    ]);
  });

  test('command argument shares the registered definition', () => {
    const parser = createParserFromText('\\foo\\foo{c}');
    defineFoo(parser);
    const [item] = parser.parse();

    expect(item.ok).toBe(true);
    if (!item.ok || item.token.kind !== TokenKind.Command) throw new Error('expected a command');
    const [arg] = item.token.args;
    expect(arg.kind).toBe(TokenKind.Command);
    if (arg.kind !== TokenKind.Command) throw new Error('expected a command argument');
    expect(arg.definition).toBe(parser.registry.lookupCommand('foo'));
    expect(arg.location).toEqual({ file: '<text>', line: 1, column: 4 });
  });

  test('two arguments', () => {
    const setup = (p: Parser) => p.defineCommand('pair', [...oneArg, ...oneArg]);
    expect(parseToStrings('\\pair{a}{b}', setup)).toEqual([
      '1:0 Command pair [Tokens [ParsedText "a"], Tokens [ParsedText "b"]]'
    ]);
  });

  test('errors inside an argument come out before the command', () => {
    expect(parseToStrings('\\foo{\\bar x}', defineFoo)).toEqual([
      '1:5 Error undefined-command: Undefined command \\bar',
      '1:0 Command foo [Tokens [ParsedText "x"]]'
    ]);
  });

  test('stray close brace as a single-token argument is reported once', () => {
    expect(parseToStrings('\\foo} x', defineFoo)).toEqual([
      '1:0 Error unexpected-close-brace: Unexpected } with no open group',
      '1:5 ParsedText " x"'
    ]);
  });

  test('close brace as a single-token argument inside an environment', () => {
    const setup = (p: Parser) => {
      defineFoo(p);
      p.defineEnvironment('a', [], ParameterType.ParsedTokens);
    };
    expect(parseToStrings('\\begin{a}\\foo}\\end{a}', setup)).toEqual([
      '1:9 Error unexpected-close-brace: Unexpected } while environment a is open',
      '1:0 Environment a [] {}'
    ]);
  });

  test('failing command argument is reported at the command taking it', () => {
    expect(parseToStrings('ab\\foo\\bar', defineFoo)).toEqual([
      '1:0 ParsedText "ab"',
      '1:2 Error undefined-command: Undefined command \\bar'
    ]);
  });

  test('close brace as a single-token argument', () => {
    expect(parseToStrings('{\\foo}', defineFoo)).toEqual([
      '1:0 Bgroup',
      '1:1 Error unexpected-close-brace: Unexpected } while brace is open',
      '1:5 Egroup'
    ]);
  });
});

describe('Argument errors', () => {
  test('blank line before an argument', () => {
    expect(parseToStrings('\\foo\n\n{a}', defineFoo)).toEqual([
      '1:0 Error blank-line-in-arguments: Blank line while looking for argument 1 of \\foo',
      '3:0 Bgroup',
      '3:1 ParsedText "a"',
      '3:2 Egroup'
    ]);
  });

  test('blank line error names the command and parameter', () => {
    const parser = createParserFromText('\\foo\n\n{a}');
    defineFoo(parser);
    const [item] = parser.parse();

    expect(item.ok).toBe(false);
    if (item.ok) throw new Error('expected an error');
    expect(item.error).toMatchObject({
      code: ErrorCode.BlankLineWhileParsingCommandArguments,
      commandName: 'foo',
      parameterNumber: 1,
      context: { location: { file: '<text>', line: 1, column: 0 }, lineText: '\\foo' }
    });
  });

  test('end of input before an argument', () => {
    expect(parseToStrings('\\foo', defineFoo)).toEqual([
      '1:0 Error eof-in-arguments: End of input while reading argument 1 of \\foo'
    ]);
  });

  test('end of input inside a braced argument keeps its content', () => {
    expect(parseToStrings('\\foo{abc', defineFoo)).toEqual([
      '1:0 Error eof-in-arguments: End of input while reading argument 1 of \\foo',
      '1:5 ParsedText "abc"'
    ]);
  });

  test('groups left open inside an unfinished argument are reported', () => {
    expect(parseToStrings('\\foo{ {a', defineFoo)).toEqual([
      '1:0 Error eof-in-arguments: End of input while reading argument 1 of \\foo',
      '1:5 ParsedText " "',
      '1:6 Bgroup',
      '1:7 ParsedText "a"',
      '1:6 Error unclosed-group: Unclosed brace'
    ]);
  });

  test('environment left open inside an unfinished argument', () => {
    const setup = (p: Parser) => {
      defineFoo(p);
      p.defineEnvironment('a', [], ParameterType.ParsedTokens);
    };
    expect(parseToStrings('\\foo{\\begin{a}x} tail\nmore text', setup)).toEqual([
      '1:15 Error unexpected-close-brace: Unexpected } while environment a is open',
      '1:0 Error eof-in-arguments: End of input while reading argument 1 of \\foo',
      '1:5 Environment a [] {ParsedText "x", ParsedText " tail", ParsedText "more text"}',
      '1:5 Error unclosed-group: Unclosed environment a'
    ]);
  });

  test('unfinished arguments inside unfinished arguments', () => {
    expect(parseToStrings('\\foo{\\foo{x', defineFoo)).toEqual([
      '1:5 Error eof-in-arguments: End of input while reading argument 1 of \\foo',
      '1:0 Error eof-in-arguments: End of input while reading argument 1 of \\foo',
      '1:10 ParsedText "x"'
    ]);
  });

  test('end of input before the second argument', () => {
    const setup = (p: Parser) => p.defineCommand('pair', [...oneArg, ...oneArg]);
    expect(parseToStrings('\\pair{a}', setup)).toEqual([
      '1:0 Error eof-in-arguments: End of input while reading argument 2 of \\pair'
    ]);
  });
});
