import { describe, expect, test } from 'vitest';

import { ParameterFormat, ParameterType } from '../scanner/token-types.js';
import type { Parser } from '../tokenizer.js';
import { parseToStrings } from './parse-utils.js';

function defineBlocks(parser: Parser) {
  parser.defineEnvironment('a', [], ParameterType.ParsedTokens);
  parser.defineEnvironment('b', [], ParameterType.ParsedTokens);
}

describe('Parsed environments', () => {
  test('body across lines', () => {
    const source = '\\begin{quote}\n  Hi {x}\n\\end{quote} after';
    expect(parseToStrings(source, p => p.defineEnvironment('quote', [], ParameterType.ParsedTokens))).toEqual([
      '1:0 Environment quote [] {ParsedText "Hi ", Bgroup, ParsedText "x", Egroup}',
      '3:11 ParsedText " after"'
    ]);
  });

  test('arguments before the body', () => {
    const setup = (p: Parser) =>
      p.defineEnvironment('list', [[ParameterFormat.Optional, ParameterType.VerbatimText]], ParameterType.ParsedTokens);
    expect(parseToStrings('\\begin{list}[tight]x\\end{list}', setup)).toEqual([
      '1:0 Environment list [RawText "tight"] {ParsedText "x"}'
    ]);
  });

  test('nested environments', () => {
    expect(parseToStrings('\\begin{a}\\begin{b}y\\end{b}\\end{a}', defineBlocks)).toEqual([
      '1:0 Environment a [] {Environment b [] {ParsedText "y"}}'
    ]);
  });

  test('mismatched end is reported and skipped', () => {
    expect(parseToStrings('\\begin{a}\\begin{b}\\end{a}\\end{b}\\end{a}', defineBlocks)).toEqual([
      '1:18 Error mismatched-environment-end: \\end{a} does not match \\begin{b}',
      '1:0 Environment a [] {Environment b [] {}}'
    ]);
  });

  test('end inside a brace group', () => {
    expect(parseToStrings('\\begin{a}{\\end{a}}\\end{a}', defineBlocks)).toEqual([
      '1:10 Error unexpected-environment-end: \\end{a} while brace is open',
      '1:0 Environment a [] {Bgroup, Egroup}'
    ]);
  });

  test('unclosed environment keeps its partial body', () => {
    expect(parseToStrings('\\begin{a}x', defineBlocks)).toEqual([
      '1:0 Environment a [] {ParsedText "x"}',
      '1:0 Error unclosed-group: Unclosed environment a'
    ]);
  });

  test('end cannot be a single-token argument', () => {
    const setup = (p: Parser) => {
      defineBlocks(p);
      p.defineCommand('foo', [[ParameterFormat.Required, ParameterType.ParsedTokens]]);
    };
    expect(parseToStrings('\\begin{a}\\foo\\end{a}', setup)).toEqual([
      '1:9 Error invalid-argument: Invalid argument 1 of \\foo: \\end cannot be an argument',
      '1:0 Environment a [] {}'
    ]);
  });
});

describe('Environment errors', () => {
  test('undefined environment', () => {
    expect(parseToStrings('\\begin{nope}x\\end{nope}')).toEqual([
      '1:0 Error undefined-environment: Undefined environment nope',
      '1:12 ParsedText "x"',
      '1:13 Error unexpected-environment-end: \\end{nope} while none is open'
    ]);
  });

  test('end without begin', () => {
    expect(parseToStrings('\\end{x} y')).toEqual([
      '1:0 Error unexpected-environment-end: \\end{x} while none is open',
      '1:7 ParsedText " y"'
    ]);
  });

  test('environment name must be braced', () => {
    expect(parseToStrings('\\begin a')).toEqual([
      '1:0 Error expected-open-brace: Argument 1 of \\begin must start with {',
      '1:7 ParsedText "a"'
    ]);
  });
});

describe('Raw environments', () => {
  test('verbatim body keeps indentation', () => {
    const source = '\\begin{code}\n  x = {\n\\end{code}done';
    expect(parseToStrings(source, p => p.defineEnvironment('code', [], ParameterType.VerbatimText))).toEqual([
      '1:0 Environment code [] {RawText "  x = {"}',
      '3:10 ParsedText "done"'
    ]);
  });

  test('verbatim body on one line', () => {
    const source = '\\begin{code}a \\b{\\end{code}';
    expect(parseToStrings(source, p => p.defineEnvironment('code', [], ParameterType.VerbatimText))).toEqual([
      '1:0 Environment code [] {RawText "a \\\\b{"}'
    ]);
  });

  test('YAML body', () => {
    const source = '\\begin{meta}\ntitle: Hi\ncount: 2\n\\end{meta}';
    expect(parseToStrings(source, p => p.defineEnvironment('meta', [], ParameterType.Yaml))).toEqual([
      '1:0 Environment meta [] {Yaml {"title":"Hi","count":2}}'
    ]);
  });

  test('unterminated raw body', () => {
    const source = '\\begin{code}\nx';
    expect(parseToStrings(source, p => p.defineEnvironment('code', [], ParameterType.VerbatimText))).toEqual([
      '1:0 Environment code [] {RawText "x"}',
      '1:0 Error unclosed-group: Unclosed environment code'
    ]);
  });
});
