/**
 * Text renderings of tokens: one-line descriptions for dumps and logs, and a
 * source rendering for the plain-text subset of the token set.
 */

import type { ParseError } from './scanner/errors.js';
import { TokenKind, type Token } from './scanner/token-types.js';
import type { ParseOutput } from './tokenizer.js';

/** `ParsedText "abc"`, `Command foo [Tokens [ParsedText "a"]]`, ... */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.ParsedText: return `ParsedText ${JSON.stringify(token.text)}`;
    case TokenKind.RawText: return `RawText ${JSON.stringify(token.text)}`;
    case TokenKind.Math: return `Math ${JSON.stringify(token.text)}`;
    case TokenKind.Boolean: return `Boolean ${token.value}`;
    case TokenKind.KeyValueList:
      return `KeyValueList ${token.entries.map(({ key, value }) => value === undefined ? key : `${key}=${value}`).join(',')}`;
    case TokenKind.Yaml: return `Yaml ${JSON.stringify(token.value)}`;
    case TokenKind.Bgroup: return 'Bgroup';
    case TokenKind.Egroup: return 'Egroup';
    case TokenKind.Tokens: return `Tokens [${token.tokens.map(describeToken).join(', ')}]`;
    case TokenKind.Command:
      return `Command ${token.definition.name} [${token.args.map(describeToken).join(', ')}]`;
    case TokenKind.Environment:
      return `Environment ${token.definition.name} [${token.args.map(describeToken).join(', ')}] ` +
        `{${token.body.map(describeToken).join(', ')}}`;
  }
}

export function describeError(error: ParseError): string {
  return `Error ${error.code}: ${error.message}`;
}

/** One line per item: `line:column Description`. */
export function formatParseOutput(items: readonly ParseOutput[]): string[] {
  return items.map(item =>
    `${item.location.line}:${item.location.column} ` +
    (item.ok ? describeToken(item.token) : describeError(item.error)));
}

/**
 * Render tokens back to source text. Text, raw text and groups come out as
 * written, with line breaks restored from token locations; commands and
 * environments render as their bare name and cannot be parsed back without
 * their definitions.
 */
export function tokensToSource(tokens: readonly Token[]): string {
  let text = '';
  let line = tokens.length ? tokens[0].location.line : 1;

  for (const token of tokens) write(token);
  return text;

  function write(token: Token): void {
    if (token.location.line > line) {
      text += '\n'.repeat(token.location.line - line);
      line = token.location.line;
    }

    switch (token.kind) {
      case TokenKind.ParsedText:
      case TokenKind.RawText:
      case TokenKind.Math:
        text += token.text;
        break;
      case TokenKind.Bgroup:
        text += '{';
        break;
      case TokenKind.Egroup:
        text += '}';
        break;
      case TokenKind.Tokens:
        text += '{';
        for (const child of token.tokens) write(child);
        text += '}';
        break;
      case TokenKind.Command:
      case TokenKind.Environment:
        text += `\\${token.definition.name}`;
        break;
      case TokenKind.Boolean:
      case TokenKind.KeyValueList:
      case TokenKind.Yaml:
        break;
    }
  }
}
