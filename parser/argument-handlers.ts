/**
 * Sub-grammars for argument types the scanner does not tokenize itself.
 *
 * The dispatcher captures the argument's raw text and hands it to the handler
 * registered for the parameter type; whatever the handler returns becomes the
 * argument token, or an invalid-argument error at the command.
 */

import { load, YAMLException } from 'js-yaml';

import type { Registry } from './registry.js';
import { CharacterCodes } from './scanner/character-codes.js';
import type { Location } from './scanner/location.js';
import {
  ParameterType,
  TokenKind,
  type KeyValueEntry,
  type Token
} from './scanner/token-types.js';

export interface ArgumentHandlerContext {
  /** Live registry: definitions made here are visible to the rest of the parse. */
  readonly registry: Registry;

  /** Command or environment the argument belongs to. */
  readonly commandName: string;

  /** 1-based; 0 for an environment body. */
  readonly parameterNumber: number;

  /** Where the captured content starts. */
  readonly location: Location;
}

export type ArgumentHandlerResult =
  | { readonly ok: true; readonly token: Token }
  | { readonly ok: false; readonly reason: string };

export type ArgumentHandler = (text: string, context: ArgumentHandlerContext) => ArgumentHandlerResult;

/** Parameter types whose content is decoded by a pluggable handler. */
export type HandledParameterType =
  | ParameterType.KeyValueList
  | ParameterType.MacroDefinition
  | ParameterType.Math
  | ParameterType.Yaml;

export type ArgumentHandlers = { readonly [T in HandledParameterType]: ArgumentHandler };

export const mathHandler: ArgumentHandler = (text, { location }) =>
  ({ ok: true, token: { kind: TokenKind.Math, location, text } });

/**
 * Default macro-definition handler: keeps the body as raw text. A handler that
 * actually defines commands can be supplied through the parser options.
 */
export const macroDefinitionHandler: ArgumentHandler = (text, { location }) =>
  ({ ok: true, token: { kind: TokenKind.RawText, location, text } });

export const keyValueListHandler: ArgumentHandler = (text, { location }) =>
  ({ ok: true, token: { kind: TokenKind.KeyValueList, location, entries: parseKeyValueList(text) } });

export const yamlHandler: ArgumentHandler = (text, { location }) => {
  try {
    return { ok: true, token: { kind: TokenKind.Yaml, location, value: load(text) } };
  } catch (error) {
    if (error instanceof YAMLException) return { ok: false, reason: error.message };
    throw error;
  }
};

export const defaultArgumentHandlers: ArgumentHandlers = {
  [ParameterType.KeyValueList]: keyValueListHandler,
  [ParameterType.MacroDefinition]: macroDefinitionHandler,
  [ParameterType.Math]: mathHandler,
  [ParameterType.Yaml]: yamlHandler,
};

/**
 * Split `key=value, flag, other={a,b}` into entries.
 *
 * Commas and equals signs inside braces do not separate. Keys and values are
 * trimmed, a value wrapped in one pair of braces loses them, empty items are
 * skipped and a key without `=` has no value.
 */
export function parseKeyValueList(text: string): KeyValueEntry[] {
  const entries: KeyValueEntry[] = [];
  let depth = 0;
  let itemStart = 0;
  let equalsAt = -1;

  for (let i = 0; i <= text.length; i++) {
    const ch = i < text.length ? text.charCodeAt(i) : CharacterCodes.comma;

    if (ch === CharacterCodes.backslash && i + 1 < text.length) {
      i++;
      continue;
    }

    if (ch === CharacterCodes.openBrace) {
      depth++;
    } else if (ch === CharacterCodes.closeBrace) {
      if (depth > 0) depth--;
    } else if (depth === 0 && ch === CharacterCodes.equals && equalsAt < 0) {
      equalsAt = i;
    } else if (depth === 0 && ch === CharacterCodes.comma) {
      const itemEnd = Math.min(i, text.length);
      const entry = equalsAt < 0 ?
        { key: text.slice(itemStart, itemEnd).trim() } :
        { key: text.slice(itemStart, equalsAt).trim(), value: stripBraces(text.slice(equalsAt + 1, itemEnd).trim()) };
      if (entry.key) entries.push(entry);
      itemStart = i + 1;
      equalsAt = -1;
    }
  }

  return entries;
}

function stripBraces(value: string): string {
  if (value.length < 2 || !value.startsWith('{') || !value.endsWith('}')) return value;

  // Only strip when the outer braces enclose the whole value: `{a}{b}` stays.
  let depth = 0;
  for (let i = 0; i < value.length - 1; i++) {
    const ch = value.charCodeAt(i);
    if (ch === CharacterCodes.backslash) {
      i++;
    } else if (ch === CharacterCodes.openBrace) {
      depth++;
    } else if (ch === CharacterCodes.closeBrace) {
      depth--;
      if (depth === 0) return value;
    }
  }

  return value.slice(1, -1).trim();
}
