/**
 * Token, definition and group types shared by the scanner and the command
 * dispatcher.
 */

import type { ErrorContext, Location } from './location.js';

/**
 * How an argument is delimited in source text.
 */
export enum ParameterFormat {
  Star,                     // optional leading *
  Required,                 // {...} or a single token
  RequiredWithBraces,       // {...} only
  Optional,                 // [...]
  ArbitraryDelimiters,      // \verb|...| style, delimiter taken from the source
}

/**
 * How an argument's captured content is interpreted.
 */
export enum ParameterType {
  ParsedTokens,
  VerbatimText,
  Boolean,
  KeyValueList,
  MacroDefinition,
  Math,
  Yaml,
}

export type Parameter = readonly [format: ParameterFormat, type: ParameterType];

/** A registered command. Frozen, shared by the registry and every token. */
export interface CommandDef {
  readonly name: string;
  readonly parameters: readonly Parameter[];
}

/** A registered environment (`\begin{name}...\end{name}`). */
export interface EnvironmentDef {
  readonly name: string;
  readonly parameters: readonly Parameter[];
  readonly bodyType: ParameterType;
}

export enum TokenKind {
  ParsedText,
  RawText,
  Math,
  Boolean,
  KeyValueList,
  Yaml,
  Bgroup,
  Egroup,
  Tokens,
  Command,
  Environment,
}

interface TokenBase {
  readonly location: Location;
}

/** A literal run of text, never crossing a line. */
export interface ParsedTextToken extends TokenBase {
  readonly kind: TokenKind.ParsedText;
  readonly text: string;
}

/** Verbatim capture. Multi-line captures are joined with `\n`. */
export interface RawTextToken extends TokenBase {
  readonly kind: TokenKind.RawText;
  readonly text: string;
}

export interface MathToken extends TokenBase {
  readonly kind: TokenKind.Math;
  readonly text: string;
}

export interface BooleanToken extends TokenBase {
  readonly kind: TokenKind.Boolean;
  readonly value: boolean;
}

export interface KeyValueEntry {
  readonly key: string;
  readonly value?: string;
}

export interface KeyValueListToken extends TokenBase {
  readonly kind: TokenKind.KeyValueList;
  readonly entries: readonly KeyValueEntry[];
}

export interface YamlToken extends TokenBase {
  readonly kind: TokenKind.Yaml;
  readonly value: unknown;
}

export interface BgroupToken extends TokenBase {
  readonly kind: TokenKind.Bgroup;
}

export interface EgroupToken extends TokenBase {
  readonly kind: TokenKind.Egroup;
}

/** A braced or bracketed argument's nested token list. */
export interface TokensToken extends TokenBase {
  readonly kind: TokenKind.Tokens;
  readonly tokens: readonly Token[];
}

export interface CommandToken extends TokenBase {
  readonly kind: TokenKind.Command;
  readonly definition: CommandDef;
  readonly args: readonly Token[];
}

export interface EnvironmentToken extends TokenBase {
  readonly kind: TokenKind.Environment;
  readonly definition: EnvironmentDef;
  readonly args: readonly Token[];
  readonly body: readonly Token[];
}

export type Token =
  | ParsedTextToken
  | RawTextToken
  | MathToken
  | BooleanToken
  | KeyValueListToken
  | YamlToken
  | BgroupToken
  | EgroupToken
  | TokensToken
  | CommandToken
  | EnvironmentToken;

export enum GroupKind {
  Brace,
  RequiredArgument,
  OptionalArgument,
  Environment,
  ArbitraryDelimiter,
}

/** An open scope on the group stack. */
export type GroupType =
  | { readonly kind: GroupKind.Brace }
  | { readonly kind: GroupKind.RequiredArgument }
  | { readonly kind: GroupKind.OptionalArgument }
  | { readonly kind: GroupKind.Environment; readonly definition: EnvironmentDef }
  | { readonly kind: GroupKind.ArbitraryDelimiter; readonly delimiter: string };

/** A group stack entry: the scope and where it was opened. */
export interface OpenGroup {
  readonly group: GroupType;
  readonly opened: ErrorContext;
}
