/**
 * Tokenizer for TeX-like markup.
 *
 * A direct-style recursive scan: the text scanner walks the current line,
 * hands every backslash to the command dispatcher, and the dispatcher re-enters
 * the text scanner whenever an argument or environment body needs nested
 * tokenization. Scope is tracked on the group stack, never in a separate
 * state machine.
 */

import { defaultArgumentHandlers, type ArgumentHandlers } from './argument-handlers.js';
import { createRegistry, type Registry } from './registry.js';
import { Chars, isCommandLetter, isWhiteSpace } from './scanner/character-codes.js';
import {
  blankLineWhileParsingCommandArguments,
  expectedOpenBrace,
  invalidArgument,
  mismatchedEnvironmentEnd,
  nestingTooDeep,
  unclosedGroup,
  undefinedCommand,
  undefinedEnvironment,
  unexpectedCloseBrace,
  unexpectedEnvironmentEnd,
  unexpectedEOFWhileParsingCommandArguments,
  unimplemented,
  type ParseError
} from './scanner/errors.js';
import { createGroupStack } from './scanner/group-stack.js';
import { createLineCursor, type CursorChar } from './scanner/line-cursor.js';
import { splitLines } from './scanner/line-source.js';
import {
  errorContextAt,
  locationAt,
  type ErrorContext,
  type Location
} from './scanner/location.js';
import {
  GroupKind,
  ParameterFormat,
  ParameterType,
  TokenKind,
  type CommandDef,
  type EnvironmentDef,
  type GroupType,
  type Parameter,
  type Token
} from './scanner/token-types.js';

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Registry to resolve names against; a fresh one when omitted. */
  registry?: Registry;

  /** Upper bound on nested argument and environment scans (default: 128) */
  maxNestingDepth?: number;

  /** Replacement decoders for key-value, macro-definition, math and YAML arguments. */
  handlers?: Partial<ArgumentHandlers>;

  /** Called with every error as it reaches the output. */
  onError?: (error: ParseError) => void;
}

export const DEFAULT_MAX_NESTING_DEPTH = 128;

/** File name given to sources created from a string. */
export const TEXT_SOURCE_FILE = '<text>';

/** One item of parse output, in source order. */
export type ParseOutput =
  | { readonly ok: true; readonly token: Token; readonly location: Location }
  | { readonly ok: false; readonly error: ParseError; readonly location: Location };

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface ParserDebugState {
  file: string;

  /** Current 1-based line number. */
  line: number;

  /** Current 0-based column. */
  column: number;

  lineText: string;

  /** Number of open groups on the group stack. */
  groupDepth: number;

  /** Number of nested scans currently running. */
  nestingDepth: number;

  /** True once the line supplier has run out. */
  exhausted: boolean;

  commandCount: number;
  environmentCount: number;
}

export interface Parser {
  defineCommand(name: string, parameters?: readonly Parameter[]): CommandDef;

  defineEnvironment(name: string, parameters: readonly Parameter[], bodyType: ParameterType): EnvironmentDef;

  /**
   * Tokenize the remaining input. Tokens and errors come back interleaved in
   * source order; a second call returns an empty array.
   */
  parse(): ParseOutput[];

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: ParserDebugState): void;

  readonly registry: Registry;
}

/** Why a call to the text scanner returned. */
const enum ScanStop {
  EndOfInput,
  Comment,
  CloseArgument,
  CloseEnvironment,
}

const enum SkipOutcome {
  Skipped,
  FoundBlankLine,
  EndOfFile,
}

/** Where a scan sends what it produces. */
interface Emitter {
  token(token: Token): void;
  error(error: ParseError): void;
}

/** Bracket nesting of an optional argument, kept across comment restarts. */
interface BracketFrame {
  depth: number;
}

/** The parameter being resolved; errors are reported against the command. */
interface ArgumentSlot {
  readonly commandName: string;
  readonly parameterNumber: number;
  readonly context: ErrorContext;
}

/**
 * A failed command, argument or body. `reported` is set when the error has
 * already gone to the output along with what the argument had collected.
 */
type Failure = { readonly ok: false; readonly error: ParseError; readonly reported?: boolean };

/** A command, argument or body either resolves or yields exactly one error. */
type Outcome =
  | { readonly ok: true; readonly token: Token | undefined }
  | Failure;

type ArgumentsOutcome =
  | { readonly ok: true; readonly tokens: Token[] }
  | Failure;

/** Types whose content is captured as raw text rather than tokenized. */
type RawParameterType = Exclude<ParameterType, ParameterType.ParsedTokens>;

type NameOutcome =
  | { readonly ok: true; readonly name: string }
  | { readonly ok: false; readonly error: ParseError };

const BOOLEAN_WORDS: Record<string, boolean> = {
  true: true,
  yes: true,
  false: false,
  no: false,
};

export function createParserFromText(source: string, options?: ParserOptions): Parser {
  return createParserFromLines(splitLines(source), TEXT_SOURCE_FILE, options);
}

export function createParserFromLines(lines: Iterable<string>, file: string, options: ParserOptions = {}): Parser {
  const registry = options.registry ?? createRegistry();
  const maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  if (!Number.isInteger(maxNestingDepth) || maxNestingDepth < 1)
    throw new Error('macroscan: maxNestingDepth must be a positive integer');

  const handlers: ArgumentHandlers = { ...defaultArgumentHandlers, ...options.handlers };
  const onError = options.onError;

  const cursor = createLineCursor(lines, file);
  const stack = createGroupStack();
  let nestingDepth = 0;

  cursor.advanceLine();

  function parse(): ParseOutput[] {
    const output: ParseOutput[] = [];
    const emitter: Emitter = {
      token(token) {
        output.push({ ok: true, token, location: token.location });
      },
      error(error) {
        onError?.(error);
        output.push({ ok: false, error, location: error.context.location });
      },
    };

    while (scanText(emitter) !== ScanStop.EndOfInput) {
      // a comment ended the scan step, keep going on the next line
    }

    for (const open of stack.drain())
      emitter.error(unclosedGroup(open.opened, open.group));

    return output;
  }

  // ---------------------------------------------------------------------------
  // Text scanner
  // ---------------------------------------------------------------------------

  function scanText(emitter: Emitter, brackets?: BracketFrame): ScanStop {
    if (cursor.column() === 0) skipLineWhitespace();
    let start = cursor.column();

    for (;;) {
      const current = cursor.peek();
      if (!current) {
        pushText(emitter, start, cursor.column());
        if (!cursor.advanceLine()) return ScanStop.EndOfInput;
        skipLineWhitespace();
        start = cursor.column();
        continue;
      }

      const { column, char } = current;
      switch (char) {
        case Chars.BACKSLASH: {
          pushText(emitter, start, column);
          if (dispatchCommand(emitter)) return ScanStop.CloseEnvironment;
          start = cursor.column();
          break;
        }

        // A comment drops the rest of the line and ends this scan step.
        case Chars.PERCENT: {
          pushText(emitter, start, column);
          cursor.advanceLine();
          return ScanStop.Comment;
        }

        case Chars.OPEN_BRACE: {
          pushText(emitter, start, column);
          emitter.token({ kind: TokenKind.Bgroup, location: locationAt(cursor.line, column) });
          stack.push({ kind: GroupKind.Brace }, errorContextAt(cursor.line, column));
          cursor.next();
          start = cursor.column();
          break;
        }

        case Chars.CLOSE_BRACE: {
          pushText(emitter, start, column);
          const group = stack.peek()?.group;
          cursor.next();
          if (group?.kind === GroupKind.Brace) {
            stack.pop();
            emitter.token({ kind: TokenKind.Egroup, location: locationAt(cursor.line, column) });
          } else if (group?.kind === GroupKind.RequiredArgument) {
            // structural: closes the argument being collected, no token
            stack.pop();
            return ScanStop.CloseArgument;
          } else {
            emitter.error(unexpectedCloseBrace(errorContextAt(cursor.line, column), group ?? null));
          }
          start = cursor.column();
          break;
        }

        case Chars.OPEN_BRACKET: {
          if (brackets && stack.peek()?.group.kind === GroupKind.OptionalArgument) brackets.depth++;
          cursor.next();
          break;
        }

        case Chars.CLOSE_BRACKET: {
          if (brackets && stack.peek()?.group.kind === GroupKind.OptionalArgument) {
            if (!brackets.depth) {
              pushText(emitter, start, column);
              cursor.next();
              stack.pop();
              return ScanStop.CloseArgument;
            }
            brackets.depth--;
          }
          cursor.next();
          break;
        }

        default:
          cursor.next();
      }
    }
  }

  function pushText(emitter: Emitter, start: number, end: number): void {
    if (start < end) {
      emitter.token({
        kind: TokenKind.ParsedText,
        location: locationAt(cursor.line, start),
        text: cursor.line.contents.slice(start, end),
      });
    }
  }

  function skipLineWhitespace(): void {
    for (let current = cursor.peek(); current && isWhiteSpaceChar(current.char); current = cursor.peek())
      cursor.next();
  }

  /**
   * Whitespace before an argument: may cross lines and comments, but not a
   * blank line or the end of input.
   */
  function skipArgumentWhitespace(): SkipOutcome {
    let lineEnds = 0;
    let foundBlankLine = false;

    for (;;) {
      const current = cursor.peek();
      if (!current) {
        if (!cursor.advanceLine()) return SkipOutcome.EndOfFile;
        lineEnds++;
        if (lineEnds > 1) foundBlankLine = true;
        continue;
      }

      if (current.char === Chars.PERCENT) {
        if (!cursor.advanceLine()) return SkipOutcome.EndOfFile;
        // the comment swallowed the line end; an empty line after it is blank
        lineEnds = 1;
        continue;
      }

      if (!isWhiteSpaceChar(current.char)) break;
      cursor.next();
    }

    return foundBlankLine ? SkipOutcome.FoundBlankLine : SkipOutcome.Skipped;
  }

  /**
   * Run the text scanner on nested content until it closes an argument or
   * environment, or input ends. Tokens are collected locally, errors go
   * straight on to the enclosing emitter.
   */
  function scanNested(parent: Emitter, brackets?: BracketFrame): { tokens: Token[]; stop: ScanStop } {
    const tokens: Token[] = [];
    const child: Emitter = {
      token(token) {
        tokens.push(token);
      },
      error(error) {
        parent.error(error);
      },
    };

    nestingDepth++;
    let stop = scanText(child, brackets);
    while (stop === ScanStop.Comment) stop = scanText(child, brackets);
    nestingDepth--;

    return { tokens, stop };
  }

  // ---------------------------------------------------------------------------
  // Command dispatcher
  // ---------------------------------------------------------------------------

  /**
   * Called with the cursor on a backslash. Returns true when the command was
   * the `\end` of the innermost open environment.
   */
  function dispatchCommand(emitter: Emitter): boolean {
    const context = errorContextAt(cursor.line, cursor.column());
    cursor.next();
    const name = readCommandName();

    if (name === 'end') return endEnvironment(context, emitter);

    const outcome = invokeCommand(name, context, emitter);
    if (!outcome.ok) {
      if (!outcome.reported) emitter.error(outcome.error);
    } else if (outcome.token) {
      emitter.token(outcome.token);
    }

    return false;
  }

  /**
   * Letters run to the first non-letter and take trailing same-line
   * whitespace with them; any other character is a one-character name and
   * leaves whitespace alone. A backslash at end of line is the command " ".
   */
  function readCommandName(): string {
    const first = cursor.peek();
    if (!first) return ' ';

    if (!isCommandLetter(first.char)) {
      cursor.next();
      return first.char;
    }

    let name = '';
    for (let current = cursor.peek(); current && isCommandLetter(current.char); current = cursor.peek()) {
      name += current.char;
      cursor.next();
    }

    skipLineWhitespace();
    return name;
  }

  function invokeCommand(name: string, context: ErrorContext, emitter: Emitter): Outcome {
    if (name === 'begin') return beginEnvironment(context, emitter);

    const definition = registry.lookupCommand(name);
    if (!definition)
      return { ok: false, error: undefinedCommand(context, name) };

    const args = resolveArguments(name, definition.parameters, context, emitter);
    if (!args.ok) return args;

    return {
      ok: true,
      token: { kind: TokenKind.Command, location: context.location, definition, args: args.tokens },
    };
  }

  /** Resolve parameters in order; the first failure abandons the rest. */
  function resolveArguments(
    commandName: string,
    parameters: readonly Parameter[],
    context: ErrorContext,
    emitter: Emitter): ArgumentsOutcome {
    const tokens: Token[] = [];

    for (let i = 0; i < parameters.length; i++) {
      const [format, type] = parameters[i];
      const slot: ArgumentSlot = { commandName, parameterNumber: i + 1, context };
      const outcome = resolveArgument(format, type, slot, emitter);
      if (!outcome.ok) return outcome;
      if (outcome.token) tokens.push(outcome.token);
    }

    return { ok: true, tokens };
  }

  function resolveArgument(format: ParameterFormat, type: ParameterType, slot: ArgumentSlot, emitter: Emitter): Outcome {
    switch (format) {
      case ParameterFormat.Star: return resolveStar();
      case ParameterFormat.Required: return resolveRequired(type, slot, emitter, true);
      case ParameterFormat.RequiredWithBraces: return resolveRequired(type, slot, emitter, false);
      case ParameterFormat.Optional: return resolveOptional(type, slot, emitter);
      case ParameterFormat.ArbitraryDelimiters: return resolveDelimited(type, slot);
    }
  }

  function resolveStar(): Outcome {
    const current = cursor.peek();
    const location = locationAt(cursor.line, cursor.column());
    const starred = current?.char === Chars.ASTERISK;
    if (starred) cursor.next();
    return { ok: true, token: { kind: TokenKind.Boolean, location, value: starred } };
  }

  function resolveRequired(type: ParameterType, slot: ArgumentSlot, emitter: Emitter, allowSingleToken: boolean): Outcome {
    const failure = skipToArgument(slot);
    if (failure) return { ok: false, error: failure };

    const current = cursor.peek();
    if (!current) return { ok: false, error: eofError(slot) };

    if (current.char === Chars.OPEN_BRACE) return resolveBraced(type, slot, emitter, current.column);

    if (!allowSingleToken)
      return { ok: false, error: expectedOpenBrace(slot.context, slot.commandName, slot.parameterNumber) };

    return resolveSingleToken(type, slot, emitter, current);
  }

  function resolveBraced(type: ParameterType, slot: ArgumentSlot, emitter: Emitter, column: number): Outcome {
    const location = locationAt(cursor.line, column);
    const opened = errorContextAt(cursor.line, column);

    if (type !== ParameterType.ParsedTokens) {
      stack.push({ kind: GroupKind.RequiredArgument }, opened);
      cursor.next();
      const text = captureRaw();
      stack.pop();
      if (text === undefined) return { ok: false, error: eofError(slot) };
      return convertRaw(type, text, location, slot);
    }

    if (nestingDepth >= maxNestingDepth)
      return { ok: false, error: nestingTooDeep(slot.context, maxNestingDepth) };

    const baseDepth = stack.depth();
    stack.push({ kind: GroupKind.RequiredArgument }, opened);
    cursor.next();

    const { tokens, stop } = scanNested(emitter);
    if (stop !== ScanStop.CloseArgument) return abandonArgument(slot, baseDepth, tokens, emitter);

    return { ok: true, token: { kind: TokenKind.Tokens, location, tokens } };
  }

  /**
   * Input ended inside a parsed argument: report that, hand on what the
   * argument collected, then report every group opened inside it.
   */
  function abandonArgument(slot: ArgumentSlot, baseDepth: number, tokens: Token[], emitter: Emitter): Failure {
    const error = eofError(slot);
    emitter.error(error);
    for (const token of tokens) emitter.token(token);

    // the first entry is the argument itself, covered by the error above
    const [, ...inner] = stack.truncate(baseDepth);
    for (const open of inner) emitter.error(unclosedGroup(open.opened, open.group));

    return { ok: false, error, reported: true };
  }

  /**
   * Argument without braces: one command invocation or one character. A
   * command argument yields its own token, or its error as this argument's
   * failure.
   */
  function resolveSingleToken(type: ParameterType, slot: ArgumentSlot, emitter: Emitter, current: CursorChar): Outcome {
    if (current.char === Chars.CLOSE_BRACE) {
      const group = stack.peek()?.group;
      // left in place only when it closes the enclosing brace or argument
      if (group?.kind !== GroupKind.Brace && group?.kind !== GroupKind.RequiredArgument) cursor.next();
      return { ok: false, error: unexpectedCloseBrace(slot.context, group ?? null) };
    }

    const location = locationAt(cursor.line, current.column);

    if (type !== ParameterType.ParsedTokens)
      return convertRaw(type, readRawSingleToken(), location, slot);

    if (current.char !== Chars.BACKSLASH) {
      cursor.next();
      return { ok: true, token: { kind: TokenKind.ParsedText, location, text: current.char } };
    }

    if (nestingDepth >= maxNestingDepth)
      return { ok: false, error: nestingTooDeep(slot.context, maxNestingDepth) };

    const context = errorContextAt(cursor.line, current.column);
    cursor.next();
    const name = readCommandName();
    if (name === 'end') {
      // leave \end for the enclosing environment
      cursor.seek(current.column);
      return {
        ok: false,
        error: invalidArgument(slot.context, slot.commandName, slot.parameterNumber, '\\end cannot be an argument'),
      };
    }

    nestingDepth++;
    const outcome = invokeCommand(name, context, emitter);
    nestingDepth--;

    // the argument fails as a whole, reported at the command taking it
    if (!outcome.ok && !outcome.reported)
      return { ok: false, error: { ...outcome.error, context: slot.context } };
    return outcome;
  }

  function resolveOptional(type: ParameterType, slot: ArgumentSlot, emitter: Emitter): Outcome {
    const failure = skipToArgument(slot);
    if (failure) return { ok: false, error: failure };

    const current = cursor.peek();
    if (current?.char !== Chars.OPEN_BRACKET) return { ok: true, token: undefined };

    const location = locationAt(cursor.line, current.column);
    const opened = errorContextAt(cursor.line, current.column);

    if (type !== ParameterType.ParsedTokens) {
      stack.push({ kind: GroupKind.OptionalArgument }, opened);
      cursor.next();
      const text = captureRaw();
      stack.pop();
      if (text === undefined) return { ok: false, error: eofError(slot) };
      return convertRaw(type, text, location, slot);
    }

    if (nestingDepth >= maxNestingDepth)
      return { ok: false, error: nestingTooDeep(slot.context, maxNestingDepth) };

    const baseDepth = stack.depth();
    stack.push({ kind: GroupKind.OptionalArgument }, opened);
    cursor.next();

    const { tokens, stop } = scanNested(emitter, { depth: 0 });
    if (stop !== ScanStop.CloseArgument) return abandonArgument(slot, baseDepth, tokens, emitter);

    return { ok: true, token: { kind: TokenKind.Tokens, location, tokens } };
  }

  /** `\verb|...|` style: the next character is the delimiter. */
  function resolveDelimited(type: ParameterType, slot: ArgumentSlot): Outcome {
    if (type === ParameterType.ParsedTokens)
      return { ok: false, error: unimplemented(slot.context, 'parsed tokens between arbitrary delimiters') };

    const current = cursor.peek();
    if (!current) {
      if (!cursor.advanceLine()) return { ok: false, error: eofError(slot) };
      skipLineWhitespace();
      return {
        ok: false,
        error: invalidArgument(slot.context, slot.commandName, slot.parameterNumber, 'missing delimiter'),
      };
    }

    const location = locationAt(cursor.line, current.column);
    stack.push({ kind: GroupKind.ArbitraryDelimiter, delimiter: current.char }, errorContextAt(cursor.line, current.column));
    cursor.next();
    const text = captureRaw();
    stack.pop();

    if (text === undefined) return { ok: false, error: eofError(slot) };
    return convertRaw(type, text, location, slot);
  }

  function skipToArgument(slot: ArgumentSlot): ParseError | undefined {
    switch (skipArgumentWhitespace()) {
      case SkipOutcome.FoundBlankLine:
        return blankLineWhileParsingCommandArguments(slot.context, slot.commandName, slot.parameterNumber);
      case SkipOutcome.EndOfFile:
        return eofError(slot);
      case SkipOutcome.Skipped:
        return undefined;
    }
  }

  function eofError(slot: ArgumentSlot): ParseError {
    return unexpectedEOFWhileParsingCommandArguments(slot.context, slot.commandName, slot.parameterNumber);
  }

  /** Turn captured raw text into the token its parameter type calls for. */
  function convertRaw(type: RawParameterType, text: string, location: Location, slot: ArgumentSlot): Outcome {
    if (type === ParameterType.VerbatimText)
      return { ok: true, token: { kind: TokenKind.RawText, location, text } };

    if (type === ParameterType.Boolean) {
      const word = text.trim().toLowerCase();
      if (!Object.prototype.hasOwnProperty.call(BOOLEAN_WORDS, word)) {
        return {
          ok: false,
          error: invalidArgument(slot.context, slot.commandName, slot.parameterNumber,
            `expected true, false, yes or no, found "${text.trim()}"`),
        };
      }
      return { ok: true, token: { kind: TokenKind.Boolean, location, value: BOOLEAN_WORDS[word] } };
    }

    const result = handlers[type](text, {
      registry,
      commandName: slot.commandName,
      parameterNumber: slot.parameterNumber,
      location,
    });
    if (!result.ok)
      return { ok: false, error: invalidArgument(slot.context, slot.commandName, slot.parameterNumber, result.reason) };

    return { ok: true, token: result.token };
  }

  // ---------------------------------------------------------------------------
  // Raw capture
  // ---------------------------------------------------------------------------

  /**
   * Raw text up to the closer of the group on top of the stack, consuming
   * the closer. Inside `{...}` and `[...]` braces are balanced and a
   * backslash and the character after it are copied as a pair, so `\{` does
   * not count; a delimiter group ends at the next delimiter. Lines are
   * joined with `\n`; undefined when input ends first.
   */
  function captureRaw(): string | undefined {
    const group = stack.peek()?.group;
    const close = group && rawCloser(group);
    if (!group || close === undefined)
      throw new Error('macroscan: raw capture outside an argument group');

    const balanced = group.kind !== GroupKind.ArbitraryDelimiter;
    const parts: string[] = [];
    let start = cursor.column();
    let depth = 0;

    for (;;) {
      const current = cursor.next();
      if (!current) {
        parts.push(cursor.line.contents.slice(start));
        if (!cursor.advanceLine()) return undefined;
        start = 0;
        continue;
      }

      const { column, char } = current;
      if (char === close && !depth) {
        parts.push(cursor.line.contents.slice(start, column));
        return parts.join('\n');
      }

      if (!balanced) continue;
      if (char === Chars.BACKSLASH) {
        cursor.next();
      } else if (char === Chars.OPEN_BRACE) {
        depth++;
      } else if (char === Chars.CLOSE_BRACE && depth > 0) {
        depth--;
      }
    }
  }

  /** A control sequence (`\name` or `\x`) or a single character, unparsed. */
  function readRawSingleToken(): string {
    const start = cursor.column();
    const first = cursor.next();
    if (first?.char === Chars.BACKSLASH) {
      const next = cursor.next();
      if (next && isCommandLetter(next.char)) {
        for (let current = cursor.peek(); current && isCommandLetter(current.char); current = cursor.peek())
          cursor.next();
      }
    }
    return cursor.line.contents.slice(start, cursor.column());
  }

  // ---------------------------------------------------------------------------
  // Environments
  // ---------------------------------------------------------------------------

  function readEnvironmentName(commandName: string, context: ErrorContext): NameOutcome {
    const slot: ArgumentSlot = { commandName, parameterNumber: 1, context };
    const failure = skipToArgument(slot);
    if (failure) return { ok: false, error: failure };

    const current = cursor.peek();
    if (current?.char !== Chars.OPEN_BRACE)
      return { ok: false, error: expectedOpenBrace(context, commandName, 1) };

    stack.push({ kind: GroupKind.RequiredArgument }, errorContextAt(cursor.line, current.column));
    cursor.next();
    const text = captureRaw();
    stack.pop();

    if (text === undefined) return { ok: false, error: eofError(slot) };
    return { ok: true, name: text.trim() };
  }

  function beginEnvironment(context: ErrorContext, emitter: Emitter): Outcome {
    const named = readEnvironmentName('begin', context);
    if (!named.ok) return named;

    const definition = registry.lookupEnvironment(named.name);
    if (!definition) return { ok: false, error: undefinedEnvironment(context, named.name) };

    const args = resolveArguments(definition.name, definition.parameters, context, emitter);
    if (!args.ok) return args;

    const bodyType = definition.bodyType;
    if (bodyType === ParameterType.ParsedTokens) {
      if (nestingDepth >= maxNestingDepth)
        return { ok: false, error: nestingTooDeep(context, maxNestingDepth) };

      // Popped by the matching \end; at end of input it stays open and is
      // reported with the other unclosed groups.
      stack.push({ kind: GroupKind.Environment, definition }, context);
      const { tokens } = scanNested(emitter);
      return {
        ok: true,
        token: { kind: TokenKind.Environment, location: context.location, definition, args: args.tokens, body: tokens },
      };
    }

    const bodyLocation = locationAt(cursor.line, cursor.column());
    stack.push({ kind: GroupKind.Environment, definition }, context);
    const body = captureEnvironmentBody(definition.name);
    if (body.closed) stack.pop();

    const slot: ArgumentSlot = { commandName: definition.name, parameterNumber: 0, context };
    const converted = convertRaw(bodyType, body.text, bodyLocation, slot);
    if (!converted.ok) return converted;

    return {
      ok: true,
      token: {
        kind: TokenKind.Environment,
        location: context.location,
        definition,
        args: args.tokens,
        body: converted.token ? [converted.token] : [],
      },
    };
  }

  /**
   * Raw lines up to `\end{name}`, leaving the cursor after it. A blank rest of
   * the `\begin` line and a blank start of the `\end` line are dropped.
   */
  function captureEnvironmentBody(name: string): { text: string; closed: boolean } {
    const marker = `\\end{${name}}`;
    const parts: string[] = [];
    let start = cursor.column();

    for (;;) {
      const contents = cursor.line.contents;
      const at = contents.indexOf(marker, start);
      if (at >= 0) {
        parts.push(contents.slice(start, at));
        cursor.seek(at + marker.length);
        return { text: joinBodyLines(parts), closed: true };
      }

      parts.push(contents.slice(start));
      if (!cursor.advanceLine()) return { text: joinBodyLines(parts), closed: false };
      start = 0;
    }
  }

  /** Returns true when the `\end` closed the innermost environment. */
  function endEnvironment(context: ErrorContext, emitter: Emitter): boolean {
    const named = readEnvironmentName('end', context);
    if (!named.ok) {
      emitter.error(named.error);
      return false;
    }

    const group = stack.peek()?.group;
    if (group?.kind === GroupKind.Environment) {
      if (group.definition.name === named.name) {
        stack.pop();
        return true;
      }
      emitter.error(mismatchedEnvironmentEnd(context, group.definition.name, named.name));
      return false;
    }

    emitter.error(unexpectedEnvironmentEnd(context, named.name, group ?? null));
    return false;
  }

  function fillDebugState(state: ParserDebugState): void {
    state.file = cursor.line.file;
    state.line = cursor.line.lineNumber;
    state.column = cursor.column();
    state.lineText = cursor.line.contents;
    state.groupDepth = stack.depth();
    state.nestingDepth = nestingDepth;
    state.exhausted = cursor.exhausted;
    state.commandCount = registry.commandCount;
    state.environmentCount = registry.environmentCount;
  }

  return {
    defineCommand: registry.defineCommand,
    defineEnvironment: registry.defineEnvironment,
    parse,
    fillDebugState,
    get registry() { return registry; },
  };
}

/** Closing character of an argument group captured as raw text. */
function rawCloser(group: GroupType): string | undefined {
  switch (group.kind) {
    case GroupKind.RequiredArgument: return Chars.CLOSE_BRACE;
    case GroupKind.OptionalArgument: return Chars.CLOSE_BRACKET;
    case GroupKind.ArbitraryDelimiter: return group.delimiter;
    default: return undefined;
  }
}

function isWhiteSpaceChar(ch: string): boolean {
  return isWhiteSpace(ch.charCodeAt(0));
}

function joinBodyLines(parts: string[]): string {
  if (parts.length > 1 && !parts[0].trim()) parts.shift();
  if (parts.length > 1 && !parts[parts.length - 1].trim()) parts.pop();
  return parts.join('\n');
}
