/**
 * Recoverable parse failures.
 *
 * Errors are values placed in the output stream next to tokens; the scanner
 * never throws them. Each carries the location and the text of the line it
 * was found on.
 */

import { describeGroup } from './group-stack.js';
import { formatLocation, type ErrorContext } from './location.js';
import type { GroupType } from './token-types.js';

/**
 * Machine-readable error codes
 */
export enum ErrorCode {
  UndefinedCommand = 'undefined-command',
  Unimplemented = 'unimplemented',
  BlankLineWhileParsingCommandArguments = 'blank-line-in-arguments',
  UnexpectedEOFWhileParsingCommandArguments = 'eof-in-arguments',
  UnexpectedCloseBrace = 'unexpected-close-brace',
  ExpectedOpenBrace = 'expected-open-brace',
  InvalidArgument = 'invalid-argument',
  UndefinedEnvironment = 'undefined-environment',
  MismatchedEnvironmentEnd = 'mismatched-environment-end',
  UnexpectedEnvironmentEnd = 'unexpected-environment-end',
  UnclosedGroup = 'unclosed-group',
  NestingTooDeep = 'nesting-too-deep',
}

interface ParseErrorBase {
  readonly context: ErrorContext;

  /** Human-readable message */
  readonly message: string;
}

/** Failures tied to one parameter of a command or environment. */
interface ArgumentErrorBase extends ParseErrorBase {
  readonly commandName: string;

  /** 1-based */
  readonly parameterNumber: number;
}

export interface UndefinedCommandError extends ParseErrorBase {
  readonly code: ErrorCode.UndefinedCommand;
  readonly commandName: string;
}

export interface UnimplementedError extends ParseErrorBase {
  readonly code: ErrorCode.Unimplemented;
  readonly feature: string;
}

export interface BlankLineError extends ArgumentErrorBase {
  readonly code: ErrorCode.BlankLineWhileParsingCommandArguments;
}

export interface UnexpectedEOFError extends ArgumentErrorBase {
  readonly code: ErrorCode.UnexpectedEOFWhileParsingCommandArguments;
}

export interface UnexpectedCloseBraceError extends ParseErrorBase {
  readonly code: ErrorCode.UnexpectedCloseBrace;

  /** The group that was open instead of a brace, null when none was. */
  readonly groupType: GroupType | null;
}

export interface ExpectedOpenBraceError extends ArgumentErrorBase {
  readonly code: ErrorCode.ExpectedOpenBrace;
}

export interface InvalidArgumentError extends ArgumentErrorBase {
  readonly code: ErrorCode.InvalidArgument;
  readonly reason: string;
}

export interface UndefinedEnvironmentError extends ParseErrorBase {
  readonly code: ErrorCode.UndefinedEnvironment;
  readonly environmentName: string;
}

export interface MismatchedEnvironmentEndError extends ParseErrorBase {
  readonly code: ErrorCode.MismatchedEnvironmentEnd;
  readonly expected: string;
  readonly found: string;
}

export interface UnexpectedEnvironmentEndError extends ParseErrorBase {
  readonly code: ErrorCode.UnexpectedEnvironmentEnd;
  readonly environmentName: string;
  readonly groupType: GroupType | null;
}

export interface UnclosedGroupError extends ParseErrorBase {
  readonly code: ErrorCode.UnclosedGroup;
  readonly groupType: GroupType;
}

export interface NestingTooDeepError extends ParseErrorBase {
  readonly code: ErrorCode.NestingTooDeep;
  readonly limit: number;
}

export type ParseError =
  | UndefinedCommandError
  | UnimplementedError
  | BlankLineError
  | UnexpectedEOFError
  | UnexpectedCloseBraceError
  | ExpectedOpenBraceError
  | InvalidArgumentError
  | UndefinedEnvironmentError
  | MismatchedEnvironmentEndError
  | UnexpectedEnvironmentEndError
  | UnclosedGroupError
  | NestingTooDeepError;

export function undefinedCommand(context: ErrorContext, commandName: string): UndefinedCommandError {
  return {
    code: ErrorCode.UndefinedCommand,
    context,
    commandName,
    message: `Undefined command \\${commandName}`,
  };
}

export function unimplemented(context: ErrorContext, feature: string): UnimplementedError {
  return {
    code: ErrorCode.Unimplemented,
    context,
    feature,
    message: `Not implemented: ${feature}`,
  };
}

export function blankLineWhileParsingCommandArguments(
  context: ErrorContext, commandName: string, parameterNumber: number): BlankLineError {
  return {
    code: ErrorCode.BlankLineWhileParsingCommandArguments,
    context,
    commandName,
    parameterNumber,
    message: `Blank line while looking for argument ${parameterNumber} of \\${commandName}`,
  };
}

export function unexpectedEOFWhileParsingCommandArguments(
  context: ErrorContext, commandName: string, parameterNumber: number): UnexpectedEOFError {
  return {
    code: ErrorCode.UnexpectedEOFWhileParsingCommandArguments,
    context,
    commandName,
    parameterNumber,
    message: `End of input while reading argument ${parameterNumber} of \\${commandName}`,
  };
}

export function unexpectedCloseBrace(context: ErrorContext, groupType: GroupType | null): UnexpectedCloseBraceError {
  return {
    code: ErrorCode.UnexpectedCloseBrace,
    context,
    groupType,
    message: groupType ?
      `Unexpected } while ${describeGroup(groupType)} is open` :
      'Unexpected } with no open group',
  };
}

export function expectedOpenBrace(
  context: ErrorContext, commandName: string, parameterNumber: number): ExpectedOpenBraceError {
  return {
    code: ErrorCode.ExpectedOpenBrace,
    context,
    commandName,
    parameterNumber,
    message: `Argument ${parameterNumber} of \\${commandName} must start with {`,
  };
}

export function invalidArgument(
  context: ErrorContext, commandName: string, parameterNumber: number, reason: string): InvalidArgumentError {
  return {
    code: ErrorCode.InvalidArgument,
    context,
    commandName,
    parameterNumber,
    reason,
    message: `Invalid argument ${parameterNumber} of \\${commandName}: ${reason}`,
  };
}

export function undefinedEnvironment(context: ErrorContext, environmentName: string): UndefinedEnvironmentError {
  return {
    code: ErrorCode.UndefinedEnvironment,
    context,
    environmentName,
    message: `Undefined environment ${environmentName}`,
  };
}

export function mismatchedEnvironmentEnd(
  context: ErrorContext, expected: string, found: string): MismatchedEnvironmentEndError {
  return {
    code: ErrorCode.MismatchedEnvironmentEnd,
    context,
    expected,
    found,
    message: `\\end{${found}} does not match \\begin{${expected}}`,
  };
}

export function unexpectedEnvironmentEnd(
  context: ErrorContext, environmentName: string, groupType: GroupType | null): UnexpectedEnvironmentEndError {
  return {
    code: ErrorCode.UnexpectedEnvironmentEnd,
    context,
    environmentName,
    groupType,
    message: `\\end{${environmentName}} while ${describeGroup(groupType)} is open`,
  };
}

export function unclosedGroup(context: ErrorContext, groupType: GroupType): UnclosedGroupError {
  return {
    code: ErrorCode.UnclosedGroup,
    context,
    groupType,
    message: `Unclosed ${describeGroup(groupType)}`,
  };
}

export function nestingTooDeep(context: ErrorContext, limit: number): NestingTooDeepError {
  return {
    code: ErrorCode.NestingTooDeep,
    context,
    limit,
    message: `Nesting deeper than ${limit} levels`,
  };
}

/**
 * Render an error as `file:line:col: message`, followed by the offending line
 * and a caret under the column.
 */
export function formatParseError(error: ParseError): string {
  const { location, lineText } = error.context;
  const caretPad = lineText.slice(0, location.column).replace(/[^\t]/g, ' ');
  return `${formatLocation(location)}: ${error.message}\n${lineText}\n${caretPad}^`;
}
