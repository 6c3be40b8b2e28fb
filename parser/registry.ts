/**
 * Command and environment definitions by name.
 *
 * Definitions are frozen when inserted and shared by reference; redefining a
 * name replaces the entry, tokens produced earlier keep the old definition.
 */

import type {
  CommandDef,
  EnvironmentDef,
  Parameter,
  ParameterType
} from './scanner/token-types.js';

export interface Registry {
  /** Insert or replace a command definition. */
  defineCommand(name: string, parameters?: readonly Parameter[]): CommandDef;

  /** Insert or replace an environment definition. */
  defineEnvironment(name: string, parameters: readonly Parameter[], bodyType: ParameterType): EnvironmentDef;

  lookupCommand(name: string): CommandDef | undefined;

  lookupEnvironment(name: string): EnvironmentDef | undefined;

  readonly commandCount: number;
  readonly environmentCount: number;
}

export function createRegistry(): Registry {
  const commands = new Map<string, CommandDef>();
  const environments = new Map<string, EnvironmentDef>();

  function defineCommand(name: string, parameters: readonly Parameter[] = []): CommandDef {
    assertName(name, 'command');
    const definition: CommandDef = Object.freeze({
      name,
      parameters: freezeParameters(parameters),
    });
    commands.set(name, definition);
    return definition;
  }

  function defineEnvironment(name: string, parameters: readonly Parameter[], bodyType: ParameterType): EnvironmentDef {
    assertName(name, 'environment');
    const definition: EnvironmentDef = Object.freeze({
      name,
      parameters: freezeParameters(parameters),
      bodyType,
    });
    environments.set(name, definition);
    return definition;
  }

  function lookupCommand(name: string): CommandDef | undefined {
    return commands.get(name);
  }

  function lookupEnvironment(name: string): EnvironmentDef | undefined {
    return environments.get(name);
  }

  return {
    defineCommand,
    defineEnvironment,
    lookupCommand,
    lookupEnvironment,
    get commandCount() { return commands.size; },
    get environmentCount() { return environments.size; },
  };
}

function assertName(name: string, what: string): void {
  if (!name)
    throw new Error(`macroscan: ${what} name must not be empty`);
}

// Copy so later mutation of the caller's array cannot reach the definition.
function freezeParameters(parameters: readonly Parameter[]): readonly Parameter[] {
  return Object.freeze(parameters.map(([format, type]) => Object.freeze([format, type] as const)));
}
