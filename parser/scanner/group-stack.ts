import type { ErrorContext } from './location.js';
import { GroupKind, type GroupType, type OpenGroup } from './token-types.js';

export interface GroupStack {
  push(group: GroupType, opened: ErrorContext): void;

  /** Remove and return the innermost entry. */
  pop(): OpenGroup | undefined;

  /** Innermost entry, left in place. */
  peek(): OpenGroup | undefined;

  /** Number of open groups. */
  depth(): number;

  /**
   * Remove every entry above `depth`, used when a nested scan is abandoned.
   * Returns them in the order they were opened.
   */
  truncate(depth: number): OpenGroup[];

  /** Remove all entries, returning them in the order they were opened. */
  drain(): OpenGroup[];
}

export function createGroupStack(): GroupStack {
  const entries: OpenGroup[] = [];

  function push(group: GroupType, opened: ErrorContext): void {
    entries.push({ group, opened });
  }

  function pop(): OpenGroup | undefined {
    return entries.pop();
  }

  function peek(): OpenGroup | undefined {
    return entries.length ? entries[entries.length - 1] : undefined;
  }

  function depth(): number {
    return entries.length;
  }

  function truncate(newDepth: number): OpenGroup[] {
    return newDepth < entries.length ? entries.splice(newDepth) : [];
  }

  function drain(): OpenGroup[] {
    return entries.splice(0, entries.length);
  }

  return {
    push,
    pop,
    peek,
    depth,
    truncate,
    drain,
  };
}

/** Short human-readable name of a group, used in messages and dumps. */
export function describeGroup(group: GroupType | null): string {
  if (!group) return 'none';
  switch (group.kind) {
    case GroupKind.Brace: return 'brace';
    case GroupKind.RequiredArgument: return 'required argument';
    case GroupKind.OptionalArgument: return 'optional argument';
    case GroupKind.Environment: return `environment ${group.definition.name}`;
    case GroupKind.ArbitraryDelimiter: return `delimiter ${group.delimiter}`;
  }
}
