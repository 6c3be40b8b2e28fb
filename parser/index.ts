export {
  createParserFromText,
  createParserFromLines,
  DEFAULT_MAX_NESTING_DEPTH,
  TEXT_SOURCE_FILE
} from './tokenizer.js';
export type { Parser, ParserOptions, ParseOutput, ParserDebugState } from './tokenizer.js';

export { createRegistry } from './registry.js';
export type { Registry } from './registry.js';

export * from './argument-handlers.js';
export * from './token-text.js';

export * from './scanner/token-types.js';
export * from './scanner/errors.js';
export * from './scanner/location.js';
export { describeGroup } from './scanner/group-stack.js';
export { splitLines } from './scanner/line-source.js';
