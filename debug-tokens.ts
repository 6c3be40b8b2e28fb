import { readFileSync } from 'fs';

import {
  createParserFromLines,
  formatParseError,
  formatParseOutput,
  ParameterFormat,
  ParameterType,
  splitLines,
  type ParserDebugState
} from './parser/index.js';

const file = process.argv[2];
if (!file) {
  console.log('Usage: debug-tokens <file> [command[:arity] ...]');
  process.exit(1);
}

const parser = createParserFromLines(splitLines(readFileSync(file, 'utf8')), file, {
  onError: error => console.log(formatParseError(error)),
});

// Commands named on the command line take that many braced arguments.
for (const arg of process.argv.slice(3)) {
  const [name, arity] = arg.split(':');
  const count = arity ? parseInt(arity, 10) : 0;
  parser.defineCommand(name, Array.from({ length: count }, () =>
    [ParameterFormat.Required, ParameterType.ParsedTokens] as const));
}

console.log(`Tokenizing ${file}...`);
const output = parser.parse();

for (const line of formatParseOutput(output)) console.log(line);

const state: ParserDebugState = {
  file: '',
  line: 0,
  column: 0,
  lineText: '',
  groupDepth: 0,
  nestingDepth: 0,
  exhausted: false,
  commandCount: 0,
  environmentCount: 0,
};
parser.fillDebugState(state);
console.log(`Done: ${output.length} items, ${output.filter(item => !item.ok).length} errors, ` +
  `${state.commandCount} commands defined, stopped at line ${state.line}.`);
