import { type ParserOptions, parseInput, type ParseError } from '../parser/index';
import { type CompiledGrammar, loadSproutGrammar } from '../grammar/index';
import { type SproutProgram, isSproutProgram } from './ast';
import { type Location } from '../utils/index';

export interface SproutParseOptions extends ParserOptions {
  /** Defaults to the bundled grammar. */
  grammar?: CompiledGrammar;
}

export class SproutSyntaxError extends Error {
  location?: Location;
  expected?: string[];
  found?: string | null;
  input?: string;

  constructor(message: string, details: ParseError) {
    super(message);
    this.name = 'SproutSyntaxError';
    this.location = details.location;
    this.expected = details.expected;
    this.found = details.found ?? null;
    this.input = details.input;
  }

  toParseError(): ParseError {
    return {
      success: false,
      error: this.message,
      location: this.location,
      expected: this.expected,
      found: this.found,
      input: this.input,
    };
  }
}

export function parseProgram(input: string, options: SproutParseOptions = {}): SproutProgram {
  const { grammar = loadSproutGrammar(), ...parserOptions } = options;
  const result = parseInput(grammar, input, parserOptions);
  if (result.success) {
    if (!isSproutProgram(result.result)) {
      throw new Error('Sprout grammar did not produce a Program node');
    }
    return result.result;
  }
  const loc = result.location?.start;
  const source = options.grammarSource ?? 'input';
  const suffix = loc ? ` at ${source}:${loc.line}:${loc.column}` : ` at ${source}`;
  throw new SproutSyntaxError(`[Sprout Syntax Error] ${result.error}${suffix}`, result);
}
