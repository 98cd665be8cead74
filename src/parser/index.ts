import type { CompiledGrammar } from '../grammar/index';
import { type Location, isValidLocation, highlightSnippet } from '../utils/index';

export type ParserOptions = {
  grammarSource?: string;
  startRule?: string;
};

export interface ParseResult<T = unknown> {
  success: true;
  result: T;
}

export interface ParseError {
  success: false;
  error: string;
  location?: Location;
  expected?: string[];
  found?: string | null;
  stack?: string;
  input?: string;
  snippet?: string;
}

/**
 * Run a compiled grammar without throwing: failures come back as a
 * `ParseError` carrying location, expectations and a source snippet.
 */
export function parseInput<T = unknown>(
  grammar: CompiledGrammar<T>,
  input: string,
  options: ParserOptions = {}
): ParseResult<T> | ParseError {
  try {
    return { success: true, result: grammar.parse(input, options) };
  } catch (error: unknown) {
    return createParseError(error, input);
  }
}

export function createParseError(error: unknown, input: string): ParseError {
  const parseError: ParseError = {
    success: false,
    error: 'Parse error',
    input,
    found: null,
  };
  if (typeof error !== 'object' || error === null) {
    if (typeof error === 'string') parseError.error = error;
    return parseError;
  }

  if ('message' in error && typeof error.message === 'string' && error.message) {
    parseError.error = error.message;
  }
  if ('stack' in error && typeof error.stack === 'string') {
    parseError.stack = error.stack;
  }
  if ('location' in error && isValidLocation(error.location)) {
    const { start, end } = error.location;
    parseError.location = {
      start: { line: start.line, column: start.column, offset: start.offset },
      end: { line: end.line, column: end.column, offset: end.offset },
    };
    parseError.snippet = highlightSnippet(input, parseError.location, false);
  }
  if ('expected' in error && Array.isArray(error.expected)) {
    parseError.expected = error.expected.map(describeExpectation);
  }
  if ('found' in error && typeof error.found === 'string') {
    parseError.found = error.found;
  }
  return parseError;
}

// peggy reports expectations as { type, text | description, ... } records.
function describeExpectation(expectation: unknown): string {
  if (typeof expectation === 'string') return expectation;
  if (typeof expectation !== 'object' || expectation === null || !('type' in expectation)) {
    return String(expectation);
  }
  switch (expectation.type) {
    case 'literal':
      return 'text' in expectation ? JSON.stringify(expectation.text) : 'literal';
    case 'class':
      return 'character class';
    case 'any':
      return 'any character';
    case 'end':
      return 'end of input';
    default:
      return 'description' in expectation && typeof expectation.description === 'string'
        ? expectation.description
        : String(expectation.type);
  }
}
