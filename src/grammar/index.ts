import fs from 'node:fs';
import path from 'node:path';
import { generate, type ParserBuildOptions } from 'peggy';
import { formatCompilationError } from '../utils/index';
import type { ParserOptions } from '../parser/index';

export interface CompiledGrammar<ASTNode = unknown> {
  parse: (input: string, options?: ParserOptions) => ASTNode;
  source: string;
  options: CompileOptions;
}

export interface CompileOptions {
  allowedStartRules?: string[];
  cache?: boolean;
  grammarSource?: string;
  trace?: boolean;
}

export const SPROUT_GRAMMAR_PATH = path.join(__dirname, 'sprout.peg');

export function compileGrammar<ASTNode = unknown>(
  grammar: string,
  options: CompileOptions = {}
): CompiledGrammar<ASTNode> {
  const resolved: CompileOptions = {
    allowedStartRules: ['*'],
    cache: false,
    trace: false,
    ...options,
  };
  const buildOptions: ParserBuildOptions = {
    allowedStartRules: resolved.allowedStartRules,
    cache: resolved.cache,
    grammarSource: resolved.grammarSource,
    trace: resolved.trace,
    output: 'parser',
  };

  try {
    const parser = generate(grammar, buildOptions);
    return {
      parse: (input, parseOptions = {}) => parser.parse(input, toPeggyOptions(parseOptions)),
      source: grammar,
      options: resolved,
    };
  } catch (error: unknown) {
    throw new Error(`Grammar compilation failed:\n${formatCompilationError(error, grammar, false)}`);
  }
}

function toPeggyOptions(options: ParserOptions): ParserOptions {
  // peggy checks for the presence of `startRule`, not its value
  const peggyOptions: ParserOptions = {};
  if (options.grammarSource !== undefined) peggyOptions.grammarSource = options.grammarSource;
  if (options.startRule !== undefined) peggyOptions.startRule = options.startRule;
  return peggyOptions;
}

export function compileGrammarFromFile<ASTNode = unknown>(
  filePath: string,
  options: CompileOptions = {}
): CompiledGrammar<ASTNode> {
  let grammar: string;
  try {
    grammar = fs.readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read grammar file ${filePath}: ${message}`);
  }
  return compileGrammar<ASTNode>(grammar, { ...options, grammarSource: filePath });
}

let sproutGrammar: CompiledGrammar | null = null;

/** The bundled Sprout grammar, compiled once per process. */
export function loadSproutGrammar(): CompiledGrammar {
  if (!sproutGrammar) {
    sproutGrammar = compileGrammarFromFile(SPROUT_GRAMMAR_PATH);
  }
  return sproutGrammar;
}
