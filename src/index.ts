// src/index.ts
// ============================================
// 🌱 Sprout Main API Surface (Public Entry)
// ============================================

// 🌳 Program representation
export * as ast from './sprout/ast';
export type {
  SproutExpr,
  SproutStatement,
  SproutProgram,
  PrefixOperator,
  InfixOperator,
} from './sprout/ast';

// 🔢 Values
export {
  NULL,
  integer,
  boolean,
  returned,
  inspect,
  typeName,
  valueEquals,
  type SproutValue,
  type ProgramValue,
} from './sprout/values';

// ⚙️ Evaluation
export {
  Evaluator,
  evaluateExpression,
  evaluateStatement,
  evaluateStatements,
  evaluateProgram,
  tryEvaluateProgram,
  type EvaluatorOptions,
  type EvaluationTracer,
  type EvaluationTraceEvent,
  type EvaluationOutcome,
} from './sprout/evaluator';
export { SproutRuntimeError, type RuntimeErrorCode } from './sprout/errors';
export { run, tryRun, type RunOptions, type RunOutcome } from './sprout/run';

// 🔤 Front end
export { tokenize, isIncomplete, createSproutLexer, SproutLexError, type SproutToken } from './sprout/lexer';
export { parseProgram, SproutSyntaxError, type SproutParseOptions } from './sprout/parser';
export {
  compileGrammar,
  compileGrammarFromFile,
  loadSproutGrammar,
  type CompiledGrammar,
} from './grammar/index';
export { parseInput, type ParseError, type ParseResult } from './parser/index';

// 🧾 Utilities
export {
  formatError,
  formatErrorWithColors,
  formatRuntimeError,
  formatLocation,
  highlightSnippet,
  createLogger,
  type Location,
  type Logger,
} from './utils/index';
export { loadConfig, resolveSettings, defaultSettings, type SproutSettings } from './config';
