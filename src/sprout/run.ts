import { parseProgram, SproutSyntaxError, type SproutParseOptions } from './parser';
import { Evaluator, type EvaluatorOptions } from './evaluator';
import { SproutRuntimeError } from './errors';
import type { ProgramValue } from './values';
import type { SproutProgram } from './ast';

export interface RunOptions extends EvaluatorOptions {
  parse?: SproutParseOptions;
}

export type RunOutcome =
  | { success: true; value: ProgramValue }
  | { success: false; stage: 'parse'; error: SproutSyntaxError }
  | { success: false; stage: 'evaluate'; error: SproutRuntimeError };

/** Parse and evaluate `source`; syntax and runtime errors are thrown. */
export function run(source: string, options: RunOptions = {}): ProgramValue {
  const program = parseProgram(source, options.parse);
  return new Evaluator(options).evaluateProgram(program);
}

export function tryRun(source: string, options: RunOptions = {}): RunOutcome {
  let program: SproutProgram;
  try {
    program = parseProgram(source, options.parse);
  } catch (error: unknown) {
    if (error instanceof SproutSyntaxError) return { success: false, stage: 'parse', error };
    throw error;
  }
  const outcome = new Evaluator(options).tryEvaluateProgram(program);
  return outcome.success ? outcome : { success: false, stage: 'evaluate', error: outcome.error };
}
