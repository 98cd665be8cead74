import readline from 'node:readline';
import { Evaluator } from './sprout/evaluator';
import { SproutRuntimeError } from './sprout/errors';
import { isIncomplete } from './sprout/lexer';
import { parseProgram, SproutSyntaxError } from './sprout/parser';
import { inspect } from './sprout/values';
import { formatErrorWithColors, formatRuntimeError, logTracer, type Logger } from './utils/index';

export interface ReplOptions {
  logger: Logger;
  color?: boolean;
  printAst?: boolean;
  /** Log every evaluation step through `logger.debug`. Ignored when `evaluator` is given. */
  trace?: boolean;
  evaluator?: Evaluator;
}

export interface ReplSession {
  /** Feed one line; returns false once the session should end. */
  handleLine(line: string): boolean;
  /** True while a multi-line entry is still open. */
  readonly pending: boolean;
}

export const REPL_HELP = `Commands:
  .ast    toggle AST output
  .help   show this help
  .exit   quit
Anything else is evaluated as a Sprout program, e.g. "1 + 2;"`;

export function createReplSession(options: ReplOptions): ReplSession {
  const { logger } = options;
  const color = options.color ?? true;
  const evaluator = options.evaluator ?? new Evaluator(options.trace ? { tracer: logTracer(logger) } : {});
  let printAst = options.printAst ?? false;
  let buffer: string[] = [];

  const evaluate = (source: string) => {
    try {
      const program = parseProgram(source, { grammarSource: 'repl' });
      if (printAst) logger.plain(JSON.stringify(program.body, null, 2));
      logger.plain(inspect(evaluator.evaluateProgram(program)));
    } catch (error: unknown) {
      if (error instanceof SproutSyntaxError) {
        logger.error(formatErrorWithColors(error.toParseError(), color));
      } else if (error instanceof SproutRuntimeError) {
        logger.error(formatRuntimeError(error, source, color));
      } else {
        throw error;
      }
    }
  };

  return {
    get pending() {
      return buffer.length > 0;
    },
    handleLine(line: string): boolean {
      const trimmed = line.trim();

      if (buffer.length === 0) {
        if (trimmed === '') return true;
        if (trimmed === '.exit') return false;
        if (trimmed === '.help') {
          logger.plain(REPL_HELP);
          return true;
        }
        if (trimmed === '.ast') {
          printAst = !printAst;
          logger.info(`AST output ${printAst ? 'on' : 'off'}`);
          return true;
        }
      }

      buffer.push(line);
      const source = buffer.join('\n');
      if (isIncomplete(source)) return true;

      buffer = [];
      evaluate(source);
      return true;
    },
  };
}

export function runREPL(options: ReplOptions): Promise<void> {
  const session = createReplSession(options);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'sprout> ',
  });

  options.logger.plain('🌱 Sprout REPL (.help for commands)');
  rl.prompt();

  return new Promise((resolve) => {
    rl.on('line', (line: string) => {
      if (!session.handleLine(line)) {
        rl.close();
        return;
      }
      rl.setPrompt(session.pending ? '...... ' : 'sprout> ');
      rl.prompt();
    });

    rl.on('close', () => {
      options.logger.plain('Goodbye!');
      resolve();
    });
  });
}
