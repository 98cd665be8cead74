import { createColors } from 'colorette';
import type { EvaluationTracer } from '../sprout/evaluator';
import { inspect } from '../sprout/values';

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerOptions {
  color?: boolean;
  verbose?: boolean;
  sink?: LogSink;
}

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  error(msg: string): void;
  warn(msg: string): void;
  /** Only printed when the logger is verbose. */
  debug(msg: string): void;
  /** Unprefixed output, e.g. a program's result. */
  plain(msg: string): void;
}

export const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const colors = createColors({ useColor: options.color ?? true });
  const sink = options.sink ?? consoleSink;
  const verbose = options.verbose ?? false;

  return {
    info: (msg) => sink.out(`${colors.blue('ℹ️')}  ${msg}`),
    success: (msg) => sink.out(`${colors.green('✅')} ${msg}`),
    error: (msg) => sink.err(`${colors.red('❌')} ${msg}`),
    warn: (msg) => sink.err(`${colors.yellow('⚠️')}  ${msg}`),
    debug: (msg) => {
      if (verbose) sink.out(colors.dim(`🐛 ${msg}`));
    },
    plain: (msg) => sink.out(msg),
  };
}

/** Writes each evaluation step to `logger.debug`, indented by depth. */
export function logTracer(logger: Logger): EvaluationTracer {
  return {
    trace({ phase, node, depth, result }) {
      const indent = '  '.repeat(depth);
      const suffix = phase === 'exit' && result ? ` => ${inspect(result)}` : '';
      logger.debug(`${indent}${phase} ${node.type}${suffix}`);
    },
  };
}
