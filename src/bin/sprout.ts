#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import path from 'node:path';

import { ConfigError, loadConfig, resolveSettings, type SproutSettings } from '../config';
import { runREPL, type ReplOptions } from '../repl';
import { Evaluator } from '../sprout/evaluator';
import { SproutRuntimeError } from '../sprout/errors';
import { SproutLexError, tokenize } from '../sprout/lexer';
import { parseProgram, SproutSyntaxError } from '../sprout/parser';
import { inspect } from '../sprout/values';
import { createLogger, formatErrorWithColors, formatRuntimeError, logTracer } from '../utils/index';
import type { LogSink } from '../utils/log';

const COMMANDS = ['run', 'eval', 'tokens', 'ast', 'repl', 'help'] as const;
type Command = typeof COMMANDS[number];

export interface CliIO {
  sink?: LogSink;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  readFile?: (filePath: string) => string;
  repl?: (options: ReplOptions) => Promise<void>;
}

interface ParsedArgs {
  command?: string;
  operand?: string;
  flags: Map<string, boolean>;
  unknownFlags: string[];
}

const KNOWN_FLAGS = ['--trace', '--ast', '--color', '--no-color', '--help', '-h'];

export const USAGE = `sprout - evaluate Sprout programs

USAGE:
  sprout run <file>          Evaluate a program file and print its value
  sprout eval "<source>"     Evaluate source given on the command line
  sprout tokens <file>       Print the token stream of a file
  sprout ast <file>          Print the parsed program as JSON
  sprout repl                Start the interactive prompt

OPTIONS:
  --trace                    Log every evaluation step
  --ast                      Print the AST before evaluating (run, eval, repl)
  --no-color                 Disable coloured output (also NO_COLOR=1)
  --help, -h                 Show this help`;

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { flags: new Map(), unknownFlags: [] };
  const positional: string[] = [];

  for (const arg of argv) {
    // `sprout eval "-5;"` must keep its source, so only `--x` and `-h` are flags
    if (arg.startsWith('--') || arg === '-h') {
      if (KNOWN_FLAGS.includes(arg)) parsed.flags.set(arg, true);
      else parsed.unknownFlags.push(arg);
    } else {
      positional.push(arg);
    }
  }

  [parsed.command, parsed.operand] = positional;
  return parsed;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function flagOverrides(flags: Map<string, boolean>): Partial<SproutSettings> {
  const overrides: Partial<SproutSettings> = {};
  if (flags.has('--trace')) overrides.trace = true;
  if (flags.has('--ast')) overrides.printAst = true;
  if (flags.has('--color')) overrides.color = true;
  if (flags.has('--no-color')) overrides.color = false;
  return overrides;
}

export async function main(argv: string[], io: CliIO = {}): Promise<number> {
  const args = parseArgs(argv);
  const env = io.env ?? process.env;
  const cwd = io.cwd ?? process.cwd();
  const readFile = io.readFile ?? ((filePath: string) => readFileSync(path.resolve(cwd, filePath), 'utf-8'));

  let settings: SproutSettings;
  try {
    settings = resolveSettings(loadConfig(cwd), flagOverrides(args.flags), env);
  } catch (error: unknown) {
    if (!(error instanceof ConfigError)) throw error;
    createLogger({ color: false, sink: io.sink }).error(error.message);
    return 1;
  }

  const log = createLogger({ color: settings.color, verbose: settings.trace, sink: io.sink });

  if (args.flags.has('--help') || args.flags.has('-h') || args.command === undefined || args.command === 'help') {
    log.plain(USAGE);
    return 0;
  }
  if (args.unknownFlags.length > 0) {
    log.error(`Unknown option: ${args.unknownFlags.join(', ')}`);
    return 1;
  }
  if (!isCommand(args.command)) {
    log.error(`Unknown command: ${args.command}`);
    log.plain(USAGE);
    return 1;
  }

  const command = args.command;
  if (command === 'repl') {
    const repl = io.repl ?? runREPL;
    await repl({ logger: log, color: settings.color, printAst: settings.printAst, trace: settings.trace });
    return 0;
  }

  if (args.operand === undefined) {
    log.error(command === 'eval' ? 'eval needs a source string' : `${command} needs a file path`);
    return 1;
  }

  let source: string;
  let sourceName: string;
  if (command === 'eval') {
    source = args.operand;
    sourceName = 'eval';
  } else {
    sourceName = args.operand;
    try {
      source = readFile(args.operand);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Could not read ${args.operand}: ${message}`);
      return 1;
    }
  }

  try {
    if (command === 'tokens') {
      for (const token of tokenize(source)) {
        log.plain(`${token.line}:${token.col}\t${token.type}\t${token.text}`);
      }
      return 0;
    }

    const program = parseProgram(source, { grammarSource: sourceName });
    if (command === 'ast' || settings.printAst) {
      log.plain(JSON.stringify(program, null, 2));
      if (command === 'ast') return 0;
    }

    const evaluator = new Evaluator(settings.trace ? { tracer: logTracer(log) } : {});
    log.plain(inspect(evaluator.evaluateProgram(program)));
    return 0;
  } catch (error: unknown) {
    if (error instanceof SproutSyntaxError) {
      log.error(formatErrorWithColors(error.toParseError(), settings.color));
      return 1;
    }
    if (error instanceof SproutLexError) {
      log.error(`${sourceName}:${error.line}:${error.col}: ${error.message}`);
      return 1;
    }
    if (error instanceof SproutRuntimeError) {
      log.error(formatRuntimeError(error, source, settings.color));
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
