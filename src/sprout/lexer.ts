import moo from 'moo';

export type TokenType =
  | 'ws'
  | 'comment'
  | 'newline'
  | 'lbrace'
  | 'rbrace'
  | 'lparen'
  | 'rparen'
  | 'semicolon'
  | 'op'
  | 'keyword'
  | 'number'
  | 'identifier';

export interface SproutToken {
  type: TokenType;
  text: string;
  offset: number;
  line: number;
  col: number;
  /** Set on `number` tokens only. */
  value?: number;
}

export const SPROUT_KEYWORDS = ['let', 'return', 'if', 'else', 'true', 'false'] as const;

const TOKEN_TYPES: readonly string[] = [
  'ws',
  'comment',
  'newline',
  'lbrace',
  'rbrace',
  'lparen',
  'rparen',
  'semicolon',
  'op',
  'keyword',
  'number',
  'identifier',
];

export class SproutLexError extends Error {
  readonly line: number;
  readonly col: number;
  readonly offset: number;

  constructor(message: string, token: { line: number; col: number; offset: number }) {
    super(message);
    this.name = 'SproutLexError';
    this.line = token.line;
    this.col = token.col;
    this.offset = token.offset;
  }
}

export interface SproutLexer {
  reset(input: string): SproutLexer;
  [Symbol.iterator](): Iterator<SproutToken>;
}

const INT32_MAX = 2147483647;

function compileRules(): moo.Lexer {
  return moo.compile({
    newline: { match: /\r?\n/, lineBreaks: true },
    ws: { match: /[ \t\r]+/, lineBreaks: false },
    comment: { match: /\/\/.*?$/, lineBreaks: false },
    lbrace: '{',
    rbrace: '}',
    lparen: '(',
    rparen: ')',
    semicolon: ';',
    op: ['==', '!=', '+', '-', '*', '/', '<', '>', '!', '='],
    number: /[0-9]+/,
    identifier: {
      match: /[A-Za-z_][A-Za-z0-9_]*/,
      type: moo.keywords({ keyword: [...SPROUT_KEYWORDS] }),
    },
    error: moo.error,
  });
}

export function createSproutLexer(): SproutLexer {
  const lexer = compileRules();
  let source: Iterable<moo.Token> | null = null;

  const wrapper: SproutLexer = {
    reset(input: string) {
      source = lexer.reset(input);
      return wrapper;
    },
    [Symbol.iterator]() {
      const tokens = source ?? lexer.reset('');
      const gen = function* () {
        for (const token of tokens) {
          yield toSproutToken(token);
        }
      };
      return gen();
    },
  };
  return wrapper;
}

function toSproutToken(token: moo.Token): SproutToken {
  const type = token.type ?? 'error';
  if (!isTokenType(type)) {
    throw new SproutLexError(`Unexpected character '${token.text.charAt(0)}'`, token);
  }
  const base: SproutToken = {
    type,
    text: token.text,
    offset: token.offset,
    line: token.line,
    col: token.col,
  };
  if (type !== 'number') return base;
  const value = Number.parseInt(token.text, 10);
  if (value > INT32_MAX) {
    throw new SproutLexError(`integer literal ${token.text} does not fit in 32 bits`, token);
  }
  return { ...base, value };
}

function isTokenType(type: string): type is TokenType {
  return TOKEN_TYPES.includes(type);
}

export interface TokenizeOptions {
  /** Keep whitespace, newline and comment tokens. */
  includeTrivia?: boolean;
}

export function tokenize(input: string, options: TokenizeOptions = {}): SproutToken[] {
  const tokens = [...createSproutLexer().reset(input)];
  if (options.includeTrivia) return tokens;
  return tokens.filter((token) => token.type !== 'ws' && token.type !== 'newline' && token.type !== 'comment');
}

/**
 * True while braces or parens opened in `input` are still unclosed.
 * Input the lexer rejects is complete: the parser reports it.
 */
export function isIncomplete(input: string): boolean {
  let tokens: SproutToken[];
  try {
    tokens = tokenize(input);
  } catch (error: unknown) {
    if (error instanceof SproutLexError) return false;
    throw error;
  }
  let braces = 0;
  let parens = 0;
  for (const token of tokens) {
    if (token.type === 'lbrace') braces++;
    else if (token.type === 'rbrace') braces--;
    else if (token.type === 'lparen') parens++;
    else if (token.type === 'rparen') parens--;
  }
  return braces > 0 || parens > 0;
}
