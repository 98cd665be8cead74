import { run, tryRun } from '../src/sprout/run';
import { SproutRuntimeError } from '../src/sprout/errors';
import type { EvaluationTraceEvent } from '../src/sprout/evaluator';
import { NULL, boolean, integer } from '../src/sprout/values';

describe('run', () => {
  it('evaluates integer literals to themselves', () => {
    for (const n of [0, 1, 42, 2147483647]) {
      expect(run(`${n};`)).toEqual(integer(n));
    }
  });

  it('treats !! as the identity on booleans', () => {
    expect(run('!!true;')).toEqual(boolean(true));
    expect(run('!!false;')).toEqual(boolean(false));
  });

  it('treats double negation as the identity on integers', () => {
    for (const n of [0, 7, -3]) {
      expect(run(`-(-${n});`)).toEqual(integer(n));
    }
  });

  it('divides with truncation', () => {
    expect(run('5/5;')).toEqual(integer(1));
    expect(run('7 / 2;')).toEqual(integer(3));
    expect(run('-7 / 2;')).toEqual(integer(-3));
  });

  it('compares for equality within a type', () => {
    expect(run('5 == 1;')).toEqual(boolean(false));
    expect(run('true == true;')).toEqual(boolean(true));
    expect(run('(1 > 2) == false;')).toEqual(boolean(true));
    expect(run('(1 > 2) != false;')).toEqual(boolean(false));
  });

  it('fails on equality across types', () => {
    expect(() => run('5 == true;')).toThrow(SproutRuntimeError);
  });

  it('evaluates the documented scenarios', () => {
    expect(run('5+5;')).toEqual(integer(10));
    expect(run('!(1>2);')).toEqual(boolean(true));
    expect(run('-(1-2);')).toEqual(integer(1));
    expect(run('(1 + 2) * 3;')).toEqual(integer(9));
    expect(run('(1 + 2) < 3;')).toEqual(boolean(false));
  });

  it('applies operator precedence', () => {
    expect(run('1 + 2 * 3;')).toEqual(integer(7));
    expect(run('2 * 3 + 1 == 7;')).toEqual(boolean(true));
    expect(run('10 - 2 - 3;')).toEqual(integer(5));
  });

  it('evaluates conditionals', () => {
    expect(run('if (true) { 10; };')).toEqual(integer(10));
    expect(run('if (false) { 10; };')).toEqual(NULL);
    expect(run('if (false) { 10; } else { 11; };')).toEqual(integer(11));
    expect(run('if (1 > 2) { 10; } else { 11; };')).toEqual(integer(11));
    expect(run('if (1 < 2) { 10; } else { 11; };')).toEqual(integer(10));
    expect(run('if (1) { 10; } else { 11; };')).toEqual(integer(11));
  });

  it('returns early', () => {
    expect(run('return 10;')).toEqual(integer(10));
    expect(run('return 10; 11;')).toEqual(integer(10));
    expect(run('9; return 2 * 5; 9;')).toEqual(integer(10));
  });

  it('unwinds a return through nested conditionals', () => {
    const source = `
      if (10 > 1) {
        if (10 > 1) {
          return 10;
        };

        return 1;
      };
    `;
    expect(run(source)).toEqual(integer(10));
  });

  it('never evaluates statements after a return', () => {
    const events: EvaluationTraceEvent[] = [];
    run('return 10; 11;', { tracer: { trace: (event) => events.push(event) } });
    expect(events.filter((event) => event.node.type === 'ExprStmt')).toEqual([]);
  });

  it('evaluates an empty program to null', () => {
    expect(run('')).toEqual(NULL);
    expect(run('// nothing here\n')).toEqual(NULL);
  });

  it('reports a return used as an operand as a type error', () => {
    expect(() => run('1 + if (true) { return 2; };')).toThrow(
      "operator '+' expects INTEGER operands, got INTEGER and RETURN"
    );
  });
});

describe('tryRun', () => {
  it('reports success', () => {
    expect(tryRun('1 + 1;')).toEqual({ success: true, value: integer(2) });
  });

  it('reports syntax errors at the parse stage', () => {
    const outcome = tryRun('5 +;');
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.stage).toBe('parse');
    }
  });

  it('reports runtime errors with the node location', () => {
    const outcome = tryRun('1 / 0;');
    if (outcome.success || outcome.stage !== 'evaluate') {
      throw new Error('expected an evaluation failure');
    }
    expect(outcome.error.code).toBe('DIVISION_BY_ZERO');
    expect(outcome.error.location).toEqual({
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 1, column: 6, offset: 5 },
    });
  });

  it('rejects bindings and name references', () => {
    const binding = tryRun('let a = 10; a;');
    const reference = tryRun('a;');
    expect(binding.success === false && binding.stage === 'evaluate' && binding.error.code).toBe(
      'UNSUPPORTED_STATEMENT'
    );
    expect(reference.success === false && reference.stage === 'evaluate' && reference.error.code).toBe(
      'NOT_IMPLEMENTED'
    );
  });
});
