import * as ast from '../src/sprout/ast';
import type { SproutExpr, SproutStatement } from '../src/sprout/ast';
import {
  Evaluator,
  evaluateExpression,
  evaluateProgram,
  evaluateStatement,
  evaluateStatements,
  tryEvaluateProgram,
  type EvaluationTraceEvent,
} from '../src/sprout/evaluator';
import { SproutRuntimeError, isSproutRuntimeError } from '../src/sprout/errors';
import { NULL, boolean, integer } from '../src/sprout/values';

function captureError(fn: () => unknown): SproutRuntimeError {
  try {
    fn();
  } catch (error: unknown) {
    if (isSproutRuntimeError(error)) return error;
    throw error;
  }
  throw new Error('Expected evaluation to fail');
}

function recordingEvaluator() {
  const events: EvaluationTraceEvent[] = [];
  const evaluator = new Evaluator({ tracer: { trace: (event) => events.push(event) } });
  return { evaluator, events };
}

describe('Evaluator', () => {
  describe('literals', () => {
    it('returns integer literals verbatim', () => {
      expect(evaluateExpression(ast.int(5))).toEqual(integer(5));
      expect(evaluateExpression(ast.int(-12))).toEqual(integer(-12));
    });

    it('rejects hand-built literals that are not 32-bit integers', () => {
      const tooLarge = captureError(() => evaluateExpression(ast.prefix('-', ast.prefix('-', ast.int(2 ** 40)))));
      expect(tooLarge.code).toBe('INVALID_INTEGER');
      expect(tooLarge.message).toBe('integer literal 1099511627776 is not a 32-bit signed integer');

      expect(captureError(() => evaluateProgram([ast.exprStmt(ast.int(1.5))])).code).toBe('INVALID_INTEGER');
      expect(captureError(() => evaluateExpression(ast.int(-2147483649))).code).toBe('INVALID_INTEGER');
      expect(evaluateExpression(ast.int(2147483647))).toEqual(integer(2147483647));
    });

    it('returns boolean literals verbatim', () => {
      expect(evaluateExpression(ast.bool(true))).toEqual(boolean(true));
      expect(evaluateExpression(ast.bool(false))).toEqual(boolean(false));
    });
  });

  describe('prefix operators', () => {
    it('negates booleans with !', () => {
      expect(evaluateExpression(ast.prefix('!', ast.bool(true)))).toEqual(boolean(false));
      expect(evaluateExpression(ast.prefix('!', ast.prefix('!', ast.bool(false))))).toEqual(boolean(false));
    });

    it('rejects ! on an integer', () => {
      const error = captureError(() => evaluateExpression(ast.prefix('!', ast.int(5))));
      expect(error.code).toBe('TYPE_MISMATCH');
      expect(error.message).toBe("operator '!' expects BOOLEAN, got INTEGER");
    });

    it('negates integers with -', () => {
      expect(evaluateExpression(ast.prefix('-', ast.int(5)))).toEqual(integer(-5));
      expect(evaluateExpression(ast.prefix('-', ast.prefix('-', ast.int(7))))).toEqual(integer(7));
    });

    it('wraps negation of the smallest 32-bit integer', () => {
      expect(evaluateExpression(ast.prefix('-', ast.int(-2147483648)))).toEqual(integer(-2147483648));
    });

    it('rejects - on a boolean', () => {
      const error = captureError(() => evaluateExpression(ast.prefix('-', ast.bool(true))));
      expect(error.code).toBe('TYPE_MISMATCH');
      expect(error.message).toBe("operator '-' expects INTEGER, got BOOLEAN");
    });
  });

  describe('infix operators', () => {
    const calc = (left: number, operator: '+' | '-' | '*' | '/', right: number) =>
      evaluateExpression(ast.infix(ast.int(left), operator, ast.int(right)));

    it('does integer arithmetic', () => {
      expect(calc(5, '+', 5)).toEqual(integer(10));
      expect(calc(5, '-', 5)).toEqual(integer(0));
      expect(calc(5, '*', 5)).toEqual(integer(25));
      expect(calc(5, '/', 5)).toEqual(integer(1));
    });

    it('truncates division toward zero', () => {
      expect(calc(7, '/', 2)).toEqual(integer(3));
      expect(calc(-7, '/', 2)).toEqual(integer(-3));
      expect(calc(7, '/', -2)).toEqual(integer(-3));
    });

    it('wraps arithmetic to 32 bits', () => {
      expect(calc(2147483647, '+', 1)).toEqual(integer(-2147483648));
      expect(calc(-2147483648, '-', 1)).toEqual(integer(2147483647));
      expect(calc(65536, '*', 65536)).toEqual(integer(0));
      expect(calc(-2147483648, '/', -1)).toEqual(integer(-2147483648));
    });

    it('fails on division by zero', () => {
      const error = captureError(() => calc(1, '/', 0));
      expect(error.code).toBe('DIVISION_BY_ZERO');
      expect(error.message).toBe('division by zero');
    });

    it('compares integers', () => {
      expect(evaluateExpression(ast.infix(ast.int(5), '>', ast.int(1)))).toEqual(boolean(true));
      expect(evaluateExpression(ast.infix(ast.int(5), '<', ast.int(1)))).toEqual(boolean(false));
      expect(evaluateExpression(ast.infix(ast.int(1), '<', ast.int(1)))).toEqual(boolean(false));
    });

    it('rejects arithmetic and ordering on booleans', () => {
      const plus = captureError(() => evaluateExpression(ast.infix(ast.bool(true), '+', ast.int(1))));
      expect(plus.code).toBe('TYPE_MISMATCH');
      expect(plus.message).toBe("operator '+' expects INTEGER operands, got BOOLEAN and INTEGER");

      const less = captureError(() => evaluateExpression(ast.infix(ast.bool(true), '<', ast.bool(false))));
      expect(less.message).toBe("operator '<' expects INTEGER operands, got BOOLEAN and BOOLEAN");
    });

    it('compares values of the same type for equality', () => {
      expect(evaluateExpression(ast.infix(ast.int(5), '==', ast.int(1)))).toEqual(boolean(false));
      expect(evaluateExpression(ast.infix(ast.int(5), '!=', ast.int(1)))).toEqual(boolean(true));
      expect(evaluateExpression(ast.infix(ast.bool(true), '==', ast.bool(true)))).toEqual(boolean(true));
      expect(evaluateExpression(ast.infix(ast.bool(true), '!=', ast.bool(true)))).toEqual(boolean(false));
    });

    it('treats equality across types as a fatal error, not false', () => {
      const error = captureError(() => evaluateExpression(ast.infix(ast.int(1), '==', ast.bool(true))));
      expect(error.code).toBe('TYPE_MISMATCH');
      expect(error.message).toBe(
        "operator '==' expects two INTEGER or two BOOLEAN operands, got INTEGER and BOOLEAN"
      );
    });

    it('does not compare nulls', () => {
      const nothing = ast.ifExpr(ast.bool(false), [ast.exprStmt(ast.int(1))]);
      const error = captureError(() => evaluateExpression(ast.infix(nothing, '!=', nothing)));
      expect(error.message).toBe(
        "operator '!=' expects two INTEGER or two BOOLEAN operands, got NULL and NULL"
      );
    });

    it('evaluates both operands before checking types', () => {
      const expr = ast.infix(ast.bool(true), '+', ast.prefix('!', ast.int(1)));
      expect(captureError(() => evaluateExpression(expr)).message).toBe(
        "operator '!' expects BOOLEAN, got INTEGER"
      );
    });

    it('copies the node location onto the error', () => {
      const location = {
        start: { line: 2, column: 3, offset: 10 },
        end: { line: 2, column: 8, offset: 15 },
      };
      const expr: SproutExpr = { ...ast.infix(ast.int(4), '/', ast.int(0)), location };
      expect(captureError(() => evaluateExpression(expr)).location).toEqual(location);
    });
  });

  describe('conditionals', () => {
    const ten = [ast.exprStmt(ast.int(10))];
    const eleven = [ast.exprStmt(ast.int(11))];

    it('selects the consequence only for exactly true', () => {
      expect(evaluateExpression(ast.ifExpr(ast.bool(true), ten, eleven))).toEqual(integer(10));
      expect(evaluateExpression(ast.ifExpr(ast.bool(false), ten, eleven))).toEqual(integer(11));
    });

    it('does not treat integers or null as truthy', () => {
      expect(evaluateExpression(ast.ifExpr(ast.int(1), ten, eleven))).toEqual(integer(11));
      const nothing = ast.ifExpr(ast.bool(false), ten);
      expect(evaluateExpression(ast.ifExpr(nothing, ten, eleven))).toEqual(integer(11));
    });

    it('yields null for a missing alternative', () => {
      expect(evaluateExpression(ast.ifExpr(ast.bool(false), ten))).toEqual(NULL);
    });

    it('yields the last statement of the selected branch', () => {
      const branch = [ast.exprStmt(ast.int(1)), ast.exprStmt(ast.int(2))];
      expect(evaluateExpression(ast.ifExpr(ast.bool(true), branch))).toEqual(integer(2));
    });
  });

  describe('unsupported nodes', () => {
    it('fails on identifiers', () => {
      const error = captureError(() => evaluateExpression(ast.ident('a')));
      expect(error.code).toBe('NOT_IMPLEMENTED');
      expect(error.message).toBe("expression 'Identifier' is not implemented (name 'a')");
    });

    it('fails on let statements', () => {
      const error = captureError(() => evaluateStatement(ast.letStmt('a', ast.int(10))));
      expect(error.code).toBe('UNSUPPORTED_STATEMENT');
      expect(error.message).toBe("statement 'Let' is not supported (binding 'a')");
    });

    it('fails on expression variants it does not know', () => {
      const expr: SproutExpr = JSON.parse('{"type":"Call"}');
      const error = captureError(() => evaluateExpression(expr));
      expect(error.code).toBe('NOT_IMPLEMENTED');
      expect(error.message).toBe("expression 'Call' is not implemented");
    });

    it('fails on statement variants it does not know', () => {
      const statement: SproutStatement = JSON.parse('{"type":"While"}');
      const error = captureError(() => evaluateStatement(statement));
      expect(error.code).toBe('UNSUPPORTED_STATEMENT');
      expect(error.message).toBe("statement 'While' is not supported");
    });
  });

  describe('statements and return', () => {
    it('wraps return values', () => {
      expect(evaluateStatement(ast.ret(ast.int(10)))).toEqual({ kind: 'Return', value: integer(10) });
    });

    it('never nests return wrappers', () => {
      const inner = ast.ifExpr(ast.bool(true), [ast.ret(ast.int(1))]);
      expect(evaluateStatement(ast.ret(inner))).toEqual({ kind: 'Return', value: integer(1) });
      expect(evaluateProgram([ast.ret(inner)])).toEqual(integer(1));
    });

    it('evaluates an empty sequence to null', () => {
      expect(evaluateStatements([])).toEqual(NULL);
      expect(evaluateProgram([])).toEqual(NULL);
    });

    it('keeps the return wrapper inside a sequence', () => {
      const result = evaluateStatements([ast.ret(ast.int(10)), ast.exprStmt(ast.int(11))]);
      expect(result).toEqual({ kind: 'Return', value: integer(10) });
    });

    it('unwraps return once at program level', () => {
      expect(evaluateProgram(ast.program([ast.ret(ast.int(10)), ast.exprStmt(ast.int(11))]))).toEqual(
        integer(10)
      );
    });

    it('propagates return out of nested conditionals', () => {
      const cond = ast.infix(ast.int(10), '>', ast.int(1));
      const program = [
        ast.exprStmt(
          ast.ifExpr(cond, [ast.exprStmt(ast.ifExpr(cond, [ast.ret(ast.int(10))])), ast.ret(ast.int(1))])
        ),
      ];
      expect(evaluateProgram(program)).toEqual(integer(10));
    });

    it('does not evaluate statements after a return', () => {
      const { evaluator, events } = recordingEvaluator();
      const trailing = ast.exprStmt(ast.int(9));
      const result = evaluator.evaluateProgram([
        ast.exprStmt(ast.int(9)),
        ast.ret(ast.infix(ast.int(2), '*', ast.int(5))),
        trailing,
      ]);
      expect(result).toEqual(integer(10));
      expect(events.some((event) => event.node === trailing)).toBe(false);
    });
  });

  describe('tracing', () => {
    it('reports enter and exit for every node', () => {
      const { evaluator, events } = recordingEvaluator();
      evaluator.evaluateExpression(ast.prefix('-', ast.int(1)));
      expect(events.map((e) => `${e.phase} ${e.node.type} ${e.depth}`)).toEqual([
        'enter Prefix 0',
        'enter IntegerLiteral 1',
        'exit IntegerLiteral 1',
        'exit Prefix 0',
      ]);
      expect(events[3].result).toEqual(integer(-1));
    });

    it('does not change results', () => {
      const { evaluator } = recordingEvaluator();
      const program = [ast.exprStmt(ast.infix(ast.int(3), '*', ast.int(4)))];
      expect(evaluator.evaluateProgram(program)).toEqual(evaluateProgram(program));
    });
  });

  describe('tryEvaluateProgram', () => {
    it('returns the value on success', () => {
      expect(tryEvaluateProgram([ast.exprStmt(ast.int(3))])).toEqual({ success: true, value: integer(3) });
    });

    it('aborts the whole program on the first error', () => {
      const { evaluator, events } = recordingEvaluator();
      const last = ast.exprStmt(ast.int(3));
      const outcome = evaluator.tryEvaluateProgram([
        ast.exprStmt(ast.int(1)),
        ast.exprStmt(ast.prefix('!', ast.int(2))),
        last,
      ]);
      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('TYPE_MISMATCH');
      }
      expect(events.some((event) => event.node === last)).toBe(false);
    });

    it('rethrows errors that are not evaluation failures', () => {
      const evaluator = new Evaluator({
        tracer: {
          trace: () => {
            throw new Error('tracer broke');
          },
        },
      });
      expect(() => evaluator.tryEvaluateProgram([ast.exprStmt(ast.int(1))])).toThrow('tracer broke');
    });
  });
});
