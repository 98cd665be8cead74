import type {
  ArithmeticOperator,
  SproutExpr,
  SproutIf,
  SproutInfix,
  SproutIntegerLiteral,
  SproutPrefix,
  SproutProgram,
  SproutStatement,
} from './ast';
import { SproutRuntimeError } from './errors';
import {
  NULL,
  boolean,
  integer,
  isReturn,
  returned,
  typeName,
  type IntegerValue,
  type ProgramValue,
  type SproutValue,
} from './values';

export type EvaluationNode = SproutExpr | SproutStatement;

export interface EvaluationTraceEvent {
  phase: 'enter' | 'exit';
  node: EvaluationNode;
  depth: number;
  result?: SproutValue;
}

export interface EvaluationTracer {
  trace(event: EvaluationTraceEvent): void;
}

export interface EvaluatorOptions {
  tracer?: EvaluationTracer;
}

export type EvaluationOutcome =
  | { success: true; value: ProgramValue }
  | { success: false; error: SproutRuntimeError };

/**
 * Tree-walking evaluator. Integers are 32-bit signed: every arithmetic
 * result wraps to two's complement, so `-(-2147483648)` is -2147483648.
 */
export class Evaluator {
  private readonly tracer?: EvaluationTracer;

  constructor(options: EvaluatorOptions = {}) {
    this.tracer = options.tracer;
  }

  evaluateProgram(program: SproutProgram | SproutStatement[]): ProgramValue {
    const statements = Array.isArray(program) ? program : program.body;
    const result = this.evaluateStatements(statements);
    return isReturn(result) ? result.value : result;
  }

  tryEvaluateProgram(program: SproutProgram | SproutStatement[]): EvaluationOutcome {
    try {
      return { success: true, value: this.evaluateProgram(program) };
    } catch (error: unknown) {
      if (error instanceof SproutRuntimeError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  evaluateStatements(statements: SproutStatement[], depth = 0): SproutValue {
    let result: SproutValue = NULL;
    for (const statement of statements) {
      result = this.evaluateStatement(statement, depth);
      if (isReturn(result)) return result;
    }
    return result;
  }

  evaluateStatement(statement: SproutStatement, depth = 0): SproutValue {
    this.enter(statement, depth);
    let result: SproutValue;
    switch (statement.type) {
      case 'ExprStmt':
        result = this.evaluateExpression(statement.expr, depth + 1);
        break;
      case 'Return':
        result = returned(this.evaluateExpression(statement.value, depth + 1));
        break;
      case 'Let':
        throw new SproutRuntimeError(
          'UNSUPPORTED_STATEMENT',
          `statement 'Let' is not supported (binding '${statement.name}')`,
          statement.location
        );
      default:
        return unsupportedStatement(statement);
    }
    return this.exit(statement, depth, result);
  }

  evaluateExpression(expr: SproutExpr, depth = 0): SproutValue {
    this.enter(expr, depth);
    let result: SproutValue;
    switch (expr.type) {
      case 'IntegerLiteral':
        result = integer(checkedInteger(expr));
        break;
      case 'BooleanLiteral':
        result = boolean(expr.value);
        break;
      case 'Prefix':
        result = this.evaluatePrefix(expr, depth);
        break;
      case 'Infix':
        result = this.evaluateInfix(expr, depth);
        break;
      case 'If':
        result = this.evaluateIf(expr, depth);
        break;
      case 'Identifier':
        throw new SproutRuntimeError(
          'NOT_IMPLEMENTED',
          `expression 'Identifier' is not implemented (name '${expr.name}')`,
          expr.location
        );
      default:
        return unimplementedExpression(expr);
    }
    return this.exit(expr, depth, result);
  }

  private evaluatePrefix(expr: SproutPrefix, depth: number): SproutValue {
    const operand = this.evaluateExpression(expr.operand, depth + 1);
    switch (expr.operator) {
      case '!':
        if (operand.kind !== 'Boolean') {
          throw mismatch(expr, `operator '!' expects BOOLEAN, got ${typeName(operand)}`);
        }
        return boolean(!operand.value);
      case '-':
        if (operand.kind !== 'Integer') {
          throw mismatch(expr, `operator '-' expects INTEGER, got ${typeName(operand)}`);
        }
        return integer(-operand.value | 0);
    }
  }

  private evaluateInfix(expr: SproutInfix, depth: number): SproutValue {
    const left = this.evaluateExpression(expr.left, depth + 1);
    const right = this.evaluateExpression(expr.right, depth + 1);
    const { operator } = expr;

    switch (operator) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '<':
      case '>': {
        if (left.kind !== 'Integer' || right.kind !== 'Integer') {
          throw mismatch(
            expr,
            `operator '${operator}' expects INTEGER operands, got ${typeName(left)} and ${typeName(right)}`
          );
        }
        if (operator === '<') return boolean(left.value < right.value);
        if (operator === '>') return boolean(left.value > right.value);
        return arithmetic(expr, operator, left, right);
      }
      case '==':
      case '!=': {
        if (left.kind === 'Integer' && right.kind === 'Integer') {
          return boolean((left.value === right.value) === (operator === '=='));
        }
        if (left.kind === 'Boolean' && right.kind === 'Boolean') {
          return boolean((left.value === right.value) === (operator === '=='));
        }
        throw mismatch(
          expr,
          `operator '${operator}' expects two INTEGER or two BOOLEAN operands, got ${typeName(left)} and ${typeName(right)}`
        );
      }
    }
  }

  private evaluateIf(expr: SproutIf, depth: number): SproutValue {
    const condition = this.evaluateExpression(expr.condition, depth + 1);
    // Only the exact value `true` picks the consequence; there is no truthiness.
    const branch =
      condition.kind === 'Boolean' && condition.value === true ? expr.consequence : expr.alternative;
    return this.evaluateStatements(branch, depth + 1);
  }

  private enter(node: EvaluationNode, depth: number): void {
    this.tracer?.trace({ phase: 'enter', node, depth });
  }

  private exit(node: EvaluationNode, depth: number, result: SproutValue): SproutValue {
    this.tracer?.trace({ phase: 'exit', node, depth, result });
    return result;
  }
}

function arithmetic(
  expr: SproutInfix,
  operator: ArithmeticOperator,
  left: IntegerValue,
  right: IntegerValue
): IntegerValue {
  switch (operator) {
    case '+':
      return integer((left.value + right.value) | 0);
    case '-':
      return integer((left.value - right.value) | 0);
    case '*':
      return integer(Math.imul(left.value, right.value));
    case '/':
      if (right.value === 0) {
        throw new SproutRuntimeError('DIVISION_BY_ZERO', 'division by zero', expr.location);
      }
      return integer(Math.trunc(left.value / right.value) | 0);
  }
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

// Hand-built trees bypass the grammar's range check.
function checkedInteger(expr: SproutIntegerLiteral): number {
  const { value } = expr;
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new SproutRuntimeError(
      'INVALID_INTEGER',
      `integer literal ${value} is not a 32-bit signed integer`,
      expr.location
    );
  }
  return value;
}

function mismatch(expr: SproutPrefix | SproutInfix, message: string): SproutRuntimeError {
  return new SproutRuntimeError('TYPE_MISMATCH', message, expr.location);
}

function describeVariant(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'type' in node) {
    return String(node.type);
  }
  return typeof node;
}

function unimplementedExpression(expr: never): never {
  throw new SproutRuntimeError(
    'NOT_IMPLEMENTED',
    `expression '${describeVariant(expr)}' is not implemented`
  );
}

function unsupportedStatement(statement: never): never {
  throw new SproutRuntimeError(
    'UNSUPPORTED_STATEMENT',
    `statement '${describeVariant(statement)}' is not supported`
  );
}

const sharedEvaluator = new Evaluator();

export function evaluateExpression(expr: SproutExpr): SproutValue {
  return sharedEvaluator.evaluateExpression(expr);
}

export function evaluateStatement(statement: SproutStatement): SproutValue {
  return sharedEvaluator.evaluateStatement(statement);
}

export function evaluateStatements(statements: SproutStatement[]): SproutValue {
  return sharedEvaluator.evaluateStatements(statements);
}

export function evaluateProgram(program: SproutProgram | SproutStatement[]): ProgramValue {
  return sharedEvaluator.evaluateProgram(program);
}

export function tryEvaluateProgram(program: SproutProgram | SproutStatement[]): EvaluationOutcome {
  return sharedEvaluator.tryEvaluateProgram(program);
}
