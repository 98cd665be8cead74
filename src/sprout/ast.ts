import type { Location } from '../utils/index';

export interface SproutNode {
  location?: Location;
}

export type PrefixOperator = '!' | '-';

export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type ComparisonOperator = '<' | '>';
export type EqualityOperator = '==' | '!=';
export type InfixOperator = ArithmeticOperator | ComparisonOperator | EqualityOperator;

export interface SproutIntegerLiteral extends SproutNode {
  type: 'IntegerLiteral';
  value: number;
}

export interface SproutBooleanLiteral extends SproutNode {
  type: 'BooleanLiteral';
  value: boolean;
}

export interface SproutPrefix extends SproutNode {
  type: 'Prefix';
  operator: PrefixOperator;
  operand: SproutExpr;
}

export interface SproutInfix extends SproutNode {
  type: 'Infix';
  operator: InfixOperator;
  left: SproutExpr;
  right: SproutExpr;
}

export interface SproutIf extends SproutNode {
  type: 'If';
  condition: SproutExpr;
  consequence: SproutStatement[];
  alternative: SproutStatement[];
}

/** Name reference. Parsed, but bindings are not evaluated. */
export interface SproutIdentifier extends SproutNode {
  type: 'Identifier';
  name: string;
}

export type SproutExpr =
  | SproutIntegerLiteral
  | SproutBooleanLiteral
  | SproutPrefix
  | SproutInfix
  | SproutIf
  | SproutIdentifier;

export interface SproutExprStmt extends SproutNode {
  type: 'ExprStmt';
  expr: SproutExpr;
}

export interface SproutReturn extends SproutNode {
  type: 'Return';
  value: SproutExpr;
}

export interface SproutLet extends SproutNode {
  type: 'Let';
  name: string;
  value: SproutExpr;
}

export type SproutStatement = SproutExprStmt | SproutReturn | SproutLet;

export interface SproutProgram extends SproutNode {
  type: 'Program';
  body: SproutStatement[];
}

export function isSproutProgram(value: unknown): value is SproutProgram {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Program' &&
    'body' in value &&
    Array.isArray(value.body)
  );
}

// Builders for hand-made trees; nodes built here carry no location.

export function int(value: number): SproutIntegerLiteral {
  return { type: 'IntegerLiteral', value };
}

export function bool(value: boolean): SproutBooleanLiteral {
  return { type: 'BooleanLiteral', value };
}

export function prefix(operator: PrefixOperator, operand: SproutExpr): SproutPrefix {
  return { type: 'Prefix', operator, operand };
}

export function infix(left: SproutExpr, operator: InfixOperator, right: SproutExpr): SproutInfix {
  return { type: 'Infix', operator, left, right };
}

export function ifExpr(
  condition: SproutExpr,
  consequence: SproutStatement[],
  alternative: SproutStatement[] = []
): SproutIf {
  return { type: 'If', condition, consequence, alternative };
}

export function ident(name: string): SproutIdentifier {
  return { type: 'Identifier', name };
}

export function exprStmt(expr: SproutExpr): SproutExprStmt {
  return { type: 'ExprStmt', expr };
}

export function ret(value: SproutExpr): SproutReturn {
  return { type: 'Return', value };
}

export function letStmt(name: string, value: SproutExpr): SproutLet {
  return { type: 'Let', name, value };
}

export function program(body: SproutStatement[]): SproutProgram {
  return { type: 'Program', body };
}
