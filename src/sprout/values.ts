export interface IntegerValue {
  kind: 'Integer';
  value: number;
}

export interface BooleanValue {
  kind: 'Boolean';
  value: boolean;
}

export interface NullValue {
  kind: 'Null';
}

/**
 * Marks a value produced by a `return` statement while statement
 * sequences unwind. The payload is never itself a ReturnValue, and
 * `evaluateProgram` strips the wrapper before handing a value back.
 */
export interface ReturnValue {
  kind: 'Return';
  value: ProgramValue;
}

export type ProgramValue = IntegerValue | BooleanValue | NullValue;
export type SproutValue = ProgramValue | ReturnValue;

export type ValueTypeName = 'INTEGER' | 'BOOLEAN' | 'NULL' | 'RETURN';

export const NULL: NullValue = Object.freeze<NullValue>({ kind: 'Null' });

export const TRUE: BooleanValue = Object.freeze<BooleanValue>({ kind: 'Boolean', value: true });
export const FALSE: BooleanValue = Object.freeze<BooleanValue>({ kind: 'Boolean', value: false });

export function integer(value: number): IntegerValue {
  return { kind: 'Integer', value };
}

export function boolean(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

export function returned(value: SproutValue): ReturnValue {
  // Already unwinding: keep the single wrapper.
  if (value.kind === 'Return') return value;
  return { kind: 'Return', value };
}

export function isReturn(value: SproutValue): value is ReturnValue {
  return value.kind === 'Return';
}

export function typeName(value: SproutValue): ValueTypeName {
  switch (value.kind) {
    case 'Integer':
      return 'INTEGER';
    case 'Boolean':
      return 'BOOLEAN';
    case 'Null':
      return 'NULL';
    case 'Return':
      return 'RETURN';
  }
}

export function valueEquals(a: SproutValue, b: SproutValue): boolean {
  switch (a.kind) {
    case 'Integer':
      return b.kind === 'Integer' && b.value === a.value;
    case 'Boolean':
      return b.kind === 'Boolean' && b.value === a.value;
    case 'Null':
      return b.kind === 'Null';
    case 'Return':
      return b.kind === 'Return' && valueEquals(a.value, b.value);
  }
}

/** Render a value the way it would be written in source. */
export function inspect(value: SproutValue): string {
  switch (value.kind) {
    case 'Integer':
      return String(value.value);
    case 'Boolean':
      return value.value ? 'true' : 'false';
    case 'Null':
      return 'null';
    case 'Return':
      return `return ${inspect(value.value)}`;
  }
}
