/**
 * =============================================================================
 * QUERY PLAN - Predicates & Ordering
 * =============================================================================
 *
 * An eagerly built, inspectable description of one query. Stores receive the
 * whole plan at once; evaluation helpers below are what the in-process store
 * uses, and double as the reference semantics for any other implementation.
 * =============================================================================
 */

export type Scalar = string | number | boolean;

export type Predicate<F extends string = string> =
  /** exact match */
  | { kind: 'eq'; field: F; value: Scalar }
  /** value is one of */
  | { kind: 'in'; field: F; values: readonly Scalar[] }
  /** inclusive timestamp bounds; either side may be open */
  | { kind: 'range'; field: F; from?: Date; to?: Date }
  /** case-insensitive substring, OR-ed across fields */
  | { kind: 'contains'; fields: readonly F[]; term: string }
  | { kind: 'or'; predicates: readonly Predicate<F>[] };

export type SortDirection = 'asc' | 'desc';

export interface OrderTerm<F extends string = string> {
  field: F;
  direction: SortDirection;
}

export interface QueryPlan<F extends string = string> {
  predicates: readonly Predicate<F>[];
  order: readonly OrderTerm<F>[];
  limit?: number;
  offset?: number;
}

/**
 * Reads a (possibly related) field value off a row
 */
export type FieldReader<T, F extends string> = (row: T, field: F) => unknown;

function toEpochMs(value: unknown): number | null {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string') {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
  }
  return null;
}

export function matchesPredicate<T, F extends string>(
  row: T,
  predicate: Predicate<F>,
  read: FieldReader<T, F>
): boolean {
  switch (predicate.kind) {
    case 'eq':
      return read(row, predicate.field) === predicate.value;

    case 'in': {
      const value = read(row, predicate.field);
      return predicate.values.some(candidate => candidate === value);
    }

    case 'range': {
      const ms = toEpochMs(read(row, predicate.field));
      if (ms === null) return false;
      if (predicate.from && ms < predicate.from.getTime()) return false;
      if (predicate.to && ms > predicate.to.getTime()) return false;
      return true;
    }

    case 'contains': {
      const needle = predicate.term.toLowerCase();
      return predicate.fields.some(field => {
        const value = read(row, field);
        return typeof value === 'string' && value.toLowerCase().includes(needle);
      });
    }

    case 'or':
      return predicate.predicates.some(inner => matchesPredicate(row, inner, read));
  }
}

export function matchesAll<T, F extends string>(
  row: T,
  predicates: readonly Predicate<F>[],
  read: FieldReader<T, F>
): boolean {
  return predicates.every(predicate => matchesPredicate(row, predicate, read));
}

function compareValues(left: unknown, right: unknown): number {
  if (left === right) return 0;
  if (left === undefined || left === null) return 1;
  if (right === undefined || right === null) return -1;
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  if (typeof left === 'boolean' && typeof right === 'boolean') return Number(left) - Number(right);
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Comparator for an ordering. Rows equal on every term fall back to id
 * ascending so pagination stays stable.
 */
export function compareByOrder<T extends { id: string }, F extends string>(
  order: readonly OrderTerm<F>[],
  read: FieldReader<T, F>
): (left: T, right: T) => number {
  return (left, right) => {
    for (const term of order) {
      const result = compareValues(read(left, term.field), read(right, term.field));
      if (result !== 0) {
        return term.direction === 'asc' ? result : -result;
      }
    }
    return compareValues(left.id, right.id);
  };
}
