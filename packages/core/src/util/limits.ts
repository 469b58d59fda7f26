import { asInteger, asNumber, type Cast } from '../document/contract.js';

export type LimitKind = 'inclusive' | 'exclusive';

export interface Limit<T> {
  readonly kind: LimitKind;
  readonly value: T;
}

export type NumericKind = 'integer' | 'real';

/**
 * Arithmetic needed by bounds checking, for one numeric document type.
 * Integers are exact (`bigint`), reals are IEEE doubles.
 */
export interface NumericDomain<T extends bigint | number> {
  readonly kind: NumericKind;
  /** Smallest positive step between two distinct values */
  readonly unit: T;
  readonly zero: T;
  /** Reads a constraint value out of a schema node */
  readonly cast: Cast<T>;
  /** Reads a document value of exactly this type */
  readonly accept: Cast<T>;
  difference(a: T, b: T): T;
  isMultiple(value: T, of: T): boolean;
}

export const INTEGER_DOMAIN: NumericDomain<bigint> = {
  kind: 'integer',
  unit: 1n,
  zero: 0n,
  cast: asInteger,
  accept: asInteger,
  difference: (a, b) => a - b,
  isMultiple: (value, of) => value % of === 0n,
};

export const REAL_DOMAIN: NumericDomain<number> = {
  kind: 'real',
  unit: Number.MIN_VALUE,
  zero: 0,
  cast: asNumber,
  accept: (node) => (node.kind === 'real' ? node.value : undefined),
  difference: (a, b) => a - b,
  isMultiple: (value, of) => value % of === 0,
};

export function inclusive<T>(value: T): Limit<T> {
  return { kind: 'inclusive', value };
}

export function exclusive<T>(value: T): Limit<T> {
  return { kind: 'exclusive', value };
}

export function satisfiesLower<T extends bigint | number>(
  limit: Limit<T>,
  value: T
): boolean {
  return limit.kind === 'inclusive'
    ? value >= limit.value
    : value > limit.value;
}

export function satisfiesUpper<T extends bigint | number>(
  limit: Limit<T>,
  value: T
): boolean {
  return limit.kind === 'inclusive'
    ? value <= limit.value
    : value < limit.value;
}

/**
 * Whether `lower..upper` admits at least one value. Two exclusive limits need
 * more than one unit between them; any other pairing only needs
 * `upper - lower >= 0`. A missing side is always valid.
 */
export function isValidRange<T extends bigint | number>(
  domain: NumericDomain<T>,
  lower: Limit<T> | undefined,
  upper: Limit<T> | undefined
): boolean {
  if (!lower || !upper) return true;
  const span = domain.difference(upper.value, lower.value);
  if (lower.kind === 'exclusive' && upper.kind === 'exclusive') {
    return span > domain.unit;
  }
  return span >= domain.zero;
}

export interface NumericConstraints<T> {
  readonly lower?: Limit<T>;
  readonly upper?: Limit<T>;
  readonly multipleOf?: T;
}
