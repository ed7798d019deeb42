/**
 * Shape combinators
 *
 * A shape describes the algebraic structure of a key representation `R`
 * with five forms. Products and sums carry the functions that take a
 * representation apart and put it back together, so the engine can recurse
 * without knowing `R`.
 *
 * | form            | representation     |
 * |-----------------|--------------------|
 * | `voidShape`     | `never`            |
 * | `unit`          | `Unit`             |
 * | `field(key)`    | the field's key    |
 * | `product(f, g)` | `readonly [A, B]`  |
 * | `sum(f, g)`     | `Either<A, B>`     |
 */

import type { TrieKey } from './internal/types';

export interface Unit {
  readonly tag: 'unit';
}
export const UNIT: Unit = { tag: 'unit' };

export type Either<A, B> =
  | { readonly tag: 'left'; readonly value: A }
  | { readonly tag: 'right'; readonly value: B };

export function left<A>(value: A): Either<A, never> {
  return { tag: 'left', value };
}

export function right<B>(value: B): Either<never, B> {
  return { tag: 'right', value };
}

export interface VoidShape {
  readonly kind: 'void';
}

export interface UnitShape<R> {
  readonly kind: 'unit';
  unitKey(): R;
}

export interface FieldShape<R> {
  readonly kind: 'field';
  target(): TrieKey<R>;
}

export interface ProductShape<R, A = unknown, B = unknown> {
  readonly kind: 'product';
  readonly first: Shape<A>;
  readonly second: Shape<B>;
  split(key: R): readonly [A, B];
  join(first: A, second: B): R;
}

export interface SumShape<R, A = unknown, B = unknown> {
  readonly kind: 'sum';
  readonly left: Shape<A>;
  readonly right: Shape<B>;
  match(key: R): Either<A, B>;
  inl(value: A): R;
  inr(value: B): R;
}

export type Shape<R> =
  | VoidShape
  | UnitShape<R>
  | FieldShape<R>
  | ProductShape<R>
  | SumShape<R>;

export const voidShape: Shape<never> = { kind: 'void' };

export const unit: Shape<Unit> = {
  kind: 'unit',
  unitKey: () => UNIT,
};

/**
 * Wraps a leaf key or another shape-derived key. Pass a thunk when the
 * key refers back to the type being defined.
 */
export function field<F>(target: TrieKey<F> | (() => TrieKey<F>)): Shape<F> {
  const resolve = typeof target === 'function' ? target : () => target;
  return { kind: 'field', target: resolve };
}

export function product<A, B>(first: Shape<A>, second: Shape<B>): Shape<readonly [A, B]> {
  const shape: ProductShape<readonly [A, B], A, B> = {
    kind: 'product',
    first,
    second,
    split: (key) => key,
    join: (a, b) => [a, b],
  };
  return shape;
}

export function sum<A, B>(leftShape: Shape<A>, rightShape: Shape<B>): Shape<Either<A, B>> {
  const shape: SumShape<Either<A, B>, A, B> = {
    kind: 'sum',
    left: leftShape,
    right: rightShape,
    match: (key) => key,
    inl: (value) => left(value),
    inr: (value) => right(value),
  };
  return shape;
}

/** Representation of a choice among `n` fieldless alternatives. */
export type Choice =
  | Unit
  | { readonly tag: 'left'; readonly value: Unit }
  | { readonly tag: 'right'; readonly value: Choice };

/**
 * Right-nested sum of `n` units: `Void` for none, `Unit` for one.
 */
export function choices(n: number): Shape<Choice> {
  if (n <= 0) return voidShape;
  if (n === 1) return unit;
  return sum(unit, choices(n - 1));
}

export function encodeChoice(index: number, n: number): Choice {
  if (n === 1) return UNIT;
  return index === 0 ? left(UNIT) : right(encodeChoice(index - 1, n - 1));
}

export function decodeChoice(choice: Choice): number {
  let index = 0;
  let cur = choice;
  while (cur.tag === 'right') {
    index++;
    cur = cur.value;
  }
  return index;
}
