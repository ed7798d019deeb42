/**
 * Common key types derived from shapes
 */

import { defineKey, shapeKey } from './key';
import { KeyDomainError } from './errors';
import { char } from './leaves';
import { list } from './list';
import {
  UNIT,
  choices,
  decodeChoice,
  encodeChoice,
  field,
  left,
  product,
  right,
  sum,
  unit,
  voidShape,
  type Choice,
  type Either,
  type Unit,
} from './shape';
import type { TrieKey } from './internal/types';

export const voidKey: TrieKey<never> = shapeKey('void', voidShape);

export const unitKey: TrieKey<Unit> = shapeKey('unit', unit);

/**
 * A finite set of values, ordered as listed and matched the way `Map`
 * matches keys. Keys outside the list are rejected.
 */
export function enumeration<T>(name: string, values: readonly T[]): TrieKey<T> {
  const positions = new Map<T, number>();
  values.forEach((value, i) => {
    if (!positions.has(value)) positions.set(value, i);
  });
  return defineKey<T, Choice>(
    name,
    choices(values.length),
    (key) => {
      const index = positions.get(key);
      if (index === undefined) throw new KeyDomainError(name, key);
      return encodeChoice(index, values.length);
    },
    (rep) => values[decodeChoice(rep)]
  );
}

/** `false` before `true`. */
export const boolean: TrieKey<boolean> = enumeration('boolean', [false, true]);

/** Comparator results: `-1` before `0` before `1`. */
export const ordering: TrieKey<-1 | 0 | 1> = enumeration<-1 | 0 | 1>('ordering', [-1, 0, 1]);

/** `undefined` before any present value. */
export function maybe<T>(key: TrieKey<T>): TrieKey<T | undefined> {
  return defineKey<T | undefined, Either<Unit, T>>(
    `maybe<${key.name}>`,
    sum(unit, field(key)),
    (value) => (value === undefined ? left(UNIT) : right(value)),
    (rep) => (rep.tag === 'left' ? undefined : rep.value)
  );
}

/** Every left value before every right value. */
export function either<A, B>(leftKey: TrieKey<A>, rightKey: TrieKey<B>): TrieKey<Either<A, B>> {
  return shapeKey(`either<${leftKey.name}, ${rightKey.name}>`, sum(field(leftKey), field(rightKey)));
}

export function pair<A, B>(a: TrieKey<A>, b: TrieKey<B>): TrieKey<readonly [A, B]> {
  return shapeKey(`[${a.name}, ${b.name}]`, product(field(a), field(b)));
}

export function triple<A, B, C>(a: TrieKey<A>, b: TrieKey<B>, c: TrieKey<C>): TrieKey<readonly [A, B, C]> {
  return defineKey<readonly [A, B, C], readonly [A, readonly [B, C]]>(
    `[${a.name}, ${b.name}, ${c.name}]`,
    product(field(a), product(field(b), field(c))),
    ([x, y, z]) => [x, [y, z]],
    ([x, [y, z]]) => [x, y, z]
  );
}

export function quadruple<A, B, C, D>(
  a: TrieKey<A>,
  b: TrieKey<B>,
  c: TrieKey<C>,
  d: TrieKey<D>
): TrieKey<readonly [A, B, C, D]> {
  return defineKey<readonly [A, B, C, D], readonly [A, readonly [B, readonly [C, D]]]>(
    `[${a.name}, ${b.name}, ${c.name}, ${d.name}]`,
    product(field(a), product(field(b), product(field(c), field(d)))),
    ([w, x, y, z]) => [w, [x, [y, z]]],
    ([w, [x, [y, z]]]) => [w, x, y, z]
  );
}

export function quintuple<A, B, C, D, E>(
  a: TrieKey<A>,
  b: TrieKey<B>,
  c: TrieKey<C>,
  d: TrieKey<D>,
  e: TrieKey<E>
): TrieKey<readonly [A, B, C, D, E]> {
  return defineKey<readonly [A, B, C, D, E], readonly [A, readonly [B, readonly [C, readonly [D, E]]]]>(
    `[${a.name}, ${b.name}, ${c.name}, ${d.name}, ${e.name}]`,
    product(field(a), product(field(b), product(field(c), product(field(d), field(e))))),
    ([v, w, x, y, z]) => [v, [w, [x, [y, z]]]],
    ([v, [w, [x, [y, z]]]]) => [v, w, x, y, z]
  );
}

export function sextuple<A, B, C, D, E, F>(
  a: TrieKey<A>,
  b: TrieKey<B>,
  c: TrieKey<C>,
  d: TrieKey<D>,
  e: TrieKey<E>,
  f: TrieKey<F>
): TrieKey<readonly [A, B, C, D, E, F]> {
  return defineKey<
    readonly [A, B, C, D, E, F],
    readonly [A, readonly [B, readonly [C, readonly [D, readonly [E, F]]]]]
  >(
    `[${a.name}, ${b.name}, ${c.name}, ${d.name}, ${e.name}, ${f.name}]`,
    product(field(a), product(field(b), product(field(c), product(field(d), product(field(e), field(f)))))),
    ([u, v, w, x, y, z]) => [u, [v, [w, [x, [y, z]]]]],
    ([u, [v, [w, [x, [y, z]]]]]) => [u, v, w, x, y, z]
  );
}

export function septuple<A, B, C, D, E, F, G>(
  a: TrieKey<A>,
  b: TrieKey<B>,
  c: TrieKey<C>,
  d: TrieKey<D>,
  e: TrieKey<E>,
  f: TrieKey<F>,
  g: TrieKey<G>
): TrieKey<readonly [A, B, C, D, E, F, G]> {
  return defineKey<
    readonly [A, B, C, D, E, F, G],
    readonly [A, readonly [B, readonly [C, readonly [D, readonly [E, readonly [F, G]]]]]]
  >(
    `[${a.name}, ${b.name}, ${c.name}, ${d.name}, ${e.name}, ${f.name}, ${g.name}]`,
    product(
      field(a),
      product(field(b), product(field(c), product(field(d), product(field(e), product(field(f), field(g))))))
    ),
    ([t, u, v, w, x, y, z]) => [t, [u, [v, [w, [x, [y, z]]]]]],
    ([t, [u, [v, [w, [x, [y, z]]]]]]) => [t, u, v, w, x, y, z]
  );
}

// =====================================================
// Sequences
// =====================================================

export { list };

/** Strings as lists of code points: `'' < 'a' < 'ab' < 'b'`. */
export const string: TrieKey<string> = defineKey<string, readonly string[]>(
  'string',
  field(list(char)),
  (s) => Array.from(s),
  (chars) => chars.join('')
);
