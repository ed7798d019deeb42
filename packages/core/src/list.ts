/**
 * List keys
 *
 * A list trie has the layout of Sum(Unit, Product(Field(element), Field(self))):
 * each level holds the value stored under the current prefix and an element
 * trie of the levels one element further down. Lists have no length limit, so
 * every operation walks the levels with an explicit work stack, carries the
 * prefix as a path and only builds a key array where one is handed out.
 */

import { asProduct, asSum, asUnit, productNode, sumNode, unitNode } from './internal/nodes';
import type { Focus, Owner, SumTrie, TrieKey, TrieNode } from './internal/types';

// Prefix of a level, last element first
interface Path<T> {
  readonly item: T;
  readonly parent: Path<T> | undefined;
}

function pathToArray<T>(path: Path<T> | undefined): T[] {
  const items: T[] = [];
  for (let p = path; p !== undefined; p = p.parent) items.push(p.item);
  return items.reverse();
}

// Filled in once the level below has been rebuilt
interface Slot<V> {
  node: SumTrie<V> | undefined;
}

function drain(work: (() => void)[]): void {
  for (let job = work.pop(); job !== undefined; job = work.pop()) job();
}

class ListKey<T> implements TrieKey<readonly T[]> {
  readonly name: string;

  constructor(private readonly element: TrieKey<T>) {
    this.name = `list<${element.name}>`;
  }

  empty<V>(): TrieNode<V> {
    return this.levelNode<V>(undefined, this.element.empty<TrieNode<V>>());
  }

  isNull<V>(trie: TrieNode<V>): boolean {
    return this.isNullLevel(asSum(trie));
  }

  focus<V>(key: readonly T[], trie: TrieNode<V>, owner?: Owner): Focus<V> {
    const root = asSum(trie);
    const trail: { level: SumTrie<V>; at: Focus<TrieNode<V>> }[] = [];
    let level = root;
    let depth = 0;
    for (; depth < key.length; depth++) {
      const at = this.element.focus(key[depth], this.children(level), owner);
      trail.push({ level, at });
      if (at.value === undefined) break;
      level = asSum(at.value);
    }
    const found = depth === key.length;
    const bottom = level;

    return {
      value: found ? this.valueAt(bottom) : undefined,
      set: (value) => {
        let next: SumTrie<V>;
        if (found) {
          if (value === this.valueAt(bottom)) return root;
          next = sumNode(unitNode(value), bottom.right);
        } else {
          if (value === undefined) return root;
          next = this.levelNode(value, this.element.empty<TrieNode<V>>());
          for (let i = key.length - 1; i > depth; i--) {
            next = this.levelNode<V>(undefined, this.element.focus(key[i], this.element.empty<TrieNode<V>>()).set(next));
          }
        }
        for (let i = trail.length - 1; i >= 0; i--) {
          const { level: parent, at } = trail[i];
          next = sumNode(parent.left, productNode(at.set(this.isNullLevel(next) ? undefined : next)));
        }
        return next;
      },
    };
  }

  mergeWithKey<A, B, C>(
    combine: (key: readonly T[], left: A, right: B) => C | undefined,
    onlyLeft: (trie: TrieNode<A>) => TrieNode<C>,
    onlyRight: (trie: TrieNode<B>) => TrieNode<C>,
    left: TrieNode<A>,
    right: TrieNode<B>
  ): TrieNode<C> {
    const root: Slot<C> = { node: undefined };
    const work: (() => void)[] = [];

    const visit = (x: SumTrie<A>, y: SumTrie<B>, path: Path<T> | undefined, slot: Slot<C>): (() => void) => () => {
      const a = this.valueAt(x);
      const b = this.valueAt(y);
      let value: C | undefined;
      if (a !== undefined && b !== undefined) {
        value = combine(pathToArray(path), a, b);
      } else if (a !== undefined) {
        value = this.oneSidedValue<A, C>(onlyLeft, a, path);
      } else if (b !== undefined) {
        value = this.oneSidedValue<B, C>(onlyRight, b, path);
      }

      const below: (() => void)[] = [];
      const slots = this.element.mergeWithKey<TrieNode<A>, TrieNode<B>, Slot<C>>(
        (item, cx, cy) => {
          const inner: Slot<C> = { node: undefined };
          below.push(visit(asSum(cx), asSum(cy), { item, parent: path }, inner));
          return inner;
        },
        (children) => this.oneSidedChildren(onlyLeft, children, path),
        (children) => this.oneSidedChildren(onlyRight, children, path),
        this.children(x),
        this.children(y)
      );

      work.push(() => {
        slot.node = this.levelNode(value, this.settle(slots));
      });
      for (let i = below.length - 1; i >= 0; i--) work.push(below[i]);
    };

    work.push(visit(asSum(left), asSum(right), undefined, root));
    drain(work);
    return root.node ?? this.empty<C>();
  }

  mapMaybeWithKey<A, B>(f: (key: readonly T[], value: A) => B | undefined, trie: TrieNode<A>): TrieNode<B> {
    const root: Slot<B> = { node: undefined };
    const work: (() => void)[] = [];

    const visit = (level: SumTrie<A>, path: Path<T> | undefined, slot: Slot<B>): (() => void) => () => {
      const current = this.valueAt(level);
      const value = current === undefined ? undefined : f(pathToArray(path), current);

      const below: (() => void)[] = [];
      const slots = this.element.mapMaybeWithKey((item: T, child: TrieNode<A>): Slot<B> => {
        const inner: Slot<B> = { node: undefined };
        below.push(visit(asSum(child), { item, parent: path }, inner));
        return inner;
      }, this.children(level));

      work.push(() => {
        slot.node = this.levelNode(value, this.settle(slots));
      });
      for (let i = below.length - 1; i >= 0; i--) work.push(below[i]);
    };

    work.push(visit(asSum(trie), undefined, root));
    drain(work);
    return root.node ?? this.empty<B>();
  }

  /** Prefixes come before their extensions; siblings follow the element order. */
  *entries<V>(trie: TrieNode<V>): IterableIterator<[readonly T[], V]> {
    const prefix: T[] = [];
    const stack: Iterator<[T, TrieNode<V>]>[] = [];
    let level: SumTrie<V> | undefined = asSum(trie);

    for (;;) {
      if (level !== undefined) {
        const value = this.valueAt(level);
        if (value !== undefined) yield [prefix.slice(), value];
        stack.push(this.element.entries(this.children(level)));
        level = undefined;
      }
      if (stack.length === 0) return;
      const step = stack[stack.length - 1].next();
      if (step.done) {
        stack.pop();
        prefix.pop();
        continue;
      }
      const [item, child] = step.value;
      prefix.push(item);
      level = asSum(child);
    }
  }

  // =====================================================
  // Levels
  // =====================================================

  private levelNode<V>(value: V | undefined, children: TrieNode<TrieNode<V>>): SumTrie<V> {
    return sumNode<V>(unitNode(value), productNode(children));
  }

  private valueAt<V>(level: SumTrie<V>): V | undefined {
    return asUnit(level.left).value;
  }

  private children<V>(level: SumTrie<V>): TrieNode<TrieNode<V>> {
    return asProduct(level.right).outer;
  }

  private isNullLevel<V>(level: SumTrie<V>): boolean {
    return this.valueAt(level) === undefined && this.element.isNull(this.children(level));
  }

  // Element trie of finished levels, without the ones that came out empty
  private settle<V>(slots: TrieNode<Slot<V>>): TrieNode<TrieNode<V>> {
    return this.element.mapMaybeWithKey(
      (_, slot: Slot<V>): TrieNode<V> | undefined =>
        slot.node === undefined || this.isNullLevel(slot.node) ? undefined : slot.node,
      slots
    );
  }

  // =====================================================
  // One-sided merge parts
  // =====================================================

  // Standalone trie holding `level` under `path` and nothing else
  private wrap<V>(level: SumTrie<V>, path: Path<T> | undefined): SumTrie<V> {
    let node = level;
    for (let p = path; p !== undefined; p = p.parent) {
      node = this.levelNode<V>(undefined, this.element.focus(p.item, this.element.empty<TrieNode<V>>()).set(node));
    }
    return node;
  }

  private descend<V>(root: SumTrie<V>, path: Path<T> | undefined): SumTrie<V> | undefined {
    let node = root;
    for (const item of pathToArray(path)) {
      const child = this.element.focus(item, this.children(node)).value;
      if (child === undefined) return undefined;
      node = asSum(child);
    }
    return node;
  }

  private oneSided<X, C>(
    transform: (trie: TrieNode<X>) => TrieNode<C>,
    level: SumTrie<X>,
    path: Path<T> | undefined
  ): SumTrie<C> | undefined {
    return this.descend(asSum(transform(this.wrap(level, path))), path);
  }

  private oneSidedValue<X, C>(
    transform: (trie: TrieNode<X>) => TrieNode<C>,
    value: X,
    path: Path<T> | undefined
  ): C | undefined {
    const level = this.oneSided(transform, this.levelNode(value, this.element.empty<TrieNode<X>>()), path);
    return level === undefined ? undefined : this.valueAt(level);
  }

  private oneSidedChildren<X, C>(
    transform: (trie: TrieNode<X>) => TrieNode<C>,
    children: TrieNode<TrieNode<X>>,
    path: Path<T> | undefined
  ): TrieNode<Slot<C>> {
    if (this.element.isNull(children)) return this.element.empty<Slot<C>>();
    const level = this.oneSided(transform, this.levelNode<X>(undefined, children), path);
    const result = level === undefined ? this.element.empty<TrieNode<C>>() : this.children(level);
    return this.element.mapMaybeWithKey((_, node: TrieNode<C>): Slot<C> => ({ node: asSum(node) }), result);
  }
}

/**
 * Arrays of `element` keys. A proper prefix sorts before its extensions,
 * then elements decide.
 */
export function list<T>(element: TrieKey<T>): TrieKey<readonly T[]> {
  return new ListKey(element);
}
