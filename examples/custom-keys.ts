/**
 * Custom keys - describe a key type by its shape
 */

import {
  Trie,
  UNIT,
  defineKey,
  field,
  left,
  list,
  maybe,
  product,
  right,
  string,
  sum,
  uint16,
  unit,
  type Either,
  type Unit,
} from '../packages/core/src/index';

console.log('=== Custom key types ===\n');

// ===== A route: either the root or a path with an optional port =====
type Route = { kind: 'root' } | { kind: 'path'; segments: readonly string[]; port?: number };

const route = defineKey<Route, Either<Unit, readonly [readonly string[], number | undefined]>>(
  'route',
  sum(unit, product(field(list(string)), field(maybe(uint16)))),
  r => (r.kind === 'root' ? left(UNIT) : right<readonly [readonly string[], number | undefined]>([r.segments, r.port])),
  rep =>
    rep.tag === 'left'
      ? { kind: 'root' }
      : { kind: 'path', segments: rep.value[0], port: rep.value[1] }
);

const routes = Trie.fromEntries(route, [
  [{ kind: 'path', segments: ['users', 'list'] }, 'listUsers'],
  [{ kind: 'root' }, 'home'],
  [{ kind: 'path', segments: ['users'], port: 8080 }, 'usersAdmin'],
  [{ kind: 'path', segments: ['users'] }, 'users'],
]);

console.log('1️⃣ Ordered by shape: root first, then paths by segment');
for (const [key, handler] of routes) {
  console.log(' ', JSON.stringify(key), '→', handler);
}

console.log('\n2️⃣ Lookup');
console.log('get /users :8080 →', routes.get({ kind: 'path', segments: ['users'], port: 8080 }));
console.log('get /missing →', routes.get({ kind: 'path', segments: ['missing'] }));
console.log('✅ No hash or compare function written by hand');
