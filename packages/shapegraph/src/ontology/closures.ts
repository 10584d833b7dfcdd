/**
 * Transitive closure over superclass links.
 *
 * Uses Warshall's algorithm; data models hold tens to hundreds of
 * classes, so the cubic bound is not a concern.
 */

/**
 * Computes the transitive closure of a set of directed relations.
 *
 * Given subclass → superclass links like [A→B, B→C], returns every
 * ancestor of every class: A→{B, C}, B→{C}.
 *
 * @param relations - Array of [from, to] pairs representing direct links
 * @returns Map from each 'from' to the set of all reachable 'to' values
 */
export function computeTransitiveClosure<T extends string>(
  relations: readonly (readonly [T, T])[],
): ReadonlyMap<T, ReadonlySet<T>> {
  const closure = new Map<T, Set<T>>();

  const allNodes = new Set<T>();
  for (const [from, to] of relations) {
    allNodes.add(from);
    allNodes.add(to);
  }
  for (const node of allNodes) {
    closure.set(node, new Set());
  }
  for (const [from, to] of relations) {
    closure.get(from)?.add(to);
  }

  // For each intermediate k: i→k and k→j implies i→j
  for (const k of allNodes) {
    const kReaches = closure.get(k);
    if (!kReaches) continue;
    for (const node of allNodes) {
      const nodeReaches = closure.get(node);
      if (!nodeReaches?.has(k)) continue;
      for (const reached of kReaches) {
        nodeReaches.add(reached);
      }
    }
  }

  return closure;
}

/**
 * Computes the inverse of a closure map: ancestors become descendants.
 *
 * Given A→{B, C}, returns B→{A}, C→{A}.
 */
export function invertClosure<T extends string>(
  closure: ReadonlyMap<T, ReadonlySet<T>>,
): ReadonlyMap<T, ReadonlySet<T>> {
  const result = new Map<T, Set<T>>();

  for (const [from, tos] of closure) {
    for (const to of tos) {
      const existing = result.get(to) ?? new Set<T>();
      existing.add(from);
      result.set(to, existing);
    }
  }

  return result;
}

/**
 * Checks if there's a path from source to target in the closure.
 */
export function isReachable<T extends string>(
  closure: ReadonlyMap<T, ReadonlySet<T>>,
  source: T,
  target: T,
): boolean {
  return closure.get(source)?.has(target) ?? false;
}
