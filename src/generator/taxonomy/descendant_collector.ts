/**
 * Transitive closure of derived classes
 */

export function collectDescendants(
  root: string,
  childrenOf: ReadonlyMap<string, readonly string[]>,
): Set<string> {
  const result = new Set<string>();
  // Work-list rather than recursion: reflection graphs can be deep.
  const pending: string[] = [root];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined || result.has(current)) continue;
    result.add(current);
    const children = childrenOf.get(current);
    if (!children) continue;
    for (const child of children) {
      if (!result.has(child)) pending.push(child);
    }
  }

  return result;
}

/**
 * Ancestors of `className`, nearest first. Stops at the first class with no
 * recorded parent, or on a repeated name.
 */
export function ancestorsOf(
  className: string,
  parentOf: ReadonlyMap<string, string>,
): string[] {
  const chain: string[] = [];
  const seen = new Set<string>([className]);
  let current = parentOf.get(className);
  while (current !== undefined && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = parentOf.get(current);
  }
  return chain;
}

export function restrictParentMap(
  parentOf: ReadonlyMap<string, string>,
  classes: ReadonlySet<string>,
): Map<string, string> {
  const restricted = new Map<string, string>();
  for (const name of Array.from(classes).sort()) {
    const parent = parentOf.get(name);
    if (parent !== undefined) restricted.set(name, parent);
  }
  return restricted;
}
