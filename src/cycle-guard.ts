import { CircularReferenceError } from "./errors.js";

/**
 * Identity history for the layered table walk. A container may appear more
 * than once inside one layer, but never in a layer after the one that first
 * admitted it.
 */
export class CycleGuard {
  private readonly seen = new Set<object>();

  constructor(roots: Iterable<object> = []) {
    for (const root of roots) this.seen.add(root);
  }

  /** Records a whole layer of `[key, container]` pairs, or throws if any was admitted before. */
  admit(layer: Iterable<readonly [string, object]>): void {
    const entries = [...layer];
    for (const [key, container] of entries) {
      if (this.seen.has(container)) throw new CircularReferenceError(key);
    }
    for (const [, container] of entries) this.seen.add(container);
  }
}

/**
 * Containers on the current descent path: array-of-tables elements being
 * expanded, and the arrays and inline tables being rendered as values.
 */
export class ActivePath {
  private readonly active = new Set<object>();

  enter<T>(container: object, key: string | undefined, body: () => T): T {
    if (this.active.has(container)) throw new CircularReferenceError(key);
    this.active.add(container);
    try {
      return body();
    } finally {
      this.active.delete(container);
    }
  }
}
