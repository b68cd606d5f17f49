/** Read-only view used when resolving REF tags. */
export interface NameLookup {
  lookup(label: string): string | undefined;
}

/**
 * Session-wide mapping from record label to the identifier assigned on insert.
 *
 * Inserting a label that already exists overwrites it without warning: the
 * most recently registered identifier is the one later REF tags resolve to.
 */
export class NameRegistry implements NameLookup {
  private readonly ids = new Map<string, string>();

  static from(entries: Map<string, string> | Record<string, string>): NameRegistry {
    const registry = new NameRegistry();
    const pairs = entries instanceof Map ? entries : Object.entries(entries);
    for (const [label, id] of pairs) {
      registry.insert(label, id);
    }
    return registry;
  }

  insert(label: string, identifier: string): void {
    this.ids.set(label, identifier);
  }

  lookup(label: string): string | undefined {
    return this.ids.get(label);
  }

  has(label: string): boolean {
    return this.ids.has(label);
  }

  get size(): number {
    return this.ids.size;
  }

  entries(): IterableIterator<[string, string]> {
    return this.ids.entries();
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.ids);
  }
}
