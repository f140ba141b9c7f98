import { validateDescriptor } from "./validate";
import type { ActionDescriptor, KeyedAction, PatternAction } from "./types";

export interface PatternMatch {
  action: PatternAction;
  captures: string[];
}

/**
 * Registry of calculator actions: exact keys, aliases and patterns.
 */
export class ActionRegistry {
  private descriptors: Map<string, ActionDescriptor> = new Map();
  private byKey: Map<string, KeyedAction> = new Map();
  private patterns: PatternAction[] = [];
  private byCategory: Map<string, ActionDescriptor[]> = new Map();
  private overridden: Set<string> = new Set();

  /**
   * Register a descriptor. Throws on an invalid descriptor and on
   * duplicate names or keys.
   */
  register(descriptor: ActionDescriptor): void {
    const { valid, errors } = validateDescriptor(descriptor);
    if (!valid) {
      throw new Error(`Invalid action descriptor: ${errors.join("; ")}`);
    }
    if (this.descriptors.has(descriptor.name)) {
      throw new Error(`Action already registered: ${descriptor.name}`);
    }
    if (descriptor.kind === "keyed") {
      for (const key of [descriptor.key, ...descriptor.aliases]) {
        const existing = this.byKey.get(key);
        if (existing) {
          throw new Error(`Key ${key} of ${descriptor.name} already used by ${existing.name}`);
        }
      }
    }

    this.descriptors.set(descriptor.name, descriptor);
    if (descriptor.kind === "keyed") {
      for (const key of [descriptor.key, ...descriptor.aliases]) this.byKey.set(key, descriptor);
    } else {
      this.patterns.push(descriptor);
    }
    this.indexByCategory(descriptor);
  }

  registerAll(descriptors: readonly ActionDescriptor[]): void {
    for (const d of descriptors) this.register(d);
  }

  /**
   * Retrieve by canonical name.
   */
  get(name: string): ActionDescriptor | undefined {
    return this.descriptors.get(name);
  }

  /**
   * Exact key or alias, skipping keys a variable has taken over.
   */
  lookup(token: string): KeyedAction | undefined {
    if (this.overridden.has(token)) return undefined;
    return this.byKey.get(token);
  }

  /**
   * First pattern, in registration order, that matches the whole token.
   */
  matchPattern(token: string): PatternMatch | undefined {
    for (const action of this.patterns) {
      const m = action.pattern.exec(token);
      if (m) return { action, captures: m.slice(1).map(g => g ?? "") };
    }
    return undefined;
  }

  /**
   * Stop treating a key as a built-in. Returns false if it was not one.
   */
  override(key: string): boolean {
    if (!this.byKey.has(key) || this.overridden.has(key)) return false;
    this.overridden.add(key);
    return true;
  }

  /**
   * List all descriptors in registration order.
   */
  getAll(): ActionDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  /**
   * Categories in the order their first action was registered.
   */
  categories(): string[] {
    return Array.from(this.byCategory.keys());
  }

  getByCategory(category: string): ActionDescriptor[] {
    return this.byCategory.get(category) ?? [];
  }

  /**
   * Help topic lookup: canonical name, key, alias or pattern usage.
   */
  find(topic: string): ActionDescriptor | undefined {
    const direct = this.byKey.get(topic) ?? this.descriptors.get(topic);
    if (direct) return direct;
    return this.patterns.find(p => p.usage === topic);
  }

  /**
   * Simple text search (name, keys, summary, detail).
   */
  search(query: string): ActionDescriptor[] {
    const q = query.toLowerCase();
    return this.getAll().filter(d =>
      d.name.toLowerCase().includes(q) ||
      (d.kind === "keyed" && [d.key, ...d.aliases].some(k => k.toLowerCase().includes(q))) ||
      d.doc.summary.toLowerCase().includes(q) ||
      (d.doc.detail?.toLowerCase().includes(q) ?? false)
    );
  }

  static from(descriptors: readonly ActionDescriptor[]): ActionRegistry {
    const registry = new ActionRegistry();
    registry.registerAll(descriptors);
    return registry;
  }

  private indexByCategory(descriptor: ActionDescriptor): void {
    const list = this.byCategory.get(descriptor.category);
    if (list) {
      list.push(descriptor);
    } else {
      this.byCategory.set(descriptor.category, [descriptor]);
    }
  }
}
