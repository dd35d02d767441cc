import { DefinitionCategory } from "../store/DefinitionCategory.js";

const keyOf = (category: DefinitionCategory, name: string): string =>
  `${category}/${name}`;

/**
 * The definitions currently being resolved by one top-level call.
 */
export class CycleGuard {
  private readonly inProgress = new Set<string>();

  /**
   * Mark a definition as in progress.
   * Returns false if it already is, meaning the reference is circular.
   */
  enter(category: DefinitionCategory, name: string): boolean {
    const key = keyOf(category, name);
    if (this.inProgress.has(key)) return false;
    this.inProgress.add(key);
    return true;
  }

  leave(category: DefinitionCategory, name: string): void {
    this.inProgress.delete(keyOf(category, name));
  }

  isResolving(category: DefinitionCategory, name: string): boolean {
    return this.inProgress.has(keyOf(category, name));
  }

  get size(): number {
    return this.inProgress.size;
  }
}
