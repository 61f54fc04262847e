import { ConfigurationError } from '@/core/errors';

/**
 * Insertion-ordered rule store owned by one metric.
 *
 * The owning metric seals it on its first evaluate(); registering a rule after
 * that raises until clear() reopens the registry.
 */
export class RuleRegistry<TRule> {
  private rules = new Map<string, TRule>();
  private sealed = false;

  constructor(private readonly owner: string) {}

  add(key: string, rule: TRule): void {
    if (this.sealed) {
      throw new ConfigurationError(
        `Metric '${this.owner}' has already been evaluated; call clear() before adding rule '${key}'`
      );
    }
    if (this.rules.has(key)) {
      throw new ConfigurationError(`A rule named '${key}' already exists in metric '${this.owner}'`);
    }
    this.rules.set(key, rule);
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  clear(): void {
    this.rules.clear();
    this.sealed = false;
  }

  get size(): number {
    return this.rules.size;
  }

  entries(): [string, TRule][] {
    return Array.from(this.rules.entries());
  }

  values(): TRule[] {
    return Array.from(this.rules.values());
  }
}
