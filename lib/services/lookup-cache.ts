import type { Organism } from "../genes/types";

/**
 * Lookup results keyed by (organism, symbol). `null` records a completed
 * lookup with no answer, so the symbol is not requested again; symbols from
 * failed batches are never stored and stay eligible for a later lookup.
 */
export class LookupCache<V> {
  private readonly entries = new Map<string, V | null>();

  private key(organism: Organism, symbol: string): string {
    return `${organism}:${symbol}`;
  }

  has(organism: Organism, symbol: string): boolean {
    return this.entries.has(this.key(organism, symbol));
  }

  get(organism: Organism, symbol: string): V | undefined {
    return this.entries.get(this.key(organism, symbol)) ?? undefined;
  }

  set(organism: Organism, symbol: string, value: V | null) {
    this.entries.set(this.key(organism, symbol), value);
  }

  /** Distinct symbols not yet looked up, in first-seen order. */
  pending(organism: Organism, symbols: Iterable<string>): string[] {
    const out = new Set<string>();
    for (const symbol of symbols) {
      if (!this.has(organism, symbol)) out.add(symbol);
    }
    return [...out];
  }
}
