// ── Gene Consolidation Types ───────────────────────────────────────────────

export type Organism = "Human" | "Mouse";

export const TAXONOMY_IDS: Record<Organism, number> = {
  Human: 9606,
  Mouse: 10090,
};

export type Polarity = "positive" | "negative" | "unspecified";

/** Raw-table `category` column value → polarity. */
export const POLARITY_BY_LABEL: Record<"Pro" | "Anti" | "General", Polarity> = {
  Pro: "positive",
  Anti: "negative",
  General: "unspecified",
};

export type Category = "Pro-apoptotic" | "Anti-apoptotic" | "Ambiguous" | "Unspecified";

/** Fixed ordering used by summaries and the per-source breakdown. */
export const CATEGORY_ORDER: readonly Category[] = [
  "Pro-apoptotic",
  "Anti-apoptotic",
  "Ambiguous",
  "Unspecified",
];

export type MappingDirection = "human_to_mouse" | "mouse_to_human";

export interface GeneSetRecord {
  readonly symbol: string;
  readonly organism: Organism;
  readonly source: string;
  readonly geneSetName: string;
  readonly polarity: Polarity;
}

export interface OrthologPair {
  humanSymbol: string;
  mouseSymbol: string;
  humanEntrez: number | null;
  mouseEntrez: number | null;
  direction: MappingDirection;
}

export interface OrthologyIndex {
  /** Human symbol → every Mouse ortholog, in pair-table order. */
  readonly forward: ReadonlyMap<string, readonly string[]>;
  /** Mouse symbol → one Human symbol (last write wins). */
  readonly reverse: ReadonlyMap<string, string>;
}

export interface EvidenceProfile {
  readonly humanSymbol: string;
  readonly pro: ReadonlySet<string>;
  readonly anti: ReadonlySet<string>;
  readonly general: ReadonlySet<string>;
  readonly mouseSymbols: ReadonlySet<string>;
}

export interface ConsolidatedGeneEntry {
  readonly humanSymbol: string;
  readonly mouseSymbols: readonly string[];
  readonly category: Category;
  readonly sources: readonly string[];
  readonly evidenceScore: number;
}

export interface AnnotatedGeneEntry extends ConsolidatedGeneEntry {
  readonly humanEnsemblId?: string;
  readonly mouseEnsemblId?: string;
}

// ── External service contracts ─────────────────────────────────────────────

/** Gene-set library source (name → member symbols). */
export interface GeneSetLibraryService {
  listLibraries(organism: Organism): Promise<string[]>;
  getLibrary(name: string, organism: Organism): Promise<Record<string, string[]>>;
}

/**
 * Cross-species lookups. Each call covers one batch and throws on failure;
 * batching, retries and timeouts belong to the caller.
 */
export interface OrthologLookupService {
  findOrthologIds(symbols: string[], from: Organism, to: Organism): Promise<Map<string, number[]>>;
  resolveEntrezIds(ids: number[], organism: Organism): Promise<Map<number, string>>;
}

export interface IdentifierLookupService {
  lookupEnsemblIds(symbols: string[], organism: Organism): Promise<Map<string, string>>;
}

// ── Helpers ────────────────────────────────────────────────────────────────

export function otherOrganism(organism: Organism): Organism {
  return organism === "Human" ? "Mouse" : "Human";
}

export function directionOf(from: Organism): MappingDirection {
  return from === "Human" ? "human_to_mouse" : "mouse_to_human";
}

export function percent(part: number, whole: number): string {
  return whole > 0 ? `${((100 * part) / whole).toFixed(1)}%` : "0.0%";
}

/** Plain code-unit comparison; locale-independent so table order is stable. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
