/**
 * Evidence aggregator.
 *
 * Files every gene-set record under its canonical Human symbol. Mouse
 * records are projected through the reverse ortholog index first; a Mouse
 * symbol with no Human counterpart contributes nothing.
 */
import type { EvidenceProfile, GeneSetRecord, OrthologyIndex, Polarity } from "./types";
import { compareText } from "./types";
import { canonicalSymbolFor, orthologsOf } from "./orthology-index";

interface MutableProfile {
  humanSymbol: string;
  pro: Set<string>;
  anti: Set<string>;
  general: Set<string>;
  mouseSymbols: Set<string>;
}

const EVIDENCE_SLOT: Record<Polarity, "pro" | "anti" | "general"> = {
  positive: "pro",
  negative: "anti",
  unspecified: "general",
};

/** Owned accumulator; profiles are created only through getOrInsert. */
export class EvidenceProfileMap {
  private readonly profiles = new Map<string, MutableProfile>();

  getOrInsert(humanSymbol: string): MutableProfile {
    let profile = this.profiles.get(humanSymbol);
    if (!profile) {
      profile = {
        humanSymbol,
        pro: new Set(),
        anti: new Set(),
        general: new Set(),
        mouseSymbols: new Set(),
      };
      this.profiles.set(humanSymbol, profile);
    }
    return profile;
  }

  file(humanSymbol: string, source: string, polarity: Polarity): MutableProfile {
    const profile = this.getOrInsert(humanSymbol);
    profile[EVIDENCE_SLOT[polarity]].add(source);
    return profile;
  }

  get size(): number {
    return this.profiles.size;
  }

  /** Frozen copies, sorted by Human symbol. */
  snapshot(): ReadonlyMap<string, EvidenceProfile> {
    const out = new Map<string, EvidenceProfile>();
    const symbols = [...this.profiles.keys()].sort(compareText);
    for (const symbol of symbols) {
      const p = this.profiles.get(symbol);
      if (!p) continue;
      out.set(
        symbol,
        Object.freeze({
          humanSymbol: p.humanSymbol,
          pro: new Set([...p.pro].sort(compareText)),
          anti: new Set([...p.anti].sort(compareText)),
          general: new Set([...p.general].sort(compareText)),
          mouseSymbols: new Set([...p.mouseSymbols].sort(compareText)),
        }),
      );
    }
    return out;
  }
}

export interface SourceProjection {
  source: string;
  humanRecords: number;
  mouseMapped: number;
  mouseUnmapped: number;
}

export interface EvidenceAggregation {
  profiles: ReadonlyMap<string, EvidenceProfile>;
  sources: SourceProjection[];
}

export function aggregateEvidence(records: readonly GeneSetRecord[], index: OrthologyIndex): EvidenceAggregation {
  const profiles = new EvidenceProfileMap();
  const bySource = new Map<string, SourceProjection>();

  const statsFor = (source: string) => {
    let stats = bySource.get(source);
    if (!stats) {
      stats = { source, humanRecords: 0, mouseMapped: 0, mouseUnmapped: 0 };
      bySource.set(source, stats);
    }
    return stats;
  };

  for (const record of records) {
    const stats = statsFor(record.source);

    if (record.organism === "Human") {
      const profile = profiles.file(record.symbol, record.source, record.polarity);
      for (const mouse of orthologsOf(index, record.symbol)) profile.mouseSymbols.add(mouse);
      stats.humanRecords++;
      continue;
    }

    const human = canonicalSymbolFor(index, record.symbol);
    if (human === undefined) {
      stats.mouseUnmapped++;
      continue;
    }
    profiles.file(human, record.source, record.polarity).mouseSymbols.add(record.symbol);
    stats.mouseMapped++;
  }

  return { profiles: profiles.snapshot(), sources: [...bySource.values()] };
}
