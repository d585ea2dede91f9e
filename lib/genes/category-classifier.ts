/**
 * Category classifier.
 *
 * Precedence lives in CLASSIFICATION_PRECEDENCE, evaluated top to bottom,
 * first match wins. The evidence score is the number of distinct source
 * labels across pro, anti and general evidence.
 */
import { InvariantViolationError, NoEvidenceFoundError } from "../errors";
import type { Category, ConsolidatedGeneEntry, EvidenceProfile } from "./types";
import { CATEGORY_ORDER, compareText, percent } from "./types";

type Presence = "present" | "absent" | "any";

export interface ClassificationRule {
  category: Category;
  pro: Presence;
  anti: Presence;
  general: Presence;
}

export const CLASSIFICATION_PRECEDENCE: readonly ClassificationRule[] = [
  { category: "Ambiguous", pro: "present", anti: "present", general: "any" },
  { category: "Pro-apoptotic", pro: "present", anti: "absent", general: "any" },
  { category: "Anti-apoptotic", pro: "absent", anti: "present", general: "any" },
  { category: "Unspecified", pro: "absent", anti: "absent", general: "present" },
];

function satisfies(presence: Presence, evidence: ReadonlySet<string>): boolean {
  if (presence === "any") return true;
  return presence === "present" ? evidence.size > 0 : evidence.size === 0;
}

export function evidenceSources(profile: EvidenceProfile): string[] {
  return [...new Set([...profile.pro, ...profile.anti, ...profile.general])].sort(compareText);
}

export function classifyProfile(profile: EvidenceProfile): { category: Category; evidenceScore: number } {
  const rule = CLASSIFICATION_PRECEDENCE.find(
    (r) => satisfies(r.pro, profile.pro) && satisfies(r.anti, profile.anti) && satisfies(r.general, profile.general),
  );
  if (!rule) {
    throw new InvariantViolationError(`Evidence profile for ${profile.humanSymbol} has no evidence`);
  }
  return { category: rule.category, evidenceScore: evidenceSources(profile).length };
}

/** Descending evidence score, then symbol (case-folded for the key only). */
export function compareByEvidence(a: ConsolidatedGeneEntry, b: ConsolidatedGeneEntry): number {
  return (
    b.evidenceScore - a.evidenceScore ||
    compareText(a.humanSymbol.toUpperCase(), b.humanSymbol.toUpperCase()) ||
    compareText(a.humanSymbol, b.humanSymbol)
  );
}

export function consolidate(profiles: ReadonlyMap<string, EvidenceProfile>): ConsolidatedGeneEntry[] {
  const entries: ConsolidatedGeneEntry[] = [];
  for (const profile of profiles.values()) {
    const { category } = classifyProfile(profile);
    const sources = evidenceSources(profile);
    entries.push(
      Object.freeze({
        humanSymbol: profile.humanSymbol,
        mouseSymbols: [...profile.mouseSymbols].sort(compareText),
        category,
        sources,
        evidenceScore: sources.length,
      }),
    );
  }
  if (entries.length === 0) throw new NoEvidenceFoundError();
  return entries.sort(compareByEvidence);
}

// ── Summary ───────────────────────────────────────────────────────────────

export function countByCategory(entries: readonly ConsolidatedGeneEntry[]): Record<Category, number> {
  const counts: Record<Category, number> = {
    "Pro-apoptotic": 0,
    "Anti-apoptotic": 0,
    Ambiguous: 0,
    Unspecified: 0,
  };
  for (const e of entries) counts[e.category]++;
  return counts;
}

export function renderConsolidationSummary(entries: readonly ConsolidatedGeneEntry[], topN = 20): string {
  const total = entries.length;
  const withMouse = entries.filter((e) => e.mouseSymbols.length > 0).length;
  const multiSource = entries.filter((e) => e.evidenceScore > 1).length;
  const average = total > 0 ? entries.reduce((s, e) => s + e.evidenceScore, 0) / total : 0;
  const counts = countByCategory(entries);

  const scoreCounts = new Map<number, number>();
  for (const e of entries) scoreCounts.set(e.evidenceScore, (scoreCounts.get(e.evidenceScore) ?? 0) + 1);

  const lines = [
    "=".repeat(60),
    "GENE SET CONSOLIDATION SUMMARY",
    "=".repeat(60),
    "",
    `Total unique human genes: ${total}`,
    `Genes with mouse orthologs: ${withMouse} (${percent(withMouse, total)})`,
    `Average evidence score: ${average.toFixed(2)}`,
    `Genes from multiple sources: ${multiSource} (${percent(multiSource, total)})`,
    "",
    "-".repeat(40),
    "CATEGORY DISTRIBUTION",
    "-".repeat(40),
    ...CATEGORY_ORDER.map((c) => `  ${c}: ${counts[c]} (${percent(counts[c], total)})`),
    "",
    "-".repeat(40),
    "EVIDENCE SCORE DISTRIBUTION",
    "-".repeat(40),
    ...[...scoreCounts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([score, count]) => `  ${score} source(s): ${count} genes`),
    "",
    "-".repeat(40),
    `TOP ${topN} GENES BY EVIDENCE SCORE`,
    "-".repeat(40),
    ...[...entries]
      .sort(compareByEvidence)
      .slice(0, topN)
      .map((e) => `  ${e.humanSymbol}: ${e.category} (score=${e.evidenceScore}, sources: ${e.sources.join(",")})`),
  ];
  return lines.join("\n");
}
