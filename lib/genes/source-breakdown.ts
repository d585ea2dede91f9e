/**
 * Per-source breakdown of the final gene list.
 *
 * Each configured label selects the entries with at least one source that
 * matches its pattern. Categories are carried over unchanged; only the
 * ordering differs from the global table.
 */
import type { SourceMatcher, SourcePattern } from "../config";
import type { AnnotatedGeneEntry, Category } from "./types";
import { CATEGORY_ORDER, compareText } from "./types";
import { countByCategory } from "./category-classifier";

export interface SourceBreakdown {
  label: string;
  matcher: SourceMatcher;
  entries: AnnotatedGeneEntry[];
  counts: Record<Category, number>;
  total: number;
}

export function matchesSource(matcher: SourceMatcher, source: string): boolean {
  return matcher.kind === "prefix" ? source.startsWith(matcher.value) : source.includes(matcher.value);
}

const CATEGORY_RANK = new Map(CATEGORY_ORDER.map((c, i) => [c, i]));

export function compareByCategory(a: AnnotatedGeneEntry, b: AnnotatedGeneEntry): number {
  return (
    (CATEGORY_RANK.get(a.category) ?? CATEGORY_ORDER.length) -
      (CATEGORY_RANK.get(b.category) ?? CATEGORY_ORDER.length) || compareText(a.humanSymbol, b.humanSymbol)
  );
}

export function breakdownBySource(
  entries: readonly AnnotatedGeneEntry[],
  patterns: readonly SourcePattern[],
): SourceBreakdown[] {
  return patterns.map(({ label, matcher }) => {
    const selected = entries
      .filter((e) => e.sources.some((s) => matchesSource(matcher, s)))
      .sort(compareByCategory);
    return {
      label,
      matcher,
      entries: selected,
      counts: countByCategory(selected),
      total: selected.length,
    };
  });
}

export function breakdownFileName(label: string): string {
  return `apoptosis_genes_${label}.csv`;
}

function describeMatcher(m: SourceMatcher): string {
  return m.kind === "prefix" ? `sources starting with "${m.value}"` : `sources containing "${m.value}"`;
}

export function renderBreakdownSummary(breakdowns: readonly SourceBreakdown[], generatedAt: Date): string {
  const stamp = generatedAt.toISOString().replace("T", " ").slice(0, 19);
  const lines = [
    "=".repeat(60),
    "APOPTOTIC GENE LIST - SOURCE BREAKDOWN SUMMARY",
    `Generated: ${stamp}`,
    "=".repeat(60),
    "",
  ];

  for (const b of breakdowns) {
    lines.push("", b.label, "-".repeat(40));
    for (const category of CATEGORY_ORDER) {
      lines.push(`  ${category.padEnd(20)}: ${String(b.counts[category]).padStart(4)} genes`);
    }
    lines.push(`  ${"TOTAL".padEnd(20)}: ${String(b.total).padStart(4)} genes`);
  }

  lines.push(
    "",
    "=".repeat(60),
    "Notes:",
    "- Categories are consensus annotations derived from multiple sources",
    "- A gene may appear in multiple source lists",
    ...breakdowns.map((b) => `- ${b.label} includes ${describeMatcher(b.matcher)}`),
    "=".repeat(60),
    "",
  );
  return lines.join("\n");
}
