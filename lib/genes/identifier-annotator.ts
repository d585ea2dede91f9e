/**
 * Identifier annotator.
 *
 * Best-effort Ensembl gene ids for both organisms. A symbol the service
 * cannot map simply leaves its field empty; coverage is reported, never
 * enforced.
 */
import type { BatchingConfig } from "../config";
import { ServiceUnavailableError } from "../errors";
import type { Logger } from "../log";
import type { BatchFailure } from "../services/batching";
import { runBatches } from "../services/batching";
import { LookupCache } from "../services/lookup-cache";
import type { AnnotatedGeneEntry, ConsolidatedGeneEntry, IdentifierLookupService, Organism } from "./types";
import { percent } from "./types";

export interface AnnotatorOptions {
  batching: BatchingConfig;
  /** Shared (organism, symbol) → Ensembl id cache; a fresh one per call if omitted. */
  cache?: LookupCache<string>;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface IdentifierCoverage {
  organism: Organism;
  /** Entries that received an id. */
  mapped: number;
  /** Entries eligible for an id (all for Human, those with orthologs for Mouse). */
  total: number;
}

export interface IdentifierAnnotation {
  entries: AnnotatedGeneEntry[];
  coverage: IdentifierCoverage[];
  failures: Array<BatchFailure & { organism: Organism }>;
}

export async function annotateIdentifiers(
  entries: readonly ConsolidatedGeneEntry[],
  service: IdentifierLookupService,
  opts: AnnotatorOptions,
): Promise<IdentifierAnnotation> {
  const logger = opts.logger ?? console;
  const cache = opts.cache ?? new LookupCache<string>();
  const failures: IdentifierAnnotation["failures"] = [];
  let issued = 0;
  let succeeded = 0;

  const lookup = async (organism: Organism, symbols: Iterable<string>) => {
    const pending = cache.pending(
      organism,
      [...symbols].map((s) => s.trim()).filter((s) => s.length > 0),
    );
    logger.log(`\nFetching Ensembl IDs for ${pending.length} ${organism.toLowerCase()} genes...`);

    const run = await runBatches(pending, (batch) => service.lookupEnsemblIds(batch, organism), {
      batchSize: opts.batching.identifierBatchSize,
      concurrency: opts.batching.concurrency,
      maxRetries: opts.batching.maxRetries,
      retryBaseDelayMs: opts.batching.retryBaseDelayMs,
      batchTimeoutMs: opts.batching.batchTimeoutMs,
      signal: opts.signal,
      label: `${organism} Ensembl id lookup`,
      logger,
    });

    issued += run.batchCount;
    succeeded += run.succeeded.length;
    for (const f of run.failures) failures.push({ ...f, organism });

    let mapped = 0;
    for (const { offset, size, value } of run.succeeded) {
      for (const symbol of pending.slice(offset, offset + size)) {
        const id = value.get(symbol) ?? null;
        if (id) mapped++;
        cache.set(organism, symbol, id);
      }
    }
    logger.log(`  Mapped ${mapped}/${pending.length} genes (${percent(mapped, pending.length)} coverage)`);
  };

  await lookup("Human", entries.map((e) => e.humanSymbol));
  await lookup("Mouse", entries.flatMap((e) => e.mouseSymbols));

  const annotated: AnnotatedGeneEntry[] = entries.map((entry) => {
    const humanEnsemblId = cache.get("Human", entry.humanSymbol.trim());
    // one slot per mouse symbol, empty where unresolved
    const mouseIds = entry.mouseSymbols.map((s) => cache.get("Mouse", s.trim()) ?? "");
    return {
      ...entry,
      ...(humanEnsemblId ? { humanEnsemblId } : {}),
      ...(mouseIds.some((id) => id.length > 0) ? { mouseEnsemblId: mouseIds.join(",") } : {}),
    };
  });

  const withMouse = annotated.filter((e) => e.mouseSymbols.length > 0);
  const coverage: IdentifierCoverage[] = [
    { organism: "Human", mapped: annotated.filter((e) => e.humanEnsemblId).length, total: annotated.length },
    { organism: "Mouse", mapped: withMouse.filter((e) => e.mouseEnsemblId).length, total: withMouse.length },
  ];

  if (issued > 0 && succeeded === 0 && coverage.every((c) => c.mapped === 0)) {
    throw new ServiceUnavailableError(
      "identifier lookup",
      `Identifier service unreachable: all ${issued} Ensembl id lookup batches failed`,
    );
  }

  return { entries: annotated, coverage, failures };
}

export function summarizeCoverage(coverage: readonly IdentifierCoverage[]): string[] {
  return coverage.map(
    (c) => `${c.organism} Ensembl ID coverage: ${c.mapped}/${c.total} (${percent(c.mapped, c.total)})`,
  );
}
