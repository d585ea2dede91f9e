/**
 * Ortholog resolver.
 *
 * Queries the ortholog service in both directions (it is not symmetric),
 * resolves the returned Entrez ids to symbols, and produces the deduplicated
 * Human/Mouse pair table plus its OrthologyIndex.
 */
import type { BatchingConfig } from "../config";
import { ResolutionFailureError, ServiceUnavailableError } from "../errors";
import type { Logger } from "../log";
import { logBanner } from "../log";
import type { BatchFailure, BatchRun } from "../services/batching";
import { runBatches } from "../services/batching";
import { buildOrthologyIndex } from "./orthology-index";
import type { Organism, OrthologLookupService, OrthologPair, OrthologyIndex } from "./types";
import { compareText, directionOf, otherOrganism, percent } from "./types";

export interface ResolverOptions {
  batching: BatchingConfig;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface DirectionStats {
  from: Organism;
  inputSymbols: number;
  symbolsWithOrthologs: number;
  targetIds: number;
  resolvedIds: number;
  pairs: number;
}

export interface OrthologResolution {
  pairs: OrthologPair[];
  index: OrthologyIndex;
  duplicatesRemoved: number;
  directions: DirectionStats[];
  failures: Array<BatchFailure & { stage: string }>;
  batchesIssued: number;
  batchesSucceeded: number;
}

interface DirectionLookup {
  orthologs: Map<string, number[]>;
  symbolsById: Map<number, string>;
  stats: DirectionStats;
}

function pairKey(human: string, mouse: string): string {
  return `${human}\u0000${mouse}`;
}

export async function resolveOrthologs(
  humanSymbols: readonly string[],
  mouseSymbols: readonly string[],
  service: OrthologLookupService,
  opts: ResolverOptions,
): Promise<OrthologResolution> {
  const logger = opts.logger ?? console;
  const failures: OrthologResolution["failures"] = [];
  let batchesIssued = 0;
  let batchesSucceeded = 0;

  const track = <R>(stage: string, run: BatchRun<R>): BatchRun<R> => {
    batchesIssued += run.batchCount;
    batchesSucceeded += run.succeeded.length;
    for (const f of run.failures) failures.push({ ...f, stage });
    return run;
  };

  const batchOpts = (label: string) => ({
    batchSize: opts.batching.orthologyBatchSize,
    concurrency: opts.batching.concurrency,
    maxRetries: opts.batching.maxRetries,
    retryBaseDelayMs: opts.batching.retryBaseDelayMs,
    batchTimeoutMs: opts.batching.batchTimeoutMs,
    signal: opts.signal,
    label,
    logger,
  });

  const lookup = async (from: Organism, input: readonly string[]): Promise<DirectionLookup> => {
    const to = otherOrganism(from);
    const symbols = [...new Set(input)].sort(compareText);
    logger.log(`\n--- ${from} -> ${to} lookup (${symbols.length} genes) ---`);

    const run = track(
      `${from}->${to} orthologs`,
      await runBatches(symbols, (batch) => service.findOrthologIds(batch, from, to), batchOpts(`${from}->${to} ortholog lookup`)),
    );

    // Merge in batch order so the id list (and everything after it) is stable.
    const orthologs = new Map<string, number[]>();
    const targetIds = new Set<number>();
    for (const { value } of run.succeeded) {
      for (const [symbol, ids] of value) {
        const known = orthologs.get(symbol) ?? [];
        for (const id of ids) {
          if (!known.includes(id)) known.push(id);
          targetIds.add(id);
        }
        orthologs.set(symbol, known);
      }
    }
    logger.log(
      `Found orthologs for ${orthologs.size}/${symbols.length} genes (${percent(orthologs.size, symbols.length)})`,
    );

    const ids = [...targetIds].sort((a, b) => a - b);
    const resolveRun = track(
      `${to} id resolution`,
      await runBatches(ids, (batch) => service.resolveEntrezIds(batch, to), batchOpts(`${to} Entrez id resolution`)),
    );
    const symbolsById = new Map<number, string>();
    for (const { value } of resolveRun.succeeded) {
      for (const [id, symbol] of value) {
        if (symbol.trim()) symbolsById.set(id, symbol.trim());
      }
    }
    logger.log(`  Resolved ${symbolsById.size}/${ids.length} Entrez IDs to ${to} symbols`);

    return {
      orthologs,
      symbolsById,
      stats: {
        from,
        inputSymbols: symbols.length,
        symbolsWithOrthologs: orthologs.size,
        targetIds: ids.length,
        resolvedIds: symbolsById.size,
        pairs: 0,
      },
    };
  };

  const forward = await lookup("Human", humanSymbols);
  const backward = await lookup("Mouse", mouseSymbols);

  const raw: OrthologPair[] = [];
  for (const [humanSym, mouseIds] of forward.orthologs) {
    for (const id of mouseIds) {
      const mouseSym = forward.symbolsById.get(id);
      if (!mouseSym) continue;
      raw.push({
        humanSymbol: humanSym.toUpperCase(),
        mouseSymbol: mouseSym,
        humanEntrez: null,
        mouseEntrez: id,
        direction: directionOf("Human"),
      });
      forward.stats.pairs++;
    }
  }
  for (const [mouseSym, humanIds] of backward.orthologs) {
    for (const id of humanIds) {
      const humanSym = backward.symbolsById.get(id);
      if (!humanSym) continue;
      raw.push({
        humanSymbol: humanSym.toUpperCase(),
        mouseSymbol: mouseSym,
        humanEntrez: id,
        mouseEntrez: null,
        direction: directionOf("Mouse"),
      });
      backward.stats.pairs++;
    }
  }

  const seen = new Set<string>();
  const pairs: OrthologPair[] = [];
  for (const pair of raw) {
    const key = pairKey(pair.humanSymbol, pair.mouseSymbol);
    if (seen.has(key)) continue;
    seen.add(key);
    pairs.push(pair);
  }
  pairs.sort((a, b) => compareText(a.humanSymbol, b.humanSymbol) || compareText(a.mouseSymbol, b.mouseSymbol));

  if (pairs.length === 0 && batchesIssued > 0 && batchesSucceeded === 0) {
    throw new ResolutionFailureError("No ortholog pairs produced: every lookup batch failed", {
      cause: new ServiceUnavailableError("ortholog lookup", `All ${batchesIssued} ortholog lookup batches failed`),
    });
  }
  if (pairs.length === 0) {
    logger.warn("WARNING: No ortholog mappings found!");
  }

  return {
    pairs,
    index: buildOrthologyIndex(pairs),
    duplicatesRemoved: raw.length - pairs.length,
    directions: [forward.stats, backward.stats],
    failures,
    batchesIssued,
    batchesSucceeded,
  };
}

// ── Summary ───────────────────────────────────────────────────────────────

export interface CardinalityStats {
  humanWithMultiple: number;
  mouseWithMultiple: number;
  maxPerHuman: number;
  maxPerMouse: number;
}

export function cardinality(pairs: readonly OrthologPair[]): CardinalityStats {
  const perHuman = new Map<string, number>();
  const perMouse = new Map<string, number>();
  for (const p of pairs) {
    perHuman.set(p.humanSymbol, (perHuman.get(p.humanSymbol) ?? 0) + 1);
    perMouse.set(p.mouseSymbol, (perMouse.get(p.mouseSymbol) ?? 0) + 1);
  }
  const counts = (m: Map<string, number>) => [...m.values()];
  return {
    humanWithMultiple: counts(perHuman).filter((n) => n > 1).length,
    mouseWithMultiple: counts(perMouse).filter((n) => n > 1).length,
    maxPerHuman: Math.max(0, ...counts(perHuman)),
    maxPerMouse: Math.max(0, ...counts(perMouse)),
  };
}

export function summarizeResolution(
  resolution: OrthologResolution,
  humanSymbols: readonly string[],
  mouseSymbols: readonly string[],
): string[] {
  const mappedHuman = new Set(resolution.pairs.map((p) => p.humanSymbol));
  const mappedMouse = new Set(resolution.pairs.map((p) => p.mouseSymbol.toUpperCase()));
  const humanCovered = humanSymbols.filter((s) => mappedHuman.has(s.toUpperCase())).length;
  const mouseCovered = mouseSymbols.filter((s) => mappedMouse.has(s.toUpperCase())).length;
  const card = cardinality(resolution.pairs);

  const lines = [
    `Total ortholog pairs: ${resolution.pairs.length}`,
    `Duplicate pairs removed: ${resolution.duplicatesRemoved}`,
    "",
    "Coverage Statistics:",
    `  Human genes in input: ${humanSymbols.length}`,
    `  Unique human genes with mouse orthologs: ${mappedHuman.size}`,
    `  Human genes from input that have mappings: ${humanCovered} (${percent(humanCovered, humanSymbols.length)})`,
    `  Mouse genes in input: ${mouseSymbols.length}`,
    `  Unique mouse genes with human orthologs: ${new Set(resolution.pairs.map((p) => p.mouseSymbol)).size}`,
    `  Mouse genes from input that have mappings: ${mouseCovered} (${percent(mouseCovered, mouseSymbols.length)})`,
    "",
    "Mapping Sources:",
    ...resolution.directions.map((d) => `  ${directionOf(d.from)}: ${d.pairs} pairs (${d.resolvedIds}/${d.targetIds} ids resolved)`),
    "",
    "Mapping Cardinality:",
    `  Human genes with multiple mouse orthologs: ${card.humanWithMultiple}`,
    `  Mouse genes with multiple human orthologs: ${card.mouseWithMultiple}`,
    `  Max mouse orthologs for one human gene: ${card.maxPerHuman}`,
    `  Max human orthologs for one mouse gene: ${card.maxPerMouse}`,
  ];
  if (resolution.failures.length > 0) {
    lines.push("", `Skipped batches: ${resolution.failures.length}/${resolution.batchesIssued}`);
  }
  return lines;
}

export function printResolutionSummary(
  resolution: OrthologResolution,
  humanSymbols: readonly string[],
  mouseSymbols: readonly string[],
  logger: Logger = console,
) {
  logBanner(logger, "ORTHOLOGY MAPPING SUMMARY");
  for (const line of summarizeResolution(resolution, humanSymbols, mouseSymbols)) logger.log(line);
}
