/**
 * Pipeline stages.
 *
 * Each stage reads what the previous one wrote under the work directory,
 * so any stage can be re-run on its own. runPipeline() chains them and
 * hands results forward in memory instead of re-reading.
 */
import path from "node:path";
import type { PipelineConfig, PipelinePaths } from "./config";
import { pipelinePaths } from "./config";
import type { Logger } from "./log";
import { logBanner } from "./log";
import { tableDigest } from "./hash";
import { EnrichrClient } from "./services/enrichr";
import { MyGeneClient } from "./services/mygene";
import { LookupCache } from "./services/lookup-cache";
import type { AcquisitionReport } from "./genes/gene-set-acquisition";
import { acquireGeneSets } from "./genes/gene-set-acquisition";
import { collectSymbols, loadGeneSetRecords } from "./genes/gene-set-loader";
import type { OrthologResolution } from "./genes/ortholog-resolver";
import { printResolutionSummary, resolveOrthologs } from "./genes/ortholog-resolver";
import { buildOrthologyIndex } from "./genes/orthology-index";
import { aggregateEvidence } from "./genes/evidence-aggregator";
import { consolidate, renderConsolidationSummary } from "./genes/category-classifier";
import type { IdentifierAnnotation } from "./genes/identifier-annotator";
import { annotateIdentifiers, summarizeCoverage } from "./genes/identifier-annotator";
import type { SourceBreakdown } from "./genes/source-breakdown";
import { breakdownBySource, breakdownFileName, renderBreakdownSummary } from "./genes/source-breakdown";
import {
  formatAnnotatedTable,
  formatConsolidatedTable,
  formatOrthologyFullTable,
  formatOrthologySimpleTable,
  readAnnotatedTable,
  readConsolidatedTable,
  readOrthologyTable,
  writeTextFile,
} from "./genes/tables";
import type {
  AnnotatedGeneEntry,
  ConsolidatedGeneEntry,
  GeneSetLibraryService,
  IdentifierLookupService,
  OrthologLookupService,
  OrthologPair,
} from "./genes/types";
import { CATEGORY_ORDER, percent } from "./genes/types";

export interface PipelineServices {
  geneSets: GeneSetLibraryService;
  orthologs: OrthologLookupService;
  identifiers: IdentifierLookupService;
}

export interface StageContext {
  config: PipelineConfig;
  services: PipelineServices;
  logger?: Logger;
  signal?: AbortSignal;
  /** Clock for report timestamps. */
  now?: () => Date;
}

export function createServices(config: PipelineConfig, signal?: AbortSignal): PipelineServices {
  const mygene = new MyGeneClient({
    baseUrl: config.services.mygeneUrl,
    timeoutMs: config.services.timeoutMs,
    signal,
  });
  return {
    geneSets: new EnrichrClient({
      baseUrls: { Human: config.services.enrichrUrl, Mouse: config.services.enrichrUrl },
      timeoutMs: config.services.timeoutMs,
      signal,
    }),
    orthologs: mygene,
    identifiers: mygene,
  };
}

/** Path → short sha256 of every table a stage wrote. */
export type TableDigests = Record<string, string>;

async function writeTable(filePath: string, text: string, digests: TableDigests, logger: Logger) {
  await writeTextFile(filePath, text);
  const digest = tableDigest(text);
  digests[filePath] = digest;
  logger.log(`Saved ${filePath} (sha256 ${digest})`);
}

// ── Stage 0: acquisition ──────────────────────────────────────────────────

export async function runAcquisitionStage(ctx: StageContext): Promise<AcquisitionReport> {
  const logger = ctx.logger ?? console;
  const paths = pipelinePaths(ctx.config);
  logBanner(logger, "GENE SET ACQUISITION");

  const report = await acquireGeneSets(ctx.services.geneSets, paths.rawDataDir, { logger, signal: ctx.signal });

  logger.log("");
  for (const t of report.targets) {
    const files = t.files.map((f) => `${f.file} (${f.rows} rows)`).join(", ");
    logger.log(`  ${t.id}: ${t.library ?? "no library matched"}${files ? ` -> ${files}` : ""}`);
  }
  logger.log(`Files written: ${report.filesWritten} to ${paths.rawDataDir}`);
  return report;
}

// ── Stage 1-2: loading + orthology ────────────────────────────────────────

export interface OrthologyStageResult {
  resolution: OrthologResolution;
  digests: TableDigests;
}

export async function runOrthologyStage(ctx: StageContext): Promise<OrthologyStageResult> {
  const logger = ctx.logger ?? console;
  const paths = pipelinePaths(ctx.config);
  logBanner(logger, "ORTHOLOGY MAPPING");

  const { records } = await loadGeneSetRecords(paths.rawDataDir, ctx.config.sourceFiles, logger);
  const symbols = collectSymbols(records);
  logger.log(`\nTotal unique human genes: ${symbols.human.length}`);
  logger.log(`Total unique mouse genes: ${symbols.mouse.length}`);

  const resolution = await resolveOrthologs(symbols.human, symbols.mouse, ctx.services.orthologs, {
    batching: ctx.config.batching,
    signal: ctx.signal,
    logger,
  });

  const digests: TableDigests = {};
  await writeTable(paths.orthologyFull, formatOrthologyFullTable(resolution.pairs), digests, logger);
  await writeTable(paths.orthologySimple, formatOrthologySimpleTable(resolution.pairs), digests, logger);

  printResolutionSummary(resolution, symbols.human, symbols.mouse, logger);
  return { resolution, digests };
}

// ── Stage 3-4: aggregation + classification ───────────────────────────────

export interface ConsolidationStageResult {
  entries: ConsolidatedGeneEntry[];
  digests: TableDigests;
}

export async function runConsolidationStage(
  ctx: StageContext,
  pairs?: readonly OrthologPair[],
): Promise<ConsolidationStageResult> {
  const logger = ctx.logger ?? console;
  const paths = pipelinePaths(ctx.config);
  logBanner(logger, "GENE CONSOLIDATION");

  const orthologyPairs = pairs ?? (await readOrthologyTable(paths.orthologyFull));
  const index = buildOrthologyIndex(orthologyPairs);
  logger.log(`Loaded ${orthologyPairs.length} ortholog mappings`);

  const { records } = await loadGeneSetRecords(paths.rawDataDir, ctx.config.sourceFiles, logger);
  const { profiles, sources } = aggregateEvidence(records, index);
  for (const s of sources) {
    const mouseTotal = s.mouseMapped + s.mouseUnmapped;
    if (mouseTotal > 0) {
      logger.log(`  ${s.source}: ${s.mouseMapped}/${mouseTotal} mouse records mapped (${percent(s.mouseMapped, mouseTotal)})`);
    }
  }

  const entries = consolidate(profiles);
  const summary = renderConsolidationSummary(entries);

  const digests: TableDigests = {};
  await writeTable(paths.consolidated, formatConsolidatedTable(entries), digests, logger);
  await writeTable(paths.consolidationSummary, `${summary}\n`, digests, logger);
  logger.log(`\n${summary}`);
  return { entries, digests };
}

// ── Stage 5: identifiers ──────────────────────────────────────────────────

export interface AnnotationStageResult {
  annotation: IdentifierAnnotation;
  digests: TableDigests;
}

export async function runAnnotationStage(
  ctx: StageContext,
  entries?: readonly ConsolidatedGeneEntry[],
  cache?: LookupCache<string>,
): Promise<AnnotationStageResult> {
  const logger = ctx.logger ?? console;
  const paths = pipelinePaths(ctx.config);
  logBanner(logger, "IDENTIFIER ANNOTATION");

  const consolidated = entries ?? (await readConsolidatedTable(paths.consolidated));
  logger.log(`Loaded ${consolidated.length} genes`);

  const annotation = await annotateIdentifiers(consolidated, ctx.services.identifiers, {
    batching: ctx.config.batching,
    cache: cache ?? new LookupCache<string>(),
    signal: ctx.signal,
    logger,
  });

  const digests: TableDigests = {};
  await writeTable(paths.finalGeneList, formatAnnotatedTable(annotation.entries), digests, logger);

  logBanner(logger, "FINAL GENE LIST SUMMARY");
  logger.log(`Total genes: ${annotation.entries.length}`);
  for (const line of summarizeCoverage(annotation.coverage)) logger.log(line);
  if (annotation.failures.length > 0) {
    logger.warn(`Skipped ${annotation.failures.length} identifier lookup batch(es)`);
  }
  return { annotation, digests };
}

// ── Stage 6: per-source breakdown ─────────────────────────────────────────

export interface BreakdownStageResult {
  breakdowns: SourceBreakdown[];
  digests: TableDigests;
}

export function breakdownSummaryPath(paths: PipelinePaths): string {
  return path.join(paths.breakdownDir, "breakdown_summary.txt");
}

export async function runBreakdownStage(
  ctx: StageContext,
  entries?: readonly AnnotatedGeneEntry[],
): Promise<BreakdownStageResult> {
  const logger = ctx.logger ?? console;
  const paths = pipelinePaths(ctx.config);
  logBanner(logger, "SOURCE BREAKDOWN");

  const annotated = entries ?? (await readAnnotatedTable(paths.finalGeneList));
  const breakdowns = breakdownBySource(annotated, ctx.config.sourcePatterns);

  const digests: TableDigests = {};
  for (const b of breakdowns) {
    logger.log(`\n${b.label}: ${b.total} genes`);
    for (const category of CATEGORY_ORDER) {
      if (b.counts[category] > 0) logger.log(`  ${category}: ${b.counts[category]}`);
    }
    await writeTable(path.join(paths.breakdownDir, breakdownFileName(b.label)), formatAnnotatedTable(b.entries), digests, logger);
  }

  const generatedAt = (ctx.now ?? (() => new Date()))();
  await writeTable(breakdownSummaryPath(paths), renderBreakdownSummary(breakdowns, generatedAt), digests, logger);
  return { breakdowns, digests };
}

// ── Whole pipeline ────────────────────────────────────────────────────────

export interface PipelineRun {
  acquisition: AcquisitionReport | null;
  orthology: OrthologyStageResult;
  consolidation: ConsolidationStageResult;
  annotation: AnnotationStageResult;
  breakdown: BreakdownStageResult;
}

export async function runPipeline(
  ctx: StageContext,
  opts: { skipAcquisition?: boolean } = {},
): Promise<PipelineRun> {
  const acquisition = opts.skipAcquisition ? null : await runAcquisitionStage(ctx);
  const orthology = await runOrthologyStage(ctx);
  const consolidation = await runConsolidationStage(ctx, orthology.resolution.pairs);
  const annotation = await runAnnotationStage(ctx, consolidation.entries);
  const breakdown = await runBreakdownStage(ctx, annotation.annotation.entries);
  return { acquisition, orthology, consolidation, annotation, breakdown };
}
