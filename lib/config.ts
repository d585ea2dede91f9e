/**
 * Pipeline configuration.
 *
 * One explicit PipelineConfig is built per run from defaults, environment
 * variables and CLI overrides, then handed to each stage. Nothing reads
 * paths or service settings from module-level state.
 */
import path from "node:path";
import { z } from "zod";
import { ENRICHR_API } from "./services/enrichr";
import { MYGENE_API } from "./services/mygene";

const matcherSchema = z.object({
  kind: z.enum(["substring", "prefix"]),
  value: z.string().min(1),
});

export type SourceMatcher = z.infer<typeof matcherSchema>;

const sourcePatternSchema = z.object({
  label: z.string().min(1),
  matcher: matcherSchema,
});

export type SourcePattern = z.infer<typeof sourcePatternSchema>;

const sourceFileSchema = z.object({
  label: z.string().min(1),
  file: z.string().min(1),
});

export type SourceFile = z.infer<typeof sourceFileSchema>;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const configSchema = z.object({
  workDir: z.string().min(1),
  sourceFiles: z.array(sourceFileSchema).min(1),
  sourcePatterns: z.array(sourcePatternSchema).min(1),
  services: z.object({
    mygeneUrl: z.string().url(),
    enrichrUrl: z.string().url(),
    timeoutMs: positiveInt,
  }),
  batching: z.object({
    orthologyBatchSize: positiveInt,
    identifierBatchSize: positiveInt,
    concurrency: positiveInt,
    maxRetries: nonNegativeInt,
    retryBaseDelayMs: nonNegativeInt,
    batchTimeoutMs: positiveInt,
  }),
});

export type PipelineConfig = z.infer<typeof configSchema>;
export type BatchingConfig = PipelineConfig["batching"];

/** Raw gene-set tables, keyed by the source label used as evidence. */
export const DEFAULT_SOURCE_FILES: SourceFile[] = [
  { label: "GO_Pro_Human", file: "human_go_pro.csv" },
  { label: "GO_Anti_Human", file: "human_go_anti.csv" },
  { label: "GO_Pro_Mouse", file: "mouse_go_pro.csv" },
  { label: "GO_Anti_Mouse", file: "mouse_go_anti.csv" },
  { label: "KEGG", file: "human_kegg_apoptosis.csv" },
  { label: "Reactome", file: "human_reactome_apoptosis.csv" },
  { label: "Hallmark", file: "human_hallmark_apoptosis.csv" },
];

/** Per-source breakdown labels, in output order. */
export const DEFAULT_SOURCE_PATTERNS: SourcePattern[] = [
  { label: "KEGG", matcher: { kind: "substring", value: "KEGG" } },
  { label: "Reactome", matcher: { kind: "substring", value: "Reactome" } },
  { label: "Hallmark", matcher: { kind: "substring", value: "Hallmark" } },
  { label: "GO", matcher: { kind: "prefix", value: "GO_" } },
];

export interface ConfigOverrides {
  workDir?: string;
  sourceFiles?: SourceFile[];
  sourcePatterns?: SourcePattern[];
  services?: Partial<PipelineConfig["services"]>;
  batching?: Partial<BatchingConfig>;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): PipelineConfig {
  return configSchema.parse({
    workDir: path.resolve(overrides.workDir ?? env.APOPTOSIS_WORK_DIR ?? "work"),
    sourceFiles: overrides.sourceFiles ?? DEFAULT_SOURCE_FILES,
    sourcePatterns: overrides.sourcePatterns ?? DEFAULT_SOURCE_PATTERNS,
    services: {
      mygeneUrl: env.MYGENE_API_URL || MYGENE_API,
      enrichrUrl: env.ENRICHR_API_URL || ENRICHR_API,
      timeoutMs: env.SERVICE_TIMEOUT_MS || 30_000,
      ...overrides.services,
    },
    batching: {
      orthologyBatchSize: env.MYGENE_ORTHOLOGY_BATCH_SIZE || 500,
      identifierBatchSize: env.MYGENE_IDENTIFIER_BATCH_SIZE || 200,
      concurrency: env.SERVICE_CONCURRENCY || 4,
      maxRetries: env.SERVICE_MAX_RETRIES || 3,
      retryBaseDelayMs: env.SERVICE_RETRY_BASE_DELAY_MS || 500,
      batchTimeoutMs: env.SERVICE_TIMEOUT_MS || 30_000,
      ...overrides.batching,
    },
  });
}

export interface PipelinePaths {
  rawDataDir: string;
  dataDir: string;
  resultsDir: string;
  breakdownDir: string;
  orthologyFull: string;
  orthologySimple: string;
  consolidated: string;
  consolidationSummary: string;
  finalGeneList: string;
}

export function pipelinePaths(config: PipelineConfig): PipelinePaths {
  const rawDataDir = path.join(config.workDir, "raw_data");
  const dataDir = path.join(config.workDir, "data");
  const resultsDir = path.join(config.workDir, "results");
  return {
    rawDataDir,
    dataDir,
    resultsDir,
    breakdownDir: path.join(resultsDir, "source_breakdown"),
    orthologyFull: path.join(dataDir, "orthology_mapping_full.csv"),
    orthologySimple: path.join(dataDir, "orthology_mapping.csv"),
    consolidated: path.join(dataDir, "consolidated_apoptosis_genes.csv"),
    consolidationSummary: path.join(dataDir, "gene_category_summary.txt"),
    finalGeneList: path.join(resultsDir, "final_apoptotic_gene_list.csv"),
  };
}
