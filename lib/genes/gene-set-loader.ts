/**
 * Gene-set loader.
 *
 * Reads the raw per-source tables and turns each row into a GeneSetRecord
 * tagged with the configured source label (e.g. "GO_Pro_Mouse"), which is
 * the label evidence is filed under downstream.
 */
import path from "node:path";
import type { SourceFile } from "../config";
import { InputMissingError } from "../errors";
import type { Logger } from "../log";
import { fileExists, readGeneSetTable } from "./tables";
import type { GeneSetRecord } from "./types";
import { POLARITY_BY_LABEL, compareText } from "./types";

export interface SourceLoadStat {
  label: string;
  file: string;
  found: boolean;
  records: number;
  rejected: number;
  humanSymbols: number;
  mouseSymbols: number;
}

export interface GeneSetLoad {
  records: GeneSetRecord[];
  sources: SourceLoadStat[];
}

export async function loadGeneSetRecords(
  rawDataDir: string,
  sourceFiles: readonly SourceFile[],
  logger: Logger = console,
): Promise<GeneSetLoad> {
  if (!(await fileExists(rawDataDir))) {
    throw new InputMissingError(rawDataDir, "Raw data directory not found");
  }

  const records: GeneSetRecord[] = [];
  const sources: SourceLoadStat[] = [];

  for (const { label, file } of sourceFiles) {
    const filePath = path.join(rawDataDir, file);
    if (!(await fileExists(filePath))) {
      logger.warn(`WARNING: Source file not found: ${filePath}`);
      sources.push({ label, file, found: false, records: 0, rejected: 0, humanSymbols: 0, mouseSymbols: 0 });
      continue;
    }

    logger.log(`Loading ${label} from ${file}`);
    const { rows, rejected } = await readGeneSetTable(filePath);
    if (rejected.length > 0) {
      logger.warn(`  Warning: skipped ${rejected.length} invalid row(s) in ${file} (rows ${rejected.slice(0, 5).join(", ")}${rejected.length > 5 ? ", ..." : ""})`);
    }

    const human = new Set<string>();
    const mouse = new Set<string>();
    for (const row of rows) {
      records.push({
        symbol: row.gene_symbol,
        organism: row.organism,
        source: label,
        geneSetName: row.gene_set_name,
        polarity: POLARITY_BY_LABEL[row.category],
      });
      (row.organism === "Human" ? human : mouse).add(row.gene_symbol);
    }

    logger.log(`  Found ${human.size} human, ${mouse.size} mouse genes`);
    sources.push({
      label,
      file,
      found: true,
      records: rows.length,
      rejected: rejected.length,
      humanSymbols: human.size,
      mouseSymbols: mouse.size,
    });
  }

  if (!sources.some((s) => s.found)) {
    throw new InputMissingError(rawDataDir, "No configured gene-set table found in");
  }

  return { records, sources };
}

/** Distinct symbols per organism, sorted. */
export function collectSymbols(records: readonly GeneSetRecord[]): { human: string[]; mouse: string[] } {
  const human = new Set<string>();
  const mouse = new Set<string>();
  for (const r of records) {
    (r.organism === "Human" ? human : mouse).add(r.symbol);
  }
  return {
    human: [...human].sort(compareText),
    mouse: [...mouse].sort(compareText),
  };
}
