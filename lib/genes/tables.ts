/**
 * CSV tables exchanged between stages.
 *
 * Writers produce exactly the column layouts listed below. Readers validate
 * every row with zod: raw gene-set tables report rejected rows to the caller,
 * stage tables throw MalformedInputError on the first file with any.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { InputMissingError, MalformedInputError } from "../errors";
import type {
  AnnotatedGeneEntry,
  Category,
  ConsolidatedGeneEntry,
  MappingDirection,
  Organism,
  OrthologPair,
} from "./types";

export const GENE_SET_COLUMNS = ["gene_symbol", "gene_set_name", "source", "category", "organism"] as const;
export const ORTHOLOGY_FULL_COLUMNS = [
  "human_symbol",
  "mouse_symbol",
  "human_entrez",
  "mouse_entrez",
  "mapping_source",
] as const;
export const CONSOLIDATED_COLUMNS = ["human_symbol", "mouse_symbol", "category", "sources", "evidence_score"] as const;
export const ANNOTATED_COLUMNS = [
  "human_symbol",
  "human_ensembl_id",
  "mouse_symbol",
  "mouse_ensembl_id",
  "category",
  "sources",
  "evidence_score",
] as const;

// ── Row schemas ────────────────────────────────────────────────────────────

const organismSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(["human", "mouse"]))
  .transform((v): Organism => (v === "human" ? "Human" : "Mouse"));

export const geneSetRowSchema = z.object({
  gene_symbol: z.string().trim().min(1),
  gene_set_name: z.string().trim().default(""),
  source: z.string().trim().default(""),
  category: z.enum(["Pro", "Anti", "General"]),
  organism: organismSchema,
});

export type GeneSetRow = z.infer<typeof geneSetRowSchema>;

const optionalInt = z
  .string()
  .trim()
  .transform((v) => (v === "" ? null : Number(v)))
  .pipe(z.number().int().nullable());

const orthologyRowSchema = z.object({
  human_symbol: z.string().trim().min(1),
  mouse_symbol: z.string().trim().min(1),
  human_entrez: optionalInt.default(""),
  mouse_entrez: optionalInt.default(""),
  mapping_source: z.enum(["human_to_mouse", "mouse_to_human"]),
});

const categorySchema = z.enum([
  "Pro-apoptotic",
  "Anti-apoptotic",
  "Ambiguous",
  "Unspecified",
]) satisfies z.ZodType<Category>;

const list = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

const consolidatedRowSchema = z.object({
  human_symbol: z.string().trim().min(1),
  mouse_symbol: list,
  category: categorySchema,
  sources: list,
  evidence_score: z.coerce.number().int().min(0),
});

const optionalText = z
  .string()
  .default("")
  .transform((v) => (v.trim() === "" ? undefined : v.trim()));

const annotatedRowSchema = consolidatedRowSchema.extend({
  human_ensembl_id: optionalText,
  mouse_ensembl_id: optionalText,
});

// ── IO helpers ─────────────────────────────────────────────────────────────

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function writeTextFile(filePath: string, text: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, text, "utf8");
}

function toCsv(columns: readonly string[], rows: Array<Record<string, string | number>>): string {
  return stringify(rows, { header: true, columns: [...columns] });
}

function parseCsv(text: string): Array<Record<string, string>> {
  const rows: unknown = parse(text, { columns: true, skip_empty_lines: true, bom: true });
  return z.array(z.record(z.string())).parse(rows);
}

async function readCsv(filePath: string, label: string): Promise<Array<Record<string, string>>> {
  if (!(await fileExists(filePath))) throw new InputMissingError(filePath, `${label} not found`);
  return parseCsv(await fs.readFile(filePath, "utf8"));
}

export interface ParsedRows<T> {
  rows: T[];
  /** 1-based data-row numbers that failed validation. */
  rejected: number[];
}

function parseRows<S extends z.ZodTypeAny>(raw: Array<Record<string, string>>, schema: S): ParsedRows<z.output<S>> {
  const rows: Array<z.output<S>> = [];
  const rejected: number[] = [];
  raw.forEach((r, i) => {
    const parsed = schema.safeParse(r);
    if (parsed.success) rows.push(parsed.data);
    else rejected.push(i + 1);
  });
  return { rows, rejected };
}

/** Stage tables are our own output, so any invalid row rejects the file. */
async function readStageTable<S extends z.ZodTypeAny>(
  filePath: string,
  label: string,
  schema: S,
): Promise<Array<z.output<S>>> {
  const { rows, rejected } = parseRows(await readCsv(filePath, label), schema);
  if (rejected.length > 0) throw new MalformedInputError(filePath, label, rejected);
  return rows;
}

// ── Raw gene-set tables ────────────────────────────────────────────────────

export function formatGeneSetTable(rows: GeneSetRow[]): string {
  return toCsv(GENE_SET_COLUMNS, rows);
}

export async function readGeneSetTable(filePath: string): Promise<ParsedRows<GeneSetRow>> {
  return parseRows(await readCsv(filePath, "Gene-set table"), geneSetRowSchema);
}

// ── Orthology tables ───────────────────────────────────────────────────────

export function formatOrthologyFullTable(pairs: readonly OrthologPair[]): string {
  return toCsv(
    ORTHOLOGY_FULL_COLUMNS,
    pairs.map((p) => ({
      human_symbol: p.humanSymbol,
      mouse_symbol: p.mouseSymbol,
      human_entrez: p.humanEntrez ?? "",
      mouse_entrez: p.mouseEntrez ?? "",
      mapping_source: p.direction,
    })),
  );
}

export function formatOrthologySimpleTable(pairs: readonly OrthologPair[]): string {
  return toCsv(
    ["human_symbol", "mouse_symbol"],
    pairs.map((p) => ({ human_symbol: p.humanSymbol, mouse_symbol: p.mouseSymbol })),
  );
}

export async function readOrthologyTable(filePath: string): Promise<OrthologPair[]> {
  const rows = await readStageTable(filePath, "Orthology mapping", orthologyRowSchema);
  return rows.map((r) => ({
    humanSymbol: r.human_symbol,
    mouseSymbol: r.mouse_symbol,
    humanEntrez: r.human_entrez,
    mouseEntrez: r.mouse_entrez,
    direction: r.mapping_source satisfies MappingDirection,
  }));
}

// ── Consolidated / annotated tables ────────────────────────────────────────

function baseColumns(e: ConsolidatedGeneEntry) {
  return {
    human_symbol: e.humanSymbol,
    mouse_symbol: e.mouseSymbols.join(","),
    category: e.category,
    sources: e.sources.join(","),
    evidence_score: e.evidenceScore,
  };
}

export function formatConsolidatedTable(entries: readonly ConsolidatedGeneEntry[]): string {
  return toCsv(CONSOLIDATED_COLUMNS, entries.map(baseColumns));
}

export function formatAnnotatedTable(entries: readonly AnnotatedGeneEntry[]): string {
  return toCsv(
    ANNOTATED_COLUMNS,
    entries.map((e) => ({
      ...baseColumns(e),
      human_ensembl_id: e.humanEnsemblId ?? "",
      mouse_ensembl_id: e.mouseEnsemblId ?? "",
    })),
  );
}

export async function readConsolidatedTable(filePath: string): Promise<ConsolidatedGeneEntry[]> {
  const rows = await readStageTable(filePath, "Consolidated gene table", consolidatedRowSchema);
  return rows.map((r) => ({
    humanSymbol: r.human_symbol,
    mouseSymbols: r.mouse_symbol,
    category: r.category,
    sources: r.sources,
    evidenceScore: r.evidence_score,
  }));
}

export async function readAnnotatedTable(filePath: string): Promise<AnnotatedGeneEntry[]> {
  const rows = await readStageTable(filePath, "Final gene list", annotatedRowSchema);
  return rows.map((r) => ({
    humanSymbol: r.human_symbol,
    mouseSymbols: r.mouse_symbol,
    category: r.category,
    sources: r.sources,
    evidenceScore: r.evidence_score,
    ...(r.human_ensembl_id ? { humanEnsemblId: r.human_ensembl_id } : {}),
    ...(r.mouse_ensembl_id ? { mouseEnsemblId: r.mouse_ensembl_id } : {}),
  }));
}
