/**
 * MyGene.info client.
 *
 * Backs both the ortholog lookups (HomoloGene clusters + Entrez id → symbol)
 * and the Ensembl gene id annotation. Every method covers a single batch and
 * throws ServiceRequestError on failure so the batch runner can retry or skip.
 */
import { z } from "zod";
import { ServiceRequestError } from "../errors";
import type { IdentifierLookupService, Organism, OrthologLookupService } from "../genes/types";
import { TAXONOMY_IDS } from "../genes/types";
import { fetchJson } from "./http-client";

export const MYGENE_API = "https://mygene.info/v3";

const hitSchema = z
  .object({
    query: z.coerce.string(),
    _id: z.coerce.string().optional(),
    notfound: z.boolean().optional(),
    symbol: z.string().optional(),
    homologene: z.unknown().optional(),
    ensembl: z.unknown().optional(),
  })
  .passthrough();

type Hit = z.infer<typeof hitSchema>;

const homologeneSchema = z.object({
  genes: z.array(z.array(z.number())).default([]),
});

const ensemblEntrySchema = z.object({ gene: z.union([z.string(), z.array(z.string())]).optional() });
const ensemblSchema = z.union([ensemblEntrySchema, z.array(ensemblEntrySchema)]);

export interface MyGeneClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

function firstEnsemblGene(raw: unknown): string | null {
  const parsed = ensemblSchema.safeParse(raw);
  if (!parsed.success) return null;
  const entry = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
  const gene = entry?.gene;
  if (Array.isArray(gene)) return gene[0] ?? null;
  return gene ?? null;
}

export class MyGeneClient implements OrthologLookupService, IdentifierLookupService {
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly signal: AbortSignal | undefined;

  constructor(opts: MyGeneClientOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? MYGENE_API).replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs;
    this.signal = opts.signal;
  }

  private async post(path: string, form: Record<string, string>): Promise<Hit[]> {
    const res = await fetchJson(`${this.baseUrl}${path}`, {
      form,
      timeoutMs: this.timeoutMs,
      signal: this.signal,
    });
    if (!res.ok) {
      throw new ServiceRequestError(`MyGene.info ${path}: ${res.error ?? "request failed"}`, res.status);
    }
    if (!Array.isArray(res.data)) {
      throw new ServiceRequestError(`MyGene.info ${path}: expected an array of hits`, res.status);
    }

    const hits: Hit[] = [];
    for (const raw of res.data) {
      const parsed = hitSchema.safeParse(raw);
      if (parsed.success && !parsed.data.notfound) hits.push(parsed.data);
    }
    return hits;
  }

  async findOrthologIds(symbols: string[], from: Organism, to: Organism): Promise<Map<string, number[]>> {
    const targetTaxid = TAXONOMY_IDS[to];
    const hits = await this.post("/query", {
      q: symbols.join(","),
      scopes: "symbol",
      fields: "symbol,homologene",
      species: String(TAXONOMY_IDS[from]),
    });

    const orthologs = new Map<string, number[]>();
    for (const hit of hits) {
      const cluster = homologeneSchema.safeParse(hit.homologene);
      if (!cluster.success) continue;

      const targetIds = cluster.data.genes
        .filter((g) => g.length >= 2 && g[0] === targetTaxid)
        .map((g) => g[1]);
      if (targetIds.length === 0) continue;

      const sourceSymbol = hit.symbol ?? hit.query;
      const known = orthologs.get(sourceSymbol) ?? [];
      for (const id of targetIds) {
        if (!known.includes(id)) known.push(id);
      }
      orthologs.set(sourceSymbol, known);
    }
    return orthologs;
  }

  async resolveEntrezIds(ids: number[], organism: Organism): Promise<Map<number, string>> {
    const hits = await this.post("/gene", {
      ids: ids.join(","),
      fields: "symbol",
      species: String(TAXONOMY_IDS[organism]),
    });

    const symbols = new Map<number, string>();
    for (const hit of hits) {
      const id = Number(hit.query || hit._id);
      if (!Number.isInteger(id) || !hit.symbol) continue;
      symbols.set(id, hit.symbol);
    }
    return symbols;
  }

  async lookupEnsemblIds(symbols: string[], organism: Organism): Promise<Map<string, string>> {
    const hits = await this.post("/query", {
      q: symbols.join(","),
      scopes: "symbol",
      fields: "ensembl.gene",
      species: String(TAXONOMY_IDS[organism]),
    });

    const ids = new Map<string, string>();
    for (const hit of hits) {
      if (ids.has(hit.query)) continue;
      const gene = firstEnsemblGene(hit.ensembl);
      if (gene) ids.set(hit.query, gene);
    }
    return ids;
  }
}
