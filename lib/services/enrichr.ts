/**
 * Enrichr gene-set library client.
 *
 * Serves the MSigDB, GO, KEGG and Reactome libraries used by acquisition.
 * Human and Mouse share one Enrichr instance by default; either can be
 * pointed elsewhere through the per-organism base URLs.
 */
import { z } from "zod";
import { ServiceRequestError } from "../errors";
import type { GeneSetLibraryService, Organism } from "../genes/types";
import { fetchJson, fetchText } from "./http-client";

export const ENRICHR_API = "https://maayanlab.cloud/Enrichr";

const statisticsSchema = z.object({
  statistics: z.array(z.object({ libraryName: z.string() }).passthrough()),
});

/**
 * Parse a `mode=text` library dump: one set per line,
 * `name \t description \t gene[,weight] \t gene[,weight] ...`.
 */
export function parseLibraryText(text: string): Record<string, string[]> {
  const library: Record<string, string[]> = {};
  for (const line of text.split(/\r?\n/)) {
    const fields = line.split("\t");
    const name = fields[0]?.trim();
    if (!name) continue;
    const genes = fields
      .slice(2)
      .map((g) => g.split(",")[0].trim())
      .filter((g) => g.length > 0);
    library[name] = genes;
  }
  return library;
}

export class EnrichrClient implements GeneSetLibraryService {
  private readonly baseUrls: Record<Organism, string>;
  private readonly timeoutMs: number | undefined;
  private readonly signal: AbortSignal | undefined;

  constructor(
    opts: { baseUrls?: Partial<Record<Organism, string>>; timeoutMs?: number; signal?: AbortSignal } = {},
  ) {
    this.baseUrls = {
      Human: (opts.baseUrls?.Human ?? ENRICHR_API).replace(/\/+$/, ""),
      Mouse: (opts.baseUrls?.Mouse ?? ENRICHR_API).replace(/\/+$/, ""),
    };
    this.timeoutMs = opts.timeoutMs;
    this.signal = opts.signal;
  }

  async listLibraries(organism: Organism): Promise<string[]> {
    const res = await fetchJson(`${this.baseUrls[organism]}/datasetStatistics`, {
      timeoutMs: this.timeoutMs,
      signal: this.signal,
    });
    if (!res.ok) {
      throw new ServiceRequestError(`Enrichr library list: ${res.error ?? "request failed"}`, res.status);
    }
    const parsed = statisticsSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new ServiceRequestError("Enrichr library list: unexpected payload", res.status);
    }
    return parsed.data.statistics.map((s) => s.libraryName);
  }

  async getLibrary(name: string, organism: Organism): Promise<Record<string, string[]>> {
    const url = `${this.baseUrls[organism]}/geneSetLibrary?mode=text&libraryName=${encodeURIComponent(name)}`;
    const res = await fetchText(url, { timeoutMs: this.timeoutMs, signal: this.signal });
    if (!res.ok || res.text === null) {
      throw new ServiceRequestError(`Enrichr library ${name}: ${res.error ?? "empty response"}`, res.status);
    }
    return parseLibraryText(res.text);
  }
}
