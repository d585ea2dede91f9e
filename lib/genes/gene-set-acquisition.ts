/**
 * Gene-set acquisition.
 *
 * Pulls the apoptosis-related sets out of the GO / KEGG / Reactome / Hallmark
 * libraries and writes one raw table per source file. Which libraries are
 * tried, and which set names count as pro-, anti- or general evidence, is the
 * ordered ACQUISITION_TARGETS table below.
 */
import path from "node:path";
import { ServiceUnavailableError, errorMessage } from "../errors";
import type { Logger } from "../log";
import { logProgress } from "../log";
import { throwIfAborted } from "../services/batching";
import type { GeneSetRow } from "./tables";
import { formatGeneSetTable, writeTextFile } from "./tables";
import type { GeneSetLibraryService, Organism } from "./types";

type CategoryLabel = GeneSetRow["category"];

interface SetRule {
  file: string;
  category: CategoryLabel;
  /** Receives the upper-cased gene-set name. */
  matches: (name: string) => boolean;
}

export interface AcquisitionTarget {
  id: string;
  organism: Organism;
  source: string;
  /** Receives the raw library name. */
  library: (name: string) => boolean;
  maxLibraries: number;
  rules: SetRule[];
}

// ── Matchers ─────────────────────────────────────────────────────────────

const mentionsApoptosis = (name: string) => name.includes("APOPTOTIC") || name.includes("APOPTOSIS");

const isGoBiologicalProcess = (lib: string) => {
  const upper = lib.toUpperCase();
  return upper.includes("GO") && upper.includes("BIOLOGICAL");
};

function goRules(prefix: "human" | "mouse"): SetRule[] {
  return [
    {
      file: `${prefix}_go_pro.csv`,
      category: "Pro",
      matches: (name) => name.includes("POSITIVE") && mentionsApoptosis(name),
    },
    {
      file: `${prefix}_go_anti.csv`,
      category: "Anti",
      matches: (name) => name.includes("NEGATIVE") && mentionsApoptosis(name),
    },
  ];
}

export const ACQUISITION_TARGETS: readonly AcquisitionTarget[] = [
  {
    id: "Human GO Biological Process",
    organism: "Human",
    source: "GO_BP",
    library: isGoBiologicalProcess,
    maxLibraries: 3,
    rules: goRules("human"),
  },
  {
    id: "Human KEGG",
    organism: "Human",
    source: "KEGG",
    library: (lib) => lib.toUpperCase().includes("KEGG"),
    maxLibraries: 3,
    rules: [{ file: "human_kegg_apoptosis.csv", category: "General", matches: (n) => n.includes("APOPTOSIS") }],
  },
  {
    id: "Human Reactome",
    organism: "Human",
    source: "Reactome",
    library: (lib) => lib.toUpperCase().includes("REACTOME"),
    maxLibraries: 3,
    rules: [{ file: "human_reactome_apoptosis.csv", category: "General", matches: mentionsApoptosis }],
  },
  {
    id: "Human Hallmark",
    organism: "Human",
    source: "Hallmark",
    library: (lib) => lib.toUpperCase().includes("HALLMARK") || lib.startsWith("H_") || lib === "MSigDB_Hallmark_2020",
    maxLibraries: 5,
    rules: [{ file: "human_hallmark_apoptosis.csv", category: "General", matches: (n) => n.includes("APOPTOSIS") }],
  },
  {
    id: "Mouse GO Biological Process",
    organism: "Mouse",
    source: "GO_BP",
    library: isGoBiologicalProcess,
    maxLibraries: 2,
    rules: goRules("mouse"),
  },
];

// ── Acquisition ──────────────────────────────────────────────────────────

export interface AcquiredFile {
  file: string;
  category: CategoryLabel;
  geneSets: number;
  rows: number;
}

export interface TargetReport {
  id: string;
  library: string | null;
  librariesTried: string[];
  files: AcquiredFile[];
}

export interface AcquisitionReport {
  targets: TargetReport[];
  filesWritten: number;
  /** Organisms whose library list could not be fetched. */
  unreachable: Organism[];
}

export async function acquireGeneSets(
  service: GeneSetLibraryService,
  rawDataDir: string,
  opts: { targets?: readonly AcquisitionTarget[]; logger?: Logger; signal?: AbortSignal } = {},
): Promise<AcquisitionReport> {
  const logger = opts.logger ?? console;
  const targets = opts.targets ?? ACQUISITION_TARGETS;
  const libraryLists = new Map<Organism, string[]>();
  const unreachable: Organism[] = [];

  const librariesFor = async (organism: Organism): Promise<string[]> => {
    const cached = libraryLists.get(organism);
    if (cached) return cached;
    let names: string[] = [];
    try {
      names = await service.listLibraries(organism);
      logProgress(logger, `Found ${names.length} libraries for ${organism}`);
    } catch (err: unknown) {
      throwIfAborted(opts.signal);
      logProgress(logger, `Error getting library list for ${organism}: ${errorMessage(err)}`);
      unreachable.push(organism);
    }
    libraryLists.set(organism, names);
    return names;
  };

  const reports: TargetReport[] = [];
  let filesWritten = 0;

  for (const target of targets) {
    throwIfAborted(opts.signal);
    logProgress(logger, `Retrieving ${target.id} gene sets...`);
    const candidates = (await librariesFor(target.organism)).filter(target.library).slice(0, target.maxLibraries);
    const matched = new Map<string, Array<[string, string[]]>>();
    const tried: string[] = [];
    let usedLibrary: string | null = null;

    for (const lib of candidates) {
      throwIfAborted(opts.signal);
      tried.push(lib);
      logProgress(logger, `  Trying library: ${lib}`);
      let sets: Record<string, string[]>;
      try {
        sets = await service.getLibrary(lib, target.organism);
      } catch (err: unknown) {
        throwIfAborted(opts.signal);
        logProgress(logger, `    Error with ${lib}: ${errorMessage(err)}`);
        continue;
      }

      for (const [setName, genes] of Object.entries(sets)) {
        const upper = setName.toUpperCase();
        const rule = target.rules.find((r) => r.matches(upper));
        if (!rule) continue;
        const bucket = matched.get(rule.file) ?? [];
        bucket.push([setName, genes]);
        matched.set(rule.file, bucket);
        logProgress(logger, `    Found ${rule.category.toUpperCase()}: ${setName} (${genes.length} genes)`);
      }

      if (matched.size > 0) {
        usedLibrary = lib;
        break;
      }
    }

    const files: AcquiredFile[] = [];
    for (const rule of target.rules) {
      const sets = matched.get(rule.file);
      if (!sets) {
        logProgress(logger, `  No gene sets to save for ${target.id} ${rule.category}`);
        continue;
      }
      const rows: GeneSetRow[] = sets.flatMap(([setName, genes]) =>
        genes.map((gene) => ({
          gene_symbol: gene,
          gene_set_name: setName,
          source: target.source,
          category: rule.category,
          organism: target.organism,
        })),
      );
      await writeTextFile(path.join(rawDataDir, rule.file), formatGeneSetTable(rows));
      logProgress(logger, `  Saved ${rows.length} gene entries to ${rule.file}`);
      files.push({ file: rule.file, category: rule.category, geneSets: sets.length, rows: rows.length });
      filesWritten++;
    }

    reports.push({ id: target.id, library: usedLibrary, librariesTried: tried, files });
  }

  throwIfAborted(opts.signal);
  if (filesWritten === 0 && unreachable.length > 0) {
    throw new ServiceUnavailableError(
      "gene-set library",
      `Gene-set library service unreachable for ${unreachable.join(", ")}; no gene sets acquired`,
    );
  }

  return { targets: reports, filesWritten, unreachable };
}
