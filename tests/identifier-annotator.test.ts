import { describe, test, expect } from "vitest";
import { annotateIdentifiers, summarizeCoverage } from "@/lib/genes/identifier-annotator";
import type { ConsolidatedGeneEntry } from "@/lib/genes/types";
import { LookupCache } from "@/lib/services/lookup-cache";
import { ServiceUnavailableError } from "@/lib/errors";
import { silentLogger } from "@/lib/log";
import { FakeIdentifierService, testBatching } from "./helpers/fakes";

function entry(humanSymbol: string, mouseSymbols: string[] = []): ConsolidatedGeneEntry {
  return { humanSymbol, mouseSymbols, category: "Pro-apoptotic", sources: ["KEGG"], evidenceScore: 1 };
}

const IDS = {
  Human: { TP53: "ENSG_TP53", BCL2A1: "ENSG_BCL2A1" },
  Mouse: { Trp53: "ENSMUSG_TRP53", Bcl2a1a: "ENSMUSG_A", Bcl2a1b: "ENSMUSG_B" },
};

describe("annotateIdentifiers", () => {
  test("adds ids where the service has them and leaves the rest empty", async () => {
    const service = new FakeIdentifierService(IDS);
    const { entries, coverage, failures } = await annotateIdentifiers(
      [entry("TP53", ["Trp53"]), entry("XGENE")],
      service,
      { batching: testBatching(), logger: silentLogger },
    );

    expect(entries[0]).toEqual({ ...entry("TP53", ["Trp53"]), humanEnsemblId: "ENSG_TP53", mouseEnsemblId: "ENSMUSG_TRP53" });
    expect(entries[1]).toEqual(entry("XGENE"));
    expect(entries[1] && "humanEnsemblId" in entries[1]).toBe(false);
    expect(coverage).toEqual([
      { organism: "Human", mapped: 1, total: 2 },
      { organism: "Mouse", mapped: 1, total: 1 },
    ]);
    expect(failures).toEqual([]);
  });

  test("joins the ids of several mouse orthologs", async () => {
    const { entries } = await annotateIdentifiers(
      [entry("BCL2A1", ["Bcl2a1a", "Bcl2a1b"])],
      new FakeIdentifierService(IDS),
      { batching: testBatching(), logger: silentLogger },
    );
    expect(entries[0]?.mouseEnsemblId).toBe("ENSMUSG_A,ENSMUSG_B");
  });

  test("unresolved mouse orthologs keep an empty position", async () => {
    const { entries } = await annotateIdentifiers(
      [entry("BCL2A1", ["Bcl2a0", "Bcl2a1a", "Bcl2a1z"])],
      new FakeIdentifierService(IDS),
      { batching: testBatching(), logger: silentLogger },
    );
    expect(entries[0]?.mouseEnsemblId).toBe(",ENSMUSG_A,");
  });

  test("looks each symbol up once and honours a shared cache", async () => {
    const service = new FakeIdentifierService(IDS);
    const cache = new LookupCache<string>();
    cache.set("Human", "TP53", "ENSG_CACHED");

    const { entries } = await annotateIdentifiers(
      [entry("TP53", ["Trp53"]), entry("BCL2A1", ["Trp53"])],
      service,
      { batching: testBatching(), cache, logger: silentLogger },
    );

    expect(service.calls).toEqual([
      { organism: "Human", symbols: ["BCL2A1"] },
      { organism: "Mouse", symbols: ["Trp53"] },
    ]);
    expect(entries[0]?.humanEnsemblId).toBe("ENSG_CACHED");
    expect(cache.get("Mouse", "Trp53")).toBe("ENSMUSG_TRP53");
  });

  test("splits lookups by the identifier batch size", async () => {
    const service = new FakeIdentifierService(IDS);
    await annotateIdentifiers([entry("A"), entry("B"), entry("C")], service, {
      batching: testBatching({ identifierBatchSize: 2, concurrency: 1 }),
      logger: silentLogger,
    });
    expect(service.calls.map((c) => c.symbols)).toEqual([["A", "B"], ["C"]]);
  });

  test("one organism failing still annotates the other", async () => {
    const service = new FakeIdentifierService(IDS);
    service.failing.add("Mouse");
    const { entries, failures } = await annotateIdentifiers([entry("TP53", ["Trp53"])], service, {
      batching: testBatching(),
      logger: silentLogger,
    });
    expect(entries[0]?.humanEnsemblId).toBe("ENSG_TP53");
    expect(entries[0]?.mouseEnsemblId).toBeUndefined();
    expect(failures.map((f) => f.organism)).toEqual(["Mouse"]);
  });

  test("an unreachable service is fatal", async () => {
    const service = new FakeIdentifierService(IDS);
    service.failing.add("Human");
    service.failing.add("Mouse");
    await expect(
      annotateIdentifiers([entry("TP53", ["Trp53"])], service, { batching: testBatching(), logger: silentLogger }),
    ).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});

describe("summarizeCoverage", () => {
  test("formats mapped over total with a percentage", () => {
    expect(
      summarizeCoverage([
        { organism: "Human", mapped: 1, total: 3 },
        { organism: "Mouse", mapped: 0, total: 0 },
      ]),
    ).toEqual(["Human Ensembl ID coverage: 1/3 (33.3%)", "Mouse Ensembl ID coverage: 0/0 (0.0%)"]);
  });
});
