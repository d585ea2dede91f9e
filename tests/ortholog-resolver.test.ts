/**
 * Ortholog resolution: pair table, dedup, batching, failure policy, index.
 */
import { describe, test, expect, vi } from "vitest";
import { cardinality, resolveOrthologs, summarizeResolution } from "@/lib/genes/ortholog-resolver";
import { buildOrthologyIndex, canonicalSymbolFor, orthologsOf } from "@/lib/genes/orthology-index";
import type { OrthologPair } from "@/lib/genes/types";
import { ResolutionFailureError, ServiceUnavailableError } from "@/lib/errors";
import { silentLogger } from "@/lib/log";
import { FakeOrthologService, testBatching } from "./helpers/fakes";
import type { OrthologFixture } from "./helpers/fakes";

const FIXTURE: OrthologFixture = {
  forward: { TP53: [22059], BCL2: [12043], BAX: [12028] },
  reverse: { Bax: [581], Bcl2: [596], Casp3: [836] },
  humanIds: { 581: "BAX", 596: "BCL2", 836: "CASP3" },
  mouseIds: { 22059: "Trp53", 12043: "Bcl2", 12028: "Bax" },
};

const HUMAN = ["TP53", "BCL2", "BAX", "NOPE"];
const MOUSE = ["Bax", "Bcl2", "Casp3"];

function pair(humanSymbol: string, mouseSymbol: string): OrthologPair {
  return { humanSymbol, mouseSymbol, humanEntrez: null, mouseEntrez: null, direction: "human_to_mouse" };
}

// ─── Index ───────────────────────────────────────────────

describe("buildOrthologyIndex", () => {
  test("forward keeps every mouse ortholog once", () => {
    const index = buildOrthologyIndex([pair("A", "a1"), pair("A", "a2"), pair("A", "a1")]);
    expect(orthologsOf(index, "A")).toEqual(["a1", "a2"]);
    expect(orthologsOf(index, "Z")).toEqual([]);
  });

  test("reverse is single-valued and the last pair wins", () => {
    const index = buildOrthologyIndex([pair("A", "m"), pair("B", "m")]);
    expect(canonicalSymbolFor(index, "m")).toBe("B");
    expect(canonicalSymbolFor(index, "unknown")).toBeUndefined();
  });
});

// ─── Resolver ────────────────────────────────────────────

describe("resolveOrthologs", () => {
  test("builds the sorted, deduplicated pair table from both directions", async () => {
    const service = new FakeOrthologService(FIXTURE);
    const res = await resolveOrthologs(HUMAN, MOUSE, service, { batching: testBatching(), logger: silentLogger });

    expect(res.pairs).toEqual([
      { humanSymbol: "BAX", mouseSymbol: "Bax", humanEntrez: null, mouseEntrez: 12028, direction: "human_to_mouse" },
      { humanSymbol: "BCL2", mouseSymbol: "Bcl2", humanEntrez: null, mouseEntrez: 12043, direction: "human_to_mouse" },
      { humanSymbol: "CASP3", mouseSymbol: "Casp3", humanEntrez: 836, mouseEntrez: null, direction: "mouse_to_human" },
      { humanSymbol: "TP53", mouseSymbol: "Trp53", humanEntrez: null, mouseEntrez: 22059, direction: "human_to_mouse" },
    ]);
    expect(res.duplicatesRemoved).toBe(2);
    expect(res.failures).toEqual([]);
    expect(res.directions[0]).toEqual({
      from: "Human",
      inputSymbols: 4,
      symbolsWithOrthologs: 3,
      targetIds: 3,
      resolvedIds: 3,
      pairs: 3,
    });
    expect(res.directions[1]?.pairs).toBe(3);
    expect(orthologsOf(res.index, "TP53")).toEqual(["Trp53"]);
    expect(canonicalSymbolFor(res.index, "Casp3")).toBe("CASP3");
  });

  test("a pair seen in both directions appears once", async () => {
    const service = new FakeOrthologService(FIXTURE);
    const res = await resolveOrthologs(["BAX"], ["Bax"], service, { batching: testBatching(), logger: silentLogger });
    expect(res.pairs).toHaveLength(1);
    expect(res.pairs[0]?.direction).toBe("human_to_mouse");
    expect(res.duplicatesRemoved).toBe(1);
  });

  test("batch size does not change the result", async () => {
    const wide = await resolveOrthologs(HUMAN, MOUSE, new FakeOrthologService(FIXTURE), {
      batching: testBatching(),
      logger: silentLogger,
    });
    const service = new FakeOrthologService(FIXTURE);
    const narrow = await resolveOrthologs(HUMAN, MOUSE, service, {
      batching: testBatching({ orthologyBatchSize: 1, concurrency: 3 }),
      logger: silentLogger,
    });
    expect(narrow.pairs).toEqual(wide.pairs);
    // 4 + 3 symbol batches, 3 + 3 id batches
    expect(narrow.batchesIssued).toBe(13);
    expect(service.calls.filter((c) => c.method === "findOrthologIds").every((c) => c.input.length === 1)).toBe(true);
  });

  test("deduplicates and sorts input symbols before querying", async () => {
    const service = new FakeOrthologService(FIXTURE);
    await resolveOrthologs(["TP53", "BAX", "TP53"], [], service, { batching: testBatching(), logger: silentLogger });
    expect(service.calls[0]).toEqual({ method: "findOrthologIds", input: ["BAX", "TP53"] });
  });

  test("upper-cases human symbols returned by the service", async () => {
    const service = new FakeOrthologService({ ...FIXTURE, humanIds: { 836: "Casp3" } });
    const res = await resolveOrthologs([], ["Casp3"], service, { batching: testBatching(), logger: silentLogger });
    expect(res.pairs.map((p) => p.humanSymbol)).toEqual(["CASP3"]);
  });

  test("a failed batch is skipped and recorded", async () => {
    const service = new FakeOrthologService(FIXTURE);
    service.failWhen = (input) => input.includes("TP53");
    const res = await resolveOrthologs(HUMAN, MOUSE, service, {
      batching: testBatching({ orthologyBatchSize: 1 }),
      logger: silentLogger,
    });

    expect(res.pairs.map((p) => p.humanSymbol)).toEqual(["BAX", "BCL2", "CASP3"]);
    expect(res.failures).toEqual([
      { offset: 3, size: 1, attempts: 1, error: "fake ortholog outage", stage: "Human->Mouse orthologs" },
    ]);
  });

  test("fails with ResolutionFailure when every batch fails", async () => {
    const service = new FakeOrthologService(FIXTURE);
    service.failWhen = () => true;
    const run = resolveOrthologs(HUMAN, MOUSE, service, { batching: testBatching(), logger: silentLogger });

    await expect(run).rejects.toBeInstanceOf(ResolutionFailureError);
    await run.catch((err: unknown) => {
      expect(err instanceof ResolutionFailureError && err.cause instanceof ServiceUnavailableError).toBe(true);
    });
  });

  test("a reachable service with no orthologs only warns", async () => {
    const warn = vi.fn();
    const res = await resolveOrthologs(["NOPE"], [], new FakeOrthologService(FIXTURE), {
      batching: testBatching(),
      logger: { ...silentLogger, warn },
    });
    expect(res.pairs).toEqual([]);
    expect(warn).toHaveBeenCalledWith("WARNING: No ortholog mappings found!");
  });

  test("two runs produce identical pair tables", async () => {
    const a = await resolveOrthologs(HUMAN, MOUSE, new FakeOrthologService(FIXTURE), {
      batching: testBatching({ orthologyBatchSize: 2, concurrency: 2 }),
      logger: silentLogger,
    });
    const b = await resolveOrthologs([...HUMAN].reverse(), [...MOUSE].reverse(), new FakeOrthologService(FIXTURE), {
      batching: testBatching({ orthologyBatchSize: 3, concurrency: 1 }),
      logger: silentLogger,
    });
    expect(b.pairs).toEqual(a.pairs);
  });
});

// ─── Summary ─────────────────────────────────────────────

describe("resolution summary", () => {
  test("cardinality counts one-to-many mappings on both sides", () => {
    expect(cardinality([pair("A", "a1"), pair("A", "a2"), pair("B", "a1")])).toEqual({
      humanWithMultiple: 1,
      mouseWithMultiple: 1,
      maxPerHuman: 2,
      maxPerMouse: 2,
    });
  });

  test("summary reports pair totals and coverage", async () => {
    const res = await resolveOrthologs(HUMAN, MOUSE, new FakeOrthologService(FIXTURE), {
      batching: testBatching(),
      logger: silentLogger,
    });
    const lines = summarizeResolution(res, HUMAN, MOUSE);
    expect(lines).toContain("Total ortholog pairs: 4");
    expect(lines).toContain("Duplicate pairs removed: 2");
    expect(lines).toContain("  Human genes from input that have mappings: 3 (75.0%)");
    expect(lines).toContain("  Mouse genes from input that have mappings: 3 (100.0%)");
  });
});
