import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { ACQUISITION_TARGETS, acquireGeneSets } from "@/lib/genes/gene-set-acquisition";
import { readGeneSetTable } from "@/lib/genes/tables";
import { ServiceUnavailableError } from "@/lib/errors";
import { silentLogger } from "@/lib/log";
import { FakeLibraryService, makeTempDir } from "./helpers/fakes";

const GO_BP = "GO_Biological_Process_2023";

function libraryService() {
  return new FakeLibraryService(
    {
      Human: ["Achilles_fitness", GO_BP, "KEGG_2021_Human", "Reactome_2022", "MSigDB_Hallmark_2020"],
      Mouse: [GO_BP],
    },
    {
      [`Human:${GO_BP}`]: {
        "positive regulation of apoptotic process (GO:0043065)": ["BAX", "BAK1"],
        "negative regulation of apoptotic process (GO:0043066)": ["BCL2"],
        "cell cycle (GO:0007049)": ["CDK1"],
      },
      [`Mouse:${GO_BP}`]: {
        "positive regulation of apoptotic process (GO:0043065)": ["Bax"],
        "negative regulation of apoptotic process (GO:0043066)": ["Bcl2"],
      },
      "Human:KEGG_2021_Human": { Apoptosis: ["TP53", "CASP3"], "p53 signaling pathway": ["TP53"] },
      "Human:Reactome_2022": { "Intrinsic Pathway for Apoptosis R-HSA-109606": ["BAX"], Autophagy: ["ATG5"] },
      "Human:MSigDB_Hallmark_2020": { Apoptosis: ["CASP3", "BCL2"] },
    },
  );
}

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("acquireGeneSets", () => {
  test("writes one raw table per matched rule", async () => {
    const report = await acquireGeneSets(libraryService(), dir, { logger: silentLogger });

    expect(report.filesWritten).toBe(7);
    expect(report.unreachable).toEqual([]);
    expect(report.targets.map((t) => t.library)).toEqual([
      GO_BP,
      "KEGG_2021_Human",
      "Reactome_2022",
      "MSigDB_Hallmark_2020",
      GO_BP,
    ]);
    expect((await fs.readdir(dir)).sort()).toEqual([
      "human_go_anti.csv",
      "human_go_pro.csv",
      "human_hallmark_apoptosis.csv",
      "human_kegg_apoptosis.csv",
      "human_reactome_apoptosis.csv",
      "mouse_go_anti.csv",
      "mouse_go_pro.csv",
    ]);
  });

  test("classifies GO sets by regulation direction", async () => {
    await acquireGeneSets(libraryService(), dir, { logger: silentLogger });

    const pro = await readGeneSetTable(path.join(dir, "human_go_pro.csv"));
    expect(pro.rows).toEqual([
      {
        gene_symbol: "BAX",
        gene_set_name: "positive regulation of apoptotic process (GO:0043065)",
        source: "GO_BP",
        category: "Pro",
        organism: "Human",
      },
      {
        gene_symbol: "BAK1",
        gene_set_name: "positive regulation of apoptotic process (GO:0043065)",
        source: "GO_BP",
        category: "Pro",
        organism: "Human",
      },
    ]);

    const mouseAnti = await readGeneSetTable(path.join(dir, "mouse_go_anti.csv"));
    expect(mouseAnti.rows.map((r) => [r.gene_symbol, r.category, r.organism])).toEqual([["Bcl2", "Anti", "Mouse"]]);
  });

  test("pathway sources are written as general evidence", async () => {
    await acquireGeneSets(libraryService(), dir, { logger: silentLogger });
    const kegg = await readGeneSetTable(path.join(dir, "human_kegg_apoptosis.csv"));
    expect(kegg.rows.map((r) => [r.gene_symbol, r.gene_set_name, r.source, r.category])).toEqual([
      ["TP53", "Apoptosis", "KEGG", "General"],
      ["CASP3", "Apoptosis", "KEGG", "General"],
    ]);
  });

  test("falls through to the next library when one fails", async () => {
    const service = new FakeLibraryService(
      { Human: ["KEGG_2019_Human", "KEGG_2021_Human"], Mouse: [] },
      { "Human:KEGG_2021_Human": { Apoptosis: ["TP53"] } },
    );
    service.broken.add("KEGG_2019_Human");
    const targets = ACQUISITION_TARGETS.filter((t) => t.id === "Human KEGG");

    const report = await acquireGeneSets(service, dir, { targets, logger: silentLogger });
    expect(report.targets).toEqual([
      {
        id: "Human KEGG",
        library: "KEGG_2021_Human",
        librariesTried: ["KEGG_2019_Human", "KEGG_2021_Human"],
        files: [{ file: "human_kegg_apoptosis.csv", category: "General", geneSets: 1, rows: 1 }],
      },
    ]);
  });

  test("an abort stops acquisition before the next target", async () => {
    const controller = new AbortController();
    const service = libraryService();
    const requested: string[] = [];
    const getLibrary = service.getLibrary.bind(service);
    service.getLibrary = async (name, organism) => {
      requested.push(`${organism}:${name}`);
      controller.abort(new Error("Interrupted"));
      return getLibrary(name, organism);
    };

    await expect(
      acquireGeneSets(service, dir, { logger: silentLogger, signal: controller.signal }),
    ).rejects.toThrow("Interrupted");
    expect(requested).toEqual([`Human:${GO_BP}`]);
  });

  test("an abort during a failing download is rethrown", async () => {
    const controller = new AbortController();
    const service = libraryService();
    service.getLibrary = async () => {
      controller.abort(new Error("Interrupted"));
      throw new Error("Aborted");
    };

    await expect(
      acquireGeneSets(service, dir, { logger: silentLogger, signal: controller.signal }),
    ).rejects.toThrow("Interrupted");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  test("an unreachable organism is reported but not fatal", async () => {
    const service = libraryService();
    service.unreachable.add("Mouse");
    const report = await acquireGeneSets(service, dir, { logger: silentLogger });
    expect(report.unreachable).toEqual(["Mouse"]);
    expect(report.filesWritten).toBe(5);
  });

  test("nothing acquired from an unreachable service is fatal", async () => {
    const service = libraryService();
    service.unreachable.add("Human");
    service.unreachable.add("Mouse");
    await expect(acquireGeneSets(service, dir, { logger: silentLogger })).rejects.toBeInstanceOf(
      ServiceUnavailableError,
    );
  });
});
