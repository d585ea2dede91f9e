#!/usr/bin/env tsx
import { ZodError } from "zod";
import { loadConfig } from "@/lib/config";
import { PipelineError, errorMessage } from "@/lib/errors";
import {
  createServices,
  runAcquisitionStage,
  runAnnotationStage,
  runBreakdownStage,
  runConsolidationStage,
  runOrthologyStage,
  runPipeline,
} from "@/lib/pipeline";
import type { StageContext } from "@/lib/pipeline";
import type { Stage } from "./args";
import { USAGE, parseArgs } from "./args";

async function runStage(stage: Stage, ctx: StageContext, skipAcquisition: boolean) {
  switch (stage) {
    case "acquire":
      await runAcquisitionStage(ctx);
      return;
    case "orthologs":
      await runOrthologyStage(ctx);
      return;
    case "consolidate":
      await runConsolidationStage(ctx);
      return;
    case "annotate":
      await runAnnotationStage(ctx);
      return;
    case "breakdown":
      await runBreakdownStage(ctx);
      return;
    case "run":
      await runPipeline(ctx, { skipAcquisition });
      return;
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    process.exit(0);
  }
  if (args.errors.length > 0 || !args.stage) {
    for (const e of args.errors) console.error(e);
    console.error(USAGE);
    process.exit(2);
  }

  const config = loadConfig(process.env, args.overrides);
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("Interrupted")));

  const ctx: StageContext = {
    config,
    services: createServices(config, controller.signal),
    signal: controller.signal,
  };
  await runStage(args.stage, ctx, args.skipAcquisition ?? false);
}

main().catch((err: unknown) => {
  if (err instanceof PipelineError) {
    console.error(`[ERROR] ${err.code}: ${err.message}`);
  } else if (err instanceof ZodError) {
    console.error(`[ERROR] invalid configuration: ${err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  } else {
    console.error(`[ERROR] ${errorMessage(err)}`);
  }
  process.exit(1);
});
