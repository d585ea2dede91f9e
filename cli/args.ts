import type { BatchingConfig, ConfigOverrides } from "@/lib/config";

export const STAGES = ["acquire", "orthologs", "consolidate", "annotate", "breakdown", "run"] as const;
export type Stage = (typeof STAGES)[number];

export type ParsedArgs = {
  stage?: Stage;
  overrides: ConfigOverrides;
  skipAcquisition?: boolean;
  help?: boolean;
  errors: string[];
};

export const USAGE =
  "Usage: apoptosis-genes <acquire|orthologs|consolidate|annotate|breakdown|run> " +
  "[--work-dir <dir>] [--batch-size <n>] [--id-batch-size <n>] [--concurrency <n>] " +
  "[--retries <n>] [--timeout-ms <n>] [--skip-acquisition]";

const isStage = (value: string): value is Stage => STAGES.some((s) => s === value);

const parseCount = (flag: string, value: string | undefined, errors: string[], min = 1): number | undefined => {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < min) {
    errors.push(`${flag} expects an integer >= ${min}`);
    return undefined;
  }
  return n;
};

export const parseArgs = (argv: readonly string[]): ParsedArgs => {
  const parsed: ParsedArgs = { overrides: {}, errors: [] };
  const batching: Partial<BatchingConfig> = {};
  const setBatching = (key: keyof BatchingConfig, value: number | undefined) => {
    if (value !== undefined) batching[key] = value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const raw = argv[i];
    if (raw === undefined) continue;
    const eq = raw.indexOf("=");
    const token = raw.startsWith("--") && eq > 0 ? raw.slice(0, eq) : raw;
    const takeValue = (): string | undefined => {
      if (token !== raw) return raw.slice(eq + 1);
      i += 1;
      return argv[i];
    };

    if (token === "--help" || token === "-h") {
      parsed.help = true;
    } else if (token === "--skip-acquisition") {
      parsed.skipAcquisition = true;
    } else if (token === "--work-dir" || token === "-w") {
      const value = takeValue();
      if (value) parsed.overrides.workDir = value;
      else parsed.errors.push("--work-dir expects a path");
    } else if (token === "--batch-size") {
      setBatching("orthologyBatchSize", parseCount(token, takeValue(), parsed.errors));
    } else if (token === "--id-batch-size") {
      setBatching("identifierBatchSize", parseCount(token, takeValue(), parsed.errors));
    } else if (token === "--concurrency") {
      setBatching("concurrency", parseCount(token, takeValue(), parsed.errors));
    } else if (token === "--retries") {
      setBatching("maxRetries", parseCount(token, takeValue(), parsed.errors, 0));
    } else if (token === "--timeout-ms") {
      const timeout = parseCount(token, takeValue(), parsed.errors);
      setBatching("batchTimeoutMs", timeout);
      if (timeout !== undefined) parsed.overrides.services = { timeoutMs: timeout };
    } else if (!token.startsWith("-") && parsed.stage === undefined && isStage(token)) {
      parsed.stage = token;
    } else {
      parsed.errors.push(`Unknown argument: ${raw}`);
    }
  }

  if (Object.keys(batching).length > 0) parsed.overrides.batching = batching;
  return parsed;
};
