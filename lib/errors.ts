/**
 * Pipeline error taxonomy.
 *
 * Only PipelineError subclasses terminate a run. Batch failures and unmapped
 * identifiers are recorded as data (see BatchFailure, coverage reports) and
 * never thrown past the component that saw them.
 */

export type PipelineErrorCode =
  | "input_missing"
  | "malformed_input"
  | "service_unavailable"
  | "resolution_failure"
  | "no_evidence_found"
  | "invariant_violation";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputMissingError extends PipelineError {
  readonly path: string;

  constructor(path: string, detail?: string) {
    super("input_missing", detail ? `${detail}: ${path}` : `Required input not found: ${path}`);
    this.path = path;
  }
}

/** A stage table exists but some of its rows do not validate. */
export class MalformedInputError extends PipelineError {
  readonly path: string;
  readonly rows: number[];

  constructor(path: string, label: string, rows: number[]) {
    const shown = rows.length > 10 ? `${rows.slice(0, 10).join(", ")}, ...` : rows.join(", ");
    super("malformed_input", `${label} has ${rows.length} invalid row(s) (data rows ${shown}): ${path}`);
    this.path = path;
    this.rows = rows;
  }
}

export class ServiceUnavailableError extends PipelineError {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super("service_unavailable", message, options);
    this.service = service;
  }
}

export class ResolutionFailureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("resolution_failure", message, options);
  }
}

export class NoEvidenceFoundError extends PipelineError {
  constructor(message = "No gene passed classification") {
    super("no_evidence_found", message);
  }
}

/** Internal assertion; reaching this means a stage broke its own contract. */
export class InvariantViolationError extends PipelineError {
  constructor(message: string) {
    super("invariant_violation", message);
  }
}

/** A single HTTP call to an external service failed. */
export class ServiceRequestError extends Error {
  readonly status: number;
  readonly transient: boolean;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ServiceRequestError";
    this.status = status;
    // status 0 = network failure or timeout
    this.transient = status === 0 || status === 429 || status >= 500;
  }
}

export class BatchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Batch timed out after ${timeoutMs}ms`);
    this.name = "BatchTimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
