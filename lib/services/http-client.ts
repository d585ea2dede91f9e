/**
 * Fetch wrapper with timeout, JSON parsing, and error handling.
 * MyGene.info and Enrichr clients use this for every external call.
 */

const DEFAULT_TIMEOUT_MS = 30_000;

export interface FetchResult<T = unknown> {
  ok: boolean;
  status: number;
  data: T | null;
  error: string | null;
}

export interface FetchOptions {
  method?: string;
  headers?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded. */
  form?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

function linkSignal(controller: AbortController, signal: AbortSignal | undefined) {
  if (!signal) return;
  if (signal.aborted) controller.abort();
  else signal.addEventListener("abort", () => controller.abort(), { once: true });
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export async function fetchJson(url: string, opts?: FetchOptions): Promise<FetchResult> {
  const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  linkSignal(controller, opts?.signal);
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: opts?.method ?? (opts?.form ? "POST" : "GET"),
      headers: {
        Accept: "application/json",
        ...opts?.headers,
        ...(opts?.form ? { "Content-Type": "application/x-www-form-urlencoded" } : {}),
      },
      body: opts?.form ? new URLSearchParams(opts.form).toString() : undefined,
      signal: controller.signal,
    });

    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        data: null,
        error: `HTTP ${response.status}: ${response.statusText}`,
      };
    }

    const data: unknown = await response.json();
    return { ok: true, status: response.status, data, error: null };
  } catch (err: unknown) {
    if (isAbort(err)) {
      const reason = opts?.signal?.aborted ? "Aborted" : `Timeout after ${timeoutMs}ms`;
      return { ok: false, status: 0, data: null, error: reason };
    }
    const message = err instanceof Error ? err.message : "Unknown fetch error";
    return { ok: false, status: 0, data: null, error: message };
  } finally {
    clearTimeout(timeout);
  }
}

/** Fetch plain text (e.g. tab-separated library dumps). */
export async function fetchText(
  url: string,
  opts?: { timeoutMs?: number; headers?: Record<string, string>; signal?: AbortSignal },
): Promise<{ ok: boolean; status: number; text: string | null; error: string | null }> {
  const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  linkSignal(controller, opts?.signal);
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: opts?.headers,
    });
    if (!response.ok) {
      return { ok: false, status: response.status, text: null, error: `HTTP ${response.status}` };
    }
    const text = await response.text();
    return { ok: true, status: response.status, text, error: null };
  } catch (err: unknown) {
    if (isAbort(err)) {
      const reason = opts?.signal?.aborted ? "Aborted" : `Timeout after ${timeoutMs}ms`;
      return { ok: false, status: 0, text: null, error: reason };
    }
    const message = err instanceof Error ? err.message : "Unknown fetch error";
    return { ok: false, status: 0, text: null, error: message };
  } finally {
    clearTimeout(timeout);
  }
}
