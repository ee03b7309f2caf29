/**
 * Outbound JSON over fetch with a hard timeout. Never throws: every failure
 * (network, timeout, non-2xx, unparsable body) comes back as an `error`
 * outcome so adapters can degrade to "no data".
 */

import { errorMessage } from "../../server/common/errors";

export type FetchOutcome =
  | { kind: "ok"; body: unknown }
  | { kind: "error"; reason: string; status?: number };

export type QueryValue = string | number | boolean | undefined;

export function buildUrl(base: string, path: string, params: Record<string, QueryValue>): URL {
  const url = new URL(path, base.endsWith("/") ? base : `${base}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === "") continue;
    url.searchParams.set(key, String(value));
  }
  return url;
}

export async function fetchJson(url: URL, timeoutMs: number): Promise<FetchOutcome> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === "TimeoutError";
    return { kind: "error", reason: timedOut ? `timed out after ${timeoutMs}ms` : errorMessage(error) };
  }

  if (!res.ok) {
    return { kind: "error", reason: `HTTP ${res.status}`, status: res.status };
  }

  try {
    const body: unknown = await res.json();
    return { kind: "ok", body };
  } catch {
    return { kind: "error", reason: "invalid JSON" };
  }
}
