/**
 * Minimal FHIR R4 read/search client over fetch, with optional basic auth.
 */

import type { FetchLike } from "../../src/tools/plugin-host.ts";
import { isRecord } from "../../src/shared/json.ts";
import { authHeaders, requestJson, withQuery, type JsonResponse } from "../../src/shared/http.ts";

export interface FhirClientOptions {
  baseUrl: string;
  username?: string;
  password?: string;
  fetch: FetchLike;
}

/** Resources of a searchset / $everything Bundle. */
export function bundleEntries(bundle: unknown): unknown[] {
  if (!isRecord(bundle) || !Array.isArray(bundle.entry)) return [];
  return bundle.entry.map((e) => (isRecord(e) ? e.resource : undefined)).filter((r) => r !== undefined);
}

export function bundleTotal(bundle: unknown, fallback: number): number {
  return isRecord(bundle) && typeof bundle.total === "number" ? bundle.total : fallback;
}

export class FhirClient {
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(private readonly opts: FhirClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.headers = { Accept: "application/fhir+json", ...authHeaders(opts.username, opts.password) };
  }

  get(path: string, params: Record<string, string | number> = {}): Promise<JsonResponse> {
    const url = withQuery(new URL(`${this.baseUrl}/${path}`), params);
    return requestJson(this.opts.fetch, url, { method: "GET", headers: this.headers });
  }
}
