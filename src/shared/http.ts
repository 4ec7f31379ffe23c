import { BackendError, errorMessage } from "../errors.ts";
import type { FetchLike } from "../tools/plugin-host.ts";

export interface JsonResponse {
  url: string;
  status: number;
  body: unknown;
}

export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

/** Auth headers for optional basic credentials; both parts must be set. */
export function authHeaders(username?: string, password?: string): Record<string, string> {
  return username && password ? { Authorization: basicAuthHeader(username, password) } : {};
}

export function withQuery(url: URL, params: Record<string, string | number | undefined>): URL {
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url;
}

/** Fetch and decode a JSON body. Transport failures and non-2xx answers become BackendErrors. */
export async function requestJson(fetchImpl: FetchLike, url: URL, init: RequestInit): Promise<JsonResponse> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (err) {
    throw new BackendError(`Request to ${url.origin} failed: ${errorMessage(err)}`, err);
  }

  if (!response.ok) {
    const text = await response.text();
    throw new BackendError(`HTTP ${response.status}: ${text.slice(0, 200)}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new BackendError(`Invalid JSON from ${url.toString()}`, err);
  }
  return { url: url.toString(), status: response.status, body };
}
