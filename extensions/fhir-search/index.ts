/**
 * Cliniq - FHIR Search Extension
 *
 * Read, search and `$everything` against a FHIR R4 server. Patient filtering
 * uses `_id` on Patient and the `patient` reference everywhere else.
 */

import type { ToolPlugin, ToolPluginApi } from "../../src/tools/plugin-host.ts";
import { defineTool } from "../../src/tools/tool-contract.ts";
import {
  DEFAULT_FHIR_COUNT,
  FhirSearchInput,
  FhirSearchOutput,
  type FhirSearchParams,
  type FhirSearchResult,
} from "../../src/tools/clinical-schemas.ts";
import type { Logger } from "../../src/logging/logger.ts";
import { FhirClient, bundleEntries, bundleTotal } from "./fhir-client.ts";

export interface FhirSearchToolOptions {
  client: FhirClient;
  logger?: Logger;
}

/** Query string for a search request; `_count` is always present. */
export function searchQuery(params: FhirSearchParams): Record<string, string | number> {
  const query: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(params.search_params ?? {})) {
    if (value !== undefined) query[key] = value;
  }
  if (params.patient_id) {
    query[params.resource_type === "Patient" ? "_id" : "patient"] = params.patient_id;
  }
  query._count = params.search_params?._count ?? DEFAULT_FHIR_COUNT;
  return query;
}

export function createFhirSearchTool(opts: FhirSearchToolOptions) {
  const { client } = opts;
  return defineTool({
    name: "fhir_search",
    description: "Search and read clinical resources from the FHIR server",
    inputSchema: FhirSearchInput,
    outputSchema: FhirSearchOutput,
    logger: opts.logger,
    async invoke(params): Promise<FhirSearchResult> {
      const operation = params.operation ?? "search";

      if (operation === "read" && params.patient_id) {
        const { url, body } = await client.get(
          `${params.resource_type}/${encodeURIComponent(params.patient_id)}`,
        );
        return { resource_type: params.resource_type, total: 1, entries: [body], url };
      }

      if (operation === "$everything" && params.patient_id) {
        const { url, body } = await client.get(`Patient/${encodeURIComponent(params.patient_id)}/$everything`);
        const entries = bundleEntries(body);
        return { resource_type: "Bundle", total: bundleTotal(body, entries.length), entries, url };
      }

      // read / $everything without an id fall back to a search.
      const { url, body } = await client.get(params.resource_type, searchQuery(params));
      const entries = bundleEntries(body);
      return { resource_type: params.resource_type, total: bundleTotal(body, entries.length), entries, url };
    },
  });
}

// ── Plugin ────────────────────────────────────────────────────────

const fhirSearchPlugin: ToolPlugin = {
  id: "fhir-search",
  name: "FHIR Search",
  description: "FHIR R4 resource search and retrieval",
  version: "1.0.0",

  register(api: ToolPluginApi) {
    const { baseUrl, username, password } = api.config.fhir;
    if (!baseUrl) {
      api.logger.info("FHIR Search: no FHIR base URL configured, skipping registration");
      return;
    }

    const client = new FhirClient({ baseUrl, username, password, fetch: api.resources.fetch });
    api.registerTool(createFhirSearchTool({ client, logger: api.logger }));
    api.logger.info(`FHIR Search registered against ${client.baseUrl}`);
  },
};

export default fhirSearchPlugin;
