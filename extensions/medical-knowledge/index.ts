/**
 * Cliniq - Medical Knowledge Extension
 *
 * Provides `medical_search` over the bundled knowledge base: ICD-10 codes,
 * drug monographs, clinical guidelines, care protocols and literature digests.
 */

import type { ToolPlugin, ToolPluginApi } from "../../src/tools/plugin-host.ts";
import { defineTool } from "../../src/tools/tool-contract.ts";
import { MedicalSearchInput } from "../../src/tools/clinical-schemas.ts";
import type { Logger } from "../../src/logging/logger.ts";
import { KnowledgeBase, type KnowledgeHit } from "./knowledge-base.ts";

export interface MedicalSearchResult {
  query: string;
  search_type: string;
  results: KnowledgeHit[];
  total_found: number;
  message: string;
}

export function createMedicalSearchTool(opts: { knowledge: KnowledgeBase; logger?: Logger }) {
  return defineTool({
    name: "medical_search",
    description: "Search medical literature, guidelines, protocols and drug information",
    inputSchema: MedicalSearchInput,
    logger: opts.logger,
    async invoke(params): Promise<MedicalSearchResult> {
      const searchType = params.search_type ?? "general";
      const results = opts.knowledge.search(params);
      return {
        query: params.query,
        search_type: searchType,
        results,
        total_found: results.length,
        message:
          results.length > 0
            ? `Found ${results.length} ${searchType} resources for "${params.query}"`
            : `No ${searchType} resources found for "${params.query}". Try broader search terms.`,
      };
    },
  });
}

// ── Plugin ────────────────────────────────────────────────────────

const medicalKnowledgePlugin: ToolPlugin = {
  id: "medical-knowledge",
  name: "Medical Knowledge Base",
  description: "ICD-10 lookup, drug monographs, guideline, protocol and literature search",
  version: "1.0.0",

  async register(api: ToolPluginApi) {
    const knowledge = await KnowledgeBase.load();
    api.registerTool(createMedicalSearchTool({ knowledge, logger: api.logger }));
    api.logger.info(`Medical Knowledge registered (${knowledge.entries.length} entries)`);
  },
};

export default medicalKnowledgePlugin;
