/**
 * In-memory medical knowledge base: ICD-10 codes, drug monographs, clinical
 * guidelines, care protocols and literature digests, loaded from a JSON file.
 */

import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { CliniqError, errorMessage } from "../../src/errors.ts";
import type { MedicalSearchParams, SearchType } from "../../src/tools/clinical-schemas.ts";

export const DEFAULT_KNOWLEDGE_FILE = fileURLToPath(new URL("../../data/medical-knowledge.json", import.meta.url));

const knowledgeEntrySchema = z.object({
  id: z.string(),
  category: z.enum(["icd10_code", "drug_monograph", "clinical_guideline", "protocol", "literature"]),
  code: z.string().optional(),
  title: z.string(),
  content: z.string(),
  source: z.string().optional(),
  tags: z.array(z.string()).default([]),
  lastUpdated: z.string(),
  evidenceLevel: z.enum(["systematic_review", "rct", "cohort", "case_control", "expert_opinion"]).optional(),
});

export type KnowledgeEntry = z.infer<typeof knowledgeEntrySchema>;
export type KnowledgeCategory = KnowledgeEntry["category"];

/** Categories searched per search type; `general` searches everything. */
export const SEARCH_CATEGORIES: Record<SearchType, readonly KnowledgeCategory[] | null> = {
  literature: ["literature"],
  guidelines: ["clinical_guideline"],
  protocols: ["protocol", "clinical_guideline"],
  drug_info: ["drug_monograph"],
  general: null,
};

const STOPWORDS = new Set([
  "the", "and", "for", "with", "what", "are", "about", "latest", "recent", "find", "show", "any", "how",
]);

export function searchTerms(query: string): string[] {
  const words = query
    .toLowerCase()
    .split(/[^a-z0-9.]+/)
    .map((w) => w.replace(/^\.+|\.+$/g, ""))
    .filter((w) => w.length >= 3 && !STOPWORDS.has(w));
  return words.length > 0 ? [...new Set(words)] : [query.trim().toLowerCase()];
}

function matchScore(entry: KnowledgeEntry, terms: string[]): number {
  const haystack = [entry.title, entry.content, entry.code ?? "", ...entry.tags].join(" ").toLowerCase();
  return terms.filter((term) => term && haystack.includes(term)).length;
}

export interface KnowledgeHit {
  id: string;
  category: KnowledgeCategory;
  code?: string;
  title: string;
  summary: string;
  source: string;
  evidence_level?: string;
  last_updated: string;
  relevance: number;
}

export class KnowledgeBase {
  constructor(readonly entries: readonly KnowledgeEntry[]) {}

  static async load(file: string = DEFAULT_KNOWLEDGE_FILE): Promise<KnowledgeBase> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(file, "utf8"));
    } catch (err) {
      throw new CliniqError("configuration", `Could not read knowledge base ${file}: ${errorMessage(err)}`, err);
    }
    const result = z.array(knowledgeEntrySchema).safeParse(parsed);
    if (!result.success) {
      const first = result.error.issues[0];
      throw new CliniqError(
        "configuration",
        `Invalid knowledge base ${file}: ${first ? `${first.path.join(".")}: ${first.message}` : "invalid"}`,
      );
    }
    return new KnowledgeBase(result.data);
  }

  search(params: MedicalSearchParams): KnowledgeHit[] {
    const categories = SEARCH_CATEGORIES[params.search_type ?? "general"];
    const terms = searchTerms(params.query);
    const filters = params.filters ?? {};
    const source = filters.source?.toLowerCase();
    const specialty = filters.specialty?.toLowerCase();

    const scored = this.entries
      .filter((e) => !categories || categories.includes(e.category))
      .filter((e) => !source || (e.source ?? "").toLowerCase().includes(source))
      .filter((e) => !specialty || e.tags.some((t) => t.toLowerCase() === specialty))
      .filter((e) => !filters.evidence_level || e.evidenceLevel === filters.evidence_level)
      .filter((e) => !filters.date_range?.start || e.lastUpdated >= filters.date_range.start)
      .filter((e) => !filters.date_range?.end || e.lastUpdated <= filters.date_range.end)
      .map((entry) => ({ entry, score: matchScore(entry, terms) }))
      .filter(({ score }) => score > 0);

    // Array.prototype.sort is stable: ties keep file order.
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, params.max_results ?? 10).map(({ entry, score }) => ({
      id: entry.id,
      category: entry.category,
      code: entry.code,
      title: entry.title,
      summary: entry.content,
      source: entry.source ?? "Cliniq knowledge base",
      evidence_level: entry.evidenceLevel,
      last_updated: entry.lastUpdated,
      relevance: Number((score / terms.length).toFixed(2)),
    }));
  }
}
