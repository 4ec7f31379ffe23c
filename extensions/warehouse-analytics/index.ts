/**
 * Cliniq - Warehouse Analytics Extension
 *
 * Provides:
 *   - Population analytics (prevalence, trends, demographics, comorbidities, custom SQL)
 *   - Patient longitudinal record retrieval (per-section, partial-failure tolerant)
 *   - Capability introspection of the connected warehouse
 *
 * All physical names are resolved through the configured schema profile.
 */

import type { ToolPlugin, ToolPluginApi } from "../../src/tools/plugin-host.ts";
import { defineTool, type ClinicalTool } from "../../src/tools/tool-contract.ts";
import {
  PatientLongitudinalInput,
  PopulationAnalyticsInput,
  PopulationAnalyticsOutput,
  WarehouseCapabilitiesInput,
  type PopulationAnalyticsParams,
  type PopulationAnalyticsResult,
} from "../../src/tools/clinical-schemas.ts";
import { FeatureUnsupportedError, errorMessage } from "../../src/errors.ts";
import { silentLogger, type Logger } from "../../src/logging/logger.ts";
import type { WarehouseConnection, WarehouseRow } from "../../src/warehouse/connection.ts";
import { SchemaProfile, type ProfileDescription } from "../../src/warehouse/schema-profile.ts";
import {
  PATIENT_SECTIONS,
  SECTION_SPECS,
  analysisFeature,
  buildPopulationQuery,
  buildSectionQuery,
  sectionFeature,
  type PatientSection,
} from "../../src/warehouse/query-builder.ts";
import { formatRecord, type RecordFormat, type SectionRecord } from "../../src/warehouse/record-format.ts";

export const FACILITY_FILTER_FEATURE = "population.facility_filter";

export interface WarehouseToolOptions {
  profile: SchemaProfile;
  warehouse: WarehouseConnection;
  logger?: Logger;
}

export interface LongitudinalResult {
  patient_id: string;
  format: RecordFormat;
  record: unknown;
  sections_included: PatientSection[];
  sections_failed: PatientSection[];
  record_count: number;
}

function count(value: unknown): number {
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : 0;
}

export function summarizePopulation(params: PopulationAnalyticsParams, rows: WarehouseRow[]): string {
  const condition = params.condition ?? "specified condition";
  if (rows.length === 0) return `No data found for ${condition}`;

  switch (params.analysis_type) {
    case "prevalence": {
      const total = rows.reduce((sum, r) => sum + count(r.patient_count), 0);
      return `Found ${total} patients with ${condition} across ${rows.length} condition codes`;
    }
    case "trends":
      return `Retrieved ${rows.length} months of trend data for ${condition}`;
    case "demographics":
      return `Demographic breakdown for ${condition} across ${rows.length} groups`;
    case "comorbidities":
      return `Found ${rows.length} co-occurring conditions among patients with ${condition}`;
    default:
      return `Analysis completed with ${rows.length} results`;
  }
}

/**
 * Sections whose view the profile maps, minus those introspection found
 * unsupported; the default when none are requested.
 */
export function mappedSections(profile: SchemaProfile): PatientSection[] {
  const computed = profile.hasComputedCapabilities();
  return PATIENT_SECTIONS.filter(
    (section) =>
      profile.hasView(SECTION_SPECS[section].view) && (!computed || profile.isSupported(sectionFeature(section))),
  );
}

/** Profile features a population request depends on. */
export function populationFeatures(params: PopulationAnalyticsParams): string[] {
  const features: string[] = [];
  const analysis = analysisFeature(params.analysis_type);
  if (analysis) features.push(analysis);
  if (params.filters?.facility_id) features.push(FACILITY_FILTER_FEATURE);
  return features;
}

// ── Tools ─────────────────────────────────────────────────────────

export function createPopulationAnalyticsTool(opts: WarehouseToolOptions) {
  const { profile, warehouse } = opts;
  return defineTool({
    name: "warehouse_population_analytics",
    description: "Query population-level health statistics from the analytics warehouse",
    inputSchema: PopulationAnalyticsInput,
    outputSchema: PopulationAnalyticsOutput,
    logger: opts.logger,
    async invoke(params): Promise<PopulationAnalyticsResult> {
      // Capabilities gate only once they have been introspected.
      if (profile.hasComputedCapabilities()) {
        for (const feature of populationFeatures(params)) {
          if (!profile.isSupported(feature)) throw new FeatureUnsupportedError(feature, profile.name);
        }
      }

      const query = buildPopulationQuery(profile, params);
      const rows = await warehouse.execute(query);
      return {
        results: rows,
        summary: summarizePopulation(params, rows),
        row_count: rows.length,
        query_executed: query.sql,
      };
    },
    cleanup: () => warehouse.close(),
  });
}

export function createPatientLongitudinalTool(opts: WarehouseToolOptions) {
  const { profile, warehouse } = opts;
  const logger = opts.logger ?? silentLogger;
  return defineTool({
    name: "warehouse_patient_longitudinal",
    description: "Retrieve a comprehensive longitudinal health record for a patient",
    inputSchema: PatientLongitudinalInput,
    logger,
    async invoke(params): Promise<LongitudinalResult> {
      const format = params.format ?? "summary";
      const requested = params.sections?.length ? [...new Set(params.sections)] : mappedSections(profile);

      // Build every query first: an unmapped view/column is a configuration error, not a partial result.
      const queries = requested.map((section) => ({
        section,
        query: buildSectionQuery(profile, section, params.patient_id, params.date_range),
      }));

      const record: SectionRecord = {};
      const failed: PatientSection[] = [];
      for (const { section, query } of queries) {
        try {
          record[section] = await warehouse.execute(query);
        } catch (err) {
          logger.error(`Failed to fetch ${section} for patient ${params.patient_id}: ${errorMessage(err)}`);
          record[section] = [];
          failed.push(section);
        }
      }

      return {
        patient_id: params.patient_id,
        format,
        record: formatRecord(record, format),
        sections_included: requested,
        sections_failed: failed,
        record_count: Object.values(record).reduce((sum, rows) => sum + (rows?.length ?? 0), 0),
      };
    },
    cleanup: () => warehouse.close(),
  });
}

export function createWarehouseCapabilitiesTool(opts: WarehouseToolOptions) {
  const { profile, warehouse } = opts;
  return defineTool({
    name: "warehouse_capabilities",
    description: "Report the active schema profile, its views, and which analytical features the warehouse supports",
    inputSchema: WarehouseCapabilitiesInput,
    logger: opts.logger,
    async invoke(params): Promise<ProfileDescription> {
      if (params.refresh) await profile.computeCapabilities(warehouse);
      return profile.describe();
    },
  });
}

export function createWarehouseTools(opts: WarehouseToolOptions): ClinicalTool[] {
  return [
    createPopulationAnalyticsTool(opts),
    createPatientLongitudinalTool(opts),
    createWarehouseCapabilitiesTool(opts),
  ];
}

// ── Plugin ────────────────────────────────────────────────────────

const warehouseAnalyticsPlugin: ToolPlugin = {
  id: "warehouse-analytics",
  name: "Warehouse Analytics",
  description: "Population analytics and longitudinal records over a profile-mapped analytics warehouse",
  version: "1.0.0",

  async register(api: ToolPluginApi) {
    const warehouse = api.resources.warehouse;
    if (!warehouse) {
      api.logger.info("Warehouse Analytics: no warehouse configured, skipping registration");
      return;
    }

    const { profile: name, profileDir, introspectOnStartup } = api.config.warehouse;
    const profile = await SchemaProfile.load({ name, directory: profileDir, logger: api.logger });
    if (introspectOnStartup) await profile.computeCapabilities(warehouse);

    for (const tool of createWarehouseTools({ profile, warehouse, logger: api.logger })) {
      api.registerTool(tool);
    }
    api.logger.info(`Warehouse Analytics registered with profile ${name}`);
  },
};

export default warehouseAnalyticsPlugin;
