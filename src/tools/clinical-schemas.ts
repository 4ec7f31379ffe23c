/**
 * Cliniq - Tool Input/Output Schemas
 *
 * TypeBox schemas shared by the concrete tools (validation in `safeInvoke`)
 * and the parameter normalizer (required fields and enumerations). The value
 * lists next to each union are what the normalizer constrains against.
 */

import { Type, type Static } from "@sinclair/typebox";

export {
  ANALYSIS_TYPES,
  GENDERS,
  PATIENT_SECTIONS,
  TIMEFRAMES,
} from "../warehouse/query-builder.ts";
export { RECORD_FORMATS } from "../warehouse/record-format.ts";

export const RESOURCE_TYPES = [
  "Patient",
  "Observation",
  "Condition",
  "MedicationRequest",
  "Encounter",
  "Procedure",
  "DiagnosticReport",
  "AllergyIntolerance",
] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const FHIR_OPERATIONS = ["search", "read", "$everything"] as const;
export const DEFAULT_FHIR_COUNT = 10;

export const SEARCH_TYPES = ["literature", "guidelines", "protocols", "drug_info", "general"] as const;
export type SearchType = (typeof SEARCH_TYPES)[number];

export const EVIDENCE_LEVELS = ["systematic_review", "rct", "cohort", "case_control", "expert_opinion"] as const;

export const APPOINTMENT_ACTIONS = ["review", "schedule"] as const;
export const APPOINTMENT_STATUSES = ["scheduled", "checked_in", "completed", "cancelled", "missed"] as const;

export const DATE_PATTERN = "^\\d{4}-\\d{2}-\\d{2}$";
export const TIME_PATTERN = "^([01]?[0-9]|2[0-3]):[0-5][0-9]$";

const IsoDate = (description?: string) => Type.String({ pattern: DATE_PATTERN, description });

// ── Population analytics ──────────────────────────────────────────

export const PopulationAnalyticsInput = Type.Object({
  analysis_type: Type.Union(
    [
      Type.Literal("prevalence"),
      Type.Literal("trends"),
      Type.Literal("demographics"),
      Type.Literal("comorbidities"),
      Type.Literal("custom"),
    ],
    { description: "Type of population analysis" },
  ),
  condition: Type.Optional(Type.String({ description: "Condition name or ICD code to analyze" })),
  timeframe: Type.Optional(
    Type.Union(
      [Type.Literal("all_time"), Type.Literal("last_year"), Type.Literal("last_month"), Type.Literal("last_week")],
      { default: "all_time" },
    ),
  ),
  filters: Type.Optional(
    Type.Object({
      age_min: Type.Optional(Type.Integer({ minimum: 0 })),
      age_max: Type.Optional(Type.Integer({ minimum: 0 })),
      gender: Type.Optional(Type.Union([Type.Literal("male"), Type.Literal("female"), Type.Literal("other")])),
      facility_id: Type.Optional(Type.String()),
    }),
  ),
  custom_sql: Type.Optional(Type.String({ description: "Custom SQL query (only for analysis_type='custom')" })),
});
export type PopulationAnalyticsParams = Static<typeof PopulationAnalyticsInput>;

export const PopulationAnalyticsOutput = Type.Object({
  results: Type.Array(Type.Record(Type.String(), Type.Unknown())),
  summary: Type.String(),
  row_count: Type.Integer(),
  query_executed: Type.String(),
});
export type PopulationAnalyticsResult = Static<typeof PopulationAnalyticsOutput>;

// ── Patient longitudinal record ───────────────────────────────────

const PatientSectionSchema = Type.Union([
  Type.Literal("demographics"),
  Type.Literal("conditions"),
  Type.Literal("medications"),
  Type.Literal("observations"),
  Type.Literal("encounters"),
  Type.Literal("procedures"),
]);

export const PatientLongitudinalInput = Type.Object({
  patient_id: Type.String({ minLength: 1, description: "Patient identifier" }),
  format: Type.Optional(
    Type.Union([Type.Literal("ips"), Type.Literal("timeline"), Type.Literal("summary"), Type.Literal("full")], {
      default: "summary",
      description: "Output format for the health record",
    }),
  ),
  sections: Type.Optional(
    Type.Array(PatientSectionSchema, { description: "Sections to include (empty or absent: all mapped sections)" }),
  ),
  date_range: Type.Optional(
    Type.Object({
      start: Type.Optional(IsoDate()),
      end: Type.Optional(IsoDate()),
    }),
  ),
});
export type PatientLongitudinalParams = Static<typeof PatientLongitudinalInput>;

export const WarehouseCapabilitiesInput = Type.Object({
  refresh: Type.Optional(Type.Boolean({ description: "Re-introspect the warehouse before answering" })),
});

// ── FHIR search ───────────────────────────────────────────────────

export const FhirSearchInput = Type.Object({
  resource_type: Type.Union(
    [
      Type.Literal("Patient"),
      Type.Literal("Observation"),
      Type.Literal("Condition"),
      Type.Literal("MedicationRequest"),
      Type.Literal("Encounter"),
      Type.Literal("Procedure"),
      Type.Literal("DiagnosticReport"),
      Type.Literal("AllergyIntolerance"),
    ],
    { description: "FHIR resource type to search" },
  ),
  patient_id: Type.Optional(Type.String({ description: "Patient ID to filter results" })),
  search_params: Type.Optional(
    Type.Object(
      {
        code: Type.Optional(Type.String()),
        date: Type.Optional(Type.String()),
        _count: Type.Optional(Type.Integer({ minimum: 1 })),
        _sort: Type.Optional(Type.String()),
        status: Type.Optional(Type.String()),
        category: Type.Optional(Type.String()),
      },
      { description: "Additional FHIR search parameters" },
    ),
  ),
  operation: Type.Optional(
    Type.Union([Type.Literal("search"), Type.Literal("read"), Type.Literal("$everything")], { default: "search" }),
  ),
});
export type FhirSearchParams = Static<typeof FhirSearchInput>;

export const FhirSearchOutput = Type.Object({
  resource_type: Type.String(),
  total: Type.Integer(),
  entries: Type.Array(Type.Unknown()),
  url: Type.String(),
});
export type FhirSearchResult = Static<typeof FhirSearchOutput>;

// ── Medical literature search ─────────────────────────────────────

export const MedicalSearchInput = Type.Object({
  query: Type.String({ minLength: 1, description: "Search query for medical literature" }),
  search_type: Type.Optional(
    Type.Union(
      [
        Type.Literal("literature"),
        Type.Literal("guidelines"),
        Type.Literal("protocols"),
        Type.Literal("drug_info"),
        Type.Literal("general"),
      ],
      { default: "general" },
    ),
  ),
  filters: Type.Optional(
    Type.Object({
      date_range: Type.Optional(Type.Object({ start: Type.Optional(IsoDate()), end: Type.Optional(IsoDate()) })),
      source: Type.Optional(Type.String({ description: "Preferred source (e.g. PubMed, ADA)" })),
      specialty: Type.Optional(Type.String()),
      evidence_level: Type.Optional(
        Type.Union([
          Type.Literal("systematic_review"),
          Type.Literal("rct"),
          Type.Literal("cohort"),
          Type.Literal("case_control"),
          Type.Literal("expert_opinion"),
        ]),
      ),
    }),
  ),
  max_results: Type.Optional(Type.Integer({ minimum: 1, maximum: 50, default: 10 })),
});
export type MedicalSearchParams = Static<typeof MedicalSearchInput>;

// ── Appointments ──────────────────────────────────────────────────

export const AppointmentInput = Type.Object({
  action: Type.Union([Type.Literal("review"), Type.Literal("schedule")]),
  patient_id: Type.Optional(Type.String({ description: "Patient UUID for filtering or scheduling" })),
  appointment_details: Type.Optional(
    Type.Object({
      date: IsoDate("Appointment date (YYYY-MM-DD)"),
      time: Type.String({ pattern: TIME_PATTERN, description: "Appointment time (HH:MM)" }),
      duration_minutes: Type.Optional(Type.Integer({ minimum: 5, default: 30 })),
      provider_uuid: Type.Optional(Type.String()),
      service: Type.Optional(Type.String()),
      location_uuid: Type.Optional(Type.String()),
      reason: Type.Optional(Type.String()),
    }),
  ),
  filters: Type.Optional(
    Type.Object({
      start_date: Type.Optional(IsoDate()),
      end_date: Type.Optional(IsoDate()),
      provider_uuid: Type.Optional(Type.String()),
      status: Type.Optional(
        Type.Union([
          Type.Literal("scheduled"),
          Type.Literal("checked_in"),
          Type.Literal("completed"),
          Type.Literal("cancelled"),
          Type.Literal("missed"),
        ]),
      ),
    }),
  ),
});
export type AppointmentParams = Static<typeof AppointmentInput>;
