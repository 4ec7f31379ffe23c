/**
 * Cliniq - Warehouse Query Builder
 *
 * Turns validated analytics / longitudinal requests into PostgreSQL text.
 * Physical names come only from the schema profile: every query first
 * projects the mapped table into a CTE whose columns carry the logical names,
 * and the analytical SQL is written against those. Values derived from the
 * request are bound parameters. Nothing here touches the network.
 */

import { sql, type SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { QueryBuildError } from "../errors.ts";
import type { WarehouseQuery } from "./connection.ts";
import type { SchemaProfile } from "./schema-profile.ts";

export const ANALYSIS_TYPES = ["prevalence", "trends", "demographics", "comorbidities", "custom"] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const TIMEFRAMES = ["all_time", "last_year", "last_month", "last_week"] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const PATIENT_SECTIONS = [
  "demographics",
  "conditions",
  "medications",
  "observations",
  "encounters",
  "procedures",
] as const;
export type PatientSection = (typeof PATIENT_SECTIONS)[number];

export const GENDERS = ["male", "female", "other"] as const;

export interface PopulationFilters {
  age_min?: number;
  age_max?: number;
  gender?: (typeof GENDERS)[number];
  facility_id?: string;
}

export interface PopulationQueryRequest {
  analysis_type: AnalysisType;
  condition?: string;
  timeframe?: string;
  filters?: PopulationFilters;
  custom_sql?: string;
}

export interface DateRange {
  start?: string;
  end?: string;
}

const dialect = new PgDialect();

const TIMEFRAME_INTERVALS: Record<Timeframe, string | undefined> = {
  all_time: undefined,
  last_year: "1 year",
  last_month: "1 month",
  last_week: "1 week",
};

export function isTimeframe(value: string): value is Timeframe {
  return (TIMEFRAMES as readonly string[]).includes(value);
}

export function render(query: SQL): WarehouseQuery {
  const { sql: text, params } = dialect.sqlToQuery(query);
  return { sql: text, params };
}

/** Feature a population analysis depends on; `custom` bypasses the profile. */
export function analysisFeature(type: AnalysisType): string | undefined {
  return type === "custom" ? undefined : `population.${type}`;
}

export function sectionFeature(section: PatientSection): string {
  return `longitudinal.${section}`;
}

// ── Building blocks ───────────────────────────────────────────────

/** `SELECT <expr> AS <logical>, ... FROM <table> [WHERE ...]` for one logical view. */
export function projectView(profile: SchemaProfile, view: string, columns: string[], where?: SQL): SQL {
  const table = profile.resolveTable(view);
  const select = sql.join(
    columns.map((column) => sql.raw(`${profile.resolveColumn(view, column)} AS ${column}`)),
    sql.raw(", "),
  );
  const base = sql`SELECT ${select} FROM ${sql.raw(table)}`;
  return where ? sql`${base} WHERE ${where}` : base;
}

function whereAll(conditions: SQL[]): SQL {
  return conditions.length ? sql` WHERE ${sql.join(conditions, sql.raw(" AND "))}` : sql.empty();
}

function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, "\\$&")}%`;
}

/**
 * Relative-date clause for `column`, or undefined for `all_time`.
 * An unknown timeframe is a caller error, never a silent `all_time`.
 */
export function timeframeClause(column: string, timeframe: string): SQL | undefined {
  if (!isTimeframe(timeframe)) {
    throw new QueryBuildError(`Unknown timeframe "${timeframe}"; expected one of ${TIMEFRAMES.join(", ")}`);
  }
  const interval = TIMEFRAME_INTERVALS[timeframe];
  return interval ? sql.raw(`${column} >= CURRENT_DATE - INTERVAL '${interval}'`) : undefined;
}

function conditionView(profile: SchemaProfile, columns: string[], filters?: PopulationFilters): SQL {
  const facility = filters?.facility_id
    ? sql`${sql.raw(profile.resolveColumn("condition", "facility_id"))} = ${filters.facility_id}`
    : undefined;
  return projectView(profile, "condition", columns, facility);
}

// ── Population analytics ──────────────────────────────────────────

export function buildPopulationQuery(profile: SchemaProfile, request: PopulationQueryRequest): WarehouseQuery {
  const timeframe = request.timeframe ?? "all_time";
  // Validated for every type, applied where a time axis exists.
  const timeFilter = timeframeClause("onset_date", timeframe);

  switch (request.analysis_type) {
    case "custom": {
      const text = request.custom_sql?.trim();
      if (!text) throw new QueryBuildError("analysis_type 'custom' requires custom_sql");
      return { sql: text, params: [] };
    }
    case "prevalence":
      return render(prevalenceQuery(profile, request));
    case "trends":
      return render(trendsQuery(profile, request, timeFilter));
    case "demographics":
      return render(demographicsQuery(profile, request));
    case "comorbidities":
      return render(comorbiditiesQuery(profile, request));
    default:
      throw new QueryBuildError(`Unknown analysis_type "${String(request.analysis_type)}"`);
  }
}

function prevalenceQuery(profile: SchemaProfile, request: PopulationQueryRequest): SQL {
  const cte = conditionView(profile, ["patient_id", "code", "display"], request.filters);
  const conditions = request.condition ? [sql`display ILIKE ${likePattern(request.condition)}`] : [];
  return sql`WITH condition_v AS (${cte}) SELECT code, display, COUNT(DISTINCT patient_id) AS patient_count, COUNT(*) AS condition_instances FROM condition_v${whereAll(conditions)} GROUP BY code, display ORDER BY patient_count DESC LIMIT 20`;
}

function trendsQuery(profile: SchemaProfile, request: PopulationQueryRequest, timeFilter: SQL | undefined): SQL {
  const cte = conditionView(profile, ["patient_id", "display", "onset_date"], request.filters);
  const conditions: SQL[] = [];
  if (request.condition) conditions.push(sql`display ILIKE ${likePattern(request.condition)}`);
  if (timeFilter) conditions.push(timeFilter);
  return sql`WITH condition_v AS (${cte}) SELECT DATE_TRUNC('month', onset_date) AS month, COUNT(DISTINCT patient_id) AS patient_count, COUNT(*) AS total_cases FROM condition_v${whereAll(conditions)} GROUP BY month ORDER BY month DESC LIMIT 12`;
}

const AGE_EXPRESSION = "DATE_PART('year', AGE(CURRENT_DATE, CAST(p.birth_date AS DATE)))";

function demographicsQuery(profile: SchemaProfile, request: PopulationQueryRequest): SQL {
  const conditionCte = conditionView(profile, ["patient_id", "display"], request.filters);
  const patientCte = projectView(profile, "patient", ["id", "gender", "birth_date"]);
  const cohortFilter = request.condition ? [sql`display ILIKE ${likePattern(request.condition)}`] : [];

  const people: SQL[] = [];
  const filters = request.filters ?? {};
  if (filters.gender) people.push(sql`p.gender = ${filters.gender}`);
  if (filters.age_min !== undefined) people.push(sql`${sql.raw(AGE_EXPRESSION)} >= ${filters.age_min}`);
  if (filters.age_max !== undefined) people.push(sql`${sql.raw(AGE_EXPRESSION)} <= ${filters.age_max}`);

  return sql`WITH condition_v AS (${conditionCte}), patient_v AS (${patientCte}), cohort AS (SELECT DISTINCT patient_id FROM condition_v${whereAll(cohortFilter)}) SELECT p.gender, ${sql.raw(AGE_EXPRESSION)} AS age, COUNT(*) AS patient_count FROM cohort JOIN patient_v p ON cohort.patient_id = p.id${whereAll(people)} GROUP BY p.gender, age ORDER BY patient_count DESC`;
}

function comorbiditiesQuery(profile: SchemaProfile, request: PopulationQueryRequest): SQL {
  if (!request.condition) throw new QueryBuildError("analysis_type 'comorbidities' requires a condition");
  const cte = conditionView(profile, ["patient_id", "code", "display"], request.filters);
  const pattern = likePattern(request.condition);
  return sql`WITH condition_v AS (${cte}), target_patients AS (SELECT DISTINCT patient_id FROM condition_v WHERE display ILIKE ${pattern}) SELECT code, display, COUNT(DISTINCT patient_id) AS patient_count FROM condition_v WHERE patient_id IN (SELECT patient_id FROM target_patients) AND display NOT ILIKE ${pattern} GROUP BY code, display ORDER BY patient_count DESC LIMIT 10`;
}

// ── Longitudinal sections ─────────────────────────────────────────

interface SectionSpec {
  view: string;
  columns: string[];
  patientColumn: string;
  dateColumn?: string;
  limit?: number;
}

export const SECTION_SPECS: Record<PatientSection, SectionSpec> = {
  demographics: {
    view: "patient",
    columns: ["id", "gender", "birth_date", "deceased", "city", "state"],
    patientColumn: "id",
  },
  conditions: {
    view: "condition",
    columns: ["patient_id", "code", "display", "clinical_status", "onset_date", "abatement_date"],
    patientColumn: "patient_id",
    dateColumn: "onset_date",
  },
  medications: {
    view: "medication_request",
    columns: ["patient_id", "medication", "dosage", "status", "authored_on"],
    patientColumn: "patient_id",
    dateColumn: "authored_on",
  },
  observations: {
    view: "observation",
    columns: ["patient_id", "code", "value", "unit", "effective_date"],
    patientColumn: "patient_id",
    dateColumn: "effective_date",
    limit: 100,
  },
  encounters: {
    view: "encounter",
    columns: ["patient_id", "type", "period_start", "period_end", "reason"],
    patientColumn: "patient_id",
    dateColumn: "period_start",
    limit: 50,
  },
  procedures: {
    view: "procedure",
    columns: ["patient_id", "code", "performed_date", "outcome"],
    patientColumn: "patient_id",
    dateColumn: "performed_date",
  },
};

export function buildSectionQuery(
  profile: SchemaProfile,
  section: PatientSection,
  patientId: string,
  dateRange?: DateRange,
): WarehouseQuery {
  const spec = SECTION_SPECS[section];
  const cte = projectView(profile, spec.view, spec.columns);

  const conditions: SQL[] = [sql`${sql.raw(spec.patientColumn)} = ${patientId}`];
  if (spec.dateColumn && dateRange?.start) conditions.push(sql`${sql.raw(spec.dateColumn)} >= ${dateRange.start}`);
  if (spec.dateColumn && dateRange?.end) conditions.push(sql`${sql.raw(spec.dateColumn)} <= ${dateRange.end}`);

  const order = spec.dateColumn ? sql.raw(` ORDER BY ${spec.dateColumn} DESC`) : sql.empty();
  const limit = spec.limit ? sql.raw(` LIMIT ${spec.limit}`) : sql.empty();

  return render(sql`WITH ${sql.raw(spec.view)}_v AS (${cte}) SELECT * FROM ${sql.raw(spec.view)}_v${whereAll(conditions)}${order}${limit}`);
}
