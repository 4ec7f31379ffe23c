/**
 * Cliniq - Parameter Normalizer
 *
 * Turns whatever the model extracted for a skill into parameters the target
 * tool's input schema accepts. Each skill has a rule that keeps valid values,
 * repairs or drops invalid ones and derives missing ones from the query text.
 * A final guard then keeps only declared keys and fills every required field.
 *
 * Only structural validity is guaranteed. A wrong but valid guess is preferred
 * over blocking the request.
 */

import type { TObject, TSchema } from "@sinclair/typebox";
import { errorMessage } from "../errors.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import { isRecord, nonEmptyString, type JsonObject } from "../shared/json.ts";
import {
  ANALYSIS_TYPES,
  APPOINTMENT_STATUSES,
  DEFAULT_FHIR_COUNT,
  EVIDENCE_LEVELS,
  FHIR_OPERATIONS,
  GENDERS,
  PATIENT_SECTIONS,
  RECORD_FORMATS,
  RESOURCE_TYPES,
  SEARCH_TYPES,
  TIMEFRAMES,
  type SearchType,
} from "../tools/clinical-schemas.ts";
import type { PatientSection, Timeframe } from "../warehouse/query-builder.ts";

export const DEFAULT_MAX_RESULTS = 10;
export const DEFAULT_APPOINTMENT_TIME = "10:00";
export const DEFAULT_DURATION_MINUTES = 30;
export const UNKNOWN_PATIENT = "unknown";

export interface NormalizeRequest {
  skill: string;
  extracted: JsonObject;
  queryText: string;
}

interface RuleContext {
  extracted: JsonObject;
  text: string;
  now: Date;
}

interface RuleOutput {
  params: JsonObject;
  /** Safe values for required fields the rule could not produce. */
  defaults: JsonObject;
}

type SkillRule = (ctx: RuleContext) => RuleOutput;

// ── Value helpers ─────────────────────────────────────────────────

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const HH_MM = /^([01]?[0-9]|2[0-3]):[0-5][0-9]$/;

/** Case-insensitive membership test returning the canonical spelling. */
export function oneOf<T extends string>(values: readonly T[], value: unknown): T | undefined {
  if (typeof value !== "string") return undefined;
  const wanted = value.trim().toLowerCase();
  return values.find((v) => v.toLowerCase() === wanted);
}

function text(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return nonEmptyString(value);
}

function integer(value: unknown): number | undefined {
  const n = typeof value === "string" && value.trim() ? Number(value) : value;
  return typeof n === "number" && Number.isInteger(n) ? n : undefined;
}

/** `YYYY-MM-DD` naming a day that exists on the calendar. */
function isoDate(value: unknown): string | undefined {
  if (typeof value !== "string" || !ISO_DATE.test(value.trim())) return undefined;
  const date = value.trim();
  const [year, month, day] = date.split("-").map(Number);
  const parsed = new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1));
  return parsed.toISOString().slice(0, 10) === date ? date : undefined;
}

function compact(obj: JsonObject): JsonObject | undefined {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(obj)) if (value !== undefined) out[key] = value;
  return Object.keys(out).length > 0 ? out : undefined;
}

function dateRange(value: unknown): JsonObject | undefined {
  if (!isRecord(value)) return undefined;
  return compact({ start: isoDate(value.start), end: isoDate(value.end) });
}

function addDays(now: Date, days: number): string {
  return new Date(now.getTime() + days * 86_400_000).toISOString().slice(0, 10);
}

// ── Query text cues ───────────────────────────────────────────────

const TREND_CUE = /\b(trend|recent|increasing|rising|common now)/i;

/** Checked in order; the first matching cue decides the timeframe. */
const TIMEFRAME_CUES: ReadonlyArray<[RegExp, Timeframe]> = [
  [/\b(this|last|past) week\b|\bweekly\b|\b7 days\b/i, "last_week"],
  [/\b(this|last|past) year\b|\b12 months\b|\bannual(ly)?\b/i, "last_year"],
  [/\b(ever|historical(ly)?|all[- ]time|overall)\b/i, "all_time"],
  [/\b(recent(ly)?|now|currently|lately|these days|(this|last|past) month)\b/i, "last_month"],
];

export function timeframeFromText(query: string): Timeframe {
  return TIMEFRAME_CUES.find(([cue]) => cue.test(query))?.[1] ?? "all_time";
}

const CONDITION_VOCABULARY: ReadonlyArray<[RegExp, string]> = [
  [/\b(influenza|flu)\b/i, "influenza"],
  [/\bdiabet(es|ic)\b/i, "diabetes"],
  [/\b(hypertension|high blood pressure)\b/i, "hypertension"],
  [/\basthma\b/i, "asthma"],
  [/\b(copd|chronic obstructive)/i, "copd"],
  [/\b(covid(-19)?|coronavirus)\b/i, "covid-19"],
  [/\bpneumonia\b/i, "pneumonia"],
  [/\bdepress(ion|ive)\b/i, "depression"],
  [/\banxiety\b/i, "anxiety"],
  [/\bobes(e|ity)\b/i, "obesity"],
  [/\b(heart failure|chf)\b/i, "heart failure"],
  [/\bcoronary( artery disease)?\b/i, "coronary artery disease"],
  [/\b(ckd|chronic kidney disease)\b/i, "chronic kidney disease"],
  [/\bstroke\b/i, "stroke"],
  [/\bsepsis\b/i, "sepsis"],
  [/\b(hyperlipidemia|high cholesterol)\b/i, "hyperlipidemia"],
  [/\barthritis\b/i, "arthritis"],
  [/\bdementia\b/i, "dementia"],
  [/\bcancer\b/i, "cancer"],
];

/** The vocabulary condition mentioned earliest in the text. */
export function conditionFromText(query: string): string | undefined {
  let best: { index: number; name: string } | undefined;
  for (const [pattern, name] of CONDITION_VOCABULARY) {
    const match = pattern.exec(query);
    if (match && (!best || match.index < best.index)) best = { index: match.index, name };
  }
  return best?.name;
}

const PATIENT_ID = /\bpatient\b\s*(?:id\b\s*)?[:#]?\s*([A-Za-z0-9][A-Za-z0-9._-]*)/gi;
const NOT_AN_ID = new Set([
  "a", "an", "the", "with", "who", "whose", "that", "and", "or", "for", "in", "of", "is", "has", "had",
  "record", "records", "history", "data", "info", "information", "summary", "details", "id",
]);

/** Identifier token following the word "patient", if any. */
export function patientIdFromText(query: string): string | undefined {
  for (const match of query.matchAll(PATIENT_ID)) {
    const token = (match[1] ?? "").replace(/[._-]+$/, "");
    if (token && !NOT_AN_ID.has(token.toLowerCase())) return token;
  }
  return undefined;
}

function patientId(ctx: RuleContext): string | undefined {
  return text(ctx.extracted.patient_id) ?? patientIdFromText(ctx.text);
}

// ── Population analytics ──────────────────────────────────────────

function populationFilters(value: unknown): JsonObject | undefined {
  if (!isRecord(value)) return undefined;
  const ageMin = integer(value.age_min);
  const ageMax = integer(value.age_max);
  return compact({
    age_min: ageMin !== undefined && ageMin >= 0 ? ageMin : undefined,
    age_max: ageMax !== undefined && ageMax >= 0 ? ageMax : undefined,
    gender: oneOf(GENDERS, value.gender),
    facility_id: text(value.facility_id),
  });
}

const populationAnalytics: SkillRule = ({ extracted, text: query }) => {
  const customSql = nonEmptyString(extracted.custom_sql);
  const requested = oneOf(ANALYSIS_TYPES, extracted.analysis_type);
  let analysisType: string;
  if (requested && (requested !== "custom" || customSql)) analysisType = requested;
  else if (extracted.analysis_type !== undefined) analysisType = "prevalence";
  else analysisType = TREND_CUE.test(query) ? "trends" : "prevalence";

  const timeframe =
    extracted.timeframe === undefined
      ? timeframeFromText(query)
      : (oneOf(TIMEFRAMES, extracted.timeframe) ?? "all_time");

  return {
    params: {
      analysis_type: analysisType,
      condition: nonEmptyString(extracted.condition) ?? conditionFromText(query),
      timeframe,
      filters: populationFilters(extracted.filters),
      custom_sql: analysisType === "custom" ? customSql : undefined,
    },
    defaults: { analysis_type: "prevalence" },
  };
};

// ── Patient longitudinal record ───────────────────────────────────

const ALL_SECTIONS_CUE = /\b(all|complete|everything|full|entire|history)\b/i;

const SECTION_ALIASES: Record<string, PatientSection> = {
  demographic: "demographics",
  condition: "conditions",
  diagnoses: "conditions",
  problems: "conditions",
  medication: "medications",
  meds: "medications",
  prescriptions: "medications",
  observation: "observations",
  labs: "observations",
  lab_results: "observations",
  vitals: "observations",
  encounter: "encounters",
  visits: "encounters",
  procedure: "procedures",
};

/**
 * Allowed section names from a model-supplied list. A "complete"/"history"
 * entry means no restriction (`[]`); a list with nothing usable is dropped.
 */
export function normalizeSections(value: unknown): PatientSection[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const names = value.filter((v): v is string => typeof v === "string").map((s) => s.trim().toLowerCase());
  if (names.some((n) => ALL_SECTIONS_CUE.test(n))) return [];
  if (value.length === 0) return [];

  const kept = new Set<PatientSection>();
  for (const name of names) {
    const section = oneOf(PATIENT_SECTIONS, SECTION_ALIASES[name] ?? name);
    if (section) kept.add(section);
  }
  return kept.size > 0 ? [...kept] : undefined;
}

const patientLongitudinal: SkillRule = (ctx) => ({
  params: {
    patient_id: patientId(ctx),
    format: oneOf(RECORD_FORMATS, ctx.extracted.format) ?? "summary",
    sections: normalizeSections(ctx.extracted.sections),
    date_range: dateRange(ctx.extracted.date_range),
  },
  defaults: { patient_id: UNKNOWN_PATIENT },
});

// ── FHIR resource search ──────────────────────────────────────────

const OBSERVATION_CUE = /\b(lab|result|observation|vital)/i;

function resourceType(extracted: JsonObject, query: string): string {
  if (extracted.resource_type === undefined) return OBSERVATION_CUE.test(query) ? "Observation" : "Patient";
  const raw = typeof extracted.resource_type === "string" ? extracted.resource_type.replace(/[\s_-]+/g, "") : "";
  return oneOf(RESOURCE_TYPES, raw) ?? "Observation";
}

function searchParams(value: unknown): JsonObject {
  const src: JsonObject = isRecord(value) ? value : {};
  const count = integer(src._count);
  return {
    ...compact({
      code: text(src.code),
      date: text(src.date),
      _sort: text(src._sort),
      status: text(src.status),
      category: text(src.category),
    }),
    _count: count !== undefined && count >= 1 ? count : DEFAULT_FHIR_COUNT,
  };
}

const fhirPatientSearch: SkillRule = (ctx) => ({
  params: {
    resource_type: resourceType(ctx.extracted, ctx.text),
    patient_id: patientId(ctx),
    search_params: searchParams(ctx.extracted.search_params),
    operation: oneOf(FHIR_OPERATIONS, ctx.extracted.operation) ?? "search",
  },
  defaults: { resource_type: "Patient" },
});

// ── Medical literature search ─────────────────────────────────────

/** Checked in order after an exact match; the first synonym found decides. */
const SEARCH_TYPE_SYNONYMS: ReadonlyArray<[RegExp, SearchType]> = [
  [/\b(drug|medication|medicine|dosing|dose|dosage|pharmac)/i, "drug_info"],
  [/\b(guideline|recommendation|standard of care|standards of care)/i, "guidelines"],
  [/\b(protocol|pathway|order set)/i, "protocols"],
  [/\b(literature|review|stud(y|ies)|paper|article|research|trial|evidence)/i, "literature"],
];

export function searchTypeFrom(value: string): SearchType | undefined {
  return oneOf(SEARCH_TYPES, value.replace(/\s+/g, "_")) ?? SEARCH_TYPE_SYNONYMS.find(([cue]) => cue.test(value))?.[1];
}

function medicalFilters(value: unknown): JsonObject | undefined {
  if (!isRecord(value)) return undefined;
  return compact({
    date_range: dateRange(value.date_range),
    source: text(value.source),
    specialty: text(value.specialty),
    evidence_level: oneOf(EVIDENCE_LEVELS, value.evidence_level),
  });
}

const medicalSearch: SkillRule = ({ extracted, text: query }) => {
  const requested = typeof extracted.search_type === "string" ? extracted.search_type : undefined;
  const searchType =
    extracted.search_type === undefined
      ? (searchTypeFrom(query) ?? "general")
      : ((requested ? searchTypeFrom(requested) : undefined) ?? "general");

  const max = integer(extracted.max_results);
  return {
    params: {
      query: nonEmptyString(extracted.query) ?? nonEmptyString(query),
      search_type: searchType,
      filters: medicalFilters(extracted.filters),
      max_results: max === undefined ? DEFAULT_MAX_RESULTS : Math.min(50, Math.max(1, max)),
    },
    defaults: { query: nonEmptyString(query) ?? "general medical information" },
  };
};

// ── Appointments ──────────────────────────────────────────────────

function dateFromText(query: string, now: Date): string | undefined {
  const explicit = isoDate(/\b(\d{4}-\d{2}-\d{2})\b/.exec(query)?.[1]);
  if (explicit) return explicit;
  if (/\btomorrow\b/i.test(query)) return addDays(now, 1);
  if (/\btoday\b/i.test(query)) return addDays(now, 0);
  return undefined;
}

/** `HH:MM` from "14:30", "9am" or "3:15 pm". */
export function timeFromText(query: string): string | undefined {
  const meridiem = /\b(1[0-2]|0?[1-9])(?::([0-5]\d))?\s*(am|pm)\b/i.exec(query);
  if (meridiem) {
    const hour = (Number(meridiem[1]) % 12) + ((meridiem[3] ?? "").toLowerCase() === "pm" ? 12 : 0);
    return `${String(hour).padStart(2, "0")}:${meridiem[2] ?? "00"}`;
  }
  const clock = /\b([01]?\d|2[0-3]):([0-5]\d)\b/.exec(query);
  return clock ? `${(clock[1] ?? "").padStart(2, "0")}:${clock[2] ?? "00"}` : undefined;
}

function reviewFilters(value: unknown, query: string, now: Date): JsonObject | undefined {
  const src: JsonObject = isRecord(value) ? value : {};
  const status = typeof src.status === "string" ? src.status.replace(/[\s-]+/g, "_") : undefined;
  let start = isoDate(src.start_date);
  let end = isoDate(src.end_date);

  if (!start && !end) {
    if (/\btomorrow\b/i.test(query)) start = end = addDays(now, 1);
    else if (/\btoday\b/i.test(query)) start = end = addDays(now, 0);
    else if (/\bthis week\b/i.test(query)) {
      start = addDays(now, 0);
      end = addDays(now, 6);
    }
  }

  return compact({
    start_date: start,
    end_date: end,
    provider_uuid: text(src.provider_uuid),
    status: oneOf(APPOINTMENT_STATUSES, status),
  });
}

const reviewAppointments: SkillRule = (ctx) => ({
  params: {
    action: "review",
    patient_id: patientId(ctx),
    filters: reviewFilters(ctx.extracted.filters, ctx.text, ctx.now),
  },
  defaults: { action: "review" },
});

const scheduleAppointment: SkillRule = (ctx) => {
  const details = ctx.extracted.appointment_details;
  const src: JsonObject = isRecord(details) ? details : {};
  const time = typeof src.time === "string" && HH_MM.test(src.time.trim()) ? src.time.trim() : undefined;
  const duration = integer(src.duration_minutes);

  return {
    params: {
      action: "schedule",
      patient_id: patientId(ctx),
      appointment_details: {
        date: isoDate(src.date) ?? dateFromText(ctx.text, ctx.now) ?? addDays(ctx.now, 1),
        time: time ?? timeFromText(ctx.text) ?? DEFAULT_APPOINTMENT_TIME,
        duration_minutes: duration !== undefined && duration >= 5 ? duration : DEFAULT_DURATION_MINUTES,
        ...compact({
          provider_uuid: text(src.provider_uuid),
          service: text(src.service),
          location_uuid: text(src.location_uuid),
          reason: text(src.reason),
        }),
      },
    },
    defaults: { action: "schedule" },
  };
};

export const SKILL_RULES: Record<string, SkillRule> = {
  population_analytics: populationAnalytics,
  patient_longitudinal: patientLongitudinal,
  fhir_patient_search: fhirPatientSearch,
  medical_search: medicalSearch,
  review_appointments: reviewAppointments,
  schedule_appointment: scheduleAppointment,
};

// ── Final guard ───────────────────────────────────────────────────

/** A value a schema accepts for a required field nobody supplied. */
export function schemaFallback(schema: TSchema | undefined): unknown {
  if (!schema) return null;
  const declared: unknown = schema.default;
  if (declared !== undefined) return declared;

  const variants: unknown = schema.anyOf;
  if (Array.isArray(variants)) {
    const literal = variants.find((v) => isRecord(v) && v.const !== undefined);
    if (isRecord(literal)) return literal.const;
  }
  const minimum: unknown = schema.minimum;
  switch (schema.type) {
    case "string":
      return "";
    case "integer":
    case "number":
      return typeof minimum === "number" ? minimum : 0;
    case "boolean":
      return false;
    case "array":
      return [];
    case "object":
      return {};
    default:
      return null;
  }
}

/** Keep declared keys only, then fill every required field still missing. */
export function applySchemaGuard(schema: TObject, params: JsonObject, defaults: JsonObject = {}): JsonObject {
  const out: JsonObject = {};
  for (const key of Object.keys(schema.properties)) {
    if (params[key] !== undefined && params[key] !== null) out[key] = params[key];
  }
  for (const key of schema.required ?? []) {
    if (out[key] !== undefined) continue;
    out[key] = defaults[key] !== undefined ? defaults[key] : schemaFallback(schema.properties[key]);
  }
  return out;
}

// ── Normalizer ────────────────────────────────────────────────────

export interface ParameterNormalizerOptions {
  now?: () => Date;
  logger?: Logger;
}

export class ParameterNormalizer {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: ParameterNormalizerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /** Never throws; an unknown skill only gets the schema guard. */
  normalize(request: NormalizeRequest, inputSchema: TObject): JsonObject {
    const rule = Object.hasOwn(SKILL_RULES, request.skill) ? SKILL_RULES[request.skill] : undefined;
    if (!rule) return applySchemaGuard(inputSchema, request.extracted);

    let output: RuleOutput;
    try {
      output = rule({ extracted: request.extracted, text: request.queryText, now: this.now() });
    } catch (err) {
      this.logger.warn(`Normalization rule for ${request.skill} failed, using schema defaults: ${errorMessage(err)}`);
      output = { params: {}, defaults: {} };
    }

    const params = applySchemaGuard(inputSchema, output.params, output.defaults);
    this.logger.debug(`Normalized ${request.skill} parameters: ${JSON.stringify(params)}`);
    return params;
  }
}
