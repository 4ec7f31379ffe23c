import { describe, expect, it } from "vitest";
import { QueryBuildError, UnmappedColumnError, UnmappedViewError } from "../errors.ts";
import { buildPopulationQuery, buildSectionQuery } from "./query-builder.ts";
import { SchemaProfile } from "./schema-profile.ts";

const profile = SchemaProfile.fromDocument(
  "test",
  JSON.stringify({
    views: {
      condition: {
        table: "conditions",
        columns: {
          patient_id: "subject_id",
          code: "code",
          display: "display",
          onset_date: "CAST(onset AS DATE)",
          facility_id: "facility",
        },
      },
      patient: { table: "patients", columns: { id: "id", gender: "gender", birth_date: "birth_date" } },
      observation: {
        table: "obs",
        columns: { patient_id: "subject_id", code: "code", value: "val", unit: "unit", effective_date: "eff_date" },
      },
    },
    features: {},
  }),
);

const conditionOnly = SchemaProfile.fromDocument(
  "condition_only",
  JSON.stringify({
    views: { condition: { table: "conditions", columns: { patient_id: "subject_id", display: "display" } } },
    features: {},
  }),
);

describe("buildPopulationQuery", () => {
  it("builds prevalence over the projected condition view", () => {
    expect(buildPopulationQuery(profile, { analysis_type: "prevalence", condition: "diabetes" })).toEqual({
      sql: "WITH condition_v AS (SELECT subject_id AS patient_id, code AS code, display AS display FROM conditions) SELECT code, display, COUNT(DISTINCT patient_id) AS patient_count, COUNT(*) AS condition_instances FROM condition_v WHERE display ILIKE $1 GROUP BY code, display ORDER BY patient_count DESC LIMIT 20",
      params: ["%diabetes%"],
    });
  });

  it("builds monthly trends limited to the timeframe", () => {
    expect(
      buildPopulationQuery(profile, { analysis_type: "trends", condition: "influenza", timeframe: "last_month" }),
    ).toEqual({
      sql: "WITH condition_v AS (SELECT subject_id AS patient_id, display AS display, CAST(onset AS DATE) AS onset_date FROM conditions) SELECT DATE_TRUNC('month', onset_date) AS month, COUNT(DISTINCT patient_id) AS patient_count, COUNT(*) AS total_cases FROM condition_v WHERE display ILIKE $1 AND onset_date >= CURRENT_DATE - INTERVAL '1 month' GROUP BY month ORDER BY month DESC LIMIT 12",
      params: ["%influenza%"],
    });
  });

  it("applies the facility filter inside the condition view", () => {
    const query = buildPopulationQuery(profile, { analysis_type: "prevalence", filters: { facility_id: "F-1" } });
    expect(query.sql).toBe(
      "WITH condition_v AS (SELECT subject_id AS patient_id, code AS code, display AS display FROM conditions WHERE facility = $1) SELECT code, display, COUNT(DISTINCT patient_id) AS patient_count, COUNT(*) AS condition_instances FROM condition_v GROUP BY code, display ORDER BY patient_count DESC LIMIT 20",
    );
    expect(query.params).toEqual(["F-1"]);
  });

  it("binds demographic filters after the cohort pattern", () => {
    const query = buildPopulationQuery(profile, {
      analysis_type: "demographics",
      condition: "asthma",
      filters: { gender: "female", age_min: 40 },
    });
    expect(query.params).toEqual(["%asthma%", "female", 40]);
    expect(query.sql).toContain(
      "FROM cohort JOIN patient_v p ON cohort.patient_id = p.id WHERE p.gender = $2 AND DATE_PART('year', AGE(CURRENT_DATE, CAST(p.birth_date AS DATE))) >= $3 GROUP BY p.gender, age",
    );
  });

  it("binds the comorbidity pattern for both the cohort and the exclusion", () => {
    const query = buildPopulationQuery(profile, { analysis_type: "comorbidities", condition: "hypertension" });
    expect(query.params).toEqual(["%hypertension%", "%hypertension%"]);
    expect(query.sql).toContain("WHERE display ILIKE $1) SELECT code, display");
    expect(query.sql).toContain("AND display NOT ILIKE $2 GROUP BY code, display ORDER BY patient_count DESC LIMIT 10");
  });

  it("requires a condition for comorbidities", () => {
    expect(() => buildPopulationQuery(profile, { analysis_type: "comorbidities" })).toThrow(
      "analysis_type 'comorbidities' requires a condition",
    );
  });

  it("escapes LIKE wildcards in the condition", () => {
    const query = buildPopulationQuery(profile, { analysis_type: "prevalence", condition: "100%_a" });
    expect(query.params).toEqual(["%100\\%\\_a%"]);
  });

  it("rejects an unknown timeframe for every analysis type", () => {
    expect(() => buildPopulationQuery(profile, { analysis_type: "prevalence", timeframe: "last_decade" })).toThrow(
      'Unknown timeframe "last_decade"; expected one of all_time, last_year, last_month, last_week',
    );
  });

  it("passes custom SQL through trimmed and unparameterized", () => {
    expect(buildPopulationQuery(profile, { analysis_type: "custom", custom_sql: "  SELECT 1  " })).toEqual({
      sql: "SELECT 1",
      params: [],
    });
    expect(() => buildPopulationQuery(profile, { analysis_type: "custom", custom_sql: "   " })).toThrow(QueryBuildError);
  });

  it("fails on views and columns the profile does not map", () => {
    expect(() => buildPopulationQuery(conditionOnly, { analysis_type: "demographics" })).toThrow(UnmappedViewError);
    expect(() => buildPopulationQuery(conditionOnly, { analysis_type: "prevalence" })).toThrow(
      'Column "condition.code" is not mapped in profile condition_only',
    );
  });
});

describe("buildSectionQuery", () => {
  it("filters by patient and date range and orders newest first", () => {
    expect(buildSectionQuery(profile, "observations", "example-123", { start: "2024-01-01" })).toEqual({
      sql: "WITH observation_v AS (SELECT subject_id AS patient_id, code AS code, val AS value, unit AS unit, eff_date AS effective_date FROM obs) SELECT * FROM observation_v WHERE patient_id = $1 AND effective_date >= $2 ORDER BY effective_date DESC LIMIT 100",
      params: ["example-123", "2024-01-01"],
    });
  });

  it("fails on a section whose view is not mapped", () => {
    expect(() => buildSectionQuery(profile, "encounters", "p1")).toThrow(UnmappedViewError);
  });

  it("fails on a section whose columns are not all mapped", () => {
    expect(() => buildSectionQuery(profile, "demographics", "p1")).toThrow(UnmappedColumnError);
    expect(() => buildSectionQuery(profile, "demographics", "p1")).toThrow(
      'Column "patient.deceased" is not mapped in profile test',
    );
  });
});
