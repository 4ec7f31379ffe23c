/**
 * Cliniq - Skill Catalogs
 *
 * A skill pairs a routing description with the tool it drives and the prompt
 * that asks the model for that tool's parameters. Each agent owns one catalog.
 */

export interface SkillDefinition {
  name: string;
  /** One line, shown to the model when routing. */
  description: string;
  tool: string;
  /** `{query}` and `{today}` are substituted before the prompt is sent. */
  promptTemplate: string;
}

export interface SkillCatalog {
  id: "clinical" | "administrative";
  routingSystemPrompt: string;
  parameterSystemPrompt: string;
  synthesisSystemPrompt: string;
  generalSystemPrompt: string;
  skills: Record<string, SkillDefinition>;
}

/** Substitute `{name}` placeholders; JSON braces in the template are left alone. */
export function renderPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => vars[key] ?? whole);
}

export function routingPrompt(catalog: SkillCatalog, query: string): string {
  const skills = Object.values(catalog.skills)
    .map((s) => `- ${s.name}: ${s.description}`)
    .join("\n");
  return `Determine the best skill for this query.

Available skills:
${skills}

Query: ${query}

Respond with JSON: {"skill": "skill_name"}`;
}

export function synthesisPrompt(query: string, result: unknown): string {
  return `Interpret these results for the query: "${query}"

Data retrieved:
${JSON.stringify(result, null, 2)}

Provide a clear, clinically relevant interpretation of this data.
Include key findings, patterns, and any clinical significance.`;
}

// ── Clinical ──────────────────────────────────────────────────────

export const CLINICAL_SKILLS: SkillCatalog = {
  id: "clinical",
  routingSystemPrompt: "You route queries to appropriate data retrieval skills.",
  parameterSystemPrompt: "You convert queries to tool parameters. Respond with JSON only.",
  synthesisSystemPrompt: "You are a clinical data interpreter providing insights from health data.",
  generalSystemPrompt: "You are a helpful clinical research assistant.",
  skills: {
    population_analytics: {
      name: "population_analytics",
      description: "Analyze population-level health statistics (prevalence, trends, demographics, comorbidities)",
      tool: "warehouse_population_analytics",
      promptTemplate: `You are a clinical data analyst. Convert this query into population analytics parameters.

Query: {query}

Determine the appropriate analysis type and parameters.
analysis_type: prevalence | trends | demographics | comorbidities
timeframe: all_time | last_year | last_month | last_week
Examples:
- "Is flu common now?" -> {"analysis_type": "trends", "condition": "influenza", "timeframe": "last_month"}
- "Diabetes prevalence" -> {"analysis_type": "prevalence", "condition": "diabetes"}
- "Comorbidities with hypertension" -> {"analysis_type": "comorbidities", "condition": "hypertension"}
- "Age breakdown of asthma patients over 40" -> {"analysis_type": "demographics", "condition": "asthma", "filters": {"age_min": 40}}

Respond with JSON only.`,
    },

    patient_longitudinal: {
      name: "patient_longitudinal",
      description: "Retrieve a patient's longitudinal health record",
      tool: "warehouse_patient_longitudinal",
      promptTemplate: `Extract patient ID and format requirements from this query.

Query: {query}

Determine:
1. Patient ID (if mentioned)
2. Desired format (ips, timeline, summary, full)
3. Specific sections needed (demographics, conditions, medications, observations, encounters, procedures)

Respond with JSON: {"patient_id": "...", "format": "...", "sections": [...]}`,
    },

    fhir_patient_search: {
      name: "fhir_patient_search",
      description: "Search specific FHIR resources (patients, observations, conditions, medications)",
      tool: "fhir_search",
      promptTemplate: `Convert this query into FHIR search parameters.

Query: {query}

Determine:
1. Resource type (Patient, Observation, Condition, MedicationRequest, Encounter, Procedure, DiagnosticReport, AllergyIntolerance)
2. Patient ID (if mentioned)
3. Search parameters (code, date, status, category, _count)

Respond with JSON: {"resource_type": "...", "patient_id": "...", "search_params": {}}`,
    },

    medical_search: {
      name: "medical_search",
      description: "Search medical literature, guidelines, protocols and drug information",
      tool: "medical_search",
      promptTemplate: `Convert this medical literature query into search parameters.

Query: {query}

search_type: literature | guidelines | protocols | drug_info | general
Respond with JSON: {"query": "...", "search_type": "...", "filters": {}}`,
    },
  },
};

// ── Administrative ────────────────────────────────────────────────

export const ADMINISTRATIVE_SKILLS: SkillCatalog = {
  id: "administrative",
  routingSystemPrompt: "You classify administrative healthcare requests.",
  parameterSystemPrompt: "You extract appointment parameters. Respond with JSON only.",
  synthesisSystemPrompt: "You are a clinic front-desk assistant summarizing appointment information clearly.",
  generalSystemPrompt: "You are a helpful healthcare administration assistant.",
  skills: {
    review_appointments: {
      name: "review_appointments",
      description: "Check existing appointments and view schedules",
      tool: "appointment_manager",
      promptTemplate: `Extract appointment review parameters from this query.
Today is {today}.

Query: {query}

Extract:
- patient_id (if mentioned)
- date range (start_date, end_date)
- status filter (scheduled, checked_in, completed, cancelled, missed)

Respond with JSON: {"patient_id": "...", "filters": {"start_date": "YYYY-MM-DD", "end_date": "YYYY-MM-DD"}}`,
    },

    schedule_appointment: {
      name: "schedule_appointment",
      description: "Book new appointments for patients",
      tool: "appointment_manager",
      promptTemplate: `Extract appointment scheduling details from this query.
Today is {today}.

Query: {query}

Extract:
- patient_id (required)
- date (YYYY-MM-DD format)
- time (HH:MM format)
- provider_uuid (if mentioned)
- service/type of appointment
- reason for visit
- location_uuid

If date/time are not specific, use tomorrow at 10:00.

Respond with JSON: {"patient_id": "...", "appointment_details": {"date": "YYYY-MM-DD", "time": "HH:MM"}}`,
    },
  },
};
