/**
 * Cliniq - Longitudinal Record Formats
 *
 * Reshapes per-section warehouse rows (keyed by logical column names) into
 * the output formats of the patient longitudinal tool.
 */

import type { WarehouseRow } from "./connection.ts";
import type { PatientSection } from "./query-builder.ts";

export const RECORD_FORMATS = ["ips", "timeline", "summary", "full"] as const;
export type RecordFormat = (typeof RECORD_FORMATS)[number];

export type SectionRecord = Partial<Record<PatientSection, WarehouseRow[]>>;

export interface TimelineEvent {
  date: string;
  type: "condition" | "observation";
  data: WarehouseRow;
}

const TIMELINE_LIMIT = 50;

function dateKey(value: unknown): string | undefined {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  if (typeof value === "string" && value) return value;
  return undefined;
}

export function buildTimeline(record: SectionRecord): TimelineEvent[] {
  const events: TimelineEvent[] = [];
  for (const row of record.conditions ?? []) {
    const date = dateKey(row.onset_date);
    if (date) events.push({ date, type: "condition", data: row });
  }
  for (const row of record.observations ?? []) {
    const date = dateKey(row.effective_date);
    if (date) events.push({ date, type: "observation", data: row });
  }
  events.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  return events.slice(0, TIMELINE_LIMIT);
}

export function formatRecord(record: SectionRecord, format: RecordFormat): unknown {
  switch (format) {
    case "full":
      return record;
    case "summary":
      return {
        patient_info: record.demographics ?? [],
        active_conditions: (record.conditions ?? []).filter(
          (c) => typeof c.clinical_status === "string" && c.clinical_status.toLowerCase() === "active",
        ),
        current_medications: (record.medications ?? []).slice(0, 5),
        recent_observations: (record.observations ?? []).slice(0, 10),
        recent_encounters: (record.encounters ?? []).slice(0, 3),
      };
    case "timeline":
      return buildTimeline(record);
    case "ips":
      // International Patient Summary; allergies and immunizations have no mapped views yet.
      return {
        patient: record.demographics ?? [],
        problems: record.conditions ?? [],
        medications: record.medications ?? [],
        allergies: [],
        immunizations: [],
        results: (record.observations ?? []).slice(0, 20),
      };
  }
}
