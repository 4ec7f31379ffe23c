/**
 * Cliniq - Appointment Scheduling Extension
 *
 * Provides `appointment_manager`:
 *   - review: list appointments filtered by patient, date window and status
 *   - schedule: book an appointment; the end time follows from the duration
 *
 * Talks to the appointment-scheduling REST resource of the clinical system.
 */

import type { ToolPlugin, ToolPluginApi, FetchLike } from "../../src/tools/plugin-host.ts";
import { defineTool } from "../../src/tools/tool-contract.ts";
import { AppointmentInput, type AppointmentParams } from "../../src/tools/clinical-schemas.ts";
import { QueryBuildError } from "../../src/errors.ts";
import type { Logger } from "../../src/logging/logger.ts";
import { isRecord, type JsonObject } from "../../src/shared/json.ts";
import { authHeaders, requestJson, withQuery } from "../../src/shared/http.ts";

export const APPOINTMENT_RESOURCE = "appointmentscheduling/appointment";
export const DEFAULT_DURATION_MINUTES = 30;
export const DEFAULT_SERVICE = "General Consultation";

export interface AppointmentSummary {
  id: string | null;
  patient: string | null;
  date: string | null;
  provider: string | null;
  service: string | null;
  status: string | null;
  reason: string | null;
}

export type AppointmentResult =
  | { action: "review"; appointments: AppointmentSummary[]; total: number; message: string }
  | { action: "schedule"; appointment_id: string | null; start: string; end: string; message: string };

export interface AppointmentToolOptions {
  baseUrl: string;
  username?: string;
  password?: string;
  fetch: FetchLike;
  logger?: Logger;
}

// ── Helpers ───────────────────────────────────────────────────────

function str(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function display(value: unknown): string | null {
  return isRecord(value) ? str(value.display) : null;
}

export function summarizeAppointment(raw: unknown): AppointmentSummary {
  const apt: JsonObject = isRecord(raw) ? raw : {};
  return {
    id: str(apt.uuid),
    patient: display(apt.patient),
    date: isRecord(apt.timeSlot) ? str(apt.timeSlot.startDate) : null,
    provider: display(apt.provider),
    service: display(apt.appointmentType),
    status: str(apt.status),
    reason: str(apt.reason),
  };
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Start and end as local `YYYY-MM-DDTHH:MM:00`; the end may roll into the next day. */
export function appointmentWindow(date: string, time: string, durationMinutes: number): { start: string; end: string } {
  const [year, month, day] = date.split("-").map(Number);
  const [hour, minute] = time.split(":").map(Number);
  if ([year, month, day, hour, minute].some((n) => n === undefined || Number.isNaN(n))) {
    throw new QueryBuildError(`Invalid appointment date/time: ${date} ${time}`);
  }
  const start = new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1, hour ?? 0, minute ?? 0));
  if (
    start.getUTCFullYear() !== year ||
    start.getUTCMonth() + 1 !== month ||
    start.getUTCDate() !== day ||
    start.getUTCHours() !== hour ||
    start.getUTCMinutes() !== minute
  ) {
    throw new QueryBuildError(`Invalid appointment date/time: ${date} ${time}`);
  }
  const end = new Date(start.getTime() + durationMinutes * 60_000);
  const fmt = (d: Date) =>
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}T${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:00`;
  return { start: fmt(start), end: fmt(end) };
}

// ── Tool ──────────────────────────────────────────────────────────

export function createAppointmentTool(opts: AppointmentToolOptions) {
  const base = opts.baseUrl.replace(/\/+$/, "");
  const headers = { Accept: "application/json", ...authHeaders(opts.username, opts.password) };
  const endpoint = () => new URL(`${base}/${APPOINTMENT_RESOURCE}`);

  async function review(params: AppointmentParams): Promise<AppointmentResult> {
    const filters = params.filters ?? {};
    const url = withQuery(endpoint(), {
      patient: params.patient_id,
      fromDate: filters.start_date,
      toDate: filters.end_date,
      provider: filters.provider_uuid,
      status: filters.status,
    });
    const { body } = await requestJson(opts.fetch, url, { method: "GET", headers });
    const raw = isRecord(body) && Array.isArray(body.results) ? body.results : [];
    const appointments = raw.map(summarizeAppointment);
    return {
      action: "review",
      appointments,
      total: appointments.length,
      message: `Found ${appointments.length} appointments`,
    };
  }

  async function schedule(params: AppointmentParams): Promise<AppointmentResult> {
    const details = params.appointment_details;
    if (!details) throw new QueryBuildError("appointment_details are required to schedule an appointment");
    if (!params.patient_id) throw new QueryBuildError("patient_id is required to schedule an appointment");

    const { start, end } = appointmentWindow(
      details.date,
      details.time,
      details.duration_minutes ?? DEFAULT_DURATION_MINUTES,
    );
    const payload = {
      patient: params.patient_id,
      appointmentType: details.service ?? DEFAULT_SERVICE,
      startDateTime: start,
      endDateTime: end,
      provider: details.provider_uuid,
      location: details.location_uuid,
      reason: details.reason ?? "",
      status: "Scheduled",
    };
    const { body } = await requestJson(opts.fetch, endpoint(), {
      method: "POST",
      headers: { ...headers, "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
    return {
      action: "schedule",
      appointment_id: isRecord(body) ? str(body.uuid) : null,
      start,
      end,
      message: `Appointment scheduled for ${details.date} at ${details.time}`,
    };
  }

  return defineTool({
    name: "appointment_manager",
    description: "Review existing appointments or schedule new ones",
    inputSchema: AppointmentInput,
    logger: opts.logger,
    invoke: (params): Promise<AppointmentResult> => (params.action === "review" ? review(params) : schedule(params)),
  });
}

// ── Plugin ────────────────────────────────────────────────────────

const schedulingPlugin: ToolPlugin = {
  id: "scheduling",
  name: "Appointment Scheduling",
  description: "Appointment review and booking against the clinical system's scheduling API",
  version: "1.0.0",

  register(api: ToolPluginApi) {
    const { baseUrl, username, password } = api.config.appointments;
    if (!baseUrl) {
      api.logger.info("Scheduling: no appointment base URL configured, skipping registration");
      return;
    }
    api.registerTool(
      createAppointmentTool({ baseUrl, username, password, fetch: api.resources.fetch, logger: api.logger }),
    );
    api.logger.info(`Scheduling registered against ${baseUrl}`);
  },
};

export default schedulingPlugin;
