/**
 * Cliniq - Router Configuration Schema
 *
 * One explicit config object, validated with Zod and built once at process
 * start. Environment variables are read only by `configFromEnv`; everything
 * else receives the parsed object through its constructor.
 */

import { fileURLToPath } from "node:url";
import { z } from "zod";

export const DEFAULT_PROFILE_DIR = fileURLToPath(new URL("../../profiles", import.meta.url));

export const routerConfigSchema = z
  .object({
    /** OpenAI-compatible completion endpoint */
    llm: z
      .object({
        baseUrl: z.string().default("http://localhost:1234/v1"),
        apiKey: z.string().default(""),
        model: z.string().default("llama-3-8b-instruct"),
        /** Model for the administrative agent; falls back to `model` */
        adminModel: z.string().optional(),
        temperature: z.coerce.number().min(0).max(2).default(0.3),
        timeoutMs: z.coerce.number().int().positive().default(180_000),
      })
      .default({}),

    /** Analytics warehouse (PostgreSQL wire protocol) */
    warehouse: z
      .object({
        host: z.string().optional(),
        port: z.coerce.number().int().positive().default(5432),
        database: z.string().default("warehouse"),
        user: z.string().default("cliniq"),
        password: z.string().default(""),
        poolMax: z.coerce.number().int().positive().default(10),
        /** Schema profile name, resolved as `<profileDir>/<profile>.json` */
        profile: z.string().default("parquet_on_fhir_flat"),
        profileDir: z.string().default(DEFAULT_PROFILE_DIR),
        /** Compute the capability map once while registering tools */
        introspectOnStartup: z.boolean().default(false),
      })
      .default({}),

    /** FHIR R4 resource server */
    fhir: z
      .object({
        baseUrl: z.string().optional(),
        username: z.string().optional(),
        password: z.string().optional(),
      })
      .default({}),

    /** Appointment REST API */
    appointments: z
      .object({
        baseUrl: z.string().optional(),
        username: z.string().optional(),
        password: z.string().optional(),
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
      })
      .default({}),
  })
  .default({});

export type RouterConfig = z.infer<typeof routerConfigSchema>;

/**
 * Load router config from a raw object. Invalid input is reported and the
 * defaults are used instead.
 */
export function loadRouterConfig(rawConfig?: unknown): RouterConfig {
  const parsed = routerConfigSchema.safeParse(rawConfig ?? {});
  if (!parsed.success) {
    console.warn("[cliniq:config] Invalid router config, using defaults:", parsed.error.issues);
    return routerConfigSchema.parse({});
  }
  return parsed.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function flag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Map environment variables onto the raw config shape. The appointment REST
 * base defaults to the OpenMRS REST root next to the FHIR base.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RouterConfig {
  const fhirBase = nonEmpty(env.CLINIQ_FHIR_BASE_URL);
  const appointmentBase =
    nonEmpty(env.CLINIQ_APPOINTMENTS_BASE_URL) ?? fhirBase?.replace("/ws/fhir2/R4", "/ws/rest/v1");

  return loadRouterConfig({
    llm: {
      baseUrl: nonEmpty(env.CLINIQ_LLM_BASE_URL),
      apiKey: env.CLINIQ_LLM_API_KEY,
      model: nonEmpty(env.CLINIQ_LLM_MODEL),
      adminModel: nonEmpty(env.CLINIQ_ADMIN_MODEL),
      temperature: nonEmpty(env.CLINIQ_LLM_TEMPERATURE),
      timeoutMs: nonEmpty(env.CLINIQ_LLM_TIMEOUT_MS),
    },
    warehouse: {
      host: nonEmpty(env.CLINIQ_WAREHOUSE_HOST),
      port: nonEmpty(env.CLINIQ_WAREHOUSE_PORT),
      database: nonEmpty(env.CLINIQ_WAREHOUSE_DATABASE),
      user: nonEmpty(env.CLINIQ_WAREHOUSE_USER),
      password: env.CLINIQ_WAREHOUSE_PASSWORD,
      poolMax: nonEmpty(env.CLINIQ_WAREHOUSE_POOL_MAX),
      profile: nonEmpty(env.CLINIQ_WAREHOUSE_PROFILE),
      profileDir: nonEmpty(env.CLINIQ_PROFILE_DIR),
      introspectOnStartup: flag(env.CLINIQ_INTROSPECT_ON_STARTUP),
    },
    fhir: {
      baseUrl: fhirBase,
      username: nonEmpty(env.CLINIQ_FHIR_USERNAME),
      password: env.CLINIQ_FHIR_PASSWORD,
    },
    appointments: {
      baseUrl: appointmentBase,
      username: nonEmpty(env.CLINIQ_APPOINTMENTS_USERNAME) ?? nonEmpty(env.CLINIQ_FHIR_USERNAME),
      password: env.CLINIQ_APPOINTMENTS_PASSWORD ?? env.CLINIQ_FHIR_PASSWORD,
    },
    logging: {
      level: nonEmpty(env.CLINIQ_LOG_LEVEL),
    },
  });
}
