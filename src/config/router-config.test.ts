import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_PROFILE_DIR, configFromEnv, loadRouterConfig } from "./router-config.ts";

describe("loadRouterConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fills every section with defaults", () => {
    const config = loadRouterConfig();
    expect(config.llm.baseUrl).toBe("http://localhost:1234/v1");
    expect(config.llm.temperature).toBe(0.3);
    expect(config.warehouse.port).toBe(5432);
    expect(config.warehouse.profile).toBe("parquet_on_fhir_flat");
    expect(config.warehouse.profileDir).toBe(DEFAULT_PROFILE_DIR);
    expect(config.warehouse.introspectOnStartup).toBe(false);
    expect(config.fhir.baseUrl).toBeUndefined();
    expect(config.logging.level).toBe("info");
  });

  it("falls back to defaults on invalid input and warns", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const config = loadRouterConfig({ llm: { temperature: 5 } });
    expect(config.llm.temperature).toBe(0.3);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("configFromEnv", () => {
  it("maps CLINIQ_* variables and derives the appointment base from the FHIR base", () => {
    const config = configFromEnv({
      CLINIQ_FHIR_BASE_URL: "http://emr.test/openmrs/ws/fhir2/R4",
      CLINIQ_FHIR_USERNAME: "clinician",
      CLINIQ_FHIR_PASSWORD: "test-secret",
      CLINIQ_WAREHOUSE_PORT: "6543",
      CLINIQ_INTROSPECT_ON_STARTUP: "true",
      CLINIQ_LLM_TEMPERATURE: "0.1",
    });

    expect(config.fhir).toEqual({
      baseUrl: "http://emr.test/openmrs/ws/fhir2/R4",
      username: "clinician",
      password: "test-secret",
    });
    expect(config.appointments).toEqual({
      baseUrl: "http://emr.test/openmrs/ws/rest/v1",
      username: "clinician",
      password: "test-secret",
    });
    expect(config.warehouse.port).toBe(6543);
    expect(config.warehouse.introspectOnStartup).toBe(true);
    expect(config.llm.temperature).toBe(0.1);
  });

  it("treats blank variables as unset", () => {
    const config = configFromEnv({ CLINIQ_LLM_MODEL: "   ", CLINIQ_WAREHOUSE_HOST: "" });
    expect(config.llm.model).toBe("llama-3-8b-instruct");
    expect(config.warehouse.host).toBeUndefined();
  });
});
