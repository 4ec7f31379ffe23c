import { Type } from "@sinclair/typebox";
import { describe, expect, it } from "vitest";
import { loadRouterConfig } from "../config/router-config.ts";
import { silentLogger } from "../logging/logger.ts";
import { FakeWarehouse, ScriptedOracle, fakeFetch, jsonResponse } from "../testing/fakes.ts";
import type { ToolPlugin } from "../tools/plugin-host.ts";
import { defineTool } from "../tools/tool-contract.ts";
import { createAdministrativeAgent, createClinicalAgent } from "./agents.ts";

const now = () => new Date("2026-10-18T12:00:00Z");

describe("createClinicalAgent", () => {
  it("registers every clinical tool and answers end to end", async () => {
    const warehouse = new FakeWarehouse();
    const http = fakeFetch(() =>
      jsonResponse({ resourceType: "Bundle", total: 1, entry: [{ resource: { resourceType: "Observation", id: "o1" } }] }),
    );
    const oracle = new ScriptedOracle(['{"skill": "fhir_patient_search"}', "{}", "One observation on file."]);
    const agent = await createClinicalAgent(loadRouterConfig({ fhir: { baseUrl: "http://fhir.test/R4" } }), {
      oracle,
      warehouse,
      fetch: http.fetch,
      now,
      logger: silentLogger,
    });

    expect(agent.id).toBe("clinical");
    expect(agent.registry.names()).toEqual([
      "warehouse_population_analytics",
      "warehouse_patient_longitudinal",
      "warehouse_capabilities",
      "fhir_search",
      "medical_search",
    ]);

    const outcome = await agent.ask("Get the latest lab results for patient example-123");

    expect(outcome).toMatchObject({ state: "DONE", text: "One observation on file.", skill: "fhir_patient_search" });
    expect(http.requests.map((r) => r.url)).toEqual(["http://fhir.test/R4/Observation?patient=example-123&_count=10"]);

    await agent.shutdown();
    expect(warehouse.closeCalls).toBeGreaterThan(0);
  });

  it("runs without a warehouse or FHIR server", async () => {
    const agent = await createClinicalAgent(loadRouterConfig({}), {
      oracle: new ScriptedOracle([]),
      logger: silentLogger,
    });
    expect(agent.registry.names()).toEqual(["medical_search"]);
  });

  it("releases the warehouse when a plugin fails to load", async () => {
    const warehouse = new FakeWarehouse();
    const broken: ToolPlugin = {
      id: "broken",
      name: "Broken",
      description: "Fails on load",
      version: "0.0.0",
      register() {
        throw new Error("bad plugin");
      },
    };

    await expect(
      createClinicalAgent(loadRouterConfig({}), {
        oracle: new ScriptedOracle([]),
        warehouse,
        plugins: [broken],
        logger: silentLogger,
      }),
    ).rejects.toThrow("bad plugin");
    expect(warehouse.closeCalls).toBe(1);
  });

  it("closes the warehouse even when a tool cleanup fails", async () => {
    const warehouse = new FakeWarehouse();
    const leaky: ToolPlugin = {
      id: "leaky",
      name: "Leaky",
      description: "Tool whose cleanup fails",
      version: "0.0.0",
      register(api) {
        api.registerTool(
          defineTool({
            name: "leaky_tool",
            description: "fails to clean up",
            inputSchema: Type.Object({}),
            invoke: async () => ({}),
            cleanup: async () => {
              throw new Error("socket stuck");
            },
          }),
        );
      },
    };
    const agent = await createClinicalAgent(loadRouterConfig({}), {
      oracle: new ScriptedOracle([]),
      warehouse,
      plugins: [leaky],
      logger: silentLogger,
    });

    await expect(agent.shutdown()).rejects.toThrow("socket stuck");
    expect(warehouse.closeCalls).toBe(1);
  });
});

describe("createAdministrativeAgent", () => {
  it("books an appointment for tomorrow at the default time", async () => {
    const http = fakeFetch(() => jsonResponse({ uuid: "apt-9" }, 201));
    const oracle = new ScriptedOracle(['{"skill": "schedule_appointment"}', '{"patient_id": "pat-1"}', "Booked."]);
    const agent = await createAdministrativeAgent(
      loadRouterConfig({ appointments: { baseUrl: "http://emr.test/ws/rest/v1" } }),
      { oracle, fetch: http.fetch, now, logger: silentLogger },
    );

    expect(agent.registry.names()).toEqual(["appointment_manager"]);
    expect(await agent.ask("Book a follow-up for pat-1")).toMatchObject({ state: "DONE", text: "Booked." });
    expect(http.requests).toHaveLength(1);
    expect(JSON.parse(http.requests[0].body ?? "null")).toMatchObject({
      patient: "pat-1",
      startDateTime: "2026-10-19T10:00:00",
      endDateTime: "2026-10-19T10:30:00",
    });
    expect(oracle.requests[1].messages[1].content).toContain("Today is 2026-10-18.");
  });

  it("fails cleanly when no appointment system is configured", async () => {
    const agent = await createAdministrativeAgent(loadRouterConfig({}), {
      oracle: new ScriptedOracle(['{"skill": "review_appointments"}']),
      logger: silentLogger,
    });

    expect(await agent.ask("What is on the schedule today?")).toMatchObject({
      state: "FAILED",
      failedAt: "TOOL_INVOKE",
      error: "Tool appointment_manager not available for skill review_appointments",
    });
  });
});
