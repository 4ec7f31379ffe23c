import { describe, expect, it, vi } from "vitest";
import { ScriptedOracle } from "../testing/fakes.ts";
import { PopulationAnalyticsInput } from "../tools/clinical-schemas.ts";
import { defineTool } from "../tools/tool-contract.ts";
import { ToolRegistry } from "../tools/tool-registry.ts";
import { SkillRouter } from "./skill-router.ts";
import { CLINICAL_SKILLS } from "./skills.ts";

const QUERY = "Is diabetes becoming more common recently?";

function setup(
  replies: Array<string | Error>,
  invoke: () => Promise<unknown> = vi.fn(async () => ({ summary: "ok", row_count: 0 })),
) {
  const registry = new ToolRegistry();
  registry.register(
    defineTool({
      name: "warehouse_population_analytics",
      description: "population analytics",
      inputSchema: PopulationAnalyticsInput,
      invoke,
    }),
  );
  const oracle = new ScriptedOracle(replies);
  const router = new SkillRouter({
    catalog: CLINICAL_SKILLS,
    registry,
    oracle,
    now: () => new Date("2026-10-18T12:00:00Z"),
  });
  return { router, oracle, invoke };
}

describe("SkillRouter.handle", () => {
  it("routes, extracts, invokes and synthesizes", async () => {
    const { router, oracle, invoke } = setup([
      '{"skill": "population_analytics"}',
      '```json\n{"condition": "diabetes"}\n```',
      "Diabetes cases are rising.",
    ]);

    const outcome = await router.handle(QUERY);

    expect(outcome).toEqual({
      state: "DONE",
      text: "Diabetes cases are rising.",
      skill: "population_analytics",
      parameters: { analysis_type: "trends", condition: "diabetes", timeframe: "last_month" },
      toolResult: { success: true, result: { summary: "ok", row_count: 0 }, error: null },
      trace: ["ROUTING", "PARAM_EXTRACTION", "TOOL_INVOKE", "SYNTHESIS", "DONE"],
    });
    expect(invoke).toHaveBeenCalledWith({ analysis_type: "trends", condition: "diabetes", timeframe: "last_month" });
    expect(oracle.requests.map((r) => r.maxTokens)).toEqual([50, 200, 1000]);
  });

  it("lists every skill in the routing prompt and the query in the parameter prompt", async () => {
    const { router, oracle } = setup(['{"skill": "population_analytics"}', "{}", "done"]);
    await router.handle(QUERY);

    const routing = oracle.requests[0].messages;
    expect(routing[0]).toEqual({ role: "system", content: "You route queries to appropriate data retrieval skills." });
    expect(routing[1].content).toContain(
      "- medical_search: Search medical literature, guidelines, protocols and drug information",
    );
    expect(routing[1].content.endsWith('Respond with JSON: {"skill": "skill_name"}')).toBe(true);
    expect(oracle.requests[1].messages[1].content).toContain(`Query: ${QUERY}`);
  });

  it("answers directly when no known skill is named", async () => {
    for (const reply of ['{"skill": "astrology"}', "I think population analytics", '{"skill": "toString"}']) {
      const { router, oracle } = setup([reply, "General answer"]);

      expect(await router.handle("What is a cohort study?")).toEqual({
        state: "DONE",
        text: "General answer",
        trace: ["ROUTING", "DONE"],
      });
      expect(oracle.requests[1].maxTokens).toBe(1500);
      expect(oracle.requests[1].messages[0].content).toBe("You are a helpful clinical research assistant.");
    }
  });

  it("fails when the skill's tool is not registered, without asking for parameters", async () => {
    const { router, oracle } = setup(['{"skill": "fhir_patient_search"}']);

    expect(await router.handle("Get the latest lab results for patient example-123")).toEqual({
      state: "FAILED",
      error: "Tool fhir_search not available for skill fhir_patient_search",
      failedAt: "TOOL_INVOKE",
      skill: "fhir_patient_search",
      trace: ["ROUTING", "PARAM_EXTRACTION", "TOOL_INVOKE", "FAILED"],
    });
    expect(oracle.requests).toHaveLength(1);
  });

  it("reports a tool failure as the answer", async () => {
    const { router, oracle } = setup(
      ['{"skill": "population_analytics"}', "{}"],
      vi.fn(async () => {
        throw new Error("connection refused");
      }),
    );

    const outcome = await router.handle(QUERY);

    expect(outcome).toMatchObject({
      state: "DONE",
      text: "Tool execution failed: Execution error: connection refused",
      trace: ["ROUTING", "PARAM_EXTRACTION", "TOOL_INVOKE", "DONE"],
    });
    expect(oracle.requests).toHaveLength(2);
  });

  it("fails in the state whose completion call failed", async () => {
    const routing = await setup([new Error("timeout")]).router.handle(QUERY);
    expect(routing).toEqual({
      state: "FAILED",
      error: "Completion failed during ROUTING: timeout",
      failedAt: "ROUTING",
      skill: undefined,
      trace: ["ROUTING", "FAILED"],
    });

    const synthesis = await setup(['{"skill": "population_analytics"}', "{}", new Error("model unloaded")]).router.handle(
      QUERY,
    );
    expect(synthesis).toMatchObject({
      state: "FAILED",
      error: "Completion failed during SYNTHESIS: model unloaded",
      failedAt: "SYNTHESIS",
      skill: "population_analytics",
      trace: ["ROUTING", "PARAM_EXTRACTION", "TOOL_INVOKE", "SYNTHESIS", "FAILED"],
    });
  });
});

describe("SkillRouter.route", () => {
  it("resolves the named skill definition", async () => {
    const { router } = setup(['{"skill": "medical_search"}']);
    expect(await router.route("metformin dosing")).toBe(CLINICAL_SKILLS.skills.medical_search);
  });
});
