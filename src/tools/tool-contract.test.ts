import { Type } from "@sinclair/typebox";
import { describe, expect, it, vi } from "vitest";
import { defineTool } from "./tool-contract.ts";

const DoubleInput = Type.Object({ n: Type.Integer({ minimum: 1 }) });

type DoubleFn = (params: { n: number }) => Promise<{ doubled: number }>;

function doubler(invoke: DoubleFn = vi.fn(async (params: { n: number }) => ({ doubled: params.n * 2 }))) {
  return {
    invoke,
    tool: defineTool({ name: "doubler", description: "Doubles n", inputSchema: DoubleInput, invoke }),
  };
}

describe("defineTool", () => {
  it("exposes the schema under the tool name", () => {
    const { tool } = doubler();
    expect(tool.name).toBe("doubler");
    expect(tool.schema).toEqual({
      name: "doubler",
      description: "Doubles n",
      inputSchema: DoubleInput,
      outputSchema: undefined,
    });
    expect(tool.cleanup).toBeUndefined();
  });

  it("returns the result of a valid call", async () => {
    const { tool } = doubler();
    expect(await tool.safeInvoke({ n: 2 })).toEqual({ success: true, result: { doubled: 4 }, error: null });
  });

  it("reports validation errors without invoking", async () => {
    const { tool, invoke } = doubler();
    const result = await tool.safeInvoke({ n: 0 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errorKind).toBe("validation");
    expect(result.error).toMatch(/^Validation error: \/n: /);
    expect(invoke).not.toHaveBeenCalled();
  });

  it("reports a missing required field", async () => {
    const { tool } = doubler();
    const result = await tool.safeInvoke({});
    expect(result).toMatchObject({ success: false, result: null, errorKind: "validation" });
  });

  it("turns a thrown error into an execution failure", async () => {
    const { tool } = doubler(
      vi.fn(async (): Promise<{ doubled: number }> => {
        throw new Error("boom");
      }),
    );
    expect(await tool.safeInvoke({ n: 1 })).toEqual({
      success: false,
      result: null,
      error: "Execution error: boom",
      errorKind: "execution",
    });
  });

  it("keeps a cleanup hook when one is defined", async () => {
    const cleanup = vi.fn(async () => {});
    const tool = defineTool({
      name: "closer",
      description: "Holds a connection",
      inputSchema: Type.Object({}),
      invoke: async () => null,
      cleanup,
    });
    await tool.cleanup?.();
    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});
