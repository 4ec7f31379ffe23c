import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger.ts";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope and drops those below the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    const logger = createLogger("router", "info").child("llm");
    logger.info("ready", { tools: 3 });
    logger.debug("hidden");

    expect(info).toHaveBeenCalledWith("[cliniq:router:llm]", "ready", { tools: 3 });
    expect(debug).not.toHaveBeenCalled();
  });
});
