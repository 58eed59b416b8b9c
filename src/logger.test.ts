import { describe, expect, it, vi } from "vitest";
import { createLogger, scopedLogger, type Logger } from "./logger";

function spySink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe("createLogger", () => {
  it("drops messages below the threshold", () => {
    const sink = spySink();
    const logger = createLogger("warn", sink);

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("c");
    expect(sink.error).toHaveBeenCalledWith("d");
  });
});

describe("scopedLogger", () => {
  it("prefixes every line with its scope", () => {
    const sink = spySink();
    scopedLogger(sink, "signals").info("computed", 3);

    expect(sink.info).toHaveBeenCalledWith("[signals]", "computed", 3);
  });
});
